import { log } from 'apify';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { InvalidConfigError } from '../errors.js';
import { createDealPipeline } from '../pipeline.js';
import type { DealSnapshot, PipelineConfig } from '../types.js';
import { NOW, coupon, sale } from './fixtures.js';

const config: PipelineConfig = {
    minSavingsDollar: 1.5,
    minSavingsPercent: 25,
    maxOriginalPrice: 100,
    dedupWindowDays: 3,
};

const tideSnapshot = (): DealSnapshot => ({
    coupons: new Map([['tide 100oz', coupon({ productName: 'Tide 100oz', discountAmount: 2 })]]),
    sales: new Map([['tide detergent', sale({ productName: 'Tide Detergent', originalPrice: 12.99, salePrice: 8.99 })]]),
});

describe('createDealPipeline', () => {
    beforeEach(() => {
        vi.spyOn(log, 'info').mockReturnValue(undefined);
        vi.spyOn(log, 'debug').mockReturnValue(undefined);
        vi.spyOn(log, 'warning').mockReturnValue(undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should find a coupon-plus-sale deal end to end', () => {
        const { allDeals, newDeals } = createDealPipeline(config).run(tideSnapshot(), [], NOW);

        expect(allDeals).toHaveLength(1);
        expect(allDeals[0]).toMatchObject({
            productName: 'Tide Detergent',
            originalPrice: 12.99,
            salePrice: 8.99,
            couponDiscount: 2,
            finalPrice: 6.99,
            savings: 6,
            foundDate: '2026-03-10T12:00:00.000Z',
        });
        expect(allDeals[0].savingsPercent).toBeCloseTo(46.19, 2);
        expect(newDeals).toEqual(allDeals);
    });

    it('should drop deals that fail the criteria', () => {
        const pipeline = createDealPipeline({ ...config, maxOriginalPrice: 10 });

        expect(pipeline.run(tideSnapshot(), [], NOW)).toEqual({ allDeals: [], newDeals: [] });
    });

    it('should keep repeated deals in allDeals but not in newDeals', () => {
        const history = [{ productName: 'Tide Detergent', finalPrice: 6.99, foundDate: '2026-03-09T08:00:00.000Z' }];

        const { allDeals, newDeals } = createDealPipeline(config).run(tideSnapshot(), history, NOW);

        expect(allDeals).toHaveLength(1);
        expect(newDeals).toEqual([]);
    });

    it('should report a deal again once its history entry has aged out', () => {
        const history = [{ productName: 'Tide Detergent', finalPrice: 6.99, foundDate: '2026-03-01T08:00:00.000Z' }];

        const { newDeals } = createDealPipeline(config).run(tideSnapshot(), history, NOW);

        expect(newDeals.map((deal) => deal.productName)).toEqual(['Tide Detergent']);
    });

    it('should sort by savings and keep equal savings in pair order', () => {
        const snapshot: DealSnapshot = {
            coupons: new Map([
                ['cheerios', coupon({ productName: 'Cheerios', discountAmount: 1 })],
                ['tide', coupon({ productName: 'Tide', discountAmount: 1 })],
                ['milk', coupon({ productName: 'Milk', discountAmount: 2 })],
            ]),
            sales: new Map([
                ['tide detergent', sale({ productName: 'Tide Detergent', originalPrice: 10, salePrice: 8 })],
                ['cheerios cereal', sale({ productName: 'Cheerios Cereal', originalPrice: 5, salePrice: 3 })],
                ['whole milk', sale({ productName: 'Whole Milk', originalPrice: 6, salePrice: 4 })],
            ]),
        };

        const { allDeals } = createDealPipeline(config).run(snapshot, [], NOW);

        expect(allDeals.map((deal) => [deal.productName, deal.savings])).toEqual([
            ['Whole Milk', 4],
            ['Cheerios Cereal', 3],
            ['Tide Detergent', 3],
        ]);
    });

    it('should keep equal savings in pair order when a key is only digits', () => {
        const snapshot: DealSnapshot = {
            coupons: new Map([
                ['organic milk', coupon({ productName: 'Organic Milk', discountAmount: 1, description: 'milk coupon' })],
                ['365 12 oz', coupon({ productName: '365 12 oz', discountAmount: 1, description: 'store brand coupon' })],
            ]),
            sales: new Map([
                ['organic milk 365', sale({ productName: 'Organic Milk 365', originalPrice: 6, salePrice: 4 })],
            ]),
        };

        const { allDeals } = createDealPipeline(config).run(snapshot, [], NOW);

        expect(allDeals.map((deal) => [deal.couponDescription, deal.savings])).toEqual([
            ['milk coupon', 3],
            ['store brand coupon', 3],
        ]);
    });

    it('should skip and log malformed pairs without failing the run', () => {
        const snapshot: DealSnapshot = {
            coupons: new Map([
                ...tideSnapshot().coupons,
                ['tide detergent', coupon({ productName: 'Tide Detergent', discountAmount: Number.NaN })],
            ]),
            sales: tideSnapshot().sales,
        };

        const { allDeals } = createDealPipeline(config).run(snapshot, [], NOW);

        expect(allDeals.map((deal) => deal.couponDiscount)).toEqual([2]);
        expect(log.warning).toHaveBeenCalledWith('Skipping malformed coupon/sale pair', {
            coupon: 'Tide Detergent',
            sale: 'Tide Detergent',
        });
    });

    it('should reject negative thresholds up front', () => {
        expect(() => createDealPipeline({ ...config, minSavingsDollar: -1 })).toThrow(InvalidConfigError);
        expect(() => createDealPipeline({ ...config, minSavingsDollar: -1 })).toThrow(/minSavingsDollar/);
    });

    it('should reject a percentage above 100', () => {
        expect(() => createDealPipeline({ ...config, minSavingsPercent: 150 })).toThrow(/minSavingsPercent/);
    });

    it('should reject a window that is not a positive whole number of days', () => {
        expect(() => createDealPipeline({ ...config, dedupWindowDays: 0 })).toThrow(InvalidConfigError);
        expect(() => createDealPipeline({ ...config, dedupWindowDays: 1.5 })).toThrow(InvalidConfigError);
    });

    it('should expose the validated configuration', () => {
        expect(createDealPipeline(config).config).toEqual(config);
    });
});
