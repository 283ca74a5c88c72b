import type { CouponRecord, Deal, SaleRecord } from '../types.js';

export const NOW = new Date('2026-03-10T12:00:00.000Z');

export const coupon = (overrides: Partial<CouponRecord> = {}): CouponRecord => ({
    productName: 'Tide Laundry Detergent 100oz',
    discountAmount: 2,
    description: '$2.00 off one Tide detergent',
    expiryDate: '03/15/2026',
    ...overrides,
});

export const sale = (overrides: Partial<SaleRecord> = {}): SaleRecord => ({
    productName: 'Tide Laundry Detergent',
    originalPrice: 12.99,
    salePrice: 8.99,
    saleDescription: 'Weekly special',
    ...overrides,
});

export const deal = (overrides: Partial<Deal> = {}): Deal => ({
    productName: 'Tide Laundry Detergent',
    originalPrice: 12.99,
    salePrice: 8.99,
    couponDiscount: 2,
    finalPrice: 6.99,
    savings: 6,
    savingsPercent: 46.19,
    couponDescription: '$2.00 off one Tide detergent',
    expiryDate: '03/15/2026',
    saleDescription: 'Weekly special',
    foundDate: NOW.toISOString(),
    ...overrides,
});
