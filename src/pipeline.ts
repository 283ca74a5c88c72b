import { log } from 'apify';
import { z } from 'zod';

import { buildDeal, meetsCriteria, sortBySavings } from './deals.js';
import { InvalidConfigError, formatZodError } from './errors.js';
import { dedupeDeals } from './history.js';
import { matchRecords } from './matcher.js';
import type { Deal, DealSnapshot, HistoryEntry, PipelineConfig, PipelineResult } from './types.js';

const pipelineConfigSchema = z.object({
    minSavingsDollar: z.number().min(0),
    minSavingsPercent: z.number().min(0).max(100),
    maxOriginalPrice: z.number().min(0),
    dedupWindowDays: z.number().int().positive(),
});

export interface DealPipeline {
    readonly config: Readonly<PipelineConfig>;
    run: (snapshot: DealSnapshot, history: readonly HistoryEntry[], now: Date) => PipelineResult;
}

export const validatePipelineConfig = (config: PipelineConfig): PipelineConfig => {
    const parsed = pipelineConfigSchema.safeParse(config);
    if (!parsed.success) throw new InvalidConfigError(formatZodError(parsed.error));
    return parsed.data;
};

/**
 * Validates the thresholds once, then runs match → build → filter → sort → dedupe over each snapshot.
 * `allDeals` is every accepted deal (for history), `newDeals` the ones not seen inside the window.
 */
export const createDealPipeline = (config: PipelineConfig): DealPipeline => {
    const validated = Object.freeze(validatePipelineConfig(config));

    const run = ({ coupons, sales }: DealSnapshot, history: readonly HistoryEntry[], now: Date): PipelineResult => {
        const pairs = matchRecords(coupons, sales);
        const accepted: Deal[] = [];

        for (const { coupon, sale, rule } of pairs) {
            const deal = buildDeal(coupon, sale, now);
            if (!deal) {
                log.warning('Skipping malformed coupon/sale pair', {
                    coupon: coupon.productName,
                    sale: sale.productName,
                });
                continue;
            }
            if (!meetsCriteria(deal, validated)) continue;

            log.debug(`Found deal: ${deal.productName} - save $${deal.savings.toFixed(2)}`, { rule });
            accepted.push(deal);
        }

        const allDeals = sortBySavings(accepted);
        const newDeals = dedupeDeals(allDeals, history, now, validated.dedupWindowDays);

        log.info(`Matched ${pairs.length} pairs, ${allDeals.length} deals accepted, ${newDeals.length} new`);

        return { allDeals, newDeals };
    };

    return { config: validated, run };
};
