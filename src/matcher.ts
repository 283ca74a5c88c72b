import { log } from 'apify';

import { MIN_SHARED_WORDS } from './constants.js';
import { normalizeProductName } from './normalize.js';
import type { CouponRecord, CouponsByKey, NormalizedKey, SaleRecord, SalesByKey } from './types.js';

export type MatchRuleName = 'exact' | 'contains' | 'sharedWords';

export interface MatchRule {
    name: MatchRuleName;
    test: (a: NormalizedKey, b: NormalizedKey) => boolean;
}

export interface MatchedPair {
    coupon: CouponRecord;
    sale: SaleRecord;
    rule: MatchRuleName;
}

export const exactMatch = (a: NormalizedKey, b: NormalizedKey): boolean => a === b;

export const containsMatch = (a: NormalizedKey, b: NormalizedKey): boolean => a.includes(b) || b.includes(a);

const words = (key: NormalizedKey): string[] => key.split(/\s+/).filter(Boolean);

export const sharedWordsMatch = (a: NormalizedKey, b: NormalizedKey): boolean => {
    const wordsA = new Set(words(a));
    const shared = new Set(words(b).filter((word) => wordsA.has(word)));
    return shared.size >= MIN_SHARED_WORDS;
};

// Evaluated in order; the first rule that passes names the match.
export const MATCH_RULES: readonly MatchRule[] = [
    { name: 'exact', test: exactMatch },
    { name: 'contains', test: containsMatch },
    { name: 'sharedWords', test: sharedWordsMatch },
];

export const findMatchRule = (couponKey: NormalizedKey, saleKey: NormalizedKey): MatchRuleName | null => {
    // An empty key is a substring of everything.
    if (!couponKey || !saleKey) return null;
    return MATCH_RULES.find((rule) => rule.test(couponKey, saleKey))?.name ?? null;
};

/**
 * Pairs every coupon with every sale it matches. A coupon may pair with several sales and vice versa;
 * nothing is ranked or collapsed here.
 */
export const matchRecords = (coupons: CouponsByKey, sales: SalesByKey): MatchedPair[] => {
    const couponEntries = [...coupons.entries()].map(([key, coupon]) => ({ key: normalizeProductName(key), coupon }));
    const saleEntries = [...sales.entries()].map(([key, sale]) => ({ key: normalizeProductName(key), sale }));

    log.debug(`Matching ${couponEntries.length} coupons with ${saleEntries.length} sales`);

    const pairs: MatchedPair[] = [];
    for (const { key: couponKey, coupon } of couponEntries) {
        for (const { key: saleKey, sale } of saleEntries) {
            const rule = findMatchRule(couponKey, saleKey);
            if (rule) pairs.push({ coupon, sale, rule });
        }
    }

    return pairs;
};
