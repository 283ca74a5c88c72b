import { log } from 'apify';

import { DAY_MS, DEAL_HISTORY_KEY } from './constants.js';
import type { Deal, DealHistory, HistoryEntry } from './types.js';
import { parseTimestamp, roundMoney } from './utils.js';

const isHistoryEntry = (value: unknown): value is HistoryEntry => {
    if (typeof value !== 'object' || value === null) return false;
    return (
        'productName' in value &&
        typeof value.productName === 'string' &&
        'finalPrice' in value &&
        typeof value.finalPrice === 'number'
    );
};

/** The slice of an Apify KeyValueStore that history persistence needs. */
export interface HistoryStorage {
    getValue(key: string): Promise<unknown>;
    setValue(key: string, value: DealHistory): Promise<void>;
}

export async function loadHistory(store: HistoryStorage): Promise<DealHistory> {
    const stored = await store.getValue(DEAL_HISTORY_KEY);
    if (!Array.isArray(stored)) return [];

    const history = stored.filter(isHistoryEntry);
    if (history.length < stored.length) {
        log.warning(`Ignoring ${stored.length - history.length} malformed history entries`);
    }
    return history;
}

export async function saveHistory(store: HistoryStorage, history: DealHistory): Promise<void> {
    await store.setValue(DEAL_HISTORY_KEY, history);
}

export const dealSignature = (productName: string, finalPrice: number): string => `${productName}_${finalPrice}`;

const windowStart = (now: Date, windowDays: number): number => now.getTime() - windowDays * DAY_MS;

// Entries without a parsable foundDate never count as recent.
const isRecent = (entry: HistoryEntry, cutoff: number): boolean => {
    const foundAt = parseTimestamp(entry.foundDate);
    return foundAt !== null && foundAt > cutoff;
};

/**
 * Drops candidates whose signature was already recorded strictly after `now - windowDays`.
 * Survivors keep their input order.
 */
export function dedupeDeals(
    candidates: readonly Deal[],
    history: readonly HistoryEntry[],
    now: Date,
    windowDays: number,
): Deal[] {
    const cutoff = windowStart(now, windowDays);
    const recentSignatures = new Set(
        history.filter((entry) => isRecent(entry, cutoff)).map((entry) => dealSignature(entry.productName, entry.finalPrice)),
    );

    return candidates.filter((deal) => !recentSignatures.has(dealSignature(deal.productName, deal.finalPrice)));
}

/** Appends this run's deals and forgets entries that can no longer suppress anything. */
export function mergeHistory(
    history: readonly HistoryEntry[],
    deals: readonly Deal[],
    now: Date,
    windowDays: number,
): DealHistory {
    const cutoff = windowStart(now, windowDays);
    return [...history.filter((entry) => isRecent(entry, cutoff)), ...deals];
}

export function logDealStats(allDeals: readonly Deal[], newDeals: readonly Deal[]): void {
    const totalSavings = newDeals.reduce((sum, deal) => sum + deal.savings, 0);
    log.info('Deal stats', {
        acceptedDeals: allDeals.length,
        newDeals: newDeals.length,
        repeatedDeals: allDeals.length - newDeals.length,
        newDealSavings: roundMoney(totalSavings),
    });
}
