import { setTimeout } from 'node:timers/promises';

import { Actor, log } from 'apify';

import { DEFAULT_HISTORY_STORE } from './constants.js';
import { loadHistory, logDealStats, mergeHistory, saveHistory } from './history.js';
import { parseInput } from './input.js';
import { sendDealsNotification } from './notify.js';
import { createDealPipeline } from './pipeline.js';
import { scrapeAll } from './sources.js';

await Actor.init();

Actor.on('aborting', async () => {
    // Temporary workaround until SDK implements proper state persistence in the aborting event:
    // https://github.com/apify/apify-sdk-js/pull/561
    await setTimeout(1000);
    await Actor.exit();
});

const input = parseInput(await Actor.getInput());
// Thresholds are checked before anything is scraped.
const pipeline = createDealPipeline(input);

log.info('Starting double-deal check', {
    baseUrl: input.baseUrl,
    minSavingsDollar: input.minSavingsDollar,
    minSavingsPercent: input.minSavingsPercent,
    maxOriginalPrice: input.maxOriginalPrice,
    dedupWindowDays: input.dedupWindowDays,
    notify: input.notificationEmail !== null,
});

const historyStore = await Actor.openKeyValueStore(input.historyStoreId || DEFAULT_HISTORY_STORE);
const history = await loadHistory(historyStore);

const snapshot = await scrapeAll(input);
const now = new Date();
const { allDeals, newDeals } = pipeline.run(snapshot, history, now);

const newDealSet = new Set(newDeals);
await Actor.pushData(allDeals.map((deal) => ({ ...deal, isNew: newDealSet.has(deal) })));
await saveHistory(historyStore, mergeHistory(history, allDeals, now, input.dedupWindowDays));

logDealStats(allDeals, newDeals);

if (newDeals.length > 0) {
    await sendDealsNotification(input.notificationEmail, newDeals, now);
} else {
    log.info('No new deals found');
}

log.info(`Done. Found ${allDeals.length} deals, ${newDeals.length} new.`);
await Actor.exit();
