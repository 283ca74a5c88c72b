import { setTimeout } from 'node:timers/promises';

import { log } from 'apify';

import { SOURCE_DELAY_MS } from './constants.js';
import { scrapeCoupons } from './scrapers/coupons.js';
import { scrapeSales } from './scrapers/sales.js';
import type { DealSnapshot, Input } from './types.js';

export const scrapeAll = async (input: Input): Promise<DealSnapshot> => {
    const coupons = await scrapeCoupons(input);
    await setTimeout(SOURCE_DELAY_MS);
    const sales = await scrapeSales(input);

    log.info(`Total scraped: ${coupons.size} coupons, ${sales.size} sales`);

    return { coupons, sales };
};
