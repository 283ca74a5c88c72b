import { log } from 'apify';
import { load } from 'cheerio';
import { HttpCrawler } from 'crawlee';

import { normalizeProductName } from '../normalize.js';
import type { Input, SaleRecord, SalesByKey } from '../types.js';
import { createProxyConfig, firstPrice, firstText, formatMoney } from '../utils.js';

const WEEKLY_AD_PATH = '/coupons-weekly-circular/weekly-ad';
const SOURCE = 'sales' as const;
const LOG_PREFIX = `[${SOURCE}]`;

const CARD_SELECTOR = "[data-testid='sale-item'], .sale-item, .product-card";
const NAME_SELECTORS = ['.product-name', '.item-name', 'h3', 'h4', '[data-testid="product-name"]'];
const SALE_PRICE_SELECTORS = ['.sale-price', '.current-price', '.price-now', '[data-testid="sale-price"]'];
const ORIGINAL_PRICE_SELECTORS = ['.original-price', '.was-price', '.price-was', '[data-testid="original-price"]'];
const DESCRIPTION_SELECTORS = ['.sale-description', '.promo-text', '.deal-text'];

/**
 * Sale cards on a weekly-ad page. Without a "was" price the original price falls back to the sale price,
 * so the sale alone contributes no savings. Cards without a name or a positive sale price are skipped.
 */
export const parseSalePage = (html: string): SaleRecord[] => {
    const $ = load(html);

    return $(CARD_SELECTOR)
        .toArray()
        .flatMap((card): SaleRecord[] => {
            const $card = $(card);
            const productName = firstText($card, NAME_SELECTORS);
            const salePrice = firstPrice($card, SALE_PRICE_SELECTORS);
            if (!productName || !salePrice) return [];

            return [
                {
                    productName,
                    originalPrice: firstPrice($card, ORIGINAL_PRICE_SELECTORS) ?? salePrice,
                    salePrice,
                    saleDescription: firstText($card, DESCRIPTION_SELECTORS) ?? `On sale for ${formatMoney(salePrice)}`,
                },
            ];
        });
};

export const keySales = (sales: SaleRecord[]): SalesByKey =>
    new Map(sales.map((sale) => [normalizeProductName(sale.productName), sale]));

export const scrapeSales = async (input: Input): Promise<SalesByKey> => {
    const found: SaleRecord[] = [];
    const proxyConfiguration = await createProxyConfig(input);

    const crawler = new HttpCrawler({
        proxyConfiguration,
        maxRequestRetries: input.maxRequestRetries,
        navigationTimeoutSecs: input.requestTimeoutSecs,
        async requestHandler({ request, body }) {
            log.info(`${LOG_PREFIX} Fetching weekly ad`, { url: request.url });

            const sales = parseSalePage(body.toString());
            if (sales.length === 0) {
                log.warning(`${LOG_PREFIX} No sale items found on page`, { url: request.url });
            }
            found.push(...sales);
        },
        failedRequestHandler({ request }, error) {
            log.error(`${LOG_PREFIX} Failed to load weekly ad`, { url: request.url, error: error.message });
        },
    });

    await crawler.run([{ url: new URL(WEEKLY_AD_PATH, input.baseUrl).href, uniqueKey: SOURCE }]);

    const sales = keySales(found);
    log.info(`${LOG_PREFIX} Done. Scraped ${sales.size} sale items.`);

    return sales;
};
