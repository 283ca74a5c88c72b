import { log } from 'apify';
import { load } from 'cheerio';
import { HttpCrawler } from 'crawlee';

import { UNKNOWN_EXPIRY } from '../constants.js';
import { normalizeProductName } from '../normalize.js';
import type { CouponRecord, CouponsByKey, Input } from '../types.js';
import { createProxyConfig, firstText, parsePrice } from '../utils.js';

const COUPONS_PATH = '/coupons-weekly-circular/digital-coupons';
const SOURCE = 'coupons' as const;
const LOG_PREFIX = `[${SOURCE}]`;

const CARD_SELECTOR = "[data-testid='coupon-card'], .coupon-card, .coupon-item";
const NAME_SELECTORS = ['.product-name', '.coupon-title', 'h3', 'h4', '[data-testid="product-name"]'];
const DISCOUNT_SELECTORS = ['.discount-amount', '.coupon-value', '.savings', '[data-testid="discount"]'];
const EXPIRY_SELECTORS = ['.expiry-date', '.expires', '.valid-until'];
const DESCRIPTION_SELECTORS = ['.coupon-description', '.qualifying-products', '.details'];

/** Coupon cards on a digital-coupons page; cards without a name or a dollar amount are skipped. */
export const parseCouponPage = (html: string): CouponRecord[] => {
    const $ = load(html);

    return $(CARD_SELECTOR)
        .toArray()
        .flatMap((card): CouponRecord[] => {
            const $card = $(card);
            const productName = firstText($card, NAME_SELECTORS);
            const discountText = firstText($card, DISCOUNT_SELECTORS);
            const discountAmount = parsePrice(discountText);
            if (!productName || !discountText || discountAmount === null) return [];

            return [
                {
                    productName,
                    discountAmount,
                    description: firstText($card, DESCRIPTION_SELECTORS) ?? discountText,
                    expiryDate: firstText($card, EXPIRY_SELECTORS) ?? UNKNOWN_EXPIRY,
                },
            ];
        });
};

export const keyCoupons = (coupons: CouponRecord[]): CouponsByKey =>
    new Map(coupons.map((coupon) => [normalizeProductName(coupon.productName), coupon]));

export const scrapeCoupons = async (input: Input): Promise<CouponsByKey> => {
    const found: CouponRecord[] = [];
    const proxyConfiguration = await createProxyConfig(input);

    const crawler = new HttpCrawler({
        proxyConfiguration,
        maxRequestRetries: input.maxRequestRetries,
        navigationTimeoutSecs: input.requestTimeoutSecs,
        async requestHandler({ request, body }) {
            log.info(`${LOG_PREFIX} Fetching digital coupons`, { url: request.url });

            const coupons = parseCouponPage(body.toString());
            if (coupons.length === 0) {
                log.warning(`${LOG_PREFIX} No coupon cards found on page`, { url: request.url });
            }
            found.push(...coupons);
        },
        failedRequestHandler({ request }, error) {
            log.error(`${LOG_PREFIX} Failed to load coupons page`, { url: request.url, error: error.message });
        },
    });

    await crawler.run([{ url: new URL(COUPONS_PATH, input.baseUrl).href, uniqueKey: SOURCE }]);

    const coupons = keyCoupons(found);
    log.info(`${LOG_PREFIX} Done. Scraped ${coupons.size} digital coupons.`);

    return coupons;
};
