import { Actor, log } from 'apify';

import { SEND_MAIL_ACTOR } from './constants.js';
import type { Deal } from './types.js';
import { escapeHtml, formatMoney, roundMoney } from './utils.js';

const totalSavings = (deals: readonly Deal[]): number => roundMoney(deals.reduce((sum, deal) => sum + deal.savings, 0));

const formatTimestamp = (date: Date): string => date.toISOString().slice(0, 16).replace('T', ' ');

const formatPercent = (deal: Deal): string => `${deal.savingsPercent.toFixed(0)}% off`;

const countDeals = (count: number): string => `${count} ${count === 1 ? 'deal' : 'deals'}`;

export const buildDealsSubject = (deals: readonly Deal[]): string =>
    `${deals.length} double-savings ${deals.length === 1 ? 'deal' : 'deals'} found`;

export const formatDealsText = (deals: readonly Deal[], generatedAt: Date): string => {
    const lines = [
        'Double-savings alert',
        '',
        `Found ${countDeals(deals.length)} with both a sale and a digital coupon.`,
        `Total potential savings: ${formatMoney(totalSavings(deals))}`,
        '',
        'Clip the coupons before shopping and check the expiry dates.',
        '',
        'DEALS FOUND:',
    ];

    deals.forEach((deal, index) => {
        lines.push(
            '',
            `${index + 1}. ${deal.productName}`,
            `   Was: ${formatMoney(deal.originalPrice)} -> Sale: ${formatMoney(deal.salePrice)} -> Final: ${formatMoney(deal.finalPrice)}`,
            `   You save: ${formatMoney(deal.savings)} (${formatPercent(deal)})`,
            `   Coupon: ${deal.couponDescription} (expires: ${deal.expiryDate})`,
            `   Sale: ${deal.saleDescription}`,
        );
    });

    lines.push('', `Generated ${formatTimestamp(generatedAt)} UTC`);
    return lines.join('\n');
};

export const formatDealsHtml = (deals: readonly Deal[], generatedAt: Date): string => {
    const items = deals
        .map(
            (deal, index) => `
    <li>
      <h3>${index + 1}. ${escapeHtml(deal.productName)}</h3>
      <p>Was: ${formatMoney(deal.originalPrice)} | Sale: ${formatMoney(deal.salePrice)} | After coupon: <strong>${formatMoney(deal.finalPrice)}</strong></p>
      <p>Save <strong>${formatMoney(deal.savings)}</strong> (${formatPercent(deal)})</p>
      <p>Coupon: ${escapeHtml(deal.couponDescription)} (expires: ${escapeHtml(deal.expiryDate)})<br>Sale: ${escapeHtml(deal.saleDescription)}</p>
    </li>`,
        )
        .join('');

    return `<html>
  <body>
    <h1>Double-savings alert</h1>
    <p>Found <strong>${countDeals(deals.length)}</strong> with both a sale and a digital coupon. Total potential savings: <strong>${formatMoney(totalSavings(deals))}</strong></p>
    <ol>${items}
    </ol>
    <p>Generated ${formatTimestamp(generatedAt)} UTC</p>
  </body>
</html>`;
};

/** Emails the new deals through the send-mail Actor. A failed send is logged, not rethrown. */
export const sendDealsNotification = async (
    email: string | null,
    deals: readonly Deal[],
    now: Date,
): Promise<boolean> => {
    if (!email) {
        log.info('No notification email configured, skipping notification');
        return false;
    }
    if (deals.length === 0) {
        log.info('No deals to email');
        return false;
    }

    try {
        await Actor.call(SEND_MAIL_ACTOR, {
            to: email,
            subject: buildDealsSubject(deals),
            text: formatDealsText(deals, now),
            html: formatDealsHtml(deals, now),
        });
        log.info(`Email sent with ${deals.length} deals`, { to: email });
        return true;
    } catch (error) {
        log.error('Failed to send deals email', { error: error instanceof Error ? error.message : String(error) });
        return false;
    }
};
