import { Actor, type ProxyConfiguration } from 'apify';
import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';

import type { Input } from './types.js';

export const roundMoney = (value: number): number => Math.round(value * 100) / 100;

export const formatMoney = (value: number): string => `$${value.toFixed(2)}`;

/** First dollar amount in a label such as "$2.00 off" or "Save 1.5", or null when there is none. */
export const parsePrice = (text: string | null | undefined): number | null => {
    if (!text) return null;
    const match = /\$?(\d+(?:\.\d+)?)/.exec(text);
    if (!match) return null;
    const value = Number.parseFloat(match[1]);
    return Number.isNaN(value) ? null : value;
};

/** Trimmed text of the first selector that yields any inside `$card`, or null. */
export const firstText = <T extends AnyNode>($card: Cheerio<T>, selectors: readonly string[]): string | null => {
    for (const selector of selectors) {
        const text = $card.find(selector).first().text().trim();
        if (text) return text;
    }
    return null;
};

export const firstPrice = <T extends AnyNode>($card: Cheerio<T>, selectors: readonly string[]): number | null => {
    for (const selector of selectors) {
        const price = parsePrice($card.find(selector).first().text().trim());
        if (price !== null) return price;
    }
    return null;
};

/** Epoch milliseconds of an ISO-like timestamp, or null when it is missing or unparsable. */
export const parseTimestamp = (value: string | null | undefined): number | null => {
    if (!value) return null;
    const time = new Date(value).getTime();
    return Number.isNaN(time) ? null : time;
};

export const escapeHtml = (text: string): string =>
    text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');

/** Proxy only when the input asks for one, so local runs without an Apify token go direct. */
export const createProxyConfig = async (input: Input): Promise<ProxyConfiguration | undefined> =>
    input.proxyConfiguration ? Actor.createProxyConfiguration(input.proxyConfiguration) : undefined;
