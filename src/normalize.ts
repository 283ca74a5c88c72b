import { SIZE_UNITS } from './constants.js';
import type { NormalizedKey } from './types.js';

const SIZE_TOKEN = new RegExp(
    String.raw`\b\d+(?:\.\d+)?\s*(?:${SIZE_UNITS.map((unit) => unit.replace(/ /g, String.raw`\s+`)).join('|')})\b`,
    'g',
);

/**
 * Canonical comparison key for a product name: lower-cased, size tokens ("12 oz", "1.5lb", "24 ct")
 * removed, whitespace collapsed.
 */
export const normalizeProductName = (name: string): NormalizedKey => {
    let key = name.toLowerCase();
    // Removing one token can leave a number next to another unit ("3 12oz l"), so strip until stable.
    let previous: string;
    do {
        previous = key;
        key = key.replace(SIZE_TOKEN, '');
    } while (key !== previous);

    return key.replace(/\s+/g, ' ').trim();
};
