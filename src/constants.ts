export const SOURCE_DELAY_MS = 2000;

export const INPUT_DEFAULTS = {
    baseUrl: 'https://giantfood.com',
    minSavingsDollar: 1.5,
    minSavingsPercent: 25,
    maxOriginalPrice: 100,
    dedupWindowDays: 3,
    maxRequestRetries: 3,
    requestTimeoutSecs: 30,
};

export const DEAL_HISTORY_KEY = 'DEAL_HISTORY';
export const DEFAULT_HISTORY_STORE = 'DEAL-HISTORY';

export const DAY_MS = 86_400_000;

// Size tokens stripped from product names. Longer spellings first so "fl oz" wins over "oz".
export const SIZE_UNITS = ['fl oz', 'oz', 'lbs', 'lb', 'ct', 'pk', 'ml', 'kg', 'g', 'gal', 'l'];

export const MIN_SHARED_WORDS = 2;

export const UNKNOWN_EXPIRY = 'Unknown';

export const SEND_MAIL_ACTOR = 'apify/send-mail';
