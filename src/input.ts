import { z } from 'zod';

import { INPUT_DEFAULTS } from './constants.js';
import { InvalidInputError, formatZodError } from './errors.js';
import type { Input } from './types.js';

// The Console sends "" for cleared optional text fields.
const emptyToUndefined = (value: unknown): unknown =>
    typeof value === 'string' && value.trim() === '' ? undefined : value;

const inputSchema: z.ZodType<Input, z.ZodTypeDef, unknown> = z.object({
    baseUrl: z.preprocess(emptyToUndefined, z.string().url().default(INPUT_DEFAULTS.baseUrl)),
    minSavingsDollar: z.number().min(0).default(INPUT_DEFAULTS.minSavingsDollar),
    minSavingsPercent: z.number().min(0).max(100).default(INPUT_DEFAULTS.minSavingsPercent),
    maxOriginalPrice: z.number().min(0).default(INPUT_DEFAULTS.maxOriginalPrice),
    dedupWindowDays: z.number().int().positive().default(INPUT_DEFAULTS.dedupWindowDays),
    notificationEmail: z.preprocess(emptyToUndefined, z.string().email().nullable().default(null)),
    historyStoreId: z.preprocess(emptyToUndefined, z.string().optional()),
    maxRequestRetries: z.number().int().min(0).default(INPUT_DEFAULTS.maxRequestRetries),
    requestTimeoutSecs: z.number().int().positive().default(INPUT_DEFAULTS.requestTimeoutSecs),
    proxyConfiguration: z
        .object({
            useApifyProxy: z.boolean().optional(),
            apifyProxyGroups: z.array(z.string()).optional(),
            apifyProxyCountry: z.string().optional(),
            proxyUrls: z.array(z.string()).optional(),
        })
        .optional(),
});

/** Applies defaults to raw Actor input; throws InvalidInputError listing every bad field. */
export const parseInput = (raw: unknown): Input => {
    const parsed = inputSchema.safeParse(raw ?? {});
    if (!parsed.success) throw new InvalidInputError(formatZodError(parsed.error));
    return parsed.data;
};
