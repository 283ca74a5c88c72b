import type { z } from 'zod';

export const formatZodError = (error: z.ZodError): string => {
    const flat = error.flatten();
    const fieldLines = Object.entries(flat.fieldErrors).flatMap(([field, messages]) =>
        (messages ?? []).map((message) => `${field}: ${message}`),
    );
    const formLines = flat.formErrors.map((message) => `input: ${message}`);
    return [...fieldLines, ...formLines].join('\n');
};

export class InvalidInputError extends Error {
    constructor(readonly issues: string) {
        super(`Invalid Actor input:\n${issues}`);
        this.name = 'InvalidInputError';
    }
}

export class InvalidConfigError extends Error {
    constructor(readonly issues: string) {
        super(`Invalid deal pipeline configuration:\n${issues}`);
        this.name = 'InvalidConfigError';
    }
}
