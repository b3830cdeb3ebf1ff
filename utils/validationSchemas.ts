// utils/validationSchemas.ts
import { z } from 'zod';
import { CONSTANTS } from './constants';

/**
 * Reusable Validation Rules
 */
const rules = {
    city: z.string({ required_error: 'City is required', invalid_type_error: 'City must be a single value' })
        .trim()
        .min(1, 'City is required')
        .max(CONSTANTS.CITY.MAX_LENGTH, `City cannot exceed ${CONSTANTS.CITY.MAX_LENGTH} characters`),

    // Out-of-range or non-numeric limits fall back to the default
    historyLimit: z.coerce.number()
        .int()
        .min(1)
        .max(CONSTANTS.HISTORY.MAX_LIMIT)
        .catch(CONSTANTS.HISTORY.DEFAULT_LIMIT),
};

// GET /weather?city=
export const weatherQuerySchema = z.object({
    city: rules.city,
});

// GET /weather/history?city=&limit=
export const historyQuerySchema = z.object({
    city: rules.city,
    limit: rules.historyLimit,
});

// DELETE /weather/cache?city=
export const cacheQuerySchema = z.object({
    city: rules.city,
});
