/**
 * Config Schema - Zod parsing for environment-provided settings
 */

import { z } from 'zod';

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

// Optional sign then ASCII digits, no surrounding whitespace
export const IterationsSchema = z
    .string()
    .regex(/^[+-]?[0-9]+$/)
    .transform(value => Number.parseInt(value, 10))
    .refine(value => value >= INT32_MIN && value <= INT32_MAX);

export const LogFilePathSchema = z.string().min(1);

export const RunEnvSchema = z.object({
    LOG_MESSAGE: z.string().optional(),
    ITERATIONS: z.string().optional(),
    LOG_FILE: z.string().optional(),
});

export type RunEnv = z.infer<typeof RunEnvSchema>;
