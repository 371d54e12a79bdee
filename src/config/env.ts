// src/config/env.ts

import { z } from 'zod';
import dotenv from 'dotenv';
import path from 'path';
import { ErrorFactory } from '../core/errors/errorFactory';

// Load environment variables from project root, not process.cwd()
dotenv.config({ path: path.resolve(__dirname, '../../.env') });

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'critical', 'silent'] as const;
export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

/**
 * Environment Variable Schema
 * Numeric settings arrive as strings and are coerced.
 */
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

    // Logging
    LOG_LEVEL: z.enum(LOG_LEVEL_NAMES).optional(),

    // Failure sink: one timestamped stack trace per failed task
    EXCEPTION_PATH: z.string().min(1).optional(),

    // Admission control
    ADMISSION_HIGH_WATER_FACTOR: z.coerce.number().int().positive().default(2),
    ADMISSION_LOW_WATER_FACTOR: z.coerce.number().int().positive().default(1),
    ADMISSION_MAX_WAIT_MS: z.coerce.number().int().nonnegative().default(2047),

    // Cross-thread bridge
    BRIDGE_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
}).superRefine((env, ctx) => {
    if (env.ADMISSION_LOW_WATER_FACTOR > env.ADMISSION_HIGH_WATER_FACTOR) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['ADMISSION_LOW_WATER_FACTOR'],
            message: 'ADMISSION_LOW_WATER_FACTOR must not exceed ADMISSION_HIGH_WATER_FACTOR',
        });
    }
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates a raw environment record, raising a ConfigurationError listing every issue.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
    const result = envSchema.safeParse(source);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw ErrorFactory.configuration(`Invalid environment configuration (${issues.join('; ')})`, {
            operation: 'parseEnv',
            suggestion: 'Check the variables in .env against .env.example',
            details: issues,
        });
    }
    return result.data;
}

export const ENV = parseEnv(process.env);
