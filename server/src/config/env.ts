/**
 * Centralized Environment Variable Validation
 *
 * This module validates ALL environment variables at startup using Zod.
 * If validation fails, the application will fail fast with clear error messages.
 *
 * USAGE:
 * - Import `env` for type-safe access: `import { env } from './config/env.js'`
 *
 * TO ADD A NEW ENV VAR:
 * 1. Add it to the schema below with appropriate validation
 * 2. Add JSDoc comment explaining the variable
 * 3. Document it in .env.example
 */

// Load dotenv FIRST - must happen before we access process.env
// This is necessary because ES module imports are hoisted
import dotenv from 'dotenv';
dotenv.config();

import { z } from 'zod';

// ============================================
// SCHEMA DEFINITION
// ============================================

const envSchema = z
    .object({
        // ----------------------------------------
        // REQUIRED - App will not start without these
        // ----------------------------------------

        /** Secret key for signing JWTs - must be a secure random string */
        JWT_SECRET: z.string().min(1, 'JWT_SECRET is required'),

        /** PostgreSQL connection string (tests run against the in-memory store) */
        DATABASE_URL: z.string().optional(),

        // ----------------------------------------
        // OPTIONAL - With sensible defaults
        // ----------------------------------------

        /** Environment mode */
        NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

        /** Server port */
        PORT: z.coerce.number().int().positive().default(3001),

        /** Pino level override (trace|debug|info|warn|error|fatal|silent) */
        LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).optional(),

        /** JWT token expiry: seconds, or a number with s/m/h/d (e.g. 7d) */
        JWT_EXPIRY: z.string().regex(/^\d+[smhd]?$/, 'JWT_EXPIRY must look like 3600, 45m, 12h or 7d').default('7d'),

        /** Shared admin login. Defaults to admin/admin outside production. */
        ADMIN_USER: z.string().min(1).optional(),
        ADMIN_PASSWORD: z.string().min(1).optional(),

        // ----------------------------------------
        // FEATURE FLAGS
        // ----------------------------------------

        /** Token for POST /api/admin/seed. Unset disables the endpoint. */
        SEED_TOKEN: z.string().min(1).optional(),

        /** Run pending migrations on server start */
        AUTO_MIGRATE: z.enum(['true', 'false']).default('false'),

        /** Title printed on PDF reports */
        REPORT_TITLE: z.string().min(1).default('Workshop Ledger'),
    })
    .superRefine((value, ctx) => {
        if (value.NODE_ENV !== 'test' && !value.DATABASE_URL) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['DATABASE_URL'], message: 'DATABASE_URL is required' });
        }
        if (value.NODE_ENV === 'production' && (!value.ADMIN_USER || !value.ADMIN_PASSWORD)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['ADMIN_PASSWORD'],
                message: 'ADMIN_USER and ADMIN_PASSWORD are required in production',
            });
        }
    })
    .transform((value) => ({
        ...value,
        ADMIN_USER: value.ADMIN_USER ?? 'admin',
        ADMIN_PASSWORD: value.ADMIN_PASSWORD ?? 'admin',
    }));

// ============================================
// TYPE EXPORT
// ============================================

export type Env = z.infer<typeof envSchema>;

// ============================================
// PARSE AND VALIDATE
// ============================================

/**
 * Parse an environment record. Exported for tests; the app uses `env`.
 */
export function parseEnv(source: NodeJS.ProcessEnv): Env {
    return envSchema.parse(source);
}

function loadEnv(): Env {
    try {
        return parseEnv(process.env);
    } catch (error) {
        if (error instanceof z.ZodError) {
            const issues = error.issues.map(issue => {
                const path = issue.path.join('.');
                return `  - ${path}: ${issue.message}`;
            }).join('\n');

            console.error('Environment validation failed:\n' + issues);
            process.exit(1);
        }
        throw error;
    }
}

export const env = loadEnv();
