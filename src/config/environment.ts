import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// Determine which .env file to load based on NODE_ENV
const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
const envPath = path.resolve(process.cwd(), envFile);

const loadEnvResult = dotenv.config({ path: envPath });

if (loadEnvResult.error) {
    if (process.env.NODE_ENV !== 'production' && process.env.NODE_ENV !== 'test') {
        // Logger reads its level from process.env, so it is not ready to report this yet
        console.warn(`⚠️ [ENV] Could not find ${envFile} file. Relying on system environment variables.`);
    }
    if (loadEnvResult.error.message.includes('Failed to load')) {
        console.error(`❌ [ENV] Error loading ${envFile}: ${loadEnvResult.error.message}`);
    }
}

const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: z.coerce.number().int().positive().default(5000),
    DATABASE_URL: z.string().url({ message: 'DATABASE_URL must be a valid PostgreSQL connection string URL' }),
    DB_POOL_MAX: z.coerce.number().int().positive().default(10),
    CORS_ORIGIN: z.string().default('*'),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
    // Upper bound for a captured request body, in body-parser notation ('20kb', '1mb')
    BODY_LIMIT: z.string().regex(/^\d+(b|kb|mb)$/i, { message: "BODY_LIMIT must look like '20kb' or '1mb'" }).default('20kb'),
    BCRYPT_SALT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
    RATE_LIMIT_WINDOW_MINUTES: z.coerce.number().int().positive().default(15),
    RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
});

const parsedEnv = envSchema.safeParse(process.env);

if (!parsedEnv.success) {
    console.error('❌ [ENV] Invalid environment variables:');
    parsedEnv.error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
}

export const env = parsedEnv.data;

export type Environment = typeof env;
