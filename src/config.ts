import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './helper/errors';
import {
    HENRIK_PLATFORMS,
    HENRIK_REGIONS,
    MAX_TIMER_DELAY_MS,
    type HenrikPlatform,
    type HenrikRegion
} from './utils/constant';

const RegionSchema = z.custom<HenrikRegion>(
    (value) => typeof value === 'string' && HENRIK_REGIONS.some((region) => region === value),
    { message: `must be one of: ${HENRIK_REGIONS.join(', ')}` }
);

const PlatformSchema = z.custom<HenrikPlatform>(
    (value) => typeof value === 'string' && HENRIK_PLATFORMS.some((platform) => platform === value),
    { message: `must be one of: ${HENRIK_PLATFORMS.join(', ')}` }
);

// Longest interval a Node timer can hold (about 24.8 days).
const MAX_INTERVAL_MINUTES = Math.floor(MAX_TIMER_DELAY_MS / 60_000);

const required = () => z.string({ required_error: 'is required' }).trim().min(1, 'is required');

// --- ENVIRONMENT SCHEMA ---
export const ConfigSchema = z.object({
    DISCORD_BOT_TOKEN: required(),
    DISCORD_APP_ID: z.string().trim().min(1).optional(),
    HENRIK_API_KEY: required(),
    HENRIK_BASE_URL: z.string().url().default('https://api.henrikdev.xyz'),
    HENRIK_REGION: z.string().trim().toLowerCase().pipe(RegionSchema).default('na'),
    HENRIK_PLATFORM: z.string().trim().toLowerCase().pipe(PlatformSchema).default('pc'),
    HENRIK_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
    REQUEST_DELAY_MS: z.coerce.number().int().nonnegative().default(2_100),
    TRACKER_INTERVAL_MINUTES: z.coerce.number().positive().max(MAX_INTERVAL_MINUTES).default(5),
    SUPABASE_PROJECT_URL: required().pipe(z.string().url()),
    SUPABASE_SERVICE_KEY: required(),
    LOG_DIR: z.string().trim().min(1).default('logs'),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Validate the process environment.
 * Empty strings are treated as unset so that optional variables fall back to their defaults.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') cleaned[key] = value;
    }

    const parsed = ConfigSchema.safeParse(cleaned);
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
        );
    }

    return parsed.data;
}

/**
 * Load `.env` (if present) and validate it.
 */
export function loadConfigFromDotenv(): Config {
    dotenv.config();
    return loadConfig(process.env);
}
