import path from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

/**
 * Environment configuration
 *
 * Parsed once at startup; an invalid value stops the process before the
 * server is built.
 */
export const ConfigSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    HOST: z.string().default('0.0.0.0'),
    /** Availability file, read once at startup */
    AVAILABILITY_PATH: z.string().default(path.resolve(__dirname, '../data/availability.json')),
    /** Date assumed when a message names none */
    DEFAULT_DATE: z.string().regex(/^\d{4}-\d{2}-\d{2}$/).default('2026-02-20'),
    RESTAURANT_NAME: z.string().min(1).default('Bella Roma'),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type Config = z.infer<typeof ConfigSchema>;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): Config => ConfigSchema.parse(env);

/**
 * Load `.env` from the project root into `process.env`
 *
 * Variables already set in the environment win over the file. A missing file is ignored.
 */
export const loadEnvFile = (root: string = path.resolve(__dirname, '..')) => {
    loadDotenv({ path: path.join(root, '.env') });
};
