import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const envSchema = z.object({
  DATABASE_URL: z.string(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SCRYFALL_BASE_URL: z.string().url().default('https://api.scryfall.com'),
  SCRYFALL_USER_AGENT: z.string().default('cardvault/1.0.0'),
  // Scryfall asks for 50-100ms between requests
  SCRYFALL_REQUEST_DELAY_MS: z.coerce.number().int().min(50).default(100),
  SCRYFALL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export type AppConfig = z.infer<typeof envSchema>;

export const config: AppConfig = envSchema.parse(process.env);
