/**
 * Process environment, validated once at import.
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigValidationError } from '../common/errors.js';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(1).max(65535).default(8001),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  CORS_ORIGINS: z.string().default('*'),

  MONGO_URL: z.string().optional(),
  DB_NAME: z.string().default('cycle_advisor'),

  TG_BOT_TOKEN: z.string().optional(),
  TG_ADMIN_CHAT_ID: z.string().optional(),
  ADVISOR_ALERTS_ENABLED: flag,
  ADVISOR_CRON: z.string().default('0 */6 * * *'),
  ADVISOR_CRON_ENABLED: flag,

  ENGINE_CONFIG_PATH: z.string().optional(),
  PORTFOLIO_PATH: z.string().default('config/portfolio.json'),
});

export type Env = z.infer<typeof EnvSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = EnvSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigValidationError(
      'environment',
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
    );
  }
  return result.data;
}

export const env: Env = parseEnv(process.env);
