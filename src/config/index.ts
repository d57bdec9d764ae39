/**
 * Lending Hub - Configuration
 * Environment is loaded by dotenv and parsed once at startup
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3001),
  DATABASE_URL: z.string().url().optional(),
  ADMIN_API_KEY: z.string().min(1).optional(),
  HUB_API_KEY: z.string().min(1).optional(),
  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(120),
});

export type AppConfig = z.infer<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`[Config] Invalid environment: ${issues}`);
  }
  if (!parsed.data.ADMIN_API_KEY) {
    console.warn('[Config] ADMIN_API_KEY is not set. Admin requests will be rejected.');
  }
  if (!parsed.data.HUB_API_KEY) {
    console.warn('[Config] HUB_API_KEY is not set. Action messages will be rejected.');
  }
  return parsed.data;
}
