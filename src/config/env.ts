/**
 * Environment variables, validated once at startup.
 *
 * Deployment policy lives here (dry-run switch, market, estimate constants);
 * customer identity and payment live in the order config file instead.
 */
import { z } from 'zod';
import { ConfigError } from '../domain/errors/index.js';

const flag = z
  .string()
  .optional()
  .transform(value => ['true', '1', 'yes'].includes((value ?? '').toLowerCase()));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8000),
  LOG_LEVEL: z.string().default('info'),

  /** Order config JSON (customer, address, payment, preferences) */
  CONFIG_PATH: z.string().default('/config/config.json'),

  /** Durable session record (selected store + cart) */
  STATE_PATH: z.string().default('/data/session.json'),

  /** Append-only audit trail of placement attempts */
  AUDIT_LOG_PATH: z.string().default('/data/orders.log'),

  /** Run the whole placement pipeline without the submit call */
  DRY_RUN: flag,

  /** Which regional profile of the vendor API to talk to */
  MARKET: z.enum(['CA', 'US']).default('CA'),

  /** `mock` serves an in-memory store and menu for local runs */
  VENDOR_CLIENT: z.enum(['http', 'mock']).default('http'),

  VENDOR_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),

  ESTIMATE_TAX_RATE: z.coerce.number().min(0).max(1).default(0.15),
  ESTIMATE_DELIVERY_FEE: z.coerce.number().min(0).default(4.99),

  CORS_ORIGIN: z.string().optional(),
  API_BASE_URL: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return result.data;
}
