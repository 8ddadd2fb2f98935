import { z } from 'zod';

const optionalUrl = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
  z.string().trim().url().optional()
);

export const configSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  MODE: z.enum(['server', 'stdio', 'mcp-stdio']).default('server'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().max(65535).default(8080),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  GRAMADOIR_BASE_URL: optionalUrl,
  SPELLCHECK_BASE_URL: optionalUrl,
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(6000),
  UPSTREAM_RETRIES: z.coerce.number().int().min(0).max(10).default(2)
});

export type AppConfig = z.infer<typeof configSchema>;
export type GatewayMode = AppConfig['MODE'];
