/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

const clockTime = z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'Expected HH:mm');

/**
 * Relay configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      env: z.enum(['development', 'test', 'production']).default('development'),
    })
    .default({}),

  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      format: z.enum(['json', 'pretty']).default('pretty'),
      filePath: z.string().optional(),
    })
    .default({}),

  relay: z
    .object({
      host: z.string().default('0.0.0.0'),
      port: z.number().int().min(0).max(65535).default(9999),
      idleProbeMs: z.number().int().positive().default(5000),
    })
    .default({}),

  upstream: z
    .object({
      host: z.string().min(1).default('127.0.0.1'),
      lookupPort: z.number().int().min(1).max(65535).default(9100),
      requestTimeoutSec: z.number().positive().default(30),
    })
    .default({}),

  session: z
    .object({
      open: clockTime.default('09:30'),
      close: clockTime.default('16:00'),
      intervalSeconds: z.number().int().positive().default(60),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  NODE_ENV: 'app.env',
  LOG_LEVEL: 'logging.level',
  LOG_FORMAT: 'logging.format',
  LOG_FILE: 'logging.filePath',
  RELAY_HOST: 'relay.host',
  RELAY_PORT: 'relay.port',
  RELAY_IDLE_PROBE_MS: 'relay.idleProbeMs',
  IQFEED_HOST: 'upstream.host',
  IQFEED_PORT_LOOKUP: 'upstream.lookupPort',
  IQFEED_TIMEOUT_SEC: 'upstream.requestTimeoutSec',
  SESSION_OPEN: 'session.open',
  SESSION_CLOSE: 'session.close',
  SESSION_INTERVAL_SECONDS: 'session.intervalSeconds',
};
