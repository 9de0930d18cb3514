/**
 * @file config.ts
 * @description Server settings read from the environment and validated with zod.
 *
 *   PORT          HTTP port (default 4000)
 *   HOST          Bind address (default 0.0.0.0)
 *   MAP_PATH      Map document served by every endpoint
 *   TICK_RATE_MS  Wall-clock milliseconds between streamed round ticks
 *   LOG_LEVEL     pino level, read by the logger itself
 */

import { z } from 'zod';
import { SimulationError } from '../../shared/util/SimulationError.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const ServerConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(4000),
  HOST: z.string().min(1).default('0.0.0.0'),
  MAP_PATH: z.string().min(1).default('data/maps/foundry.json'),
  TICK_RATE_MS: z.coerce.number().int().min(0).max(10_000).default(100),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

/**
 * Parse settings from an environment record.
 *
 * @throws SimulationError REQUEST_INVALID listing every bad variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerConfigSchema.safeParse(env);
  if (!parsed.success) {
    const summary = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new SimulationError('REQUEST_INVALID', `Invalid server configuration: ${summary}`, {
      issues: parsed.error.issues,
    });
  }
  return parsed.data;
}
