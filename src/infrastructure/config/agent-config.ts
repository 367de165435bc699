import { resolve } from 'node:path';
import { z } from 'zod';
import { compactEnv, ConfigError, positiveInt } from './env.js';
import type { Env } from './env.js';

const csv = z
  .string()
  .transform((v) => v.split(',').map((s) => s.trim()).filter((s) => s.length > 0));

const agentEnvSchema = z
  .object({
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(1).max(65535).default(49950),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    SPOKE_API_KEY: z.string().min(16).optional(),
    SPOKE_API_KEY_HASH: z.string().startsWith('scrypt$').optional(),
    HUB_ALLOWED_IP: z.string().ip().optional(),
    HUB_URL: z.string().url().optional(),
    SPOKE_ID: z.string().uuid().optional(),
    GAME_ROOT: z.string().default('.'),
    INSTANCES: csv.optional(),
    CUSTOM_ACTIONS: csv.default('backup'),
    SCRIPT_TIMEOUT_MS: positiveInt.default(10 * 60_000),
    LOG_REPLAY_LINES: z.coerce.number().int().min(0).default(100),
    CALLBACK_TIMEOUT_MS: positiveInt.default(10_000),
  })
  .refine((env) => env.SPOKE_API_KEY !== undefined || env.SPOKE_API_KEY_HASH !== undefined, {
    message: 'Either SPOKE_API_KEY or SPOKE_API_KEY_HASH is required',
    path: ['SPOKE_API_KEY'],
  })
  .refine((env) => (env.HUB_URL === undefined) === (env.SPOKE_ID === undefined), {
    message: 'HUB_URL and SPOKE_ID must be set together',
    path: ['SPOKE_ID'],
  })
  .refine((env) => env.HUB_URL === undefined || env.SPOKE_API_KEY !== undefined, {
    message: 'Reporting results to the hub needs SPOKE_API_KEY',
    path: ['SPOKE_API_KEY'],
  });

export interface AgentConfig {
  host: string;
  port: number;
  logLevel: string;
  apiKey: string | null;
  apiKeyHash: string | null;
  hubAllowedIp: string | null;
  hub: { url: string; spokeId: string } | null;
  gameRoot: string;
  /** null means any instance with an executable script under the game root. */
  instances: string[] | null;
  customActions: string[];
  scriptTimeoutMs: number;
  logReplayLines: number;
  callbackTimeoutMs: number;
}

export function loadAgentConfig(env: Env = process.env): AgentConfig {
  const parsed = agentEnvSchema.safeParse(compactEnv(env));
  if (!parsed.success) throw new ConfigError('spoke agent', parsed.error);
  const e = parsed.data;

  return {
    host: e.HOST,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    apiKey: e.SPOKE_API_KEY ?? null,
    apiKeyHash: e.SPOKE_API_KEY_HASH ?? null,
    hubAllowedIp: e.HUB_ALLOWED_IP ?? null,
    hub: e.HUB_URL !== undefined && e.SPOKE_ID !== undefined ? { url: e.HUB_URL, spokeId: e.SPOKE_ID } : null,
    gameRoot: resolve(e.GAME_ROOT),
    instances: e.INSTANCES ?? null,
    customActions: e.CUSTOM_ACTIONS,
    scriptTimeoutMs: e.SCRIPT_TIMEOUT_MS,
    logReplayLines: e.LOG_REPLAY_LINES,
    callbackTimeoutMs: e.CALLBACK_TIMEOUT_MS,
  };
}
