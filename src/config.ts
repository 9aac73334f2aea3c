// ──────────────────────────────────────────────────────────────────────────────
// Runtime configuration from CLI flags and environment
// ──────────────────────────────────────────────────────────────────────────────

import { z } from 'zod';
import type { TimeoutConfig } from './tools/index.js';

export interface ServerConfig {
  mode: 'stdio' | 'http';
  port: number;
  baseUrl: string;
  timeouts: TimeoutConfig;
  contextPrefix: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

// Largest delay setTimeout honours; anything above fires immediately
const MAX_TIMEOUT_MS = 2_147_483_647;

const configSchema = z.object({
  mode: z.enum(['stdio', 'http']),
  port: z.coerce.number().int().min(1).max(65_535),
  baseUrl: z.string().url().refine((u) => /^https?:\/\//i.test(u), 'must be an http(s) URL'),
  timeouts: z.object({
    standardMs: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS),
    extendedMs: z.coerce.number().int().positive().max(MAX_TIMEOUT_MS),
  }),
  contextPrefix: z.string().refine((p) => p === '' || p.startsWith('/'), 'must be empty or start with "/"'),
});

/** Value following `--name`, or undefined when the flag is absent. */
function flagValue(args: string[], name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  return idx !== -1 ? args[idx + 1] : undefined;
}

export function loadConfig(
  argv: string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env,
): ServerConfig {
  const raw = {
    mode: argv.includes('--http') && !argv.includes('--stdio') ? 'http' : 'stdio',
    port: flagValue(argv, 'port') ?? env.PORT ?? 3000,
    baseUrl: flagValue(argv, 'base-url') ?? env.ADCP_API_BASE_URL ?? 'http://localhost:8000',
    timeouts: {
      standardMs: env.ADCP_TIMEOUT_MS ?? 10_000,
      extendedMs: env.ADCP_EXTENDED_TIMEOUT_MS ?? 15_000,
    },
    contextPrefix: env.ADCP_CONTEXT_PREFIX ?? '/api/v1',
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return parsed.data;
}
