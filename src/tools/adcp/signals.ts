// ──────────────────────────────────────────────────────────────────────────────
// ADCP Signals Activation protocol: discover_signals, activate_signal
// ──────────────────────────────────────────────────────────────────────────────

import { z } from 'zod';
import { jsonObjectSchema } from '../schemas.js';
import { adcpFailure, defineTool } from '../types.js';

export const DEFAULT_SIGNAL_TYPES = ['audience', 'contextual'];

export const discoverSignals = defineTool({
  description:
    "ADCP: Discover audience and contextual signals using natural language. Example: 'Find sports enthusiasts aged 25-45 in Casablanca'",
  schema: {
    query: z.string().describe('Natural language signal description'),
    signal_types: z
      .array(z.string())
      .nullish()
      .describe('Types to search (audience, contextual, geographic, temporal)'),
    min_scale: z.number().int().nullish().describe('Minimum audience size'),
  },
  failure: adcpFailure('Signal discovery error'),
  build: (args, ctx) => ({
    method: 'POST',
    url: '/api/v1/adcp/signals/discover',
    body: {
      query: args.query,
      signal_types: args.signal_types?.length ? args.signal_types : [...DEFAULT_SIGNAL_TYPES],
      providers: null,
      filters: { min_scale: args.min_scale ?? null },
    },
    timeoutMs: ctx.timeouts.extendedMs,
  }),
});

export const activateSignal = defineTool({
  description: 'ADCP: Activate audience signals on decisioning platforms',
  schema: {
    signal_id: z.string().describe('Signal ID from discover_signals'),
    platform_ids: z.array(z.string()).describe('Target platform IDs'),
    config: jsonObjectSchema.nullish().describe('Platform-specific configuration'),
  },
  failure: adcpFailure('Signal activation error'),
  build: (args, ctx) => ({
    method: 'POST',
    url: '/api/v1/adcp/signals/activate',
    body: {
      signal_id: args.signal_id,
      platforms: args.platform_ids.map((id) => ({ platform_id: id })),
      config: args.config ?? {},
    },
    timeoutMs: ctx.timeouts.extendedMs,
  }),
});
