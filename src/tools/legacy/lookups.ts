// ──────────────────────────────────────────────────────────────────────────────
// Legacy schedule and inventory lookups (pre-ADCP endpoints)
// ──────────────────────────────────────────────────────────────────────────────

import { z } from 'zod';
import { BARE_FAILURE, defineTool, formatDate } from '../types.js';

export const getChannels = defineTool({
  description: '[LEGACY] Get channels list - prefer get_properties for ADCP compliance',
  schema: {},
  failure: BARE_FAILURE,
  build: (_args, ctx) => ({
    method: 'GET',
    url: '/api/v1/channels',
    timeoutMs: ctx.timeouts.standardMs,
  }),
});

export const getEpgShows = defineTool({
  description: '[LEGACY] Fetch EPG schedule - prefer get_products for ADCP compliance',
  schema: {
    channel: z.string().describe('Channel code (e.g. "al_aoula")'),
    query_date: z.string().nullish().describe('Date in YYYY-MM-DD format, defaults to today'),
  },
  failure: BARE_FAILURE,
  build: (args, ctx) => ({
    method: 'GET',
    url: '/api/v1/programs',
    query: {
      channel: args.channel,
      date: args.query_date || formatDate(ctx.now),
    },
    timeoutMs: ctx.timeouts.standardMs,
  }),
});

export const getAdbreaks = defineTool({
  description: '[LEGACY] Fetch ad breaks - prefer get_products for ADCP compliance',
  schema: {
    available: z.boolean().nullish().describe('Only return breaks with this availability'),
  },
  failure: BARE_FAILURE,
  build: (args, ctx) => ({
    method: 'GET',
    url: '/api/v1/adbreaks',
    query: { available: args.available },
    timeoutMs: ctx.timeouts.standardMs,
  }),
});

export const getInventory = defineTool({
  description: '[LEGACY] Get inventory with audience data',
  schema: {
    channel: z.string().describe('Channel code'),
    query_date: z.string().describe('Date in YYYY-MM-DD format'),
    region: z.string().nullish().describe('Optional region filter'),
  },
  failure: BARE_FAILURE,
  build: (args, ctx) => ({
    method: 'GET',
    url: '/api/v1/inventory',
    query: {
      channel: args.channel,
      date: args.query_date || formatDate(ctx.now),
      region: args.region || undefined,
    },
    timeoutMs: ctx.timeouts.standardMs,
  }),
});
