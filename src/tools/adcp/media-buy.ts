// ──────────────────────────────────────────────────────────────────────────────
// ADCP Media Buy protocol: get_products, create_media_buy, get_media_buy_delivery
// ──────────────────────────────────────────────────────────────────────────────

import { z } from 'zod';
import { adcpFailure, defineTool, formatDate } from '../types.js';

export const DEFAULT_OBJECTIVES = ['reach', 'awareness'];

export const getProducts = defineTool({
  description:
    "ADCP: Discover media inventory using natural language. Example: 'Find premium video spots during sports programs next week under 50,000 MAD'",
  schema: {
    query: z.string().describe('Natural language description (e.g. "Find prime time slots for sports audience")'),
    channel: z.string().nullish().describe('Filter by channel code (e.g. "al_aoula")'),
    date_from: z.string().nullish().describe('Start date YYYY-MM-DD (defaults to today)'),
    date_to: z.string().nullish().describe('End date YYYY-MM-DD'),
    max_budget: z.number().nullish().describe('Maximum price per spot in MAD'),
  },
  failure: adcpFailure('Product discovery error'),
  build: (args, ctx) => ({
    method: 'POST',
    url: '/api/v1/adcp/products',
    body: {
      query: args.query,
      channel: args.channel ?? null,
      date_from: args.date_from || formatDate(ctx.now),
      date_to: args.date_to ?? null,
      filters: { max_budget: args.max_budget ?? null },
    },
    timeoutMs: ctx.timeouts.extendedMs,
  }),
});

export const createMediaBuy = defineTool({
  description: 'ADCP: Create a new TV advertising campaign by purchasing ad spots',
  schema: {
    name: z.string().describe('Campaign name (e.g. "Summer Sale 2025")'),
    advertiser: z.string().describe('Advertiser/brand name'),
    package_ids: z.array(z.string()).describe('Ad break IDs to purchase'),
    start_date: z.string().describe('Campaign start YYYY-MM-DD'),
    end_date: z.string().describe('Campaign end YYYY-MM-DD'),
    budget: z.number().describe('Total campaign budget'),
    currency: z.string().default('MAD').describe('Currency code'),
    objectives: z.array(z.string()).nullish().describe('Marketing objectives (reach, awareness, conversions)'),
  },
  failure: adcpFailure('Media buy creation error'),
  build: (args, ctx) => ({
    method: 'POST',
    url: '/api/v1/adcp/media-buy',
    body: {
      name: args.name,
      advertiser: args.advertiser,
      packages: args.package_ids.map((id) => ({ package_id: id })),
      start_date: args.start_date,
      end_date: args.end_date,
      budget: args.budget,
      currency: args.currency,
      // An empty list also falls back to the defaults
      objectives: args.objectives?.length ? args.objectives : [...DEFAULT_OBJECTIVES],
      kpis: {},
    },
    timeoutMs: ctx.timeouts.extendedMs,
  }),
});

export const getMediaBuyDelivery = defineTool({
  description: 'ADCP: Get real-time campaign performance and delivery metrics',
  schema: {
    media_buy_id: z.string().describe('Campaign identifier from create_media_buy'),
  },
  failure: adcpFailure('Delivery data error'),
  build: (args, ctx) => ({
    method: 'GET',
    url: `/api/v1/adcp/media-buy/${encodeURIComponent(args.media_buy_id)}/delivery`,
    timeoutMs: ctx.timeouts.standardMs,
  }),
});
