import { z } from 'zod';
import { BARE_FAILURE, defineTool } from '../types.js';

/** Marks a single ad break as sold. Not idempotent: repeat calls book again. */
export const bookAd = defineTool({
  description: '[LEGACY] Book an ad spot - prefer create_media_buy for ADCP compliance',
  schema: {
    inventory_id: z.string().describe('Inventory (ad break) ID to book'),
  },
  failure: BARE_FAILURE,
  build: (args, ctx) => ({
    method: 'POST',
    url: '/api/v1/book_ad',
    body: { inventory_id: args.inventory_id },
    timeoutMs: ctx.timeouts.standardMs,
  }),
});
