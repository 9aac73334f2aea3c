import { z } from 'zod';
import { jsonObjectSchema } from '../schemas.js';
import { adcpFailure, defineTool } from '../types.js';

// ADCP Creative protocol
export const syncCreatives = defineTool({
  description: 'ADCP: Upload and assign creative assets (videos, images) to campaigns',
  schema: {
    media_buy_id: z.string().describe('Target campaign ID'),
    creative_urls: z.array(z.string()).describe('URLs of video/image creative files'),
    assignments: jsonObjectSchema.nullish().describe('Map creatives to specific placements'),
  },
  failure: adcpFailure('Creative sync error'),
  build: (args, ctx) => ({
    method: 'POST',
    url: '/api/v1/adcp/creatives/sync',
    body: {
      media_buy_id: args.media_buy_id,
      creatives: args.creative_urls.map((url) => ({ url })),
      assignments: args.assignments ?? {},
    },
    timeoutMs: ctx.timeouts.extendedMs,
  }),
});
