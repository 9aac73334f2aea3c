import { z } from 'zod';
import { adcpFailure, defineTool } from '../types.js';

export const getProperties = defineTool({
  description: 'ADCP: Get TV channel/property catalog (AdCP v2.3.0)',
  schema: {
    publisher_domain: z.string().nullish().describe('Filter by publisher (e.g. "snrt.ma")'),
    tags: z.string().nullish().describe('Comma-separated tags (premium, sports, news, ctv)'),
  },
  failure: adcpFailure('Property discovery error'),
  build: (args, ctx) => ({
    method: 'GET',
    url: '/api/v1/adcp/properties',
    // Empty strings are treated as "no filter"
    query: {
      publisher_domain: args.publisher_domain || undefined,
      tags: args.tags || undefined,
    },
    timeoutMs: ctx.timeouts.standardMs,
  }),
});
