import { z } from 'zod';
import { jsonValueSchema, queryValueSchema } from './schemas.js';
import { BARE_FAILURE, defineTool } from './types.js';

/**
 * Generic passthrough: method, URL, headers, params and body go out as given.
 * A relative URL is resolved against the backend base address.
 */
export const getApiData = defineTool({
  description: 'Generic HTTP API caller for non-ADCP endpoints',
  schema: {
    url: z.string().describe('API endpoint URL'),
    method: z.string().default('GET').describe('HTTP method (GET, POST, etc.)'),
    headers: z.record(z.string()).nullish().describe('Optional HTTP headers'),
    params: z.record(queryValueSchema).nullish().describe('Optional query parameters'),
    body: jsonValueSchema.nullish().describe('Optional JSON body'),
  },
  decode: 'json-or-text',
  failure: BARE_FAILURE,
  build: (args, ctx) => ({
    method: args.method.toUpperCase(),
    url: args.url,
    headers: args.headers ?? undefined,
    query: args.params ?? undefined,
    // A null body means no body, like an omitted one
    body: args.body ?? undefined,
    timeoutMs: ctx.timeouts.standardMs,
  }),
});
