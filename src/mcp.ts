// ──────────────────────────────────────────────────────────────────────────────
// MCP server factory: tools, context tools, resources and prompts
// ──────────────────────────────────────────────────────────────────────────────

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

import { AdContextHandler } from './context/handler.js';
import type { ForwardError } from './http/errors.js';
import { HttpForwarder } from './http/forwarder.js';
import { campaignPlannerPrompt, inventoryAnalyzerPrompt } from './prompts/adcp.js';
import { ADCP_RESOURCES } from './resources/adcp.js';
import { queryValueSchema } from './tools/schemas.js';
import { TOOLS, type TimeoutConfig } from './tools/index.js';

export const SERVER_NAME = 'adcp-tv-mcp';
export const SERVER_VERSION = '0.1.0';

export interface McpServerDeps {
  forwarder: HttpForwarder;
  timeouts: TimeoutConfig;
  contextPrefix: string;
  /** Clock used for date defaults and context timestamps. */
  now?: () => Date;
}

/** Render a result as the single text item MCP clients expect. */
function toToolResult(toolName: string, value: unknown, error?: ForwardError): CallToolResult {
  if (error) {
    console.error(`[adcp-tv] ${toolName} failed: ${error.message}`);
  }
  return {
    content: [{ type: 'text', text: JSON.stringify(value, null, 2) }],
    ...(error ? { isError: true } : {}),
  };
}

// Each transport (stdio or HTTP session) gets its own McpServer instance
// because Protocol.connect() only supports a single transport at a time.
export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerTools(server, deps);
  registerContextTools(server, deps);
  registerResources(server);
  registerPrompts(server);

  return server;
}

function registerTools(server: McpServer, deps: McpServerDeps): void {
  const now = deps.now ?? (() => new Date());

  for (const [name, spec] of Object.entries(TOOLS)) {
    server.tool(name, spec.description, spec.schema, async (args) => {
      const descriptor = spec.build(args, { now: now(), timeouts: deps.timeouts });
      const { envelope, error } = await deps.forwarder.forward(descriptor, spec);
      return toToolResult(name, envelope, error);
    });
  }
}

// ─── Ad context tools ────────────────────────────────────────────────────────

function registerContextTools(server: McpServer, deps: McpServerDeps): void {
  const handler = new AdContextHandler({
    forwarder: deps.forwarder,
    prefix: deps.contextPrefix,
    timeoutMs: deps.timeouts.standardMs,
    now: deps.now,
  });

  server.tool(
    'get_ad_context',
    'Fetch advertising context data',
    {
      context_id: z.string().describe('Ad context identifier'),
      filters: z.record(queryValueSchema).nullish().describe('Optional filters (channel, date, time_range, etc.)'),
    },
    async (params) => {
      const { document, error } = await handler.getAdContext(params.context_id, params.filters ?? undefined);
      return toToolResult('get_ad_context', document, error);
    },
  );

  server.tool(
    'get_available_inventory',
    'Get available ad inventory for a channel and date',
    {
      channel: z.string().describe('Channel code'),
      date: z.string().describe('Date in YYYY-MM-DD format'),
    },
    async (params) => {
      const { document, error } = await handler.getAvailableInventory(params.channel, params.date);
      return toToolResult('get_available_inventory', document, error);
    },
  );

  server.tool(
    'get_campaign_context',
    'Get campaign-specific advertising context',
    {
      campaign_id: z.string().describe('Campaign identifier'),
    },
    async (params) => {
      const { document, error } = await handler.getCampaignContext(params.campaign_id);
      return toToolResult('get_campaign_context', document, error);
    },
  );
}

// ─── Resources & prompts ─────────────────────────────────────────────────────

function registerResources(server: McpServer): void {
  for (const resource of ADCP_RESOURCES) {
    server.resource(
      resource.name,
      resource.uri,
      { description: resource.description, mimeType: 'text/plain' },
      async (uri) => ({
        contents: [{ uri: uri.href, mimeType: 'text/plain', text: resource.text }],
      }),
    );
  }
}

function registerPrompts(server: McpServer): void {
  server.prompt(
    'campaign_planner',
    'Generate ADCP-ready campaign planning prompt',
    {
      objective: z.string().describe('Campaign objective (e.g. awareness)'),
      target_audience: z.string().describe('Audience description'),
      budget: z.string().describe('Total budget in MAD'),
      duration_days: z.string().describe('Campaign length in days'),
    },
    (args) => ({
      messages: [{ role: 'user', content: { type: 'text', text: campaignPlannerPrompt(args) } }],
    }),
  );

  server.prompt(
    'inventory_analyzer',
    'Generate inventory analysis prompt',
    {
      channel: z.string().describe('Channel code'),
      date_from: z.string().describe('Start date YYYY-MM-DD'),
      date_to: z.string().describe('End date YYYY-MM-DD'),
    },
    (args) => ({
      messages: [{ role: 'user', content: { type: 'text', text: inventoryAnalyzerPrompt(args) } }],
    }),
  );
}
