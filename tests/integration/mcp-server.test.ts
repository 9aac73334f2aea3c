// ──────────────────────────────────────────────────────────────────────────────
// MCP integration: full protocol over the SDK's in-memory transport,
// tools forwarding to an in-process stub backend
// ──────────────────────────────────────────────────────────────────────────────

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';

import { createMcpServer } from '../../src/mcp.js';
import { HttpForwarder } from '../../src/http/forwarder.js';
import { startStubBackend, unusedBaseUrl, type StubBackend } from '../helpers/stub-backend.js';

const FIXED_NOW = new Date(2026, 2, 15, 9, 0, 0);

async function connect(baseUrl: string, timeouts = { standardMs: 1000, extendedMs: 1000 }): Promise<Client> {
  const server = createMcpServer({
    forwarder: new HttpForwarder({ baseUrl }),
    timeouts,
    contextPrefix: '/api/v1',
    now: () => FIXED_NOW,
  });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: 'integration-test', version: '1.0.0' });
  await client.connect(clientTransport);
  return client;
}

function parseToolResult(result: Awaited<ReturnType<Client['callTool']>>): { data: unknown; isError?: boolean } {
  const content = result.content as Array<{ type: string; text: string }>;
  return {
    data: JSON.parse(content[0]?.text ?? '{}'),
    isError: result.isError as boolean | undefined,
  };
}

describe('MCP server', () => {
  let backend: StubBackend;
  let client: Client;

  beforeEach(async () => {
    // Failed calls log to stderr
    vi.spyOn(console, 'error').mockImplementation(() => {});
    backend = await startStubBackend();
    client = await connect(backend.baseUrl);
  });

  afterEach(async () => {
    await client.close();
    await backend.close();
    vi.restoreAllMocks();
  });

  // ─── Listing ───────────────────────────────────────────────────────────────

  it('lists all 16 tools', async () => {
    const tools = await client.listTools();
    const names = tools.tools.map((t) => t.name).sort();
    expect(names).toEqual([
      'activate_signal',
      'book_ad',
      'create_media_buy',
      'discover_signals',
      'get_ad_context',
      'get_adbreaks',
      'get_api_data',
      'get_available_inventory',
      'get_campaign_context',
      'get_channels',
      'get_epg_shows',
      'get_inventory',
      'get_media_buy_delivery',
      'get_products',
      'get_properties',
      'sync_creatives',
    ]);
  });

  it('declares required arguments in the tool schema', async () => {
    const tools = await client.listTools();
    const createMediaBuy = tools.tools.find((t) => t.name === 'create_media_buy');
    const required = createMediaBuy?.inputSchema.required ?? [];
    expect(required).toEqual(
      expect.arrayContaining(['name', 'advertiser', 'package_ids', 'start_date', 'end_date', 'budget']),
    );
    expect(required).not.toContain('objectives');
  });

  it('lists and reads both resources', async () => {
    const { resources } = await client.listResources();
    expect(resources.map((r) => r.uri).sort()).toEqual(['adcp://examples', 'adcp://protocol']);

    const read = await client.readResource({ uri: 'adcp://protocol' });
    const first = read.contents[0];
    expect(first.uri).toBe('adcp://protocol');
    expect('text' in first ? first.text : '').toMatch(/^Ad Context Protocol \(ADCP\) v2\.3\.0/);
  });

  it('renders the inventory analyzer prompt', async () => {
    const { prompts } = await client.listPrompts();
    expect(prompts.map((p) => p.name).sort()).toEqual(['campaign_planner', 'inventory_analyzer']);

    const prompt = await client.getPrompt({
      name: 'inventory_analyzer',
      arguments: { channel: 'al_aoula', date_from: '2026-03-16', date_to: '2026-03-22' },
    });
    const content = prompt.messages[0].content;
    expect(content.type).toBe('text');
    expect(content.type === 'text' ? content.text : '').toContain('📅 Date Range: 2026-03-16 to 2026-03-22');
  });

  it('renders the campaign planner prompt with its arguments', async () => {
    const prompt = await client.getPrompt({
      name: 'campaign_planner',
      arguments: { objective: 'awareness', target_audience: 'families', budget: '200000', duration_days: '30' },
    });
    const content = prompt.messages[0].content;
    expect(content.type === 'text' ? content.text : '').toContain('💰 Budget: 200000 MAD');
  });

  // ─── Legacy tools ──────────────────────────────────────────────────────────

  it('get_epg_shows forwards channel and today\'s date', async () => {
    backend.on('GET', '/api/v1/programs', { json: [{ title: 'News' }] });

    const result = await client.callTool({ name: 'get_epg_shows', arguments: { channel: 'al_aoula' } });
    const { data, isError } = parseToolResult(result);

    expect(isError).toBeFalsy();
    expect(data).toEqual([{ title: 'News' }]);
    expect(backend.requests[0].query).toEqual({ channel: ['al_aoula'], date: ['2026-03-15'] });
  });

  it('get_adbreaks sends availability as true/false', async () => {
    backend.on('GET', '/api/v1/adbreaks', { json: [] });

    await client.callTool({ name: 'get_adbreaks', arguments: { available: true } });
    await client.callTool({ name: 'get_adbreaks', arguments: {} });

    expect(backend.requests[0].query).toEqual({ available: ['true'] });
    expect(backend.requests[1].query).toEqual({});
  });

  it('book_ad returns the bare error shape on 404', async () => {
    const result = await client.callTool({ name: 'book_ad', arguments: { inventory_id: 'ab_001' } });
    const { data, isError } = parseToolResult(result);

    expect(isError).toBe(true);
    expect(data).toEqual({ error: `404 Client Error: Not Found for url: ${backend.baseUrl}/api/v1/book_ad` });
    expect(backend.requests[0].json).toEqual({ inventory_id: 'ab_001' });
  });

  it('identical lookups give structurally identical results', async () => {
    backend.on('GET', '/api/v1/channels', { json: { channels: [{ code: 'al_aoula' }] } });

    const first = parseToolResult(await client.callTool({ name: 'get_channels', arguments: {} }));
    const second = parseToolResult(await client.callTool({ name: 'get_channels', arguments: {} }));

    expect(second).toEqual(first);
  });

  // ─── ADCP tools ────────────────────────────────────────────────────────────

  it('create_media_buy posts packages and default objectives', async () => {
    backend.on('POST', '/api/v1/adcp/media-buy', (req) => ({ json: { media_buy_id: 'mb_1', received: req.json } }));

    const result = await client.callTool({
      name: 'create_media_buy',
      arguments: {
        name: 'Spring Sale',
        advertiser: 'Test Brand',
        package_ids: ['a', 'b'],
        start_date: '2026-04-01',
        end_date: '2026-04-30',
        budget: 500000,
      },
    });
    const { isError } = parseToolResult(result);

    expect(isError).toBeFalsy();
    expect(backend.requests[0].json).toMatchObject({
      packages: [{ package_id: 'a' }, { package_id: 'b' }],
      objectives: ['reach', 'awareness'],
      currency: 'MAD',
      kpis: {},
    });
  });

  it('get_media_buy_delivery returns the protocol-tagged shape on failure', async () => {
    backend.on('GET', '/api/v1/adcp/media-buy/mb_1/delivery', { status: 500, json: { detail: 'boom' } });

    const result = await client.callTool({ name: 'get_media_buy_delivery', arguments: { media_buy_id: 'mb_1' } });
    const { data, isError } = parseToolResult(result);

    expect(isError).toBe(true);
    expect(data).toEqual({
      protocol: 'adcp',
      version: '2.3.0',
      status: 'failed',
      message: `Delivery data error: 500 Server Error: Internal Server Error for url: ${backend.baseUrl}/api/v1/adcp/media-buy/mb_1/delivery`,
    });
  });

  it('get_products returns the protocol-tagged shape on timeout', async () => {
    await client.close();
    client = await connect(backend.baseUrl, { standardMs: 1000, extendedMs: 50 });
    backend.on('POST', '/api/v1/adcp/products', { hang: true });

    const result = await client.callTool({ name: 'get_products', arguments: { query: 'sports' } });
    const { data } = parseToolResult(result);

    expect(data).toEqual({
      protocol: 'adcp',
      version: '2.3.0',
      status: 'failed',
      message: `Product discovery error: Request to ${backend.baseUrl}/api/v1/adcp/products timed out after 50ms`,
    });
  });

  // ─── Passthrough ───────────────────────────────────────────────────────────

  it('get_api_data returns { text } for a non-JSON 200', async () => {
    backend.on('GET', '/status', { raw: 'all good' });

    const result = await client.callTool({ name: 'get_api_data', arguments: { url: `${backend.baseUrl}/status` } });
    const { data, isError } = parseToolResult(result);

    expect(isError).toBeFalsy();
    expect(data).toEqual({ text: 'all good' });
  });

  it('get_api_data returns { error } mentioning 404', async () => {
    const result = await client.callTool({ name: 'get_api_data', arguments: { url: `${backend.baseUrl}/nowhere` } });
    const { data } = parseToolResult(result);

    expect(data).toEqual({ error: `404 Client Error: Not Found for url: ${backend.baseUrl}/nowhere` });
  });

  it('get_api_data forwards method, headers, params and body', async () => {
    backend.on('PUT', '/items', (req) => ({ json: { echoed: req.json } }));

    const result = await client.callTool({
      name: 'get_api_data',
      arguments: {
        url: `${backend.baseUrl}/items`,
        method: 'put',
        headers: { 'X-Api-Key': 'test-secret' },
        params: { page: 2, tag: ['a', 'b'] },
        body: { name: 'spot' },
      },
    });
    const { data } = parseToolResult(result);

    expect(data).toEqual({ echoed: { name: 'spot' } });
    expect(backend.requests[0].headers['x-api-key']).toBe('test-secret');
    expect(backend.requests[0].query).toEqual({ page: ['2'], tag: ['a', 'b'] });
  });

  it('get_api_data sends a GET with a null body as a plain GET', async () => {
    backend.on('GET', '/ok', { json: { ok: true } });

    const result = await client.callTool({
      name: 'get_api_data',
      arguments: { url: `${backend.baseUrl}/ok`, body: null, headers: null, params: null },
    });
    const { data, isError } = parseToolResult(result);

    expect(isError).toBeFalsy();
    expect(data).toEqual({ ok: true });
    expect(backend.requests[0].body).toBe('');
  });

  // ─── Explicit nulls ────────────────────────────────────────────────────────

  it('get_products accepts null optional arguments', async () => {
    backend.on('POST', '/api/v1/adcp/products', { json: { products: [] } });

    const result = await client.callTool({
      name: 'get_products',
      arguments: { query: 'news', channel: null, date_to: null, max_budget: null },
    });
    const { data, isError } = parseToolResult(result);

    expect(isError).toBeFalsy();
    expect(data).toEqual({ products: [] });
    expect(backend.requests[0].json).toEqual({
      query: 'news',
      channel: null,
      date_from: '2026-03-15',
      date_to: null,
      filters: { max_budget: null },
    });
  });

  it('get_epg_shows accepts a null date', async () => {
    backend.on('GET', '/api/v1/programs', { json: [] });

    const result = await client.callTool({ name: 'get_epg_shows', arguments: { channel: '2m', query_date: null } });

    expect(parseToolResult(result).isError).toBeFalsy();
    expect(backend.requests[0].query).toEqual({ channel: ['2m'], date: ['2026-03-15'] });
  });

  it('get_ad_context accepts null filters', async () => {
    backend.on('GET', '/api/v1/ad-context', { json: { slots: 1 } });

    const result = await client.callTool({ name: 'get_ad_context', arguments: { context_id: 'ctx_1', filters: null } });

    expect(parseToolResult(result).isError).toBeFalsy();
    expect(backend.requests[0].query).toEqual({ context_id: ['ctx_1'] });
  });

  // ─── Context tools ─────────────────────────────────────────────────────────

  it('get_campaign_context wraps the backend payload', async () => {
    backend.on('GET', '/api/v1/campaigns/cmp_1', { json: { name: 'Spring' } });

    const result = await client.callTool({ name: 'get_campaign_context', arguments: { campaign_id: 'cmp_1' } });
    const { data } = parseToolResult(result);

    expect(data).toEqual({ protocol: 'adcp/1.0', type: 'campaign', campaign_id: 'cmp_1', data: { name: 'Spring' } });
  });
});

describe('MCP server with an unreachable backend', () => {
  let client: Client;

  beforeEach(async () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    client = await connect(await unusedBaseUrl());
  });

  afterEach(async () => {
    await client.close();
    vi.restoreAllMocks();
  });

  it('legacy tools answer with { error }', async () => {
    const { data, isError } = parseToolResult(await client.callTool({ name: 'get_channels', arguments: {} }));

    expect(isError).toBe(true);
    expect(Object.keys(data as object)).toEqual(['error']);
  });

  it('ADCP tools answer with the protocol-tagged envelope', async () => {
    const { data } = parseToolResult(
      await client.callTool({ name: 'discover_signals', arguments: { query: 'football fans' } }),
    );

    expect(data).toMatchObject({ protocol: 'adcp', version: '2.3.0', status: 'failed' });
    expect((data as { message: string }).message).toMatch(/^Signal discovery error: Request to .* failed: /);
  });

  it('logs the failure to stderr', async () => {
    await client.callTool({ name: 'get_channels', arguments: {} });

    expect(console.error).toHaveBeenCalledWith(expect.stringMatching(/^\[adcp-tv\] get_channels failed: /));
  });
});
