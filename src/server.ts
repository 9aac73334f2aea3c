#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';
import crypto from 'node:crypto';

import { ConfigError, loadConfig, type ServerConfig } from './config.js';
import { HttpForwarder } from './http/forwarder.js';
import { createMcpServer, SERVER_NAME, SERVER_VERSION, type McpServerDeps } from './mcp.js';

// ─── Config ──────────────────────────────────────────────────────────────────

function readConfig(): ServerConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`[adcp-tv] ${err.message}`);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const deps: McpServerDeps = {
  forwarder: new HttpForwarder({ baseUrl: config.baseUrl }),
  timeouts: config.timeouts,
  contextPrefix: config.contextPrefix,
};

console.error(`[adcp-tv] Forwarding to backend at: ${config.baseUrl}`);

// ─── Transport & Startup ─────────────────────────────────────────────────────

async function startStdio() {
  console.error('[adcp-tv] Starting in stdio mode...');

  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error('[adcp-tv] MCP server running on stdio');
}

async function startHttp() {
  const { port } = config;
  console.error(`[adcp-tv] Starting in HTTP mode on port ${port}...`);

  // Track transports per session for cleanup
  const transports = new Map<string, StreamableHTTPServerTransport>();

  const handle = async (req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? '/', `http://localhost:${port}`);

    if (url.pathname === '/health') {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ status: 'ok', server: SERVER_NAME, version: SERVER_VERSION }));
      return;
    }

    if (url.pathname === '/mcp') {
      const header = req.headers['mcp-session-id'];
      const sessionId = typeof header === 'string' ? header : undefined;
      const existing = sessionId ? transports.get(sessionId) : undefined;

      if (existing) {
        await existing.handleRequest(req, res);
        return;
      }

      // New session: each session gets its own McpServer instance
      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => crypto.randomUUID(),
        onsessioninitialized: (sid) => {
          // Store transport once the session ID is assigned (after initialize)
          transports.set(sid, transport);
        },
      });

      transport.onclose = () => {
        if (transport.sessionId) {
          transports.delete(transport.sessionId);
        }
      };

      const sessionServer = createMcpServer(deps);
      await sessionServer.connect(transport);
      await transport.handleRequest(req, res);
      return;
    }

    res.writeHead(404, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify({ error: 'Not found. Use /mcp for MCP protocol or /health for health check.' }));
  };

  const httpServer = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      console.error('[adcp-tv] Request handling failed:', err);
      if (!res.headersSent) {
        res.writeHead(500, { 'Content-Type': 'application/json' });
      }
      res.end(JSON.stringify({ error: 'Internal server error' }));
    });
  });

  httpServer.listen(port, () => {
    console.error(`[adcp-tv] MCP server listening on http://localhost:${port}/mcp`);
    console.error(`[adcp-tv] Health check: http://localhost:${port}/health`);
  });
}

// ─── Main ────────────────────────────────────────────────────────────────────

const start = config.mode === 'http' ? startHttp : startStdio;

start().catch((err) => {
  console.error('[adcp-tv] Fatal error:', err);
  process.exit(1);
});
