// ──────────────────────────────────────────────────────────────────────────────
// Ad context handler: wraps backend lookups in adcp/1.0 context documents
// ──────────────────────────────────────────────────────────────────────────────

import type { HttpForwarder } from '../http/forwarder.js';
import type { ForwardError } from '../http/errors.js';
import type { QueryParams, RequestDescriptor, ResultEnvelope } from '../http/types.js';
import { BARE_FAILURE } from '../tools/types.js';

export const CONTEXT_PROTOCOL = 'adcp/1.0';

export interface ContextHandlerOptions {
  forwarder: HttpForwarder;
  /** Path prefix for the context endpoints, e.g. `/api/v1`. */
  prefix: string;
  timeoutMs: number;
  /** Clock for the context timestamp (injectable for testing). */
  now?: () => Date;
}

export interface ContextMetadata {
  source: string;
  version: string;
  context_type: 'advertising';
}

export interface AdContext {
  protocol: typeof CONTEXT_PROTOCOL;
  context_id: string;
  timestamp: string;
  data: ResultEnvelope;
  metadata: ContextMetadata;
}

export interface InventoryContext {
  protocol: typeof CONTEXT_PROTOCOL;
  type: 'inventory';
  channel: string;
  date: string;
  inventory: ResultEnvelope;
}

export interface CampaignContext {
  protocol: typeof CONTEXT_PROTOCOL;
  type: 'campaign';
  campaign_id: string;
  data: ResultEnvelope;
}

/** A context document plus the forwarding failure behind it, if any. */
export interface ContextResult<T> {
  document: T;
  error?: ForwardError;
}

export class AdContextHandler {
  private readonly forwarder: HttpForwarder;
  private readonly prefix: string;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: ContextHandlerOptions) {
    this.forwarder = options.forwarder;
    this.prefix = options.prefix.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  async getAdContext(contextId: string, filters?: QueryParams): Promise<ContextResult<AdContext>> {
    // A filter named context_id overrides the argument
    const { envelope, error } = await this.fetch('/ad-context', { context_id: contextId, ...filters });
    return {
      document: {
        protocol: CONTEXT_PROTOCOL,
        context_id: contextId,
        timestamp: this.now().toISOString(),
        data: envelope,
        metadata: {
          source: 'backend_api',
          version: '1.0',
          context_type: 'advertising',
        },
      },
      error,
    };
  }

  async getAvailableInventory(channel: string, date: string): Promise<ContextResult<InventoryContext>> {
    const { envelope, error } = await this.fetch('/inventory', { channel, date });
    return {
      document: { protocol: CONTEXT_PROTOCOL, type: 'inventory', channel, date, inventory: envelope },
      error,
    };
  }

  async getCampaignContext(campaignId: string): Promise<ContextResult<CampaignContext>> {
    const { envelope, error } = await this.fetch(`/campaigns/${encodeURIComponent(campaignId)}`);
    return {
      document: { protocol: CONTEXT_PROTOCOL, type: 'campaign', campaign_id: campaignId, data: envelope },
      error,
    };
  }

  private fetch(path: string, query?: QueryParams) {
    const descriptor: RequestDescriptor = {
      method: 'GET',
      url: `${this.prefix}${path}`,
      query,
      timeoutMs: this.timeoutMs,
    };
    return this.forwarder.forward(descriptor, { decode: 'json', failure: BARE_FAILURE });
  }
}
