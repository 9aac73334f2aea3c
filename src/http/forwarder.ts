// ──────────────────────────────────────────────────────────────────────────────
// Request forwarder: one HTTP call per tool invocation, one envelope out
// ──────────────────────────────────────────────────────────────────────────────

import {
  DecodeError,
  ForwardError,
  HttpStatusError,
  NetworkError,
  TimeoutError,
} from './errors.js';
import {
  ADCP_VERSION,
  type DecodeMode,
  type FailureShape,
  type JsonValue,
  type QueryParams,
  type RequestDescriptor,
  type ResultEnvelope,
  type TextEnvelope,
} from './types.js';

export interface ForwarderOptions {
  /** Backend base address, e.g. `http://localhost:8000`. */
  baseUrl: string;
  /** Injectable for tests; defaults to the global fetch. */
  fetch?: typeof fetch;
}

export interface ForwardPolicy {
  decode: DecodeMode;
  failure: FailureShape;
}

export interface ForwardOutcome {
  envelope: ResultEnvelope;
  /** Set when the envelope is an error envelope. */
  error?: ForwardError;
}

const ABSOLUTE_URL = /^https?:\/\//i;

export class HttpForwarder {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;

  constructor(options: ForwarderOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.fetchFn = options.fetch ?? fetch;
  }

  /** Build the final URL for a descriptor, query string included. */
  resolveUrl(target: string, query?: QueryParams): string {
    const href = ABSOLUTE_URL.test(target) ? target : `${this.baseUrl}${target.startsWith('/') ? '' : '/'}${target}`;
    if (!query) return href;

    const url = new URL(href);
    for (const [key, value] of Object.entries(query)) {
      if (value === null || value === undefined) continue;
      const values = Array.isArray(value) ? value : [value];
      for (const v of values) {
        url.searchParams.append(key, String(v));
      }
    }
    return url.toString();
  }

  /**
   * Issue the request and decode the body.
   * Throws a ForwardError subclass on transport, status or decode failure.
   */
  async send(descriptor: RequestDescriptor, decode: DecodeMode = 'json'): Promise<JsonValue | TextEnvelope> {
    const url = this.buildUrl(descriptor);
    const headers: Record<string, string> = { ...descriptor.headers };
    let payload: string | undefined;
    if (descriptor.body !== undefined) {
      payload = JSON.stringify(descriptor.body);
      const hasContentType = Object.keys(headers).some((h) => h.toLowerCase() === 'content-type');
      if (!hasContentType) headers['Content-Type'] = 'application/json';
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), descriptor.timeoutMs);

    try {
      let res: Response;
      try {
        res = await this.fetchFn(url, {
          method: descriptor.method,
          headers,
          body: payload,
          signal: controller.signal,
        });
      } catch (err: unknown) {
        throw this.transportError(err, url, descriptor.timeoutMs, controller.signal);
      }

      // Read before the status check so the socket is released either way
      let text: string;
      try {
        text = await res.text();
      } catch (err: unknown) {
        throw this.transportError(err, url, descriptor.timeoutMs, controller.signal);
      }

      if (!res.ok) {
        throw new HttpStatusError(res.status, res.statusText, url);
      }

      try {
        const data: JsonValue = JSON.parse(text);
        return data;
      } catch (err: unknown) {
        if (decode === 'json-or-text') return { text };
        throw new DecodeError(url, err instanceof Error ? err.message : String(err));
      }
    } finally {
      clearTimeout(timeoutId);
    }
  }

  /**
   * Send the request and fold any forwarding failure into the policy's
   * error envelope. Errors that are not ForwardErrors propagate.
   */
  async forward(descriptor: RequestDescriptor, policy: ForwardPolicy): Promise<ForwardOutcome> {
    try {
      return { envelope: await this.send(descriptor, policy.decode) };
    } catch (err) {
      if (err instanceof ForwardError) {
        return { envelope: toErrorEnvelope(policy.failure, err.message), error: err };
      }
      throw err;
    }
  }

  private buildUrl(descriptor: RequestDescriptor): string {
    try {
      return this.resolveUrl(descriptor.url, descriptor.query);
    } catch (err: unknown) {
      // new URL() rejects malformed targets
      throw new NetworkError(`Invalid URL '${descriptor.url}': ${describe(err)}`, descriptor.url);
    }
  }

  private transportError(err: unknown, url: string, timeoutMs: number, signal: AbortSignal): NetworkError {
    if (signal.aborted) return new TimeoutError(url, timeoutMs);
    return new NetworkError(`Request to ${url} failed: ${describe(err)}`, url);
  }
}

/** Map a failure message to the operation's envelope shape. */
export function toErrorEnvelope(shape: FailureShape, message: string): ResultEnvelope {
  if (shape.kind === 'adcp') {
    return {
      protocol: 'adcp',
      version: ADCP_VERSION,
      status: 'failed',
      message: `${shape.label}: ${message}`,
    };
  }
  return { error: message };
}

function describe(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  // fetch wraps socket errors: TypeError('fetch failed', { cause })
  if (err.cause instanceof Error) return `${err.message} (${err.cause.message})`;
  return err.message;
}
