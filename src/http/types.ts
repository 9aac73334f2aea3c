// ──────────────────────────────────────────────────────────────────────────────
// Wire types shared by the forwarder, the tool table and the context handler
// ──────────────────────────────────────────────────────────────────────────────

// ─── JSON ───────────────────────────────────────────────────────────────────

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type QueryScalar = string | number | boolean;
export type QueryValue = QueryScalar | QueryScalar[] | null | undefined;
export type QueryParams = Record<string, QueryValue>;

// ─── Requests ───────────────────────────────────────────────────────────────

export interface RequestDescriptor {
  method: string;
  /** Absolute http(s) URL, or a path resolved against the backend base URL. */
  url: string;
  query?: QueryParams;
  headers?: Record<string, string>;
  body?: JsonValue;
  timeoutMs: number;
}

/** `json-or-text` falls back to `{ text }` when the body is not JSON. */
export type DecodeMode = 'json' | 'json-or-text';

// ─── Envelopes ──────────────────────────────────────────────────────────────

export interface TextEnvelope {
  text: string;
}

export interface ErrorEnvelope {
  error: string;
}

export interface AdcpErrorEnvelope {
  protocol: 'adcp';
  version: typeof ADCP_VERSION;
  status: 'failed';
  message: string;
}

export type ResultEnvelope = JsonValue | TextEnvelope | ErrorEnvelope | AdcpErrorEnvelope;

export const ADCP_VERSION = '2.3.0';

/**
 * How an operation reports failure. Legacy tools use the bare `{ error }`
 * shape; ADCP tools use the protocol-tagged shape with a context label.
 */
export type FailureShape =
  | { kind: 'bare' }
  | { kind: 'adcp'; label: string };
