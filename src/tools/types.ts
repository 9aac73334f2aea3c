import { z, type ZodRawShape } from 'zod';
import type { DecodeMode, FailureShape, RequestDescriptor } from '../http/types.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export interface TimeoutConfig {
  /** Lookups, legacy bookings and the passthrough call. */
  standardMs: number;
  /** ADCP discovery and mutation tasks. */
  extendedMs: number;
}

/** Per-call inputs a builder may read besides its arguments. */
export interface BuildContext {
  now: Date;
  timeouts: TimeoutConfig;
}

/** A tool entry with its argument type erased, ready for registration. */
export interface ToolSpec {
  description: string;
  schema: ZodRawShape;
  decode: DecodeMode;
  failure: FailureShape;
  build(args: unknown, ctx: BuildContext): RequestDescriptor;
}

/** Parsed arguments of a tool whose schema is the raw shape `S`. */
export type ToolArgs<S extends ZodRawShape> = z.objectOutputType<S, z.ZodTypeAny, 'strip'>;

export interface ToolDefinition<S extends ZodRawShape> {
  description: string;
  schema: S;
  decode?: DecodeMode;
  failure: FailureShape;
  build(args: ToolArgs<S>, ctx: BuildContext): RequestDescriptor;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Bind a typed builder to its schema. Arguments are parsed again here so
 * schema defaults apply the same way whether or not the MCP runtime ran first.
 */
export function defineTool<S extends ZodRawShape>(def: ToolDefinition<S>): ToolSpec {
  const parser = z.object(def.schema);
  return {
    description: def.description,
    schema: def.schema,
    decode: def.decode ?? 'json',
    failure: def.failure,
    build: (args, ctx) => def.build(parser.parse(args ?? {}), ctx),
  };
}

/** Local calendar date as YYYY-MM-DD. */
export function formatDate(date: Date): string {
  const y = date.getFullYear();
  const m = String(date.getMonth() + 1).padStart(2, '0');
  const d = String(date.getDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

export const adcpFailure = (label: string): FailureShape => ({ kind: 'adcp', label });
export const BARE_FAILURE: FailureShape = { kind: 'bare' };
