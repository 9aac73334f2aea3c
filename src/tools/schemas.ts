import { z } from 'zod';
import type { JsonValue } from '../http/types.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema = z.record(jsonValueSchema);

const queryScalarSchema = z.union([z.string(), z.number(), z.boolean()]);

export const queryValueSchema = z.union([
  queryScalarSchema,
  z.array(queryScalarSchema),
  z.null(),
]);
