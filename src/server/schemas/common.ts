/**
 * Common TypeBox schemas for the preview API
 */

import { Type, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

const ResponseMetaSchema = Type.Object({
  total: Type.Optional(Type.Number()),
  revision: Type.Optional(Type.String()),
});

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
    meta: Type.Optional(ResponseMetaSchema),
  });
}

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Optional(ResponseMetaSchema),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const ClinicStatusSchema = Type.Union([
  Type.Literal("ACTIVE"),
  Type.Literal("INACTIVE"),
]);
