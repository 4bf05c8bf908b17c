// @outline-admin/sdk - Maps exchange results onto values or typed failures

import { z } from 'zod';
import {
  Endpoints,
  ParseError,
  ServerError,
  canonicalize,
  type HttpExchangeResult,
  type OperationName,
} from '@outline-admin/core';

// ============================================================================
// Response Schemas
// ============================================================================

export const DataLimitSchema = z.object({
  bytes: z.number().int().nonnegative(),
});

/**
 * Access key as returned by the server. Unknown fields are kept.
 */
export const AccessKeySchema = z
  .object({
    id: z.string(),
    name: z.string().optional(),
    password: z.string().optional(),
    port: z.number().int().optional(),
    method: z.string().optional(),
    accessUrl: z.string().optional(),
    dataLimit: DataLimitSchema.optional(),
  })
  .passthrough();

export type AccessKey = z.infer<typeof AccessKeySchema>;

export const AccessKeyListSchema = z
  .object({
    accessKeys: z.array(AccessKeySchema),
  })
  .passthrough();

export type AccessKeyList = z.infer<typeof AccessKeyListSchema>;

// ============================================================================
// Classification
// ============================================================================

/**
 * @throws ServerError unless the status is the operation's single success code
 */
export function expectStatus(operation: OperationName, result: HttpExchangeResult): void {
  if (result.status !== Endpoints[operation].expectedStatus) {
    throw new ServerError(operation, result.status);
  }
}

/**
 * Parse the body as JSON, check its shape and return it with keys sorted.
 * @throws ParseError when the body is not JSON or not the expected shape
 */
export function parseBody<T>(
  operation: OperationName,
  body: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  let raw: unknown;
  try {
    raw = JSON.parse(body);
  } catch (err) {
    throw new ParseError(operation, err);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ParseError(operation, parsed.error);
  }
  return canonicalize(parsed.data);
}

/**
 * Status check first; the body is only parsed on success
 */
export function classify<T>(
  operation: OperationName,
  result: HttpExchangeResult,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  expectStatus(operation, result);
  return parseBody(operation, result.body, schema);
}
