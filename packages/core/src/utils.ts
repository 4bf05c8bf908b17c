// @outline-admin/core - Shared utility functions

import type { AccessKeyBody, AccessKeyParams, JsonValue } from './types.js';

/**
 * Build the create/update request body, leaving out every absent field
 */
export function toAccessKeyBody(params: AccessKeyParams): AccessKeyBody {
  const body: AccessKeyBody = {};
  if (params.name !== undefined) body.name = params.name;
  if (params.password !== undefined) body.password = params.password;
  if (params.method !== undefined) body.method = params.method;
  if (params.dataLimitBytes !== undefined) body.limit = { bytes: params.dataLimitBytes };
  return body;
}

/**
 * Rebuild a parsed JSON value with object keys sorted recursively.
 * Keys are defined as own properties, so a `__proto__` key stays a plain field.
 */
export function canonicalize<T>(value: T): T;
export function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item: unknown) => canonicalize(item));
  }
  if (value !== null && typeof value === 'object') {
    const entries: Array<[string, unknown]> = Object.entries(value);
    return Object.fromEntries(
      entries
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, item]) => [key, canonicalize(item)])
    );
  }
  return value;
}

/**
 * Compact JSON with sorted keys
 */
export function canonicalJson(value: JsonValue): string {
  return JSON.stringify(canonicalize(value));
}

/**
 * Truncate a string to a max length, adding ellipsis if truncated
 */
export function truncate(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  if (maxLen < 4) return str.slice(0, maxLen);
  return str.slice(0, maxLen - 3) + '...';
}
