// @outline-admin/core - Error types

import type { TransportStage } from './types.js';

/**
 * Base class for every error raised by the client
 */
export class OutlineApiError extends Error {
  /** Error code for programmatic handling */
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OutlineApiError';
    this.code = code;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Malformed base URL or endpoint composition failure
 */
export class UrlError extends OutlineApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'URL_ERROR', options);
    this.name = 'UrlError';
  }
}

/**
 * Client settings that cannot be used, such as an unreadable CA file
 */
export class ConfigError extends OutlineApiError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}

/**
 * Failure at one stage of a transport exchange
 */
export class TransportError extends OutlineApiError {
  public readonly stage: TransportStage;

  constructor(message: string, stage: TransportStage, options?: { cause?: unknown; code?: string }) {
    super(message, options?.code ?? 'TRANSPORT_ERROR', options);
    this.name = 'TransportError';
    this.stage = stage;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), stage: this.stage };
  }
}

/**
 * The per-call deadline expired while a stage was in progress
 */
export class TimeoutError extends TransportError {
  public readonly timeoutMs: number;

  constructor(stage: TransportStage, timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms during ${stage}`, stage, { code: 'TIMEOUT' });
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), timeoutMs: this.timeoutMs };
  }
}

/**
 * The server answered with a status other than the one the operation expects
 */
export class ServerError extends OutlineApiError {
  public readonly operation: string;
  public readonly status: number;

  constructor(operation: string, status: number) {
    super(`${operation} failed with status ${status}`, 'SERVER_ERROR');
    this.name = 'ServerError';
    this.operation = operation;
    this.status = status;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operation: this.operation, status: this.status };
  }
}

/**
 * The response body could not be read as the expected JSON
 */
export class ParseError extends OutlineApiError {
  public readonly operation: string;

  constructor(operation: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`${operation} returned an unreadable body: ${detail}`, 'PARSE_ERROR', { cause });
    this.name = 'ParseError';
    this.operation = operation;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), operation: this.operation };
  }
}

export function isOutlineApiError(error: unknown): error is OutlineApiError {
  return error instanceof OutlineApiError;
}
