/**
 * Client configuration module
 * Environment variables are validated and typed on load
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { MAX_TIMEOUT_MS } from "@outline-admin/core";

// ============================================================================
// Schema Definitions
// ============================================================================

const booleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    return ["true", "1", "yes"].includes(val.toLowerCase());
  });

function isHttpsUrl(val: string): boolean {
  try {
    return new URL(val).protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Main configuration schema
 */
export const ConfigSchema = z.object({
  /** Management API URL, including the secret path (e.g. https://203.0.113.5:8081/AbCdEf) */
  apiUrl: z
    .string()
    .url()
    .refine(isHttpsUrl, { message: "API URL must use https" }),

  // TLS
  /** SHA-256 fingerprint of the server certificate */
  certSha256: z
    .string()
    .regex(/^([0-9a-fA-F]{2}:?){31}[0-9a-fA-F]{2}$/, "Expected a SHA-256 fingerprint in hex")
    .optional(),
  /** PEM file with trust anchors for the server certificate */
  caFile: z.string().min(1).optional(),
  /** Accept any server certificate (opt-in) */
  insecure: booleanFlag.default(false),

  // Transport
  /** Per-call deadline in milliseconds */
  timeoutMs: z.coerce.number().int().min(1).max(MAX_TIMEOUT_MS).default(30_000),

  // Logging
  logLevel: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  logFormat: z.enum(["json", "pretty"]).default("json"),
});

export type Config = z.infer<typeof ConfigSchema>;

// ============================================================================
// Environment Variable Mapping
// ============================================================================

/**
 * Maps environment variable names to config keys
 */
const ENV_MAP: Record<string, keyof Config> = {
  OUTLINE_API_URL: "apiUrl",
  OUTLINE_CERT_SHA256: "certSha256",
  OUTLINE_CA_FILE: "caFile",
  OUTLINE_INSECURE: "insecure",
  OUTLINE_TIMEOUT_MS: "timeoutMs",
  LOG_LEVEL: "logLevel",
  LOG_FORMAT: "logFormat",
};

// ============================================================================
// File-Based Secrets (_FILE suffix support for Docker secrets)
// ============================================================================

/** The API URL embeds the access secret, so it may come from a mounted file */
const SECRET_KEYS = ["OUTLINE_API_URL"] as const;

/**
 * Resolve _FILE suffixed env vars into their base env vars.
 * For each secret key, if KEY_FILE is set and KEY is not,
 * reads the file and sets KEY in process.env.
 */
function resolveFileSecrets(): void {
  for (const key of SECRET_KEYS) {
    const fileKey = `${key}_FILE`;
    const filePath = process.env[fileKey];
    if (filePath && !process.env[key]) {
      try {
        process.env[key] = readFileSync(filePath, "utf-8").trim();
      } catch (err) {
        // console.error is intentional: logger is not initialized at config load time
        console.error(
          `Warning: Could not read secret file for ${fileKey}: ${err}`
        );
      }
    }
  }
}

/**
 * Load raw values from environment variables
 */
function loadFromEnv(): Record<string, unknown> {
  resolveFileSecrets();

  const raw: Record<string, unknown> = {};

  for (const [envKey, configKey] of Object.entries(ENV_MAP)) {
    const value = process.env[envKey];
    if (value !== undefined) {
      raw[configKey] = value;
    }
  }

  return raw;
}

// ============================================================================
// Config Loading Functions
// ============================================================================

/**
 * Parse and validate configuration
 * @throws {z.ZodError} if validation fails
 */
export function parseConfig(input: Record<string, unknown>): Config {
  return ConfigSchema.parse(input);
}

/**
 * Load configuration from environment variables
 * @throws {z.ZodError} if validation fails
 */
export function loadConfig(): Config {
  return parseConfig(loadFromEnv());
}

/**
 * Safely load configuration, returning errors instead of throwing
 */
export function loadConfigSafe(): { config: Config | null; errors: string[] } {
  try {
    const config = loadConfig();
    return { config, errors: [] };
  } catch (err) {
    if (err instanceof z.ZodError) {
      const errors = err.issues.map(
        (e: z.ZodIssue) => `${e.path.join(".")}: ${e.message}`
      );
      return { config: null, errors };
    }
    return { config: null, errors: [err instanceof Error ? err.message : String(err)] };
  }
}

/**
 * Warnings about the TLS trust setup
 */
export function validateTlsConfig(config: Config): string[] {
  const warnings: string[] = [];

  if (config.insecure) {
    warnings.push("OUTLINE_INSECURE is set: server certificates are not verified");
    if (config.certSha256 || config.caFile) {
      warnings.push("OUTLINE_CERT_SHA256 and OUTLINE_CA_FILE are ignored in insecure mode");
    }
  } else if (!config.certSha256 && !config.caFile) {
    warnings.push(
      "No OUTLINE_CERT_SHA256 or OUTLINE_CA_FILE configured: self-signed servers will be rejected"
    );
  }

  return warnings;
}

// ============================================================================
// Singleton Config Instance
// ============================================================================

let _config: Config | null = null;

/**
 * Get the global config instance (lazy-loaded)
 */
export function getConfig(): Config {
  if (!_config) {
    _config = loadConfig();
  }
  return _config;
}

/**
 * Reset the global config (mainly for testing)
 */
export function resetConfig(): void {
  _config = null;
}

/**
 * Set the global config (mainly for testing)
 */
export function setConfig(config: Config): void {
  _config = config;
}
