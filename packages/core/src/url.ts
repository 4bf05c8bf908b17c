// @outline-admin/core - API URL parsing and endpoint template resolution

import { UrlError } from './errors.js';
import type { ApiUrl, EndpointTemplate, PlaceholderMap } from './types.js';

const DEFAULT_HTTPS_PORT = '443';
const PLACEHOLDER_PATTERN = /\{[A-Za-z0-9_]+\}/g;

export interface ResolveOptions {
  /**
   * Throw when the template still contains a `{placeholder}` after substitution.
   * When false the literal marker is left in the path. Default: true
   */
  strict?: boolean;
}

/**
 * Parse the user-supplied management URL (e.g. "https://203.0.113.5:8081/SecretPath")
 */
export function parseApiUrl(input: string): ApiUrl {
  let parsed: URL;
  try {
    parsed = new URL(input.trim());
  } catch (err) {
    throw new UrlError('Unable to parse API URL', { cause: err });
  }

  if (parsed.protocol !== 'https:') {
    throw new UrlError(`API URL must use https, got ${parsed.protocol.replace(/:$/, '')}`);
  }

  // URL keeps the brackets around IPv6 literals
  const host = parsed.hostname.replace(/^\[|\]$/g, '');
  if (!host) {
    throw new UrlError('API URL has no host');
  }

  return Object.freeze({
    scheme: 'https',
    host,
    port: parsed.port || DEFAULT_HTTPS_PORT,
    path: parsed.pathname.replace(/\/+$/, ''),
    query: parsed.search.replace(/^\?/, ''),
  });
}

/**
 * Replace every occurrence of each `{key}` in the template with its value.
 * Substitution is literal; values are not encoded.
 */
export function substitutePlaceholders(template: EndpointTemplate, placeholders: PlaceholderMap): string {
  let result = template;
  for (const [key, value] of Object.entries(placeholders)) {
    result = result.split(`{${key}}`).join(value);
  }
  return result;
}

/**
 * Build the target URL for one call from the immutable base, an endpoint template and its placeholders.
 *
 * The resolved path is appended to the base path. The template's own query replaces the
 * base query when present; otherwise the base query is kept.
 */
export function resolveEndpoint(
  base: ApiUrl,
  template: EndpointTemplate,
  placeholders: PlaceholderMap = {},
  options: ResolveOptions = {}
): ApiUrl {
  const strict = options.strict ?? true;
  const resolved = substitutePlaceholders(template, placeholders);

  const queryStart = resolved.indexOf('?');
  const endpointPath = queryStart === -1 ? resolved : resolved.slice(0, queryStart);
  const endpointQuery = queryStart === -1 ? '' : resolved.slice(queryStart + 1);

  if (strict) {
    const unresolved = endpointPath.match(PLACEHOLDER_PATTERN) ?? endpointQuery.match(PLACEHOLDER_PATTERN);
    if (unresolved) {
      throw new UrlError(`Unresolved placeholder ${unresolved[0]} in endpoint ${template}`);
    }
  }

  const joiner = endpointPath === '' || endpointPath.startsWith('/') ? '' : '/';

  return Object.freeze({
    scheme: base.scheme,
    host: base.host,
    port: base.port,
    path: `${base.path}${joiner}${endpointPath}`,
    query: endpointQuery || base.query,
  });
}

/**
 * Request target: `path[?query]`
 */
export function formatTarget(url: ApiUrl): string {
  const path = url.path || '/';
  return url.query ? `${path}?${url.query}` : path;
}

/**
 * Value for the Host header
 */
export function formatHostHeader(url: ApiUrl): string {
  const host = url.host.includes(':') ? `[${url.host}]` : url.host;
  return url.port === DEFAULT_HTTPS_PORT ? host : `${host}:${url.port}`;
}

export function formatApiUrl(url: ApiUrl): string {
  const host = url.host.includes(':') ? `[${url.host}]` : url.host;
  return `${url.scheme}://${host}:${url.port}${formatTarget(url)}`;
}
