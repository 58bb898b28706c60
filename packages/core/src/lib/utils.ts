/**
 * Utility functions for fluent-rest
 */
import type { HeaderValues } from "../types/http";

type HeaderSource = Readonly<
  Record<string, string | number | readonly string[] | undefined>
>;

/**
 * True for null, undefined and whitespace-only strings
 */
export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === "";
}

export function hasText(value: string | null | undefined): value is string {
  return !isBlank(value);
}

/**
 * Finds the key under which a header is stored (case-insensitive)
 * HTTP headers are case-insensitive per RFC 7230, but JavaScript objects are case-sensitive
 */
export function findHeaderName(
  headers: HeaderSource,
  headerName: string,
): string | undefined {
  const lowerHeaderName = headerName.toLowerCase();
  return Object.keys(headers).find((key) => key.toLowerCase() === lowerHeaderName);
}

/**
 * Gets the first value of a header (case-insensitive)
 */
export function getHeader(
  headers: HeaderSource,
  headerName: string,
): string | undefined {
  const key = findHeaderName(headers, headerName);
  if (key === undefined) {
    return undefined;
  }
  const value = headers[key];
  if (Array.isArray(value)) {
    return value[0];
  }
  return value === undefined ? undefined : String(value);
}

export function hasHeader(headers: HeaderSource, headerName: string): boolean {
  return getHeader(headers, headerName) !== undefined;
}

/**
 * Appends values to a header, keeping the spelling the header was first stored with
 *
 * @returns New headers object
 */
export function appendHeader(
  headers: HeaderValues,
  headerName: string,
  values: readonly string[],
): Record<string, string[]> {
  const newHeaders = copyHeaders(headers);
  const key = findHeaderName(newHeaders, headerName) ?? headerName;
  newHeaders[key] = [...(newHeaders[key] ?? []), ...values];
  return newHeaders;
}

/**
 * Sets a header, removing any existing case variants
 *
 * @returns New headers object with header set
 */
export function setHeader(
  headers: HeaderValues,
  headerName: string,
  values: readonly string[],
): Record<string, string[]> {
  const newHeaders = removeHeader(headers, headerName);
  newHeaders[headerName] = [...values];
  return newHeaders;
}

/**
 * Removes a header (case-insensitive)
 *
 * @returns New headers object without the header
 */
export function removeHeader(
  headers: HeaderValues,
  headerName: string,
): Record<string, string[]> {
  const lowerHeaderName = headerName.toLowerCase();
  const newHeaders: Record<string, string[]> = {};

  for (const [key, values] of Object.entries(headers)) {
    if (key.toLowerCase() !== lowerHeaderName) {
      newHeaders[key] = [...values];
    }
  }

  return newHeaders;
}

export function copyHeaders(headers: HeaderValues): Record<string, string[]> {
  const copy: Record<string, string[]> = {};
  for (const [key, values] of Object.entries(headers)) {
    copy[key] = [...values];
  }
  return copy;
}

/**
 * Joins multi-valued headers with ", " for libraries that take one string per name
 */
export function flattenHeaders(headers: HeaderValues): Record<string, string> {
  const flat: Record<string, string> = {};
  for (const [key, values] of Object.entries(headers)) {
    flat[key] = values.join(", ");
  }
  return flat;
}

/**
 * Normalizes response headers from Node or axios into lower-cased single strings
 */
export function normalizeResponseHeaders(
  headers: Readonly<Record<string, unknown>>,
): Record<string, string> {
  const normalized: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || value === null) {
      continue;
    }
    normalized[key.toLowerCase()] = Array.isArray(value)
      ? value.map((item) => String(item)).join(", ")
      : String(value);
  }
  return normalized;
}

export function isReadonlyMap<V>(
  value: ReadonlyMap<string, V> | Readonly<Record<string, V>>,
): value is ReadonlyMap<string, V> {
  return value instanceof Map;
}

/**
 * Entries of a Map or a plain record, in insertion order
 */
export function entriesOf<V>(
  value: ReadonlyMap<string, V> | Readonly<Record<string, V>>,
): [string, V][] {
  return isReadonlyMap(value) ? Array.from(value.entries()) : Object.entries(value);
}
