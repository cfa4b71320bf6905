/**
 * Header validation and merging
 */

import { HeaderError } from '../errors/index.js';

// RFC 9110 token
const HEADER_NAME = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;

// Visible ASCII, space, tab and obs-text; no CR, LF or NUL.
const HEADER_VALUE = /^[\t\x20-\x7e\x80-\xff]*$/;

export function isValidHeaderName(name: string): boolean {
  return HEADER_NAME.test(name);
}

export function isValidHeaderValue(value: string): boolean {
  return HEADER_VALUE.test(value);
}

/**
 * @throws {HeaderError} If the name is not a token or the value contains
 * characters that cannot appear in a header
 */
export function assertValidHeader(name: string, value: string): void {
  if (!isValidHeaderName(name)) {
    throw HeaderError.invalidName(name);
  }
  if (!isValidHeaderValue(value)) {
    throw HeaderError.invalidValue(name);
  }
}

/**
 * Merges client defaults beneath call-specific headers.
 *
 * Call headers are kept as given; a default is added only when the call has
 * not set a header of the same name (compared case-insensitively). All names
 * in the result are lower-cased.
 */
export function mergeHeaders(
  defaults: Readonly<Record<string, string>>,
  overrides: Readonly<Record<string, string>>
): Record<string, string> {
  const merged: Record<string, string> = {};

  for (const [name, value] of Object.entries(overrides)) {
    merged[name.toLowerCase()] = value;
  }

  for (const [name, value] of Object.entries(defaults)) {
    const key = name.toLowerCase();
    if (!(key in merged)) {
      merged[key] = value;
    }
  }

  return merged;
}
