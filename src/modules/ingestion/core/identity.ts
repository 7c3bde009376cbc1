/**
 * Deterministic record identity.
 *
 * Identity is a SHA-256 over canonicalized field values: keys sorted, text
 * trimmed, whitespace collapsed and lowercased, blanks omitted. The same
 * content therefore hashes the same regardless of column order or casing.
 */

import type { Hasher } from './types.js';

export type IdentityValue = string | number | boolean | null | undefined;

const canonicalValue = (value: IdentityValue): string | null => {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return null;
    }
    // -0 and 0 must collide
    return String(value === 0 ? 0 : value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  const text = value.trim().replace(/\s+/g, ' ').toLowerCase();
  return text === '' ? null : text;
};

/**
 * Canonical, order-independent serialization of identity fields.
 */
export const canonicalizeIdentityFields = (
  fields: Readonly<Record<string, IdentityValue>>
): string => {
  const entries: [string, string][] = [];
  for (const key of Object.keys(fields).sort()) {
    const value = canonicalValue(fields[key]);
    if (value !== null) {
      entries.push([key, value]);
    }
  }
  return JSON.stringify(entries);
};

/**
 * Formats the first 128 bits of a hex digest as a UUID string.
 */
export const formatDigestAsUuid = (hex: string): string =>
  [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join('-');

export const computeIdentity = (
  hasher: Hasher,
  fields: Readonly<Record<string, IdentityValue>>
): string => hasher.sha256(canonicalizeIdentityFields(fields));
