/**
 * Canonical hashing
 *
 * Stable JSON serialization with recursively sorted object keys, hashed
 * with SHA-256. Spec hashes, evidence hashes and runpack step hashes all
 * go through here so external verifiers can reimplement them exactly.
 */

import { createHash } from 'node:crypto';

export type HashAlgorithm = 'sha256';

export interface HashDigest {
  algorithm: HashAlgorithm;
  value: string;
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Integer-like keys sort as strings too */
function writeCanonical(value: unknown, path: string): string {
  if (value === null) return 'null';

  switch (typeof value) {
    case 'string':
    case 'boolean':
      return JSON.stringify(value);
    case 'number':
      if (!Number.isFinite(value)) {
        throw new TypeError(`Non-finite number at ${path}`);
      }
      return JSON.stringify(value);
    case 'object':
      break;
    default:
      throw new TypeError(`Unsupported ${typeof value} at ${path}`);
  }

  if (Array.isArray(value)) {
    const items = value.map((item: unknown, index) => {
      if (item === undefined) {
        throw new TypeError(`Undefined array item at ${path}[${index}]`);
      }
      return writeCanonical(item, `${path}[${index}]`);
    });
    return `[${items.join(',')}]`;
  }

  const entries: Array<[string, unknown]> = Object.entries(value);
  entries.sort(([a], [b]) => compareKeys(a, b));
  const members: string[] = [];
  for (const [key, item] of entries) {
    // Absent optional fields are dropped, matching JSON.stringify
    if (item === undefined) continue;
    members.push(`${JSON.stringify(key)}:${writeCanonical(item, `${path}.${key}`)}`);
  }
  return `{${members.join(',')}}`;
}

/**
 * Serialize a JSON-compatible value with keys sorted by code unit.
 * Guarantees identical output regardless of property insertion order.
 */
export function canonicalJson(value: unknown): string {
  return writeCanonical(value, '$');
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text, 'utf-8').digest('hex');
}

export function hashCanonical(value: unknown): string {
  return sha256Hex(canonicalJson(value));
}

export function digestOf(value: unknown): HashDigest {
  return { algorithm: 'sha256', value: hashCanonical(value) };
}

/**
 * Recursively freeze plain objects and arrays. Class instances (such as
 * decimals) are left as they are.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) {
    return value;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  if (!Array.isArray(value) && proto !== Object.prototype && proto !== null) {
    return value;
  }
  for (const item of Object.values(value)) {
    deepFreeze(item);
  }
  return Object.freeze(value);
}
