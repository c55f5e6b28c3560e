/**
 * Evidence values
 *
 * The typed facts providers return and conditions compare against. Numbers
 * are exact decimals and never pass through binary floating point; the
 * tagged wire form carries them as strings.
 */

import { Decimal } from 'decimal.js';
import { z } from 'zod';
import { isLosslessNumber } from 'lossless-json';

// =============================================================================
// Decimal Context
// =============================================================================

/**
 * Decimal constructor used for every number the engine handles. Arithmetic
 * keeps 64 significant digits and rounds half to even; construction and
 * comparison are exact.
 */
export const ExactDecimal: Decimal.Constructor = Decimal.clone({
  precision: 64,
  rounding: Decimal.ROUND_HALF_EVEN,
});

export type { Decimal };

export const MAX_DECIMAL_LITERAL_LENGTH = 256;

const DECIMAL_LITERAL_PATTERN = /^[+-]?\d+(\.\d+)?([eE][+-]?\d+)?$/;

export function isDecimalLiteral(raw: string): boolean {
  if (raw.length > MAX_DECIMAL_LITERAL_LENGTH || !DECIMAL_LITERAL_PATTERN.test(raw)) {
    return false;
  }
  return new ExactDecimal(raw).isFinite();
}

/**
 * Parse a plain decimal literal. Hex, binary, NaN and Infinity forms are
 * rejected, as is anything whose exponent overflows.
 */
export function parseDecimal(raw: string): Decimal {
  if (!isDecimalLiteral(raw)) {
    const shown = raw.length > 32 ? `${raw.slice(0, 32)}...` : raw;
    throw new TypeError(`Invalid decimal literal: ${JSON.stringify(shown)}`);
  }
  return new ExactDecimal(raw);
}

export function decimal(value: Decimal.Value): Decimal {
  if (typeof value === 'string') return parseDecimal(value);
  const result = new ExactDecimal(value);
  if (!result.isFinite()) {
    throw new TypeError('Decimal value must be finite');
  }
  return result;
}

// =============================================================================
// Value Types
// =============================================================================

export type MissingReason =
  | 'absent'
  | 'timeout'
  | 'budget_exceeded'
  | 'provider_error'
  | 'cancelled';

export const MISSING_REASONS: readonly MissingReason[] = [
  'absent',
  'timeout',
  'budget_exceeded',
  'provider_error',
  'cancelled',
];

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

export interface NumberValue {
  readonly kind: 'number';
  readonly value: Decimal;
}

export interface TextValue {
  readonly kind: 'text';
  readonly value: string;
}

export interface ListValue {
  readonly kind: 'list';
  readonly items: readonly EvidenceValue[];
}

export interface MissingValue {
  readonly kind: 'missing';
  readonly reason: MissingReason;
}

export type EvidenceValue = BooleanValue | NumberValue | TextValue | ListValue | MissingValue;

export type EvidenceKind = EvidenceValue['kind'];

/** Lossless JSON wire form of an EvidenceValue */
export type EncodedValue =
  | { kind: 'boolean'; value: boolean }
  | { kind: 'number'; value: string }
  | { kind: 'text'; value: string }
  | { kind: 'list'; items: EncodedValue[] }
  | { kind: 'missing'; reason: MissingReason };

// =============================================================================
// Constructors
// =============================================================================

export function booleanValue(value: boolean): BooleanValue {
  return Object.freeze({ kind: 'boolean', value });
}

export function numberValue(value: Decimal | string): NumberValue {
  const parsed = typeof value === 'string' ? parseDecimal(value) : decimal(value);
  return Object.freeze({ kind: 'number', value: parsed });
}

export function textValue(value: string): TextValue {
  return Object.freeze({ kind: 'text', value });
}

export function listValue(items: readonly EvidenceValue[]): ListValue {
  return Object.freeze({ kind: 'list', items: Object.freeze([...items]) });
}

export function missingValue(reason: MissingReason = 'absent'): MissingValue {
  return Object.freeze({ kind: 'missing', reason });
}

export function isMissing(value: EvidenceValue): value is MissingValue {
  return value.kind === 'missing';
}

// =============================================================================
// Wire Codec
// =============================================================================

export const encodedValueSchema: z.ZodType<EncodedValue> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('boolean'), value: z.boolean() }).strict(),
    z
      .object({
        kind: z.literal('number'),
        value: z.string().refine(isDecimalLiteral, 'Expected a plain decimal literal'),
      })
      .strict(),
    z.object({ kind: z.literal('text'), value: z.string() }).strict(),
    z.object({ kind: z.literal('list'), items: z.array(encodedValueSchema) }).strict(),
    z.object({ kind: z.literal('missing'), reason: z.enum(['absent', 'timeout', 'budget_exceeded', 'provider_error', 'cancelled']) }).strict(),
  ])
);

export function encodeValue(value: EvidenceValue): EncodedValue {
  switch (value.kind) {
    case 'boolean':
      return { kind: 'boolean', value: value.value };
    case 'number':
      return { kind: 'number', value: value.value.toString() };
    case 'text':
      return { kind: 'text', value: value.value };
    case 'list':
      return { kind: 'list', items: value.items.map(encodeValue) };
    case 'missing':
      return { kind: 'missing', reason: value.reason };
  }
}

function fromEncoded(encoded: EncodedValue): EvidenceValue {
  switch (encoded.kind) {
    case 'boolean':
      return booleanValue(encoded.value);
    case 'number':
      return numberValue(encoded.value);
    case 'text':
      return textValue(encoded.value);
    case 'list':
      return listValue(encoded.items.map(fromEncoded));
    case 'missing':
      return missingValue(encoded.reason);
  }
}

/**
 * Decode the tagged wire form. Throws TypeError on malformed input.
 */
export function decodeValue(json: unknown): EvidenceValue {
  const parsed = encodedValueSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new TypeError(`Malformed evidence value${where}: ${issue?.message ?? 'invalid'}`);
  }
  return fromEncoded(parsed.data);
}

function isTaggedObject(raw: object): boolean {
  return 'kind' in raw && typeof raw.kind === 'string';
}

/**
 * Normalize plain JSON into an EvidenceValue. `null` is absent evidence,
 * JS numbers go through their shortest decimal rendering, lossless-json
 * numbers keep their source digits and tagged objects are decoded.
 */
export function fromJson(raw: unknown): EvidenceValue {
  if (raw === null) return missingValue('absent');
  switch (typeof raw) {
    case 'boolean':
      return booleanValue(raw);
    case 'string':
      return textValue(raw);
    case 'number':
      if (!Number.isFinite(raw)) {
        throw new TypeError('Evidence numbers must be finite');
      }
      return numberValue(String(raw));
    case 'object':
      if (Array.isArray(raw)) {
        return listValue(raw.map((item: unknown) => fromJson(item)));
      }
      if (isLosslessNumber(raw)) {
        return numberValue(raw.value);
      }
      if (isTaggedObject(raw)) {
        return decodeValue(raw);
      }
      throw new TypeError('Untagged JSON objects are not evidence values');
    default:
      throw new TypeError(`Unsupported evidence JSON type: ${typeof raw}`);
  }
}

// =============================================================================
// Inspection
// =============================================================================

export function isEvidenceValue(x: unknown): x is EvidenceValue {
  if (typeof x !== 'object' || x === null || !('kind' in x)) return false;
  switch (x.kind) {
    case 'boolean':
      return 'value' in x && typeof x.value === 'boolean';
    case 'number':
      return 'value' in x && Decimal.isDecimal(x.value) && x.value.isFinite();
    case 'text':
      return 'value' in x && typeof x.value === 'string';
    case 'list':
      return 'items' in x && Array.isArray(x.items) && x.items.every((item: unknown) => isEvidenceValue(item));
    case 'missing': {
      if (!('reason' in x)) return false;
      const reason = x.reason;
      return MISSING_REASONS.some((r) => r === reason);
    }
    default:
      return false;
  }
}

function listsEqual(left: readonly EvidenceValue[], right: readonly EvidenceValue[]): boolean {
  if (left.length !== right.length) return false;
  return left.every((item, i) => {
    const other = right[i];
    return other !== undefined && valuesEqual(item, other);
  });
}

/**
 * Kind-strict structural equality. Numbers compare as exact decimals.
 */
export function valuesEqual(a: EvidenceValue, b: EvidenceValue): boolean {
  switch (a.kind) {
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'number':
      return b.kind === 'number' && a.value.eq(b.value);
    case 'text':
      return b.kind === 'text' && a.value === b.value;
    case 'list':
      return b.kind === 'list' && listsEqual(a.items, b.items);
    case 'missing':
      return b.kind === 'missing' && a.reason === b.reason;
  }
}

const MAX_DESCRIBED_TEXT = 48;
const MAX_DESCRIBED_ITEMS = 5;

/**
 * Short human-readable rendering for reasons and log lines.
 */
export function describeValue(value: EvidenceValue): string {
  switch (value.kind) {
    case 'boolean':
      return String(value.value);
    case 'number':
      return value.value.toString();
    case 'text': {
      const text = value.value.length > MAX_DESCRIBED_TEXT
        ? `${value.value.slice(0, MAX_DESCRIBED_TEXT)}...`
        : value.value;
      return JSON.stringify(text);
    }
    case 'list': {
      const shown = value.items.slice(0, MAX_DESCRIBED_ITEMS).map(describeValue);
      if (value.items.length > MAX_DESCRIBED_ITEMS) {
        shown.push(`+${value.items.length - MAX_DESCRIBED_ITEMS} more`);
      }
      return `[${shown.join(', ')}]`;
    }
    case 'missing':
      return `missing(${value.reason})`;
  }
}
