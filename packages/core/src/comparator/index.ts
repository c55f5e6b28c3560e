/**
 * Comparator
 *
 * Turns an (operator, actual, expected) triple into a tri-state outcome.
 * Comparisons are pure and exact; a missing operand, a kind mismatch or an
 * unknown operator yields `indeterminate` rather than an error.
 */

import { decimal, valuesEqual, type Decimal, type EvidenceValue, type ListValue } from '../values/index.ts';
import { fromBoolean, type TriState } from '../ret-logic/index.ts';

// =============================================================================
// Types
// =============================================================================

export type ComparatorFn = (actual: EvidenceValue, expected: EvidenceValue) => TriState;

export type OperatorTable = ReadonlyMap<string, ComparatorFn>;

export type OperatorName =
  | 'equals'
  | 'not_equals'
  | 'greater_than'
  | 'greater_than_or_equal'
  | 'less_than'
  | 'less_than_or_equal'
  | 'lex_greater_than'
  | 'lex_greater_than_or_equal'
  | 'lex_less_than'
  | 'lex_less_than_or_equal'
  | 'in_set'
  | 'contains'
  | 'deep_equals'
  | 'deep_not_equals';

export interface Comparator {
  readonly operators: readonly string[];
  has(operator: string): boolean;
  compare(operator: string, actual: EvidenceValue, expected: EvidenceValue): TriState;
}

type Ordering = -1 | 0 | 1;

const INDETERMINATE: TriState = 'indeterminate';

// =============================================================================
// Temporal Text
// =============================================================================

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATE_TIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(\.\d{1,9})?(?:[Zz]|([+-])(\d{2}):(\d{2}))$/;

interface Instant {
  form: 'date' | 'date_time';
  /** Days for dates, seconds for date-times, both since the Unix epoch */
  at: Decimal;
}

function epochDays(year: number, month: number, day: number): number | null {
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null;
  }
  return date.getTime() / 86_400_000;
}

function parseInstant(text: string): Instant | null {
  const dateMatch = DATE_PATTERN.exec(text);
  if (dateMatch) {
    const days = epochDays(Number(dateMatch[1]), Number(dateMatch[2]), Number(dateMatch[3]));
    return days === null ? null : { form: 'date', at: decimal(days) };
  }

  const match = DATE_TIME_PATTERN.exec(text);
  if (!match) return null;
  const [, year, month, day, hour, minute, second, fraction, sign, offsetHour, offsetMinute] = match;
  const days = epochDays(Number(year), Number(month), Number(day));
  const h = Number(hour);
  const m = Number(minute);
  const s = Number(second);
  const oh = Number(offsetHour ?? '0');
  const om = Number(offsetMinute ?? '0');
  if (days === null || h > 23 || m > 59 || s > 59 || oh > 23 || om > 59) return null;

  const offset = (oh * 3600 + om * 60) * (sign === '-' ? -1 : 1);
  const seconds = days * 86_400 + h * 3600 + m * 60 + s - offset;
  return { form: 'date_time', at: decimal(seconds).plus(fraction === undefined ? 0 : `0${fraction}`) };
}

// =============================================================================
// Helpers
// =============================================================================

function toOrdering(n: number): Ordering {
  return n < 0 ? -1 : n > 0 ? 1 : 0;
}

/** Order numbers exactly, or RFC 3339 texts of the same form chronologically */
function orderValues(actual: EvidenceValue, expected: EvidenceValue): Ordering | null {
  if (actual.kind === 'number' && expected.kind === 'number') {
    return toOrdering(actual.value.cmp(expected.value));
  }
  if (actual.kind === 'text' && expected.kind === 'text') {
    const left = parseInstant(actual.value);
    const right = parseInstant(expected.value);
    if (left === null || right === null || left.form !== right.form) return null;
    return toOrdering(left.at.cmp(right.at));
  }
  return null;
}

/** Compare by Unicode code point rather than UTF-16 code unit */
export function compareCodePoints(left: string, right: string): Ordering {
  const a = Array.from(left);
  const b = Array.from(right);
  const length = Math.min(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const x = a[i]?.codePointAt(0) ?? 0;
    const y = b[i]?.codePointAt(0) ?? 0;
    if (x !== y) return x < y ? -1 : 1;
  }
  return toOrdering(a.length - b.length);
}

function ordered(accept: (ordering: Ordering) => boolean): ComparatorFn {
  return (actual, expected) => {
    const ordering = orderValues(actual, expected);
    return ordering === null ? INDETERMINATE : fromBoolean(accept(ordering));
  };
}

function lexical(accept: (ordering: Ordering) => boolean): ComparatorFn {
  return (actual, expected) => {
    if (actual.kind !== 'text' || expected.kind !== 'text') return INDETERMINATE;
    return fromBoolean(accept(compareCodePoints(actual.value, expected.value)));
  };
}

function listIncludes(list: ListValue, item: EvidenceValue): boolean {
  return list.items.some((candidate) => valuesEqual(candidate, item));
}

// =============================================================================
// Operators
// =============================================================================

const equals: ComparatorFn = (actual, expected) =>
  actual.kind === expected.kind ? fromBoolean(valuesEqual(actual, expected)) : INDETERMINATE;

const notEquals: ComparatorFn = (actual, expected) =>
  actual.kind === expected.kind ? fromBoolean(!valuesEqual(actual, expected)) : INDETERMINATE;

const inSet: ComparatorFn = (actual, expected) => {
  if (expected.kind !== 'list' || actual.kind === 'list') return INDETERMINATE;
  return fromBoolean(listIncludes(expected, actual));
};

const contains: ComparatorFn = (actual, expected) => {
  if (actual.kind === 'text' && expected.kind === 'text') {
    return fromBoolean(actual.value.includes(expected.value));
  }
  if (actual.kind !== 'list') return INDETERMINATE;
  const haystack: ListValue = actual;
  if (expected.kind === 'list') {
    return fromBoolean(expected.items.every((item) => listIncludes(haystack, item)));
  }
  return fromBoolean(listIncludes(haystack, expected));
};

const deepEquals: ComparatorFn = (actual, expected) =>
  actual.kind === 'list' && expected.kind === 'list' ? fromBoolean(valuesEqual(actual, expected)) : INDETERMINATE;

const deepNotEquals: ComparatorFn = (actual, expected) =>
  actual.kind === 'list' && expected.kind === 'list' ? fromBoolean(!valuesEqual(actual, expected)) : INDETERMINATE;

const BUILT_IN: ReadonlyArray<readonly [OperatorName, ComparatorFn]> = [
  ['equals', equals],
  ['not_equals', notEquals],
  ['greater_than', ordered((o) => o > 0)],
  ['greater_than_or_equal', ordered((o) => o >= 0)],
  ['less_than', ordered((o) => o < 0)],
  ['less_than_or_equal', ordered((o) => o <= 0)],
  ['lex_greater_than', lexical((o) => o > 0)],
  ['lex_greater_than_or_equal', lexical((o) => o >= 0)],
  ['lex_less_than', lexical((o) => o < 0)],
  ['lex_less_than_or_equal', lexical((o) => o <= 0)],
  ['in_set', inSet],
  ['contains', contains],
  ['deep_equals', deepEquals],
  ['deep_not_equals', deepNotEquals],
];

export const DEFAULT_OPERATORS: OperatorTable = new Map<string, ComparatorFn>(BUILT_IN);

/**
 * Build an operator table from a base table plus extra operators. Extra
 * entries replace base entries of the same name.
 */
export function defineOperators(
  extra: Readonly<Record<string, ComparatorFn>>,
  base: OperatorTable = DEFAULT_OPERATORS
): OperatorTable {
  const table = new Map(base);
  for (const [name, fn] of Object.entries(extra)) {
    table.set(name, fn);
  }
  return table;
}

// =============================================================================
// Comparator
// =============================================================================

export function createComparator(table: OperatorTable = DEFAULT_OPERATORS): Comparator {
  const operators = Object.freeze([...table.keys()]);
  return {
    operators,
    has: (operator) => table.has(operator),
    compare: (operator, actual, expected) => {
      if (actual.kind === 'missing' || expected.kind === 'missing') return INDETERMINATE;
      const fn = table.get(operator);
      return fn === undefined ? INDETERMINATE : fn(actual, expected);
    },
  };
}

const defaultComparator = createComparator();

/**
 * Compare with the built-in operator table.
 */
export function compare(operator: string, actual: EvidenceValue, expected: EvidenceValue): TriState {
  return defaultComparator.compare(operator, actual, expected);
}
