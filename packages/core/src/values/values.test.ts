import { describe, it, expect } from 'vitest';
import { LosslessNumber } from 'lossless-json';
import {
  booleanValue,
  numberValue,
  textValue,
  listValue,
  missingValue,
  decimal,
  parseDecimal,
  isDecimalLiteral,
  fromJson,
  encodeValue,
  decodeValue,
  isEvidenceValue,
  valuesEqual,
  describeValue,
} from './index.ts';

describe('parseDecimal', () => {
  it('accepts plain decimal literals', () => {
    expect(parseDecimal('18').toString()).toBe('18');
    expect(parseDecimal('-0.25').toString()).toBe('-0.25');
    expect(parseDecimal('+3').toString()).toBe('3');
    expect(parseDecimal('1.5e3').toString()).toBe('1500');
  });

  it('keeps every digit of long literals', () => {
    const raw = '12345678901234567890.123456789012345678901234567891';
    expect(parseDecimal(raw).toFixed()).toBe(raw);
  });

  it('rejects non-decimal forms', () => {
    for (const raw of ['NaN', 'Infinity', '-Infinity', '0x10', '0b101', '', '1.', '.5', '1e', ' 1', '1_000']) {
      expect(isDecimalLiteral(raw)).toBe(false);
      expect(() => parseDecimal(raw)).toThrow(TypeError);
    }
  });

  it('rejects literals longer than 256 characters', () => {
    expect(isDecimalLiteral('1'.repeat(256))).toBe(true);
    expect(isDecimalLiteral('1'.repeat(257))).toBe(false);
  });
});

describe('decimal arithmetic', () => {
  it('adds without binary-float drift', () => {
    expect(decimal('0.1').plus(decimal('0.2')).eq(decimal('0.3'))).toBe(true);
  });

  it('rounds half to even at 64 significant digits', () => {
    const third = decimal(1).div(3);
    expect(third.precision()).toBe(64);
    expect(decimal('2.5').toDecimalPlaces(0).toString()).toBe('2');
    expect(decimal('3.5').toDecimalPlaces(0).toString()).toBe('4');
  });

  it('rejects non-finite numbers', () => {
    expect(() => decimal(Number.POSITIVE_INFINITY)).toThrow('Decimal value must be finite');
  });
});

describe('constructors', () => {
  it('freezes values', () => {
    const list = listValue([booleanValue(true)]);
    expect(Object.isFrozen(list)).toBe(true);
    expect(Object.isFrozen(list.items)).toBe(true);
  });

  it('defaults missing to absent', () => {
    expect(missingValue()).toEqual({ kind: 'missing', reason: 'absent' });
  });
});

describe('fromJson', () => {
  it('normalizes plain JSON', () => {
    expect(fromJson(true)).toEqual(booleanValue(true));
    expect(fromJson('eu')).toEqual(textValue('eu'));
    expect(fromJson(null)).toEqual(missingValue('absent'));
    expect(valuesEqual(fromJson(0.1), numberValue('0.1'))).toBe(true);
    expect(valuesEqual(fromJson([1, 'a']), listValue([numberValue('1'), textValue('a')]))).toBe(true);
  });

  it('keeps the source digits of lossless numbers', () => {
    const value = fromJson([new LosslessNumber('12345678901234567890.000000001')]);
    expect(encodeValue(value)).toEqual({
      kind: 'list',
      items: [{ kind: 'number', value: '12345678901234567890.000000001' }],
    });
  });

  it('decodes tagged objects', () => {
    const value = fromJson({ kind: 'number', value: '18' });
    expect(valuesEqual(value, numberValue('18'))).toBe(true);
  });

  it('rejects untagged objects and unsupported types', () => {
    expect(() => fromJson({ age: 18 })).toThrow('Untagged JSON objects are not evidence values');
    expect(() => fromJson(undefined)).toThrow('Unsupported evidence JSON type: undefined');
    expect(() => fromJson(Number.NaN)).toThrow('Evidence numbers must be finite');
  });
});

describe('wire codec', () => {
  it('encodes numbers as strings', () => {
    expect(encodeValue(numberValue('0.1'))).toEqual({ kind: 'number', value: '0.1' });
  });

  it('decodes nested lists', () => {
    const decoded = decodeValue({
      kind: 'list',
      items: [{ kind: 'text', value: 'a' }, { kind: 'missing', reason: 'timeout' }],
    });
    expect(valuesEqual(decoded, listValue([textValue('a'), missingValue('timeout')]))).toBe(true);
  });

  it('reports where malformed input fails', () => {
    expect(() => decodeValue({ kind: 'number', value: 'NaN' })).toThrow(
      'Malformed evidence value at value: Expected a plain decimal literal'
    );
    expect(() => decodeValue({ kind: 'text', value: 'x', extra: 1 })).toThrow(TypeError);
    expect(() => decodeValue({ kind: 'missing', reason: 'lost' })).toThrow(TypeError);
    expect(() => decodeValue('18')).toThrow(TypeError);
  });
});

describe('isEvidenceValue', () => {
  it('recognizes well-formed values', () => {
    expect(isEvidenceValue(numberValue('1'))).toBe(true);
    expect(isEvidenceValue(listValue([missingValue('cancelled')]))).toBe(true);
  });

  it('rejects lookalikes', () => {
    expect(isEvidenceValue({ kind: 'number', value: 1 })).toBe(false);
    expect(isEvidenceValue({ kind: 'missing', reason: 'lost' })).toBe(false);
    expect(isEvidenceValue({ kind: 'list', items: [1] })).toBe(false);
    expect(isEvidenceValue(null)).toBe(false);
    expect(isEvidenceValue('text')).toBe(false);
  });
});

describe('valuesEqual', () => {
  it('compares numbers by value', () => {
    expect(valuesEqual(numberValue('1.50'), numberValue('1.5'))).toBe(true);
  });

  it('is kind-strict', () => {
    expect(valuesEqual(textValue('1'), numberValue('1'))).toBe(false);
    expect(valuesEqual(missingValue('timeout'), missingValue('absent'))).toBe(false);
  });

  it('compares lists element by element', () => {
    const a = listValue([textValue('a'), textValue('b')]);
    expect(valuesEqual(a, listValue([textValue('a'), textValue('b')]))).toBe(true);
    expect(valuesEqual(a, listValue([textValue('b'), textValue('a')]))).toBe(false);
    expect(valuesEqual(a, listValue([textValue('a')]))).toBe(false);
  });
});

describe('describeValue', () => {
  it('renders short descriptions', () => {
    expect(describeValue(booleanValue(false))).toBe('false');
    expect(describeValue(numberValue('18'))).toBe('18');
    expect(describeValue(textValue('eu'))).toBe('"eu"');
    expect(describeValue(missingValue('timeout'))).toBe('missing(timeout)');
    expect(describeValue(listValue([numberValue('1'), textValue('x')]))).toBe('[1, "x"]');
  });

  it('truncates long lists', () => {
    const items = ['1', '2', '3', '4', '5', '6', '7'].map((n) => numberValue(n));
    expect(describeValue(listValue(items))).toBe('[1, 2, 3, 4, 5, +2 more]');
  });
});
