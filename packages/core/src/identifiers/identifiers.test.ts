import { describe, it, expect } from 'vitest';
import { SpecError } from '../errors/index.ts';
import {
  validateIdentifier,
  toIdentifier,
  conditionId,
  generateRunId,
  MAX_IDENTIFIER_LENGTH,
} from './index.ts';

describe('validateIdentifier', () => {
  it('accepts letters, digits and the safe punctuation set', () => {
    for (const raw of ['age_check', 'a', '0', 'ci.lint:v2', 'region-eu']) {
      expect(validateIdentifier(raw).valid).toBe(true);
    }
  });

  it('rejects empty ids', () => {
    const result = validateIdentifier('');
    expect(result.valid).toBe(false);
    expect(result.error).toBe('Identifier cannot be empty');
  });

  it('rejects ids over the length limit', () => {
    expect(validateIdentifier('a'.repeat(MAX_IDENTIFIER_LENGTH)).valid).toBe(true);
    const result = validateIdentifier('a'.repeat(MAX_IDENTIFIER_LENGTH + 1));
    expect(result.valid).toBe(false);
    expect(result.error).toBe('Identifier exceeds 128 characters (129)');
  });

  it('rejects characters that could inject into paths, urls or log lines', () => {
    for (const raw of ['../etc', 'a/b', 'a b', 'a\nb', '"quoted"', '_lead', '-lead', 'a?b=c', 'a%2F', 'é']) {
      expect(validateIdentifier(raw).valid).toBe(false);
    }
  });
});

describe('toIdentifier', () => {
  it('returns the branded string', () => {
    const id = conditionId('age_check');
    expect(id).toBe('age_check');
  });

  it('throws SpecError naming the kind', () => {
    try {
      toIdentifier('evidence', 'bad id');
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof SpecError)) throw err;
      expect(err.code).toBe('invalid_spec');
      expect(err.message).toContain('Invalid evidence id');
      expect(err.issues[0]?.path).toBe('evidence');
    }
  });
});

describe('generateRunId', () => {
  it('produces valid, distinct run ids', () => {
    const a = generateRunId();
    const b = generateRunId();
    expect(a.startsWith('run_')).toBe(true);
    expect(validateIdentifier(a).valid).toBe(true);
    expect(a).not.toBe(b);
  });
});
