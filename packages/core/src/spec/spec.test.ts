/**
 * Scenario Spec Tests
 */

import { describe, it, expect } from 'vitest';
import { SpecError } from '../errors/index.ts';
import { sha256Hex } from '../hashing/index.ts';
import { DEFAULT_ENGINE_CONFIG } from '../config/index.ts';
import { DEFAULT_OPERATORS } from '../comparator/index.ts';
import { numberValue, textValue, valuesEqual } from '../values/index.ts';
import {
  parseScenarioSpec,
  serializeScenarioSpec,
  specHash,
  validateScenarioSpec,
} from './index.ts';

const baseSpec = {
  scenarioId: 'age-gate',
  specVersion: '1',
  policy: { onIndeterminate: 'block' },
  evidence: [{ evidenceId: 'age', providerId: 'profile' }],
  conditions: [
    {
      conditionId: 'age_check',
      evidenceId: 'age',
      operator: 'greater_than_or_equal',
      expected: 18,
      required: true,
    },
  ],
  requirement: 'age_check',
};

function catchSpecError(fn: () => unknown): SpecError {
  try {
    fn();
  } catch (err) {
    if (err instanceof SpecError) return err;
    throw err;
  }
  throw new Error('Expected a SpecError');
}

describe('parseScenarioSpec', () => {
  it('normalizes plain JSON expected values', () => {
    const spec = parseScenarioSpec(baseSpec);
    const expected = spec.conditions[0]?.expected;
    expect(expected?.kind).toBe('number');
    expect(expected !== undefined && valuesEqual(expected, numberValue('18'))).toBe(true);
  });

  it('accepts the tagged form for expected values', () => {
    const spec = parseScenarioSpec({
      ...baseSpec,
      conditions: [{ ...baseSpec.conditions[0], expected: { kind: 'text', value: 'eu' } }],
    });
    const expected = spec.conditions[0]?.expected;
    expect(expected !== undefined && valuesEqual(expected, textValue('eu'))).toBe(true);
  });

  it('parses JSON text', () => {
    const spec = parseScenarioSpec(JSON.stringify(baseSpec));
    expect(spec.scenarioId).toBe('age-gate');
    expect(spec.evidence[0]?.providerId).toBe('profile');
  });

  it('keeps every digit of numeric literals in JSON text', () => {
    const text = JSON.stringify({
      ...baseSpec,
      limits: { budgetMs: 1000 },
      conditions: [{ ...baseSpec.conditions[0], operator: 'equals', expected: 0.5 }],
    }).replace('"expected":0.5', '"expected":0.10000000000000000001');

    const spec = parseScenarioSpec(text);
    const expected = spec.conditions[0]?.expected;

    expect(spec.limits?.budgetMs).toBe(1000);
    expect(expected !== undefined && valuesEqual(expected, numberValue('0.10000000000000000001'))).toBe(true);
    expect(expected !== undefined && valuesEqual(expected, numberValue('0.1'))).toBe(false);
    expect(serializeScenarioSpec(spec)).toContain('"expected":{"kind":"number","value":"0.10000000000000000001"}');
  });

  it('rejects provider params that a double cannot hold exactly', () => {
    const text = JSON.stringify({
      ...baseSpec,
      evidence: [{ evidenceId: 'age', providerId: 'profile', params: { ratio: 0.5 } }],
    }).replace('"ratio":0.5', '"ratio":0.10000000000000000001');

    const err = catchSpecError(() => parseScenarioSpec(text));

    expect(err.code).toBe('invalid_spec');
    expect(err.issues.map((issue) => issue.path)).toEqual(['evidence.0.params.ratio']);
  });

  it('deep-freezes the result', () => {
    const spec = parseScenarioSpec(baseSpec);
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec.policy)).toBe(true);
    expect(Object.isFrozen(spec.evidence)).toBe(true);
    expect(Object.isFrozen(spec.evidence[0])).toBe(true);
  });

  it('rejects malformed JSON text', () => {
    const err = catchSpecError(() => parseScenarioSpec('{"scenarioId":'));
    expect(err.code).toBe('invalid_spec');
    expect(err.issues[0]?.path).toBe('(root)');
  });

  it('requires an explicit indeterminate policy', () => {
    const err = catchSpecError(() => parseScenarioSpec({ ...baseSpec, policy: {} }));
    expect(err.code).toBe('invalid_spec');
    expect(err.issues).toContainEqual({ path: 'policy.onIndeterminate', message: 'Required' });
  });

  it('reports invalid identifiers by path', () => {
    const err = catchSpecError(() => parseScenarioSpec({ ...baseSpec, scenarioId: 'bad id' }));
    expect(err.issues.map((issue) => issue.path)).toEqual(['scenarioId']);
  });

  it('rejects untagged objects and missing expected values', () => {
    const untagged = catchSpecError(() =>
      parseScenarioSpec({
        ...baseSpec,
        conditions: [{ ...baseSpec.conditions[0], expected: { years: 18 } }],
      })
    );
    expect(untagged.issues).toEqual([
      { path: 'conditions.0.expected', message: 'Untagged JSON objects are not evidence values' },
    ]);

    const missing = catchSpecError(() =>
      parseScenarioSpec({
        ...baseSpec,
        conditions: [{ ...baseSpec.conditions[0], expected: null }],
      })
    );
    expect(missing.issues).toEqual([
      { path: 'conditions.0.expected', message: 'Expected value cannot be missing' },
    ]);
  });

  it('rejects unknown fields', () => {
    const err = catchSpecError(() => parseScenarioSpec({ ...baseSpec, extra: true }));
    expect(err.code).toBe('invalid_spec');
    expect(err.issues[0]?.path).toBe('(root)');
  });

  it('rejects absurdly nested documents before schema validation', () => {
    let deep: unknown = 1;
    for (let i = 0; i < 700; i++) deep = [deep];
    const err = catchSpecError(() =>
      parseScenarioSpec({
        ...baseSpec,
        evidence: [{ evidenceId: 'age', providerId: 'profile', params: { deep } }],
      })
    );
    expect(err.code).toBe('limit_exceeded');
  });
});

describe('validateScenarioSpec', () => {
  it('resolves policy defaults, limits and the requirement tree', () => {
    const spec = parseScenarioSpec(baseSpec);
    const validated = validateScenarioSpec(spec, DEFAULT_ENGINE_CONFIG);

    expect(validated.policy).toEqual({ onIndeterminate: 'block', onBudgetExceeded: 'proceed', logic: 'kleene' });
    expect(validated.limits).toEqual(DEFAULT_ENGINE_CONFIG);
    expect(validated.requirement).toEqual({ kind: 'leaf', conditionId: 'age_check' });
    expect(validated.specHash).toBe(specHash(spec));
  });

  it('applies spec limits below the ceiling', () => {
    const spec = parseScenarioSpec({ ...baseSpec, limits: { budgetMs: 1000 } });
    const { limits } = validateScenarioSpec(spec, DEFAULT_ENGINE_CONFIG);
    expect(limits.budgetMs).toBe(1000);
    expect(limits.maxParallelism).toBe(8);
  });

  it('rejects limits above the engine ceiling', () => {
    const spec = parseScenarioSpec({ ...baseSpec, limits: { maxParallelism: 500 } });
    const err = catchSpecError(() => validateScenarioSpec(spec, DEFAULT_ENGINE_CONFIG));
    expect(err.code).toBe('limit_exceeded');
    expect(err.issues).toEqual([
      { path: 'limits.maxParallelism', message: 'maxParallelism 500 exceeds engine ceiling 8' },
    ]);
  });

  it('enforces the evidence count and per-binding timeouts', () => {
    const spec = parseScenarioSpec({
      ...baseSpec,
      limits: { maxEvidence: 1 },
      evidence: [
        { evidenceId: 'age', providerId: 'profile', timeoutMs: 6000 },
        { evidenceId: 'region', providerId: 'profile' },
      ],
    });
    const err = catchSpecError(() => validateScenarioSpec(spec, DEFAULT_ENGINE_CONFIG));
    expect(err.issues).toEqual([
      { path: 'evidence', message: '2 evidence bindings exceed limit 1' },
      { path: 'evidence.0.timeoutMs', message: 'timeoutMs 6000 exceeds provider timeout 5000' },
    ]);
  });

  it('rejects duplicate ids and undeclared evidence', () => {
    const spec = parseScenarioSpec({
      ...baseSpec,
      evidence: [
        { evidenceId: 'age', providerId: 'profile' },
        { evidenceId: 'age', providerId: 'registry' },
      ],
      conditions: [{ ...baseSpec.conditions[0], evidenceId: 'dob' }],
    });
    const err = catchSpecError(() => validateScenarioSpec(spec, DEFAULT_ENGINE_CONFIG));
    expect(err.code).toBe('invalid_spec');
    expect(err.issues).toEqual([
      { path: 'evidence.1.evidenceId', message: 'Duplicate id "age"' },
      { path: 'conditions.0.evidenceId', message: 'Condition references undeclared evidence "dob"' },
    ]);
  });

  it('checks operators against the given table', () => {
    const spec = parseScenarioSpec({
      ...baseSpec,
      conditions: [{ ...baseSpec.conditions[0], operator: 'matches' }],
    });
    expect(() => validateScenarioSpec(spec, DEFAULT_ENGINE_CONFIG)).not.toThrow();

    const err = catchSpecError(() =>
      validateScenarioSpec(spec, DEFAULT_ENGINE_CONFIG, { operators: DEFAULT_OPERATORS })
    );
    expect(err.code).toBe('unknown_operator');
    expect(err.message).toBe('Scenario spec uses unknown operators: conditions.0.operator: Unknown operator "matches"');
  });

  it('wraps requirement errors', () => {
    const spec = parseScenarioSpec({
      ...baseSpec,
      requirement: { kind: 'leaf', conditionId: 'region_ok' },
    });
    const err = catchSpecError(() => validateScenarioSpec(spec, DEFAULT_ENGINE_CONFIG));
    expect(err.code).toBe('malformed_requirement');
    expect(err.issues).toEqual([
      { path: 'requirement', message: 'Leaf references unknown condition "region_ok" at $' },
    ]);
  });

  it('compiles DSL requirements', () => {
    const spec = parseScenarioSpec({
      ...baseSpec,
      conditions: [
        baseSpec.conditions[0],
        { conditionId: 'region_ok', evidenceId: 'age', operator: 'less_than', expected: 120, required: false },
      ],
      requirement: 'age_check && !region_ok',
    });
    const { requirement } = validateScenarioSpec(spec, DEFAULT_ENGINE_CONFIG);
    expect(requirement).toEqual({
      kind: 'and',
      children: [
        { kind: 'leaf', conditionId: 'age_check' },
        { kind: 'not', child: { kind: 'leaf', conditionId: 'region_ok' } },
      ],
    });
  });
});

describe('serializeScenarioSpec', () => {
  it('writes canonical JSON with tagged values', () => {
    expect(serializeScenarioSpec(parseScenarioSpec(baseSpec))).toBe(
      '{"conditions":[{"conditionId":"age_check","evidenceId":"age",' +
        '"expected":{"kind":"number","value":"18"},"operator":"greater_than_or_equal","required":true}],' +
        '"evidence":[{"evidenceId":"age","providerId":"profile"}],' +
        '"policy":{"onIndeterminate":"block"},"requirement":"age_check",' +
        '"scenarioId":"age-gate","specVersion":"1"}'
    );
  });

  it('round-trips through parse', () => {
    const first = serializeScenarioSpec(parseScenarioSpec(baseSpec));
    expect(serializeScenarioSpec(parseScenarioSpec(first))).toBe(first);
  });

  it('normalizes decimal literals', () => {
    const spec = parseScenarioSpec({
      ...baseSpec,
      conditions: [{ ...baseSpec.conditions[0], expected: { kind: 'number', value: '1.50' } }],
    });
    expect(serializeScenarioSpec(spec)).toContain('"expected":{"kind":"number","value":"1.5"}');
  });
});

describe('specHash', () => {
  it('hashes the canonical serialization', () => {
    const spec = parseScenarioSpec(baseSpec);
    expect(specHash(spec)).toBe(sha256Hex(serializeScenarioSpec(spec)));
  });

  it('ignores key order in the source document', () => {
    const reordered = {
      requirement: baseSpec.requirement,
      conditions: baseSpec.conditions,
      evidence: baseSpec.evidence,
      policy: baseSpec.policy,
      specVersion: baseSpec.specVersion,
      scenarioId: baseSpec.scenarioId,
    };
    expect(specHash(parseScenarioSpec(reordered))).toBe(specHash(parseScenarioSpec(baseSpec)));
  });
});
