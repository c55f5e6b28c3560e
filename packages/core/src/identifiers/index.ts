/**
 * Typed identifiers
 *
 * Scenario, condition, evidence, provider and run ids are opaque strings
 * restricted to a path-, URL- and log-safe alphabet. The brand keeps one
 * kind of id from being passed where another is expected.
 */

import { SpecError } from '../errors/index.ts';

export type IdentifierKind = 'scenario' | 'condition' | 'evidence' | 'provider' | 'run';

declare const brand: unique symbol;

export type Identifier<K extends IdentifierKind> = string & { readonly [brand]: K };

export type ScenarioId = Identifier<'scenario'>;
export type ConditionId = Identifier<'condition'>;
export type EvidenceId = Identifier<'evidence'>;
export type ProviderId = Identifier<'provider'>;
export type RunId = Identifier<'run'>;

export const MAX_IDENTIFIER_LENGTH = 128;

const IDENTIFIER_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.:-]*$/;

/** Validation result */
export interface IdentifierCheck {
  valid: boolean;
  value?: string;
  error?: string;
}

/**
 * Check a raw string against the identifier rules. Never throws.
 */
export function validateIdentifier(raw: string): IdentifierCheck {
  if (raw.length === 0) {
    return { valid: false, error: 'Identifier cannot be empty' };
  }
  if (raw.length > MAX_IDENTIFIER_LENGTH) {
    return {
      valid: false,
      error: `Identifier exceeds ${MAX_IDENTIFIER_LENGTH} characters (${raw.length})`,
    };
  }
  if (!IDENTIFIER_PATTERN.test(raw)) {
    return {
      valid: false,
      error: 'Identifier must start with a letter or digit and contain only letters, digits, "_", ".", ":" or "-"',
    };
  }
  return { valid: true, value: raw };
}

export function isIdentifier<K extends IdentifierKind>(raw: string): raw is Identifier<K> {
  return validateIdentifier(raw).valid;
}

/**
 * Brand a raw string as an identifier of the given kind.
 * Throws SpecError when the string is not a valid identifier.
 */
export function toIdentifier<K extends IdentifierKind>(kind: K, raw: string): Identifier<K> {
  if (!isIdentifier<K>(raw)) {
    const result = validateIdentifier(raw);
    throw new SpecError('invalid_spec', `Invalid ${kind} id: ${result.error ?? 'rejected'}`, [
      { path: kind, message: result.error ?? 'rejected' },
    ]);
  }
  return raw;
}

export const scenarioId = (raw: string): ScenarioId => toIdentifier('scenario', raw);
export const conditionId = (raw: string): ConditionId => toIdentifier('condition', raw);
export const evidenceId = (raw: string): EvidenceId => toIdentifier('evidence', raw);
export const providerId = (raw: string): ProviderId => toIdentifier('provider', raw);
export const runId = (raw: string): RunId => toIdentifier('run', raw);

/**
 * Generate a fresh run id.
 */
export function generateRunId(): RunId {
  const timestamp = Date.now().toString(36);
  const random = Math.random().toString(36).substring(2, 8);
  return runId(`run_${timestamp}${random}`);
}
