/**
 * Error taxonomy
 *
 * Every failure the engine can surface is a GateError subclass with a
 * machine-readable code. Provider errors never escape orchestration; they
 * are folded into missing evidence. Spec, lifecycle and store errors are
 * fatal and propagate to the caller.
 */

// =============================================================================
// Base
// =============================================================================

export class GateError extends Error {
  constructor(message: string, public readonly code: string = 'gate_error') {
    super(message);
    this.name = 'GateError';
  }
}

// =============================================================================
// Spec Errors
// =============================================================================

export type SpecErrorCode =
  | 'invalid_spec'
  | 'limit_exceeded'
  | 'unknown_operator'
  | 'provider_missing'
  | 'malformed_requirement';

export interface SpecIssue {
  /** Dotted path into the spec document, e.g. `conditions.0.operator` */
  path: string;
  message: string;
}

export class SpecError extends GateError {
  declare readonly code: SpecErrorCode;
  public readonly issues: ReadonlyArray<SpecIssue>;

  constructor(code: SpecErrorCode, message: string, issues: SpecIssue[] = []) {
    super(message, code);
    this.name = 'SpecError';
    this.issues = issues;
  }
}

// =============================================================================
// Requirement Errors
// =============================================================================

export type RequirementErrorCode =
  | 'dangling_leaf'
  | 'depth_exceeded'
  | 'node_limit_exceeded'
  | 'empty_group'
  | 'invalid_threshold';

export class RequirementError extends GateError {
  declare readonly code: RequirementErrorCode;
  /** Path of the offending node (`$`, `$.0`, ...) */
  public readonly path: string;

  constructor(code: RequirementErrorCode, message: string, path: string) {
    super(`${message} at ${path}`, code);
    this.name = 'RequirementError';
    this.path = path;
  }
}

export type DslErrorCode =
  | 'empty_input'
  | 'input_too_large'
  | 'nesting_too_deep'
  | 'unexpected_token'
  | 'unknown_condition'
  | 'unknown_function'
  | 'invalid_number'
  | 'trailing_input';

export class DslError extends GateError {
  declare readonly code: DslErrorCode;
  public readonly position: number;

  constructor(code: DslErrorCode, message: string, position: number) {
    super(message, code);
    this.name = 'DslError';
    this.position = position;
  }
}

// =============================================================================
// Provider Errors
// =============================================================================

export type ProviderErrorCode =
  | 'timeout'
  | 'unreachable'
  | 'invalid_params'
  | 'denied'
  | 'malformed_response';

export class ProviderError extends GateError {
  declare readonly code: ProviderErrorCode;

  constructor(code: ProviderErrorCode, message: string) {
    super(message, code);
    this.name = 'ProviderError';
  }
}

// =============================================================================
// Lifecycle Errors
// =============================================================================

export type LifecycleErrorCode = 'post_seal_append' | 'invalid_transition' | 'already_started';

export class LifecycleError extends GateError {
  declare readonly code: LifecycleErrorCode;
  constructor(code: LifecycleErrorCode, message: string) {
    super(message, code);
    this.name = 'LifecycleError';
  }
}

// =============================================================================
// Store Errors
// =============================================================================

export type StoreErrorCode = 'not_found' | 'conflict' | 'corrupt' | 'io';

export class StoreError extends GateError {
  declare readonly code: StoreErrorCode;
  constructor(code: StoreErrorCode, message: string) {
    super(message, code);
    this.name = 'StoreError';
  }
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
