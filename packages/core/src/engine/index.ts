/**
 * Gate Engine
 *
 * Drives one gate run through its state machine:
 *
 *   pending → evaluating → decided | blocked | failed
 *   pending → failed (spec rejected)
 *
 * Validation happens before anything is recorded. Evidence orchestration
 * is the only asynchronous phase; condition checks, requirement evaluation
 * and runpack appends run synchronously after the join. Terminal states
 * are final and every one carries a readable reason.
 */

import { LifecycleError, SpecError, errorMessage, type SpecIssue } from '../errors/index.ts';
import { generateRunId, runId as toRunId, type ConditionId, type EvidenceId, type RunId } from '../identifiers/index.ts';
import { componentLogger, type Logger } from '../logger/index.ts';
import { loadEngineConfig, resolveEngineConfig, type EngineConfig } from '../config/index.ts';
import { CancellationRegistry } from '../cancellation/index.ts';
import { createComparator, DEFAULT_OPERATORS, type Comparator, type OperatorTable } from '../comparator/index.ts';
import { encodeValue, missingValue, type EvidenceValue } from '../values/index.ts';
import {
  collectLeaves,
  evaluateRequirement,
  type Plan,
  type TriState,
} from '../ret-logic/index.ts';
import { parseScenarioSpec, validateScenarioSpec, type ConditionSpec, type ValidatedSpec } from '../spec/index.ts';
import type { ProviderRegistry } from '../providers/index.ts';
import { orchestrateEvidence, systemClock, type Clock, type EvidenceRecord } from '../orchestration/index.ts';
import { RunpackRecorder, type SealedRunpack } from '../runpack/index.ts';

// =============================================================================
// Types
// =============================================================================

export type GatePhase = 'pending' | 'evaluating' | 'decided' | 'blocked' | 'failed';

export type FailureCode = 'invalid_spec' | 'budget_exceeded' | 'cancelled' | 'internal_error';

export type GateState =
  | { readonly phase: 'pending' }
  | { readonly phase: 'evaluating' }
  | { readonly phase: 'decided'; readonly outcome: boolean; readonly reason: string }
  | { readonly phase: 'blocked'; readonly reason: string; readonly unresolved: readonly ConditionId[] }
  | {
      readonly phase: 'failed';
      readonly code: FailureCode;
      readonly reason: string;
      readonly issues?: readonly SpecIssue[];
      readonly evidenceIds?: readonly EvidenceId[];
    };

export type TerminalGateState = Extract<GateState, { phase: 'decided' | 'blocked' | 'failed' }>;

export type ConditionNote = 'compared' | 'type_mismatch' | 'evidence_unavailable' | 'optional_evidence_unavailable';

export interface ConditionOutcome {
  readonly conditionId: ConditionId;
  readonly evidenceId: EvidenceId;
  readonly operator: string;
  readonly expected: EvidenceValue;
  readonly actual: EvidenceValue;
  readonly required: boolean;
  readonly result: TriState;
  readonly note: ConditionNote;
}

export interface GateRunResult {
  readonly runId: RunId;
  readonly state: TerminalGateState;
  /** Null when the spec was rejected or the run was cancelled */
  readonly runpack: SealedRunpack | null;
  readonly evidence: readonly EvidenceRecord[];
  readonly conditions: readonly ConditionOutcome[];
  readonly plan: Plan | null;
  readonly budgetExceeded: boolean;
}

export type StateChangeListener = (state: GateState, runId: RunId) => void;

export interface GateEngineOptions {
  providers: ProviderRegistry;
  /** Overrides on top of the GATEHOUSE_* environment configuration */
  config?: Partial<EngineConfig>;
  operators?: OperatorTable;
  clock?: Clock;
  logger?: Logger;
  cancellation?: CancellationRegistry;
  onStateChange?: StateChangeListener;
}

export interface CreateRunOptions {
  runId?: string;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
}

// =============================================================================
// State Machine
// =============================================================================

export const VALID_TRANSITIONS: Record<GatePhase, ReadonlyArray<GatePhase>> = {
  pending: ['evaluating', 'failed'],
  evaluating: ['decided', 'blocked', 'failed'],
  decided: [],
  blocked: [],
  failed: [],
};

export const TERMINAL_PHASES: ReadonlySet<GatePhase> = new Set(['decided', 'blocked', 'failed']);

export function isValidTransition(from: GatePhase, to: GatePhase): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

function isTerminal(state: GateState): state is TerminalGateState {
  return TERMINAL_PHASES.has(state.phase);
}

// =============================================================================
// Helpers
// =============================================================================

function linkSignal(source: AbortSignal | undefined, target: AbortController): () => void {
  if (source === undefined) return () => undefined;
  if (source.aborted) {
    target.abort(source.reason);
    return () => undefined;
  }
  const forward = (): void => target.abort(source.reason);
  source.addEventListener('abort', forward, { once: true });
  return () => source.removeEventListener('abort', forward);
}

function assertNotExecuting(cancellation: CancellationRegistry, runId: RunId): void {
  if (cancellation.getSignal(runId) !== undefined) {
    throw new LifecycleError('already_started', `Run ${runId} is already executing`);
  }
}

function cancelReason(signal: AbortSignal): string {
  const reason: unknown = signal.reason;
  return typeof reason === 'string' && reason !== 'cancelled' ? `Run cancelled: ${reason}` : 'Run cancelled';
}

function decideReason(result: TriState, conditions: readonly ConditionOutcome[], plan: Plan): string {
  if (result === 'true') return 'requirement satisfied';
  const evaluated = new Set(
    plan.entries.filter((entry) => entry.status === 'evaluated').map((entry) => entry.conditionId)
  );
  const failing = conditions
    .filter((c) => c.result === 'false' && evaluated.has(c.conditionId))
    .map((c) => c.conditionId);
  return failing.length > 0 ? `requirement not satisfied: ${failing.join(', ')} false` : 'requirement not satisfied';
}

function resolveCondition(
  condition: ConditionSpec,
  actual: EvidenceValue,
  comparator: Comparator
): ConditionOutcome {
  const base = {
    conditionId: condition.conditionId,
    evidenceId: condition.evidenceId,
    operator: condition.operator,
    expected: condition.expected,
    actual,
    required: condition.required,
  };
  if (actual.kind === 'missing') {
    return condition.required
      ? { ...base, result: 'indeterminate', note: 'evidence_unavailable' }
      : { ...base, result: 'false', note: 'optional_evidence_unavailable' };
  }
  const result = comparator.compare(condition.operator, actual, condition.expected);
  return { ...base, result, note: result === 'indeterminate' ? 'type_mismatch' : 'compared' };
}

function evidencePayload(record: EvidenceRecord): Record<string, unknown> {
  return {
    evidenceId: record.evidenceId,
    providerId: record.providerId,
    value: encodeValue(record.value),
    ...(record.error !== undefined ? { error: { ...record.error } } : {}),
    attempts: record.attempts,
    latencyMs: record.latencyMs,
    evidenceHash: record.evidenceHash,
  };
}

function conditionPayload(outcome: ConditionOutcome): Record<string, unknown> {
  return {
    conditionId: outcome.conditionId,
    evidenceId: outcome.evidenceId,
    operator: outcome.operator,
    expected: encodeValue(outcome.expected),
    actual: encodeValue(outcome.actual),
    required: outcome.required,
    result: outcome.result,
    note: outcome.note,
  };
}

// =============================================================================
// Gate Run
// =============================================================================

interface EngineContext {
  providers: ProviderRegistry;
  config: EngineConfig;
  operators: OperatorTable;
  comparator: Comparator;
  clock: Clock;
  logger: Logger;
  cancellation: CancellationRegistry;
  onStateChange?: StateChangeListener;
}

export class GateRun {
  readonly runId: RunId;
  private current: GateState = { phase: 'pending' };
  private started = false;
  private readonly controller = new AbortController();
  private readonly log: Logger;

  constructor(
    private readonly context: EngineContext,
    private readonly specInput: unknown,
    runId: RunId
  ) {
    this.runId = runId;
    this.log = context.logger.child({ runId });
  }

  get state(): GateState {
    return this.current;
  }

  /** Request cancellation; takes effect at the next checkpoint */
  cancel(reason?: string): void {
    this.controller.abort(reason ?? 'cancelled');
  }

  async execute(options: ExecuteOptions = {}): Promise<GateRunResult> {
    if (this.started) {
      throw new LifecycleError('already_started', `Run ${this.runId} has already been started`);
    }
    assertNotExecuting(this.context.cancellation, this.runId);
    this.started = true;

    const registered = this.context.cancellation.register(this.runId);
    const unlinkCaller = linkSignal(options.signal, this.controller);
    const unlinkRegistry = linkSignal(registered.signal, this.controller);
    try {
      return await this.run();
    } finally {
      unlinkCaller();
      unlinkRegistry();
      this.context.cancellation.unregister(this.runId);
    }
  }

  private transition(next: GateState): void {
    const from = this.current.phase;
    if (!isValidTransition(from, next.phase)) {
      throw new LifecycleError('invalid_transition', `Invalid transition: ${from} → ${next.phase}`);
    }
    this.current = Object.freeze(next);
    this.log.debug({ from, to: next.phase }, 'Gate state changed');
    this.notify();
  }

  /** Listener faults are logged and never affect the run */
  private notify(): void {
    const listener = this.context.onStateChange;
    if (listener === undefined) return;
    try {
      listener(this.current, this.runId);
    } catch (err) {
      this.log.warn({ phase: this.current.phase, error: errorMessage(err) }, 'State change listener failed');
    }
  }

  private finish(
    state: TerminalGateState,
    rest: Omit<GateRunResult, 'runId' | 'state'>
  ): GateRunResult {
    this.transition(state);
    this.log.info({ phase: state.phase, reason: state.reason }, 'Gate run finished');
    return Object.freeze({ runId: this.runId, state, ...rest });
  }

  private validate(): ValidatedSpec {
    const spec = parseScenarioSpec(this.specInput);
    const missing = this.context.providers.missingFor(spec);
    if (missing.length > 0) {
      const issues = spec.evidence.flatMap((binding, i) =>
        missing.includes(binding.providerId)
          ? [{ path: `evidence.${i}.providerId`, message: `Provider "${binding.providerId}" is not registered` }]
          : []
      );
      throw new SpecError('provider_missing', `Unregistered providers: ${missing.join(', ')}`, issues);
    }
    return validateScenarioSpec(spec, this.context.config, { operators: this.context.operators });
  }

  private async run(): Promise<GateRunResult> {
    const empty = { runpack: null, evidence: [], conditions: [], plan: null, budgetExceeded: false };

    // 1. Validate
    let validated: ValidatedSpec;
    try {
      validated = this.validate();
    } catch (err) {
      const reason = err instanceof SpecError ? err.message : `Invalid scenario spec: ${errorMessage(err)}`;
      const issues = err instanceof SpecError ? [...err.issues] : [];
      this.log.warn({ reason }, 'Scenario spec rejected');
      return this.finish({ phase: 'failed', code: 'invalid_spec', reason, issues }, empty);
    }

    const { spec, policy, limits, requirement } = validated;
    const signal = this.controller.signal;
    this.transition({ phase: 'evaluating' });

    const recorder = new RunpackRecorder({
      scenarioId: spec.scenarioId,
      runId: this.runId,
      specHash: validated.specHash,
    });

    try {
      // 2. Record the spec
      recorder.append('spec_loaded', {
        scenarioId: spec.scenarioId,
        specVersion: spec.specVersion,
        specHash: validated.specHash,
        runId: this.runId,
        limits: { ...limits },
        policy: { ...policy },
      });

      // 3. Gather evidence
      if (signal.aborted) {
        recorder.discard();
        return this.finish({ phase: 'failed', code: 'cancelled', reason: cancelReason(signal) }, empty);
      }
      const gathered = await orchestrateEvidence(spec.evidence, this.context.providers, {
        providerTimeoutMs: limits.providerTimeoutMs,
        budgetMs: limits.budgetMs,
        maxParallelism: limits.maxParallelism,
        maxRetries: limits.maxRetries,
        retryDelayMs: limits.retryDelayMs,
        signal,
        clock: this.context.clock,
        logger: this.log,
      });
      const { records, budgetExceeded } = gathered;

      // 4. Cancellation checkpoint between orchestration and evaluation
      if (signal.aborted || gathered.cancelled) {
        recorder.discard();
        return this.finish(
          { phase: 'failed', code: 'cancelled', reason: cancelReason(signal) },
          { ...empty, evidence: records, budgetExceeded }
        );
      }

      // 5. Budget exhausted under the fail policy
      if (budgetExceeded && policy.onBudgetExceeded === 'fail') {
        for (const record of records) recorder.append('evidence_fetched', evidencePayload(record));
        const evidenceIds = records
          .filter((r) => r.value.kind === 'missing' && r.value.reason === 'budget_exceeded')
          .map((r) => r.evidenceId);
        const reason = `Evidence budget of ${limits.budgetMs}ms exhausted before ${evidenceIds.join(', ')} resolved`;
        recorder.append('failed', { code: 'budget_exceeded', reason, evidenceIds, budgetExceeded });
        const runpack = recorder.seal();
        return this.finish(
          { phase: 'failed', code: 'budget_exceeded', reason, evidenceIds },
          { ...empty, runpack, evidence: records, budgetExceeded }
        );
      }

      // 6. Record evidence
      for (const record of records) recorder.append('evidence_fetched', evidencePayload(record));

      // 7. Resolve conditions in declaration order
      const byEvidence = new Map(records.map((r) => [r.evidenceId, r.value]));
      const conditions = spec.conditions.map((condition) => {
        const actual = byEvidence.get(condition.evidenceId) ?? missingValue('absent');
        const outcome = Object.freeze(resolveCondition(condition, actual, this.context.comparator));
        recorder.append('condition_evaluated', conditionPayload(outcome));
        return outcome;
      });

      // 8. Evaluate the requirement
      const results = new Map<ConditionId, TriState>(conditions.map((c) => [c.conditionId, c.result]));
      const { result, plan } = evaluateRequirement(
        requirement,
        (id) => results.get(id) ?? 'indeterminate',
        { mode: policy.logic }
      );

      // 9-10. Terminal step
      const rest = { evidence: records, conditions: Object.freeze(conditions), plan, budgetExceeded };
      if (result === 'indeterminate' && policy.onIndeterminate === 'block') {
        const leaves = new Set(collectLeaves(requirement));
        const indeterminate = conditions.filter((c) => c.result === 'indeterminate' && leaves.has(c.conditionId));
        const requiredOnes = indeterminate.filter((c) => c.required);
        const unresolved = requiredOnes.length > 0 ? requiredOnes : indeterminate;
        const reason = unresolved
          .map((c) =>
            c.note === 'evidence_unavailable'
              ? `${c.conditionId}: evidence unavailable`
              : `${c.conditionId}: comparison indeterminate`
          )
          .join('; ');
        const unresolvedIds = unresolved.map((c) => c.conditionId);
        recorder.append('blocked', { result, reason, unresolved: unresolvedIds, plan, budgetExceeded });
        const runpack = recorder.seal();
        return this.finish({ phase: 'blocked', reason, unresolved: unresolvedIds }, { ...rest, runpack });
      }

      const outcome = result === 'true';
      const reason = result === 'indeterminate'
        ? 'requirement indeterminate; decided false by policy'
        : decideReason(result, conditions, plan);
      recorder.append('decided', { result, outcome, reason, plan, budgetExceeded });
      const runpack = recorder.seal();
      return this.finish({ phase: 'decided', outcome, reason }, { ...rest, runpack });
    } catch (err) {
      if (isTerminal(this.current)) throw err;
      this.log.error({ error: errorMessage(err) }, 'Gate run failed unexpectedly');
      if (recorder.state === 'open') recorder.discard();
      return this.finish(
        { phase: 'failed', code: 'internal_error', reason: `Gate run failed: ${errorMessage(err)}` },
        empty
      );
    }
  }
}

// =============================================================================
// Engine
// =============================================================================

export class GateEngine {
  readonly config: EngineConfig;
  readonly cancellation: CancellationRegistry;
  private readonly context: EngineContext;

  constructor(options: GateEngineOptions) {
    this.config = resolveEngineConfig(options.config ?? {}, loadEngineConfig());
    this.cancellation = options.cancellation ?? new CancellationRegistry();
    const operators = options.operators ?? DEFAULT_OPERATORS;
    this.context = {
      providers: options.providers,
      config: this.config,
      operators,
      comparator: createComparator(operators),
      clock: options.clock ?? systemClock,
      logger: componentLogger('engine', options.logger),
      cancellation: this.cancellation,
      onStateChange: options.onStateChange,
    };
  }

  /**
   * Create a run in `pending`; nothing is validated until it executes.
   * Throws LifecycleError('already_started') when a run with the same id is
   * executing.
   */
  createRun(specInput: unknown, options: CreateRunOptions = {}): GateRun {
    const id = options.runId !== undefined ? toRunId(options.runId) : generateRunId();
    assertNotExecuting(this.cancellation, id);
    return new GateRun(this.context, specInput, id);
  }

  start(specInput: unknown, options: CreateRunOptions & ExecuteOptions = {}): Promise<GateRunResult> {
    return this.createRun(specInput, { runId: options.runId }).execute({ signal: options.signal });
  }

  /** Cancel an executing run by id; false when no such run is executing */
  cancel(runId: string, reason?: string): boolean {
    return this.cancellation.signal(runId, reason);
  }
}
