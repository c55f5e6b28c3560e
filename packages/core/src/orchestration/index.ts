/**
 * Evidence Orchestration
 *
 * Fans out one provider call per evidence binding, in declaration order,
 * with at most `maxParallelism` calls in flight. Each attempt is bounded by
 * a timeout; the whole fan-out is bounded by a budget and by the caller's
 * cancellation signal. The join is the only await point of a gate run:
 * once it returns, every binding has exactly one immutable record.
 */

import { ProviderError, type ProviderErrorCode } from '../errors/index.ts';
import { hashCanonical } from '../hashing/index.ts';
import type { EvidenceId, ProviderId } from '../identifiers/index.ts';
import { componentLogger, type Logger } from '../logger/index.ts';
import {
  encodeValue,
  isEvidenceValue,
  missingValue,
  type EvidenceValue,
  type MissingReason,
} from '../values/index.ts';
import type { EvidenceBinding } from '../spec/index.ts';
import {
  isTransientProviderError,
  normalizeProviderError,
  type EvidenceProvider,
  type ProviderRegistry,
} from '../providers/index.ts';

// =============================================================================
// Types
// =============================================================================

export interface Clock {
  /** Epoch milliseconds */
  now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

export interface EvidenceError {
  readonly code: ProviderErrorCode;
  readonly message: string;
}

export interface EvidenceRecord {
  readonly evidenceId: EvidenceId;
  readonly providerId: ProviderId;
  /** `missing` with a reason when the evidence could not be obtained */
  readonly value: EvidenceValue;
  readonly error?: EvidenceError;
  readonly attempts: number;
  readonly latencyMs: number;
  /** SHA-256 of the canonical encoded value; null when missing */
  readonly evidenceHash: string | null;
}

export interface OrchestrationOptions {
  providerTimeoutMs: number;
  budgetMs: number;
  maxParallelism: number;
  maxRetries: number;
  retryDelayMs: number;
  signal?: AbortSignal;
  clock?: Clock;
  logger?: Logger;
}

export interface OrchestrationResult {
  /** One record per binding, sorted by evidence id */
  records: readonly EvidenceRecord[];
  budgetExceeded: boolean;
  cancelled: boolean;
  durationMs: number;
}

type StopReason = Extract<MissingReason, 'budget_exceeded' | 'cancelled'>;

// =============================================================================
// Helpers
// =============================================================================

export function evidenceHash(value: EvidenceValue): string | null {
  return value.kind === 'missing' ? null : hashCanonical(encodeValue(value));
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

function byEvidenceId(a: EvidenceRecord, b: EvidenceRecord): number {
  return a.evidenceId < b.evidenceId ? -1 : a.evidenceId > b.evidenceId ? 1 : 0;
}

// =============================================================================
// Orchestration
// =============================================================================

/**
 * Gather evidence for every binding. Provider faults become missing
 * evidence; this function only rejects on programming errors.
 */
export async function orchestrateEvidence(
  bindings: readonly EvidenceBinding[],
  registry: ProviderRegistry,
  options: OrchestrationOptions
): Promise<OrchestrationResult> {
  const clock = options.clock ?? systemClock;
  const log = componentLogger('orchestration', options.logger);
  const startedAt = clock.now();

  const records = new Map<string, EvidenceRecord>();
  const attemptCounts = new Map<string, number>();
  const fanout = new AbortController();
  let joined = false;

  /** First write wins; nothing is written after the join */
  const settle = (record: EvidenceRecord): void => {
    if (joined || records.has(record.evidenceId)) return;
    records.set(record.evidenceId, Object.freeze(record));
    log.debug(
      { evidenceId: record.evidenceId, kind: record.value.kind, attempts: record.attempts },
      'Evidence settled'
    );
  };

  const attemptFetch = async (
    provider: EvidenceProvider,
    binding: EvidenceBinding,
    timeoutMs: number
  ): Promise<EvidenceValue> => {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;
    let forward: (() => void) | undefined;

    // Settles on the attempt timeout or when the fan-out stops
    const interrupted = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new ProviderError(
          'timeout',
          `Provider "${binding.providerId}" did not respond within ${timeoutMs}ms`
        );
        controller.abort(err);
        reject(err);
      }, timeoutMs);
      forward = () => {
        controller.abort(fanout.signal.reason);
        reject(new ProviderError('unreachable', `Fetch from "${binding.providerId}" was stopped`));
      };
      fanout.signal.addEventListener('abort', forward, { once: true });
    });

    const context = { deadline: clock.now() + timeoutMs, signal: controller.signal };
    const call = Promise.resolve()
      .then(() => provider.fetch(binding.evidenceId, binding.params ?? {}, context))
      .then((value: unknown) => {
        if (!isEvidenceValue(value)) {
          throw new ProviderError(
            'malformed_response',
            `Provider "${binding.providerId}" returned something that is not an evidence value`
          );
        }
        return value;
      });

    try {
      return await Promise.race([call, interrupted]);
    } finally {
      clearTimeout(timer);
      if (forward !== undefined) fanout.signal.removeEventListener('abort', forward);
    }
  };

  const fetchEvidence = async (binding: EvidenceBinding): Promise<EvidenceRecord> => {
    const started = clock.now();
    const base = { evidenceId: binding.evidenceId, providerId: binding.providerId };
    const provider = registry.get(binding.providerId);
    if (provider === undefined) {
      return {
        ...base,
        value: missingValue('provider_error'),
        error: Object.freeze({ code: 'unreachable', message: `No provider registered as "${binding.providerId}"` }),
        attempts: 0,
        latencyMs: 0,
        evidenceHash: null,
      };
    }

    const retries = binding.retries ?? options.maxRetries;
    const timeoutMs = binding.timeoutMs ?? options.providerTimeoutMs;
    let attempts = 0;
    let lastError = new ProviderError('unreachable', 'No attempt was made');

    for (let attempt = 0; attempt <= retries && !fanout.signal.aborted; attempt++) {
      attempts++;
      attemptCounts.set(binding.evidenceId, attempts);
      try {
        const value = await attemptFetch(provider, binding, timeoutMs);
        return { ...base, value, attempts, latencyMs: clock.now() - started, evidenceHash: evidenceHash(value) };
      } catch (err) {
        lastError = normalizeProviderError(err);
        if (!isTransientProviderError(lastError) || attempt === retries) break;
        log.debug(
          { evidenceId: binding.evidenceId, attempt: attempts, error: lastError.message },
          'Retrying evidence fetch'
        );
        await delay(options.retryDelayMs, fanout.signal);
      }
    }

    log.warn(
      { evidenceId: binding.evidenceId, providerId: binding.providerId, code: lastError.code, attempts },
      'Evidence unavailable'
    );
    return {
      ...base,
      value: missingValue(lastError.code === 'timeout' ? 'timeout' : 'provider_error'),
      error: Object.freeze({ code: lastError.code, message: lastError.message }),
      attempts,
      latencyMs: clock.now() - started,
      evidenceHash: null,
    };
  };

  // Budget and cancellation race the pool
  let budgetTimer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;
  const stopped = new Promise<StopReason>((resolve) => {
    budgetTimer = setTimeout(() => resolve('budget_exceeded'), options.budgetMs);
    onAbort = () => resolve('cancelled');
    options.signal?.addEventListener('abort', onAbort, { once: true });
  });

  let next = 0;
  const worker = async (): Promise<void> => {
    while (!fanout.signal.aborted) {
      const binding = bindings[next++];
      if (binding === undefined) return;
      settle(await fetchEvidence(binding));
    }
  };

  let stopReason: StopReason | null = 'cancelled';
  if (options.signal?.aborted !== true) {
    const poolSize = Math.min(options.maxParallelism, bindings.length);
    const pool = Promise.all(Array.from({ length: poolSize }, () => worker())).then(() => null);
    stopReason = await Promise.race([pool, stopped]);
  }

  joined = true;
  clearTimeout(budgetTimer);
  if (onAbort !== undefined) options.signal?.removeEventListener('abort', onAbort);
  if (stopReason !== null) fanout.abort(stopReason);

  const finishedAt = clock.now();
  for (const binding of bindings) {
    if (records.has(binding.evidenceId)) continue;
    records.set(
      binding.evidenceId,
      Object.freeze({
        evidenceId: binding.evidenceId,
        providerId: binding.providerId,
        value: missingValue(stopReason ?? 'cancelled'),
        attempts: attemptCounts.get(binding.evidenceId) ?? 0,
        latencyMs: finishedAt - startedAt,
        evidenceHash: null,
      })
    );
  }

  const result: OrchestrationResult = {
    records: Object.freeze([...records.values()].sort(byEvidenceId)),
    budgetExceeded: stopReason === 'budget_exceeded',
    cancelled: stopReason === 'cancelled',
    durationMs: finishedAt - startedAt,
  };

  log.info(
    {
      evidence: result.records.length,
      missing: result.records.filter((r) => r.value.kind === 'missing').length,
      budgetExceeded: result.budgetExceeded,
      cancelled: result.cancelled,
      durationMs: result.durationMs,
    },
    'Evidence gathered'
  );
  return result;
}
