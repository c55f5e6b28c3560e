/**
 * Evidence Provider Registry
 *
 * Providers fetch one piece of evidence per call. The engine resolves each
 * binding's providerId through a registry it was given; there is no
 * process-wide registry.
 *
 * Provider faults never escape orchestration. Whatever a provider throws is
 * normalized to a ProviderError and folded into missing evidence.
 */

import { GateError, ProviderError, errorMessage } from '../errors/index.ts';
import type { EvidenceId, ProviderId } from '../identifiers/index.ts';
import type { EvidenceValue } from '../values/index.ts';
import type { JsonObject, ScenarioSpec } from '../spec/index.ts';

// =============================================================================
// Types
// =============================================================================

export interface FetchContext {
  /** Epoch milliseconds by which this attempt must settle */
  deadline: number;
  /** Aborted on timeout, budget exhaustion or cancellation */
  signal: AbortSignal;
}

export interface EvidenceProvider {
  fetch(evidenceId: EvidenceId, params: JsonObject, context: FetchContext): Promise<EvidenceValue>;
}

/** Plain function form, for providers without state */
export type ProviderFn = EvidenceProvider['fetch'];

// =============================================================================
// Registry
// =============================================================================

export class ProviderRegistry {
  private readonly providers = new Map<string, EvidenceProvider>();

  /**
   * Register a provider under an id. Registering the same id twice throws.
   */
  register(id: ProviderId | string, provider: EvidenceProvider | ProviderFn): this {
    if (this.providers.has(id)) {
      throw new GateError(`Provider already registered: ${id}`, 'duplicate_provider');
    }
    this.providers.set(id, typeof provider === 'function' ? { fetch: provider } : provider);
    return this;
  }

  get(id: string): EvidenceProvider | undefined {
    return this.providers.get(id);
  }

  has(id: string): boolean {
    return this.providers.has(id);
  }

  ids(): string[] {
    return [...this.providers.keys()].sort();
  }

  /**
   * Provider ids a spec binds that are not registered, in binding order
   * and without duplicates.
   */
  missingFor(spec: Pick<ScenarioSpec, 'evidence'>): ProviderId[] {
    const missing: ProviderId[] = [];
    for (const binding of spec.evidence) {
      if (!this.providers.has(binding.providerId) && !missing.includes(binding.providerId)) {
        missing.push(binding.providerId);
      }
    }
    return missing;
  }
}

// =============================================================================
// Error Normalization
// =============================================================================

/**
 * Only unreachable providers are worth another attempt.
 */
export function isTransientProviderError(err: unknown): boolean {
  return err instanceof ProviderError && err.code === 'unreachable';
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

/**
 * Map anything a provider throws to a ProviderError. Aborts become
 * `timeout`; unknown failures become `unreachable`.
 */
export function normalizeProviderError(err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (isAbortError(err)) {
    return new ProviderError('timeout', errorMessage(err));
  }
  return new ProviderError('unreachable', errorMessage(err));
}
