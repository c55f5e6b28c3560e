import { describe, it, expect } from 'vitest';
import { GateError, ProviderError } from '../errors/index.ts';
import { evidenceId, providerId } from '../identifiers/index.ts';
import { booleanValue } from '../values/index.ts';
import { ProviderRegistry, isTransientProviderError, normalizeProviderError } from './index.ts';

describe('ProviderRegistry', () => {
  it('registers objects and plain functions', async () => {
    const registry = new ProviderRegistry()
      .register('profile', { fetch: async () => booleanValue(true) })
      .register('flags', async () => booleanValue(false));

    expect(registry.has('profile')).toBe(true);
    expect(registry.ids()).toEqual(['flags', 'profile']);

    const flags = registry.get('flags');
    const value = await flags?.fetch(evidenceId('beta'), {}, {
      deadline: 0,
      signal: new AbortController().signal,
    });
    expect(value).toEqual(booleanValue(false));
  });

  it('refuses duplicate registrations', () => {
    const registry = new ProviderRegistry().register('profile', async () => booleanValue(true));
    expect(() => registry.register('profile', async () => booleanValue(true))).toThrow(GateError);
    expect(() => registry.register('profile', async () => booleanValue(true))).toThrow(
      'Provider already registered: profile'
    );
  });

  it('lists unregistered providers a spec needs', () => {
    const registry = new ProviderRegistry().register('profile', async () => booleanValue(true));
    const missing = registry.missingFor({
      evidence: [
        { evidenceId: evidenceId('age'), providerId: providerId('profile') },
        { evidenceId: evidenceId('region'), providerId: providerId('geo') },
        { evidenceId: evidenceId('country'), providerId: providerId('geo') },
        { evidenceId: evidenceId('score'), providerId: providerId('risk') },
      ],
    });
    expect(missing).toEqual(['geo', 'risk']);
  });
});

describe('provider errors', () => {
  it('treats only unreachable as transient', () => {
    expect(isTransientProviderError(new ProviderError('unreachable', 'down'))).toBe(true);
    expect(isTransientProviderError(new ProviderError('invalid_params', 'bad'))).toBe(false);
    expect(isTransientProviderError(new ProviderError('timeout', 'slow'))).toBe(false);
    expect(isTransientProviderError(new Error('down'))).toBe(false);
  });

  it('normalizes thrown values', () => {
    const denied = new ProviderError('denied', 'no access');
    expect(normalizeProviderError(denied)).toBe(denied);

    const abort = new Error('This operation was aborted');
    abort.name = 'AbortError';
    expect(normalizeProviderError(abort).code).toBe('timeout');

    const unknown = normalizeProviderError('socket hang up');
    expect(unknown.code).toBe('unreachable');
    expect(unknown.message).toBe('socket hang up');
  });
});
