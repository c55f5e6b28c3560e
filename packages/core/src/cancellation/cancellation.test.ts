/**
 * Cancellation Registry Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { CancellationRegistry } from './index.ts';

let registry: CancellationRegistry;

beforeEach(() => {
  registry = new CancellationRegistry();
});

describe('CancellationRegistry', () => {
  it('register creates and returns an AbortController', () => {
    const controller = registry.register('run_1');
    expect(controller).toBeInstanceOf(AbortController);
    expect(controller.signal.aborted).toBe(false);
  });

  it('register reuses existing controller (increments refCount)', () => {
    const first = registry.register('run_1');
    const second = registry.register('run_1');
    expect(second).toBe(first);
  });

  it('signal aborts the signal with its reason and returns true', () => {
    const controller = registry.register('run_1');
    expect(registry.signal('run_1', 'operator request')).toBe(true);
    expect(registry.isCancelled('run_1')).toBe(true);
    expect(controller.signal.reason).toBe('operator request');
  });

  it('signal returns false for unknown runId', () => {
    expect(registry.signal('run_nonexistent')).toBe(false);
  });

  it('isCancelled returns true after signal, false before', () => {
    registry.register('run_1');
    expect(registry.isCancelled('run_1')).toBe(false);
    registry.signal('run_1');
    expect(registry.isCancelled('run_1')).toBe(true);
  });

  it('getSignal returns the AbortSignal object', () => {
    const controller = registry.register('run_1');
    expect(registry.getSignal('run_1')).toBe(controller.signal);
    expect(registry.getSignal('run_nonexistent')).toBeUndefined();
  });

  it('unregister decrements refCount; only deletes at 0', () => {
    registry.register('run_1');
    registry.register('run_1'); // refCount = 2

    registry.unregister('run_1'); // refCount = 1
    expect(registry.getSignal('run_1')).toBeDefined();

    registry.unregister('run_1'); // refCount = 0, deleted
    expect(registry.getSignal('run_1')).toBeUndefined();
  });

  it('keeps registries isolated from each other', () => {
    const other = new CancellationRegistry();
    registry.register('run_1');
    other.register('run_1');

    registry.signal('run_1');
    expect(registry.isCancelled('run_1')).toBe(true);
    expect(other.isCancelled('run_1')).toBe(false);
  });

  it('runIds and clear', () => {
    registry.register('run_1');
    registry.register('run_2');
    expect(registry.runIds()).toEqual(['run_1', 'run_2']);
    registry.clear();
    expect(registry.runIds()).toEqual([]);
  });
});
