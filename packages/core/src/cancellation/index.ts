/**
 * Cancellation registry for gate runs.
 *
 * Each engine owns one registry. A run registers its id while it executes,
 * so a server or CLI holding the registry can cancel it by id; the run's
 * AbortSignal then reaches every in-flight provider call.
 *
 * Signals are per-process. A registry cannot cancel a run executing in
 * another process.
 */

interface CancellableEntry {
  controller: AbortController;
  refCount: number;
}

export class CancellationRegistry {
  private readonly entries = new Map<string, CancellableEntry>();

  /**
   * Register a run as cancellable.
   * If an entry already exists, increments refCount and returns its
   * controller, which may already be aborted.
   */
  register(runId: string): AbortController {
    const existing = this.entries.get(runId);
    if (existing !== undefined) {
      existing.refCount++;
      return existing.controller;
    }

    const controller = new AbortController();
    this.entries.set(runId, { controller, refCount: 1 });
    return controller;
  }

  /**
   * Signal cancellation for a run.
   * Returns true if the entry existed (signal fired), false otherwise.
   */
  signal(runId: string, reason?: string): boolean {
    const entry = this.entries.get(runId);
    if (entry === undefined) return false;
    entry.controller.abort(reason ?? 'cancelled');
    return true;
  }

  isCancelled(runId: string): boolean {
    return this.entries.get(runId)?.controller.signal.aborted === true;
  }

  getSignal(runId: string): AbortSignal | undefined {
    return this.entries.get(runId)?.controller.signal;
  }

  /**
   * Decrements refCount; only deletes the entry when refCount reaches 0.
   */
  unregister(runId: string): void {
    const entry = this.entries.get(runId);
    if (entry === undefined) return;
    entry.refCount--;
    if (entry.refCount <= 0) {
      this.entries.delete(runId);
    }
  }

  /** Ids of the runs currently registered */
  runIds(): string[] {
    return [...this.entries.keys()];
  }

  clear(): void {
    this.entries.clear();
  }
}
