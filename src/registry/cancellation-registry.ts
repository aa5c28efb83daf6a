/**
 * Process-wide table of in-flight application runs, keyed by job id.
 *
 * A run claims its job with `register`, polls `isCancelled` at its checkpoints
 * and gives the claim back with `release` on every exit path. `requestCancel`
 * only raises the flag; the run observes it at its next checkpoint.
 */

export interface RunStatus {
  isRunning: boolean;
  startedAt: string | null;
  cancelRequested: boolean;
}

interface RegistryEntry {
  token: symbol;
  cancelled: boolean;
  startedAt: Date;
}

/**
 * Handle returned to the run that owns a registry entry
 */
export interface RunLease {
  readonly jobId: string;
  readonly startedAt: Date;
  isCancelled(): boolean;
  /** Removes the entry if this lease still owns it. Safe to call more than once. */
  release(): void;
}

export class CancellationRegistry {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  /**
   * Claim a job. Returns null while another non-cancelled run holds it.
   * A cancelled entry is replaced: its run is already winding down.
   */
  register(jobId: string): RunLease | null {
    const existing = this.entries.get(jobId);
    if (existing && !existing.cancelled) {
      return null;
    }

    const entry: RegistryEntry = {
      token: Symbol(jobId),
      cancelled: false,
      startedAt: this.now(),
    };
    this.entries.set(jobId, entry);

    return {
      jobId,
      startedAt: entry.startedAt,
      isCancelled: () => entry.cancelled,
      release: () => {
        if (this.entries.get(jobId)?.token === entry.token) {
          this.entries.delete(jobId);
        }
      },
    };
  }

  /**
   * Flag a running job for cancellation. False when nothing is running for it.
   */
  requestCancel(jobId: string): boolean {
    const entry = this.entries.get(jobId);
    if (!entry) return false;
    entry.cancelled = true;
    return true;
  }

  isCancelled(jobId: string): boolean {
    return this.entries.get(jobId)?.cancelled ?? false;
  }

  /**
   * Drop the entry for a job regardless of owner
   */
  release(jobId: string): void {
    this.entries.delete(jobId);
  }

  status(jobId: string): RunStatus {
    const entry = this.entries.get(jobId);
    if (!entry) {
      return { isRunning: false, startedAt: null, cancelRequested: false };
    }
    return {
      isRunning: true,
      startedAt: entry.startedAt.toISOString(),
      cancelRequested: entry.cancelled,
    };
  }

  activeJobIds(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }
}

export default {
  CancellationRegistry,
};
