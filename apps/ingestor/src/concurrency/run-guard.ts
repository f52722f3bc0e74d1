import { Injectable } from '@nestjs/common';

export type RunAttempt<T> =
  | { started: true; result: Promise<T> }
  | { started: false; activeRun: string };

interface ActiveRun {
  label: string;
  startedAt: number;
  settled: Promise<void>;
}

/**
 * Process-wide "run in progress" flag. At most one ingestion run holds it;
 * a second trigger is turned away, never queued.
 */
@Injectable()
export class RunGuard {
  private active: ActiveRun | null = null;

  /**
   * Start `work` if no run is active. Acquisition is synchronous, so two
   * triggers in the same tick cannot both get through.
   */
  tryRun<T>(label: string, work: () => Promise<T>): RunAttempt<T> {
    if (this.active) {
      return { started: false, activeRun: this.active.label };
    }

    const result = Promise.resolve().then(work);
    const release = (): void => {
      this.active = null;
    };
    // The caller observes failures through `result`; `settled` only tracks completion.
    const settled = result.then(release, release);
    this.active = { label, startedAt: Date.now(), settled };
    return { started: true, result };
  }

  isActive(): boolean {
    return this.active !== null;
  }

  activeRun(): { label: string; startedAt: number } | null {
    return this.active ? { label: this.active.label, startedAt: this.active.startedAt } : null;
  }

  /** Resolves once the in-flight run, if any, has finished */
  async whenIdle(): Promise<void> {
    while (this.active) {
      await this.active.settled;
    }
  }
}
