import type { Signal } from './types.js';

export type ScanRunStatus = 'FINISHED' | 'FAILED';

export type ScanRun = {
  runId: number;
  preset: string;
  status: ScanRunStatus;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  instruments: number;
  scanned: number;
  cooledDown: number;
  signals: number;
  skipped: number;
  rateLimited: number;
  errors: string[];
  errorMessage: string | null;
};

const MAX_ERRORS_PER_RUN = 20;

/** Bounded in-memory history of runs and signals for the status API. */
export class ScanStore {
  private readonly runs: ScanRun[] = [];
  private readonly signals: Signal[] = [];
  private nextRunId = 1;
  private signalsSeen = 0;

  constructor(private readonly maxRuns = 50, private readonly maxSignals = 200) {}

  recordScanRun(run: Omit<ScanRun, 'runId'>): ScanRun {
    const stored: ScanRun = { ...run, runId: this.nextRunId++, errors: run.errors.slice(0, MAX_ERRORS_PER_RUN) };
    this.runs.push(stored);
    if (this.runs.length > this.maxRuns) this.runs.splice(0, this.runs.length - this.maxRuns);
    return stored;
  }

  recordSignal(signal: Signal): void {
    this.signals.push(signal);
    this.signalsSeen++;
    if (this.signals.length > this.maxSignals) this.signals.splice(0, this.signals.length - this.maxSignals);
  }

  /** Newest first. */
  getLatestScanRuns(limit = 10): ScanRun[] {
    if (limit <= 0) return [];
    return this.runs.slice(-limit).reverse();
  }

  /** Newest first. */
  listRecentSignals(limit = 50): Signal[] {
    if (limit <= 0) return [];
    return this.signals.slice(-limit).reverse();
  }

  /** Signals recorded since start, including ones already rotated out. */
  get signalCount(): number {
    return this.signalsSeen;
  }
}
