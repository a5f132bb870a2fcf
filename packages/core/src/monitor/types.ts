import type { MaybePromise, MonitorStep } from '@repowarden/shared';

export type MonitorStatus = 'stopped' | 'running';

export interface TickFailure {
  path: string;
  step: MonitorStep;
  message: string;
}

/** Outcome of one pass over the repository list */
export interface TickReport {
  tickNumber: number;
  /** Repositories examined, excluded ones included */
  processed: number;
  skipped: number;
  unchanged: number;
  committed: string[];
  pushed: string[];
  failures: TickFailure[];
  startedAt: string;
  finishedAt: string;
}

export type TickCallback = (report: TickReport) => MaybePromise<void>;
