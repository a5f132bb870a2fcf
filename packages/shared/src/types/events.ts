/**
 * Base interface for all repowarden events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Identifier of the manager run that produced the event */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/** Emitted when a scan begins, before the cache is consulted */
export interface ScanStarted extends BaseEvent {
  type: 'ScanStarted';
  payload: {
    rootDir: string;
  };
}

/** Emitted when a scan has produced its repository list */
export interface ScanFinished extends BaseEvent {
  type: 'ScanFinished';
  payload: {
    rootDir: string;
    repositoryCount: number;
    warningCount: number;
    fromCache: boolean;
    durationMs: number;
  };
}

/** Emitted when a nested repository has been turned into a submodule of its parent */
export interface SubmoduleNormalized extends BaseEvent {
  type: 'SubmoduleNormalized';
  payload: {
    parentPath: string;
    childPath: string;
  };
}

export interface TickStarted extends BaseEvent {
  type: 'TickStarted';
  payload: {
    tickNumber: number;
    repositoryCount: number;
  };
}

export interface TickFinished extends BaseEvent {
  type: 'TickFinished';
  payload: {
    tickNumber: number;
    committed: number;
    pushed: number;
    failed: number;
    durationMs: number;
  };
}

export interface RepoCommitted extends BaseEvent {
  type: 'RepoCommitted';
  payload: {
    path: string;
    message: string;
  };
}

export interface RepoPushed extends BaseEvent {
  type: 'RepoPushed';
  payload: {
    path: string;
    /** Remote pushed to; absent when the repository default was used */
    remote?: string;
  };
}

/** Steps of the per-repository monitor sequence that can fail independently */
export type MonitorStep = 'status' | 'diff' | 'summarize' | 'commit' | 'push';

export interface RepoFailed extends BaseEvent {
  type: 'RepoFailed';
  payload: {
    path: string;
    step: MonitorStep;
    message: string;
  };
}

export type WardenEvent =
  | ScanStarted
  | ScanFinished
  | SubmoduleNormalized
  | TickStarted
  | TickFinished
  | RepoCommitted
  | RepoPushed
  | RepoFailed;

export type WardenEventType = WardenEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata fields for a new event.
 *
 * @example
 * ```typescript
 * logger.log({ ...eventMeta(runId), type: 'TickStarted', payload: { tickNumber: 1, repositoryCount: 3 } });
 * ```
 */
export function eventMeta(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
