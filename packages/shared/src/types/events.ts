import type { PipelineStage, TaskStatus, TaskType } from './indexing';

/**
 * Base interface for all engine events.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Task the event belongs to, or a synthetic id for engine-level work */
  runId: string;
  type: string;
}

export interface TaskSubmitted extends BaseEvent {
  type: 'TaskSubmitted';
  payload: {
    repoId: string;
    taskType: TaskType;
  };
}

export interface TaskStatusChanged extends BaseEvent {
  type: 'TaskStatusChanged';
  payload: {
    repoId: string;
    from: TaskStatus;
    to: TaskStatus;
    progressPct: number;
    currentStage: string | null;
  };
}

export interface TaskRetryScheduled extends BaseEvent {
  type: 'TaskRetryScheduled';
  payload: {
    attempt: number;
    delayMs: number;
    failedAtStage: PipelineStage | null;
    error: string;
  };
}

export interface TaskFailed extends BaseEvent {
  type: 'TaskFailed';
  payload: {
    failedAtStage: PipelineStage | null;
    error: string;
  };
}

export interface ChangesDetected extends BaseEvent {
  type: 'ChangesDetected';
  payload: {
    added: number;
    modified: number;
    unchanged: number;
    deleted: number;
  };
}

export interface FileSkipped extends BaseEvent {
  type: 'FileSkipped';
  payload: {
    path: string;
    reason: string;
  };
}

export interface ChunksExtracted extends BaseEvent {
  type: 'ChunksExtracted';
  payload: {
    files: number;
    chunks: number;
    splitUnits: number;
  };
}

export interface EmbeddingBatchCommitted extends BaseEvent {
  type: 'EmbeddingBatchCommitted';
  payload: {
    batchIndex: number;
    batchCount: number;
    chunks: number;
  };
}

export interface CheckpointsCommitted extends BaseEvent {
  type: 'CheckpointsCommitted';
  payload: {
    updatedFiles: number;
    deletedFiles: number;
    staleChunksRemoved: number;
  };
}

export interface ConsistencyErrorDetected extends BaseEvent {
  type: 'ConsistencyErrorDetected';
  payload: {
    path: string;
    missingChunkIds: number;
  };
}

export interface StructuralIndexUpdated extends BaseEvent {
  type: 'StructuralIndexUpdated';
  payload: {
    mode: 'rebuild' | 'patch';
    files: number;
  };
}

export interface RepairFinished extends BaseEvent {
  type: 'RepairFinished';
  payload: {
    repoId: string;
    mode: 'verify' | 'rederive';
    checkedFiles: number;
    inconsistentFiles: number;
    orphanedChunksRemoved: number;
    checkpointsRederived: number;
  };
}

export interface ProviderRequestStarted extends BaseEvent {
  type: 'ProviderRequestStarted';
  payload: {
    provider: string;
    model: string;
  };
}

export interface ProviderRequestFinished extends BaseEvent {
  type: 'ProviderRequestFinished';
  payload: {
    provider: string;
    durationMs: number;
    success: boolean;
    error?: string;
    retries: number;
  };
}

export type EngineEvent =
  | TaskSubmitted
  | TaskStatusChanged
  | TaskRetryScheduled
  | TaskFailed
  | ChangesDetected
  | FileSkipped
  | ChunksExtracted
  | EmbeddingBatchCommitted
  | CheckpointsCommitted
  | ConsistencyErrorDetected
  | StructuralIndexUpdated
  | RepairFinished
  | ProviderRequestStarted
  | ProviderRequestFinished;

export type EngineEventType = EngineEvent['type'];

/**
 * Common envelope fields for an event emitted on behalf of `runId`.
 */
export function eventEnvelope(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: 1,
    timestamp: new Date().toISOString(),
    runId,
  };
}
