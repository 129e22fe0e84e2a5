import {
  InvalidTransitionError,
  type PipelineStage,
  type TaskStatus,
  type TerminalTaskStatus,
} from '@repoindex/shared';

const STOPPED: readonly TaskStatus[] = ['failed', 'cancelled', 'interrupted'];

/**
 * Allowed task transitions. `pending` is re-entered from any stage when a
 * transient failure schedules a retry.
 */
export const TASK_TRANSITIONS: Readonly<Record<TaskStatus, readonly TaskStatus[]>> = {
  pending: ['acquiring', 'generating-artifacts', ...STOPPED],
  acquiring: ['parsing', 'pending', ...STOPPED],
  parsing: ['embedding', 'completed', 'pending', ...STOPPED],
  embedding: ['generating-artifacts', 'pending', ...STOPPED],
  'generating-artifacts': ['completed', 'pending', ...STOPPED],
  completed: [],
  failed: [],
  cancelled: [],
  interrupted: [],
};

export const PIPELINE_STAGES: readonly PipelineStage[] = [
  'acquiring',
  'parsing',
  'embedding',
  'generating-artifacts',
];

export function isTerminalStatus(status: TaskStatus): status is TerminalTaskStatus {
  return TASK_TRANSITIONS[status].length === 0;
}

export function isPipelineStage(status: TaskStatus): status is PipelineStage {
  return PIPELINE_STAGES.some((stage) => stage === status);
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

export function assertTransition(from: TaskStatus, to: TaskStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/** Progress shown on entry to each stage; embedding advances to 75 per batch. */
export const STAGE_PROGRESS = {
  acquiring: 5,
  parsing: 20,
  embedding: 50,
  'generating-artifacts': 75,
  completed: 100,
} as const;

export function embeddingProgress(batchesDone: number, batchCount: number): number {
  if (batchCount === 0) return STAGE_PROGRESS['generating-artifacts'];
  const span = STAGE_PROGRESS['generating-artifacts'] - STAGE_PROGRESS.embedding;
  return STAGE_PROGRESS.embedding + Math.floor((span * batchesDone) / batchCount);
}
