import { EventEmitter } from 'events';
import {
  NotFoundError,
  type IndexingTask,
  type PipelineStage,
  type TaskStatus,
  type TaskType,
} from '@repoindex/shared';
import { isTerminalStatus } from './state-machine';

export interface TaskStatusView {
  taskId: string;
  repoId: string;
  type: TaskType;
  status: TaskStatus;
  progressPct: number;
  currentStage: string | null;
  filesTotal: number;
  filesProcessed: number;
  failedAtStage?: PipelineStage;
  errorMessage?: string;
}

export type ProgressEventKind = 'snapshot' | 'transition' | 'progress' | 'keep-alive';

export interface ProgressEvent extends TaskStatusView {
  kind: ProgressEventKind;
  timestamp: string;
}

export function toStatusView(task: IndexingTask): TaskStatusView {
  const view: TaskStatusView = {
    taskId: task.id,
    repoId: task.repoId,
    type: task.type,
    status: task.status,
    progressPct: task.progressPct,
    currentStage: task.currentStage,
    filesTotal: task.filesTotal,
    filesProcessed: task.filesProcessed,
  };
  if (task.failedAtStage !== null) view.failedAtStage = task.failedAtStage;
  if (task.errorMessage !== null) view.errorMessage = task.errorMessage;
  return view;
}

export function toProgressEvent(task: IndexingTask, kind: ProgressEventKind): ProgressEvent {
  return { ...toStatusView(task), kind, timestamp: new Date().toISOString() };
}

type ProgressListener = (event: ProgressEvent) => void;

/**
 * In-process fan-out of task progress, keyed by task id.
 */
export class ProgressBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(0);
  }

  publish(task: IndexingTask, kind: Exclude<ProgressEventKind, 'snapshot' | 'keep-alive'>): void {
    this.emit(task.id, toProgressEvent(task, kind));
  }

  subscribe(taskId: string, listener: ProgressListener): () => void {
    this.on(taskId, listener);
    return () => {
      this.off(taskId, listener);
    };
  }
}

export interface ProgressSource {
  bus: ProgressBus;
  getTask(taskId: string): IndexingTask | null;
}

export interface StreamProgressOptions {
  /** Idle interval before a keep-alive is emitted */
  keepAliveMs: number;
}

/**
 * Current snapshot first, then every published event, with keep-alives while
 * idle. Ends after the first event with a terminal status.
 */
export async function* streamProgress(
  source: ProgressSource,
  taskId: string,
  options: StreamProgressOptions,
): AsyncGenerator<ProgressEvent, void, undefined> {
  const pending: ProgressEvent[] = [];
  let wake: (() => void) | null = null;
  // subscribe and snapshot without an await in between, so nothing is missed
  const unsubscribe = source.bus.subscribe(taskId, (event) => {
    pending.push(event);
    wake?.();
  });

  try {
    const task = source.getTask(taskId);
    if (!task) {
      throw new NotFoundError(`Task ${taskId} not found`);
    }
    let latest = toProgressEvent(task, 'snapshot');
    yield latest;
    if (isTerminalStatus(latest.status)) return;

    for (;;) {
      if (pending.length === 0) {
        const woke = await new Promise<boolean>((resolve) => {
          const timer = setTimeout(() => {
            wake = null;
            resolve(false);
          }, options.keepAliveMs);
          wake = () => {
            clearTimeout(timer);
            wake = null;
            resolve(true);
          };
        });

        if (!woke) {
          // the task may have ended without a published event, e.g. in another process
          const fresh = source.getTask(taskId);
          if (fresh && isTerminalStatus(fresh.status)) {
            yield toProgressEvent(fresh, 'transition');
            return;
          }
          const base = fresh ? toStatusView(fresh) : latest;
          latest = { ...base, kind: 'keep-alive', timestamp: new Date().toISOString() };
          yield latest;
          continue;
        }
      }

      const event = pending.shift();
      if (!event) continue;
      latest = event;
      yield event;
      if (isTerminalStatus(event.status)) return;
    }
  } finally {
    unsubscribe();
  }
}
