import { setTimeout as delay } from 'timers/promises';
import {
  CancelledError,
  IndexError,
  InterruptedError,
  NotFoundError,
  StoreError,
  eventEnvelope,
  isTransientError,
  scrubErrorMessage,
  type Config,
  type IndexingTask,
  type Logger,
  type PipelineStage,
  type RepositorySnapshot,
  type RepositoryStatus,
  type TaskStatus,
} from '@repoindex/shared';
import { hasChanges } from '@repoindex/repo';
import type { ConcurrencyGate, Embedder } from '@repoindex/adapters';
import type { IndexStateStore, TaskPatch, VectorStore } from '@repoindex/store';
import type { ProgressBus } from './progress';
import type { RepositoryAcquirer } from './acquirer';
import { ParseStage } from './parse-stage';
import { EmbeddingCommitter } from './committer';
import { ArtifactGenerator } from './artifacts';
import {
  STAGE_PROGRESS,
  assertTransition,
  embeddingProgress,
  isPipelineStage,
  isTerminalStatus,
} from './state-machine';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface PipelineDeps {
  state: IndexStateStore;
  vectors: VectorStore;
  bus: ProgressBus;
  logger: Logger;
  config: Config;
  acquirer: RepositoryAcquirer;
  gate: ConcurrencyGate;
  /** Resolved on first use so read-only callers never need provider credentials */
  embedder: () => Embedder;
  sleep?: Sleep;
}

export interface RunOptions {
  forceFull: boolean;
  branch?: string;
  token?: string;
  /** Aborted with a CancelledError or InterruptedError once the task was stopped */
  signal: AbortSignal;
}

type StopStatus = 'cancelled' | 'interrupted';

const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal.aborted) throw signal.reason;
    throw error;
  }
};

/** Status a repository returns to once its task stops without failing. */
export function idleStatus(repo: RepositorySnapshot): RepositoryStatus {
  return repo.lastSyncedAt ? 'ready' : 'pending';
}

/**
 * Drives one task through acquire, parse, embed and artifact generation.
 * Every status change is a compare-and-set in the state store, so a
 * concurrent stop always wins; the loser observes it as a Cancelled or
 * InterruptedError and leaves quietly.
 */
export class PipelineOrchestrator {
  private readonly parseStage: ParseStage;
  private readonly artifacts: ArtifactGenerator;
  private readonly sleep: Sleep;

  constructor(private readonly deps: PipelineDeps) {
    this.parseStage = new ParseStage({
      vectors: deps.vectors,
      logger: deps.logger,
      chunking: deps.config.chunking,
    });
    this.artifacts = new ArtifactGenerator(deps.state, deps.vectors, deps.logger);
    this.sleep = deps.sleep ?? abortableSleep;
  }

  async run(taskId: string, options: RunOptions): Promise<IndexingTask> {
    for (;;) {
      const task = this.requireTask(taskId);
      if (isTerminalStatus(task.status)) return task;

      try {
        await this.runAttempt(task, options);
        return this.requireTask(taskId);
      } catch (error) {
        if (!(await this.handleFailure(taskId, error, options.signal))) {
          return this.requireTask(taskId);
        }
      }
    }
  }

  /**
   * Moves a live task to `cancelled` or `interrupted`. Terminal tasks are
   * returned unchanged.
   */
  async stop(taskId: string, to: StopStatus, message: string | null = null): Promise<IndexingTask> {
    const { state } = this.deps;
    for (;;) {
      const current = this.requireTask(taskId);
      if (isTerminalStatus(current.status)) return current;

      const updated = state.transitionTask(taskId, current.status, to, {
        currentStage: to === 'cancelled' ? 'Cancelled' : 'Interrupted',
        errorMessage: message,
      });
      if (!updated) continue;

      await this.announce(current.status, updated);
      const repo = state.getRepository(updated.repoId);
      if (repo) state.updateRepository(repo.id, { status: idleStatus(repo) });
      return updated;
    }
  }

  private async runAttempt(initial: IndexingTask, options: RunOptions): Promise<void> {
    const { state } = this.deps;
    const { signal } = options;
    let task = initial;
    let repo = this.requireRepository(task.repoId);

    if (task.type === 'artifacts-only') {
      task = await this.transition(task, 'generating-artifacts', {
        progressPct: STAGE_PROGRESS['generating-artifacts'],
        currentStage: 'Generating structural index',
      });
      await this.artifacts.generate({ repoId: repo.id, runId: task.id, mode: 'rebuild' });
      await this.transition(task, 'completed', {
        progressPct: STAGE_PROGRESS.completed,
        currentStage: 'Completed',
      });
      state.updateRepository(repo.id, { status: idleStatus(repo) });
      return;
    }

    const remote = repo.platform !== 'local';
    task = await this.transition(task, 'acquiring', {
      progressPct: STAGE_PROGRESS.acquiring,
      currentStage: remote ? `Fetching ${repo.name}` : `Reading ${repo.name}`,
    });
    state.updateRepository(repo.id, { status: remote ? 'cloning' : 'syncing' });
    const acquired = await this.deps.acquirer.acquire(repo, {
      branch: options.branch,
      token: options.token,
    });
    repo = state.updateRepository(repo.id, {
      status: 'syncing',
      localPath: acquired.root,
      defaultBranch: acquired.branch,
    });
    signal.throwIfAborted();

    task = await this.transition(task, 'parsing', {
      progressPct: STAGE_PROGRESS.parsing,
      currentStage: 'Parsing files',
    });
    const taskId = task.id;
    const parsed = await this.parseStage.run({
      repoId: repo.id,
      runId: taskId,
      root: acquired.root,
      forceFull: options.forceFull,
      checkpoints: state.getCheckpoints(repo.id),
      onProgress: (filesProcessed, filesTotal) => {
        // every 25 files and the last one
        if (filesProcessed % 25 === 0 || filesProcessed === filesTotal) {
          this.progress(taskId, { filesProcessed, filesTotal });
        }
      },
    });
    signal.throwIfAborted();

    if (options.forceFull && parsed.chunkCount === 0) {
      throw new IndexError(
        `Full reindex of ${repo.name} produced no chunks from ${parsed.filesTotal} file(s)`,
      );
    }

    if (!options.forceFull && !hasChanges(parsed.changes)) {
      await this.transition(task, 'completed', {
        progressPct: STAGE_PROGRESS.completed,
        currentStage: 'Up to date',
        filesTotal: 0,
        filesProcessed: 0,
      });
      state.updateRepository(repo.id, { status: 'ready', lastSyncedAt: new Date().toISOString() });
      return;
    }

    task = await this.transition(task, 'embedding', {
      progressPct: STAGE_PROGRESS.embedding,
      currentStage: `Embedding ${parsed.chunkCount} chunk(s)`,
      filesTotal: parsed.files.length,
      filesProcessed: parsed.files.length,
    });
    const committer = new EmbeddingCommitter({
      embedder: this.deps.embedder(),
      vectors: this.deps.vectors,
      state,
      gate: this.deps.gate,
      embeddings: this.deps.config.embeddings,
      logger: this.deps.logger,
    });
    await committer.commit({
      repoId: repo.id,
      runId: taskId,
      revision: acquired.revision,
      files: parsed.files,
      deleted: parsed.changes.deleted,
      signal,
      onBatch: (done, total) => {
        this.progress(taskId, { progressPct: embeddingProgress(done, total) });
      },
    });

    task = await this.transition(task, 'generating-artifacts', {
      progressPct: STAGE_PROGRESS['generating-artifacts'],
      currentStage: 'Generating structural index',
    });
    await this.artifacts.generate({
      repoId: repo.id,
      runId: taskId,
      mode: options.forceFull ? 'rebuild' : 'patch',
      changedFiles: parsed.files.map((f) => f.filePath),
      deletedFiles: parsed.changes.deleted,
    });

    await this.transition(task, 'completed', {
      progressPct: STAGE_PROGRESS.completed,
      currentStage: 'Completed',
    });
    state.updateRepository(repo.id, { status: 'ready', lastSyncedAt: new Date().toISOString() });
  }

  /** Returns true when a retry was scheduled and the task should run again. */
  private async handleFailure(
    taskId: string,
    error: unknown,
    signal: AbortSignal,
  ): Promise<boolean> {
    const current = this.requireTask(taskId);
    if (isTerminalStatus(current.status)) return false;

    if (error instanceof CancelledError || error instanceof InterruptedError) {
      const to = error instanceof CancelledError ? 'cancelled' : 'interrupted';
      await this.stop(taskId, to, error.message);
      return false;
    }

    const stage = isPipelineStage(current.status) ? current.status : current.failedAtStage;
    const message = scrubErrorMessage(error);
    const { maxTaskRetries, retryDelayMs } = this.deps.config.pipeline;

    try {
      const retriable =
        current.status !== 'pending' && isTransientError(error) && current.attempt < maxTaskRetries;
      if (retriable) {
        const delayMs = retryDelayMs * 2 ** current.attempt;
        await this.scheduleRetry(current, stage, message, delayMs, signal);
        return true;
      }
      await this.fail(current, stage, message, error);
    } catch (stopped) {
      // a stop raced the failure handling
      if (stopped instanceof CancelledError || stopped instanceof InterruptedError) return false;
      throw stopped;
    }
    return false;
  }

  private async scheduleRetry(
    task: IndexingTask,
    stage: PipelineStage | null,
    message: string,
    delayMs: number,
    signal: AbortSignal,
  ): Promise<void> {
    const attempt = task.attempt + 1;
    await this.transition(task, 'pending', {
      attempt,
      failedAtStage: stage,
      errorMessage: message,
      progressPct: 0,
      currentStage: `Retry ${attempt} of ${this.deps.config.pipeline.maxTaskRetries} in ${Math.ceil(delayMs / 1000)}s`,
    });
    await this.deps.logger.log({
      type: 'TaskRetryScheduled',
      ...eventEnvelope(task.id),
      payload: { attempt, delayMs, failedAtStage: stage, error: message },
    });
    await this.sleep(delayMs, signal);
  }

  private async fail(
    task: IndexingTask,
    stage: PipelineStage | null,
    message: string,
    error: unknown,
  ): Promise<void> {
    await this.transition(task, 'failed', {
      failedAtStage: stage,
      errorMessage: message,
      currentStage: 'Failed',
    });
    const { logger, state } = this.deps;
    await logger.log({
      type: 'TaskFailed',
      ...eventEnvelope(task.id),
      payload: { failedAtStage: stage, error: message },
    });
    await logger.error(
      error instanceof Error ? error : new Error(message),
      `Task ${task.id} failed: ${message}`,
    );
    state.updateRepository(task.repoId, { status: 'error' });
  }

  private async transition(
    task: IndexingTask,
    to: TaskStatus,
    patch: TaskPatch,
  ): Promise<IndexingTask> {
    assertTransition(task.status, to);
    const updated = this.deps.state.transitionTask(task.id, task.status, to, patch);
    if (!updated) {
      throw this.lostTransition(task.id, to);
    }
    await this.announce(task.status, updated);
    return updated;
  }

  private async announce(from: TaskStatus, task: IndexingTask): Promise<void> {
    this.deps.bus.publish(task, 'transition');
    await this.deps.logger.log({
      type: 'TaskStatusChanged',
      ...eventEnvelope(task.id),
      payload: {
        repoId: task.repoId,
        from,
        to: task.status,
        progressPct: task.progressPct,
        currentStage: task.currentStage,
      },
    });
  }

  private progress(taskId: string, patch: TaskPatch): void {
    const updated = this.deps.state.updateTaskProgress(taskId, patch);
    if (updated) this.deps.bus.publish(updated, 'progress');
  }

  private lostTransition(taskId: string, to: TaskStatus): Error {
    const current = this.requireTask(taskId);
    if (current.status === 'cancelled') return new CancelledError();
    if (current.status === 'interrupted') return new InterruptedError();
    return new StoreError(`Task ${taskId} is ${current.status}; cannot move it to ${to}`);
  }

  private requireTask(taskId: string): IndexingTask {
    const task = this.deps.state.getTask(taskId);
    if (!task) throw new NotFoundError(`Task ${taskId} not found`);
    return task;
  }

  private requireRepository(repoId: string): RepositorySnapshot {
    const repo = this.deps.state.getRepository(repoId);
    if (!repo) throw new NotFoundError(`Repository ${repoId} not found`);
    return repo;
  }
}
