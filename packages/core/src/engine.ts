import { randomUUID } from 'crypto';
import {
  CancelledError,
  InterruptedError,
  NotFoundError,
  SilentLogger,
  UsageError,
  eventEnvelope,
  type ChunkNode,
  type ChunkKind,
  type Config,
  type IndexingTask,
  type Logger,
  type RepositorySnapshot,
  type StructuralIndex,
  type TaskType,
} from '@repoindex/shared';
import {
  GitService,
  buildDependencyGraph,
  getOrmModels,
  parseRepositoryRef,
  type DependencyGraph,
  type OrmModelSummary,
} from '@repoindex/repo';
import {
  ConcurrencyGate,
  createEmbedder,
  executeProviderRequest,
  type Embedder,
} from '@repoindex/adapters';
import { IndexStateStore, createVectorStore, type VectorStore } from '@repoindex/store';
import { RepositoryAcquirer } from './pipeline/acquirer';
import { PipelineOrchestrator, idleStatus, type Sleep } from './pipeline/orchestrator';
import {
  ProgressBus,
  streamProgress,
  toStatusView,
  type ProgressEvent,
  type TaskStatusView,
} from './pipeline/progress';
import { RepairService, type RepairReport } from './pipeline/repair';

export interface RepositoryRequest {
  url: string;
  branch?: string;
  /** Used for this clone only; never persisted */
  token?: string;
}

export type RepositoryInput = string | RepositoryRequest;

export interface SearchHit {
  id: string;
  filePath: string;
  startLine: number;
  endLine: number;
  name: string;
  kind: ChunkKind;
  score: number;
}

export interface EngineOptions {
  config: Config;
  logger?: Logger;
  env?: NodeJS.ProcessEnv;
  /** Overrides for tests and embedding hosts */
  embedder?: Embedder;
  vectors?: VectorStore;
  state?: IndexStateStore;
  git?: GitService;
  sleep?: Sleep;
}

interface RunningTask {
  controller: AbortController;
  done: Promise<void>;
}

/**
 * In-process API of the indexing engine. `init()` must be awaited before
 * anything else; `close()` interrupts running tasks at their next batch
 * boundary and releases the stores.
 */
export class IndexingEngine {
  private readonly config: Config;
  private readonly logger: Logger;
  private readonly env: NodeJS.ProcessEnv;
  private readonly state: IndexStateStore;
  private readonly vectors: VectorStore;
  private readonly bus = new ProgressBus();
  private readonly gate: ConcurrencyGate;
  private readonly acquirer: RepositoryAcquirer;
  private readonly orchestrator: PipelineOrchestrator;
  private readonly repairs: RepairService;
  private readonly running = new Map<string, RunningTask>();
  private embedderInstance: Embedder | undefined;
  private initialized = false;

  constructor(options: EngineOptions) {
    this.config = options.config;
    this.logger = options.logger ?? new SilentLogger();
    this.env = options.env ?? process.env;
    this.embedderInstance = options.embedder;
    this.state = options.state ?? new IndexStateStore(this.config.storage.statePath);
    this.vectors = options.vectors ?? createVectorStore(this.config.storage.vectors);
    this.gate = new ConcurrencyGate(this.config.embeddings.concurrency);
    this.acquirer = new RepositoryAcquirer(
      options.git ?? new GitService(),
      this.config.storage.reposDir,
    );
    this.orchestrator = new PipelineOrchestrator({
      state: this.state,
      vectors: this.vectors,
      bus: this.bus,
      logger: this.logger,
      config: this.config,
      acquirer: this.acquirer,
      gate: this.gate,
      embedder: () => this.embedder,
      sleep: options.sleep,
    });
    this.repairs = new RepairService(this.state, this.vectors, this.logger);
  }

  private get embedder(): Embedder {
    this.embedderInstance ??= createEmbedder(this.config.embeddings, this.env);
    return this.embedderInstance;
  }

  async init(): Promise<void> {
    if (this.initialized) return;
    this.state.init();
    await this.vectors.init();

    // tasks a dead process left behind
    for (const task of this.state.markInterrupted()) {
      await this.logger.log({
        type: 'TaskStatusChanged',
        ...eventEnvelope(task.id),
        payload: {
          repoId: task.repoId,
          from: task.status,
          to: 'interrupted',
          progressPct: task.progressPct,
          currentStage: task.currentStage,
        },
      });
      const repo = this.state.getRepository(task.repoId);
      if (repo) this.state.updateRepository(repo.id, { status: idleStatus(repo) });
    }
    this.initialized = true;
  }

  async close(): Promise<void> {
    if (!this.initialized) return;
    await this.interruptAll('Interrupted by engine shutdown');
    await this.gate.drain();
    await this.vectors.close();
    this.state.close();
    this.initialized = false;
  }

  // Tasks

  /**
   * Starts an incremental sync, or a full reindex when `forceFull` is set or
   * the repository was never indexed. Returns the new task's id.
   */
  async submit(input: RepositoryInput, forceFull = false): Promise<string> {
    this.assertReady();
    const request = typeof input === 'string' ? { url: input } : input;
    const parsed = parseRepositoryRef(request.url);

    const repo =
      this.state.findRepositoryByUrl(parsed.url) ??
      this.state.createRepository({
        url: parsed.url,
        name: parsed.name,
        platform: parsed.platform,
        defaultBranch: request.branch ?? 'HEAD',
        localPath: parsed.isLocal ? parsed.url : null,
      });

    const neverIndexed =
      repo.lastSyncedAt === null && this.state.getCheckpoints(repo.id).length === 0;
    const type: TaskType = forceFull || neverIndexed ? 'full-reindex' : 'incremental-sync';
    const task = await this.createTask(repo, type);

    this.launch(task, {
      forceFull: type === 'full-reindex',
      branch: request.branch,
      token: request.token,
    });
    return task.id;
  }

  /** Regenerates derived artifacts from the stored chunks without touching files. */
  async submitArtifacts(ref: string): Promise<string> {
    this.assertReady();
    const repo = this.resolveRepository(ref);
    const task = await this.createTask(repo, 'artifacts-only');
    this.launch(task, { forceFull: false });
    return task.id;
  }

  getStatus(taskId: string): TaskStatusView {
    return toStatusView(this.requireTask(taskId));
  }

  streamProgress(
    taskId: string,
    options: { keepAliveMs?: number } = {},
  ): AsyncIterable<ProgressEvent> {
    const source = { bus: this.bus, getTask: (id: string) => this.state.getTask(id) };
    return streamProgress(source, taskId, {
      keepAliveMs: options.keepAliveMs ?? this.config.pipeline.keepAliveMs,
    });
  }

  /** Cancels a live task; an in-flight embedding batch still finishes. */
  async cancel(taskId: string): Promise<TaskStatusView> {
    this.requireTask(taskId);
    const task = await this.orchestrator.stop(taskId, 'cancelled');
    this.running.get(taskId)?.controller.abort(new CancelledError());
    return toStatusView(task);
  }

  /** Resolves once the task has stopped running in this process. */
  async waitForTask(taskId: string): Promise<TaskStatusView> {
    this.requireTask(taskId);
    await this.running.get(taskId)?.done;
    return this.getStatus(taskId);
  }

  // Reads

  async getDependencyGraph(ref: string, filePrefix?: string): Promise<DependencyGraph> {
    const repo = this.resolveRepository(ref);
    const chunks = await this.vectors.listChunks(repo.id);
    return buildDependencyGraph(chunks, { filePrefix });
  }

  /** ORM model classes with their column fields, in file and line order. */
  async getOrmModels(ref: string): Promise<OrmModelSummary[]> {
    const repo = this.resolveRepository(ref);
    return getOrmModels(await this.vectors.listChunks(repo.id));
  }

  async search(
    ref: string,
    queryVector: readonly number[] | Float32Array,
    topK = 10,
  ): Promise<SearchHit[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new UsageError(`topK must be a positive integer, got ${topK}`);
    }
    const repo = this.resolveRepository(ref);
    const results = await this.vectors.query(repo.id, Float32Array.from(queryVector), topK);
    return results.map(({ chunk, score }) => ({
      id: chunk.id,
      filePath: chunk.filePath,
      startLine: chunk.startLine,
      endLine: chunk.endLine,
      name: chunk.name,
      kind: chunk.kind,
      score,
    }));
  }

  /** Embeds `query` with the configured provider, then searches. */
  async searchText(ref: string, query: string, topK = 10): Promise<SearchHit[]> {
    if (query.trim().length === 0) {
      throw new UsageError('Search query is empty');
    }
    const repo = this.resolveRepository(ref);
    const embedder = this.embedder;
    const { embeddings } = this.config;
    const [vector] = await executeProviderRequest(
      {
        runId: `search-${randomUUID()}`,
        logger: this.logger,
        timeoutMs: embeddings.timeoutMs,
        retryOptions: embeddings.retry,
      },
      embeddings.provider,
      embedder.id(),
      (signal) => embedder.embedTexts([query], { signal }),
    );
    return this.search(repo.id, vector ?? [], topK);
  }

  async getChunks(ref: string, chunkIds: string[]): Promise<ChunkNode[]> {
    const repo = this.resolveRepository(ref);
    return this.vectors.getChunks(repo.id, chunkIds);
  }

  getStructuralIndex(ref: string): StructuralIndex {
    const repo = this.resolveRepository(ref);
    return this.state.getStructuralIndex(repo.id) ?? {};
  }

  /**
   * Verify mode drops checkpoints whose vectors vanished and queues a sync
   * to re-embed them; rederive mode rebuilds checkpoints from the vectors.
   */
  async repair(ref: string, options: { rederive?: boolean } = {}): Promise<RepairReport> {
    this.assertReady();
    const repo = this.resolveRepository(ref);
    const mode = options.rederive ? 'rederive' : 'verify';
    const report = await this.repairs.repair(repo.id, mode, `repair-${randomUUID()}`);

    if (mode === 'verify' && report.inconsistentFiles.length > 0) {
      const task = await this.createTask(repo, 'incremental-sync');
      this.launch(task, { forceFull: false });
      return { ...report, resyncTaskId: task.id };
    }
    return report;
  }

  // Repositories

  listRepositories(): RepositorySnapshot[] {
    return this.state.listRepositories();
  }

  getRepository(ref: string): RepositorySnapshot {
    return this.resolveRepository(ref);
  }

  /**
   * Removes the repository with its tasks, checkpoints, structural index,
   * vectors and clone. A live task is cancelled first.
   */
  async deleteRepository(ref: string): Promise<boolean> {
    this.assertReady();
    const repo = this.resolveRepository(ref);
    const active = this.state.findActiveTask(repo.id);
    if (active) {
      await this.cancel(active.id);
      await this.running.get(active.id)?.done;
    }

    await this.vectors.wipeRepo(repo.id);
    await this.acquirer.release(repo);
    return this.state.deleteRepository(repo.id);
  }

  // Internals

  private async createTask(repo: RepositorySnapshot, type: TaskType): Promise<IndexingTask> {
    const task = this.state.createTask(repo.id, type);
    await this.logger.log({
      type: 'TaskSubmitted',
      ...eventEnvelope(task.id),
      payload: { repoId: repo.id, taskType: type },
    });
    return task;
  }

  private launch(
    task: IndexingTask,
    options: { forceFull: boolean; branch?: string; token?: string },
  ): void {
    const controller = new AbortController();
    const done = this.orchestrator
      .run(task.id, { ...options, signal: controller.signal })
      .then(
        () => undefined,
        async (error: unknown) => {
          await this.logger.error(
            error instanceof Error ? error : new Error(String(error)),
            `Task ${task.id} stopped unexpectedly`,
          );
        },
      )
      .finally(() => {
        this.running.delete(task.id);
      });
    this.running.set(task.id, { controller, done });
  }

  private async interruptAll(message: string): Promise<void> {
    const pending: Promise<void>[] = [];
    for (const [taskId, running] of this.running) {
      await this.orchestrator.stop(taskId, 'interrupted', message);
      running.controller.abort(new InterruptedError(message));
      pending.push(running.done);
    }
    await Promise.all(pending);
  }

  /**
   * Accepts a repository id, or a URL or path that was submitted before.
   */
  private resolveRepository(ref: string): RepositorySnapshot {
    const byId = this.state.getRepository(ref);
    if (byId) return byId;

    let url: string | null = null;
    try {
      url = parseRepositoryRef(ref).url;
    } catch (error) {
      if (!(error instanceof UsageError)) throw error;
    }
    const byUrl = url === null ? null : this.state.findRepositoryByUrl(url);
    if (!byUrl) {
      throw new NotFoundError(`Unknown repository: ${ref}`);
    }
    return byUrl;
  }

  private requireTask(taskId: string): IndexingTask {
    const task = this.state.getTask(taskId);
    if (!task) throw new NotFoundError(`Task ${taskId} not found`);
    return task;
  }

  private assertReady(): void {
    if (!this.initialized) {
      throw new UsageError('IndexingEngine.init() must be called first');
    }
  }
}
