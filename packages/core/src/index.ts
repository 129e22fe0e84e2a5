export * from './config/loader';
export * from './engine';
export * from './pipeline/state-machine';
export * from './pipeline/progress';
export { RepositoryAcquirer } from './pipeline/acquirer';
export type { AcquireOptions, AcquiredRepository } from './pipeline/acquirer';
export { ParseStage } from './pipeline/parse-stage';
export type { ParsedFile, ParseStageResult } from './pipeline/parse-stage';
export { EmbeddingCommitter } from './pipeline/committer';
export type { CommitInput, CommitResult } from './pipeline/committer';
export { ArtifactGenerator } from './pipeline/artifacts';
export type { ArtifactMode } from './pipeline/artifacts';
export { PipelineOrchestrator, idleStatus } from './pipeline/orchestrator';
export type { PipelineDeps, RunOptions, Sleep } from './pipeline/orchestrator';
export { RepairService } from './pipeline/repair';
export type { RepairMode, RepairReport } from './pipeline/repair';
