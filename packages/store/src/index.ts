export { IndexStateStore } from './state/store';
export type { CheckpointInput, NewRepository, RepositoryPatch, TaskPatch } from './state/store';
export { TERMINAL_STATUSES } from './state/schema';
export * from './vector';
