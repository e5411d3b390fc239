export {
  DEFAULT_MAX_CONCURRENT_RECONCILES,
  IssueRequestController,
  type IssueRequestControllerOptions,
  type KeySource,
  type KeySourceFactory,
  type Reconciler,
} from './controller.js';
export { DEFAULT_FINALIZER_ATTEMPTS, FinalizationGuard, type FinalizationGuardOptions } from './finalizer.js';
export {
  DEFAULT_CONFLICT_RETRY_DELAY_MS,
  DEFAULT_TOKEN_POLL_INTERVAL_MS,
  ReconcileLoop,
  type ReconcileLoopDependencies,
  type ReconcileLoopOptions,
} from './reconciler.js';
export { SecretProvisioner, type TokenLookup } from './secret-provisioner.js';
export {
  findCondition,
  HAS_PULL_REQUEST_CONDITION,
  ISSUE_OPEN_CONDITION,
  setCondition,
  StatusProjector,
} from './status-projector.js';
export {
  IssueRequestWatcher,
  type IssueRequestWatcherOptions,
  issueRequestWatchPath,
  type WatchFactory,
} from './watcher.js';
export {
  DEFAULT_BACKOFF_BASE_DELAY_MS,
  DEFAULT_BACKOFF_MAX_DELAY_MS,
  WorkQueue,
  type WorkQueueOptions,
} from './work-queue.js';
