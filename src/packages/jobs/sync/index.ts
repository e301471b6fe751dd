export {
  SyncEngine,
  type SyncEngineConfig,
  type SyncStepOutcome,
  type SyncWorker,
  type TransitionHandler,
  type BatchCounts,
} from './SyncEngine.js';
export { SyncSupervisor, type SyncSupervisorConfig, type WorkerStatus } from './SyncSupervisor.js';
