/**
 * SyncSupervisor - Owns the per-chain sync workers
 *
 * Each worker gets its own AbortController linked to the supervisor's.
 * A worker that throws, or returns without being cancelled, is logged and
 * restarted after a delay; other workers keep running.
 *
 * @module packages/jobs/sync/SyncSupervisor
 */

import type { Logger } from 'pino';
import type { ChainType } from '../../../types/index.js';
import { errorMessage } from '../../../utils/errors.js';
import { sleep } from '../../../utils/sleep.js';
import type { SyncWorker } from './SyncEngine.js';

export interface SyncSupervisorConfig {
  /** Delay before restarting a crashed worker (default: 10s) */
  restartDelayMs?: number;
}

export interface WorkerStatus {
  name: ChainType;
  running: boolean;
  restarts: number;
  lastError: string | null;
}

interface ManagedWorker {
  status: WorkerStatus;
  done: Promise<void>;
}

const DEFAULT_RESTART_DELAY_MS = 10_000;

export class SyncSupervisor {
  private readonly controller = new AbortController();
  private readonly workers: ManagedWorker[] = [];
  private readonly restartDelayMs: number;
  private readonly log: Logger;

  constructor(logger: Logger, config: SyncSupervisorConfig = {}) {
    this.restartDelayMs = config.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
    this.log = logger.child({ component: 'SyncSupervisor' });
  }

  /**
   * Start supervising `worker`. Has no effect once `stop()` was called.
   */
  start(worker: SyncWorker): void {
    if (this.controller.signal.aborted) {
      this.log.warn({ worker: worker.name }, 'Supervisor stopped; not starting worker');
      return;
    }

    const controller = new AbortController();
    this.controller.signal.addEventListener('abort', () => controller.abort(), { once: true });

    const status: WorkerStatus = { name: worker.name, running: true, restarts: 0, lastError: null };
    const done = this.supervise(worker, controller.signal, status);
    this.workers.push({ status, done });

    this.log.info({ worker: worker.name }, 'Worker started');
  }

  getStatus(): WorkerStatus[] {
    return this.workers.map((managed) => ({ ...managed.status }));
  }

  /**
   * Cancel every worker and wait for all of them to finish
   */
  async stop(): Promise<void> {
    this.controller.abort();
    await Promise.all(this.workers.map((managed) => managed.done));
    this.log.info({ workers: this.workers.length }, 'All workers stopped');
  }

  private async supervise(
    worker: SyncWorker,
    signal: AbortSignal,
    status: WorkerStatus
  ): Promise<void> {
    while (!signal.aborted) {
      try {
        await worker.run(signal);
        if (!signal.aborted) {
          status.lastError = 'worker exited';
          this.log.error({ worker: worker.name }, 'Worker exited unexpectedly');
        }
      } catch (error) {
        status.lastError = errorMessage(error);
        this.log.error({ worker: worker.name, error: errorMessage(error) }, 'Worker crashed');
      }

      if (signal.aborted) break;

      status.restarts++;
      this.log.info(
        { worker: worker.name, restarts: status.restarts, delayMs: this.restartDelayMs },
        'Restarting worker'
      );
      await sleep(this.restartDelayMs, signal);
    }

    status.running = false;
  }
}
