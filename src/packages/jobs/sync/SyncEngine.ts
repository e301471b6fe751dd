/**
 * SyncEngine - Per-Chain Trade Event Sync Loop
 *
 * Drives one chain adapter: fetch the batch after the checkpoint, fold
 * every event into the ledger, hand resulting transitions to the access
 * policy, then persist the new checkpoint.
 *
 * The checkpoint is written only after the whole batch has been applied.
 * If that write fails the in-memory checkpoint stays put and the same
 * window is fetched again; already-applied events come back as duplicates.
 *
 * @module packages/jobs/sync/SyncEngine
 */

import type { Logger } from 'pino';
import type { IChainAdapter } from '../../core/ports/IChainAdapter.js';
import type { ICheckpointStore } from '../../core/ports/ICheckpointStore.js';
import type { LedgerService } from '../../../services/LedgerService.js';
import type { AccessTransition, ChainType, Checkpoint, FetchResult } from '../../../types/index.js';
import { errorMessage } from '../../../utils/errors.js';
import { sleep } from '../../../utils/sleep.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Configuration for the sync loop
 */
export interface SyncEngineConfig {
  /** Sleep when the adapter is caught up (default: 60s) */
  idleIntervalMs?: number;
  /** Sleep after a failed fetch (default: 10s) */
  retryIntervalMs?: number;
  /** Sleep between consecutive batches (default: 1s) */
  pacingIntervalMs?: number;
}

/**
 * Receives ledger transitions; implemented by AccessPolicy
 */
export interface TransitionHandler {
  enforceTransition(transition: AccessTransition): Promise<unknown>;
}

export interface BatchCounts {
  applied: number;
  duplicates: number;
  missing: number;
  failed: number;
  skipped: number;
  transitions: number;
}

export type SyncStepOutcome =
  | { kind: 'initialization-failed'; error: string }
  | { kind: 'caught-up'; head: string }
  | { kind: 'fetch-failed'; error: string }
  | { kind: 'advanced'; checkpoint: Checkpoint; counts: BatchCounts }
  | { kind: 'checkpoint-failed'; error: string; counts: BatchCounts };

/**
 * A long-running unit the supervisor can start and cancel
 */
export interface SyncWorker {
  readonly name: ChainType;
  run(signal: AbortSignal): Promise<void>;
}

const DEFAULT_CONFIG: Required<SyncEngineConfig> = {
  idleIntervalMs: 60_000,
  retryIntervalMs: 10_000,
  pacingIntervalMs: 1_000,
};

// =============================================================================
// Implementation
// =============================================================================

export class SyncEngine implements SyncWorker {
  readonly name: ChainType;

  private readonly config: Required<SyncEngineConfig>;
  private readonly log: Logger;
  private checkpoint: Checkpoint | null = null;

  constructor(
    private readonly adapter: IChainAdapter,
    private readonly deps: {
      checkpoints: ICheckpointStore;
      ledger: LedgerService;
      transitions: TransitionHandler;
      logger: Logger;
    },
    config: SyncEngineConfig = {}
  ) {
    this.name = adapter.name;
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.log = deps.logger.child({ component: 'SyncEngine', chain: adapter.name });
  }

  /**
   * Run until `signal` aborts
   */
  async run(signal: AbortSignal): Promise<void> {
    this.log.info('Sync loop started');

    while (!signal.aborted) {
      const outcome = await this.step(signal);
      await sleep(this.delayAfter(outcome), signal);
    }

    this.log.info('Sync loop stopped');
  }

  /**
   * One iteration: fetch, apply, persist
   */
  async step(signal?: AbortSignal): Promise<SyncStepOutcome> {
    let checkpoint: Checkpoint;
    try {
      checkpoint = this.loadCheckpoint();
    } catch (error) {
      this.log.error({ error: errorMessage(error) }, 'Failed to load checkpoint');
      return { kind: 'initialization-failed', error: errorMessage(error) };
    }

    let batch: FetchResult;
    try {
      batch = await this.adapter.fetchBatch(checkpoint, signal);
    } catch (error) {
      this.log.warn(
        { position: checkpoint.position.toString(), error: errorMessage(error) },
        'Failed to fetch events'
      );
      return { kind: 'fetch-failed', error: errorMessage(error) };
    }

    if (batch.kind === 'caught-up') {
      this.log.debug({ head: batch.head }, 'Caught up; waiting for new events');
      return { kind: 'caught-up', head: batch.head };
    }

    const counts: BatchCounts = {
      applied: 0,
      duplicates: 0,
      missing: 0,
      failed: 0,
      skipped: batch.skipped,
      transitions: 0,
    };

    for (const event of batch.events) {
      try {
        const result = this.deps.ledger.apply(event);
        if (result.status === 'duplicate') {
          counts.duplicates++;
          continue;
        }
        if (result.status === 'missing-entry') {
          counts.missing++;
          continue;
        }

        counts.applied++;
        if (result.transition) {
          counts.transitions++;
          await this.deps.transitions.enforceTransition(result.transition);
        }
      } catch (error) {
        counts.failed++;
        this.log.error(
          { eventKey: event.eventKey, error: errorMessage(error) },
          'Failed to process Trade event; skipping'
        );
      }
    }

    try {
      this.deps.checkpoints.save(this.adapter.name, batch.next);
    } catch (error) {
      this.log.error(
        { window: batch.window, error: errorMessage(error) },
        'Failed to persist checkpoint; window will be fetched again'
      );
      return { kind: 'checkpoint-failed', error: errorMessage(error), counts };
    }

    this.checkpoint = batch.next;
    this.log.info({ window: batch.window, ...counts }, 'Batch synced');

    return { kind: 'advanced', checkpoint: batch.next, counts };
  }

  private loadCheckpoint(): Checkpoint {
    if (this.checkpoint) return this.checkpoint;

    const stored = this.deps.checkpoints.load(this.adapter.name);
    if (stored) {
      this.checkpoint = stored;
      this.log.info(
        { position: stored.position.toString(), cursor: stored.cursorToken },
        'Resuming from stored checkpoint'
      );
      return stored;
    }

    const initial = this.adapter.initialCheckpoint();
    this.deps.checkpoints.save(this.adapter.name, initial);
    this.checkpoint = initial;
    this.log.info(
      { position: initial.position.toString(), cursor: initial.cursorToken },
      'Starting from initial checkpoint'
    );
    return initial;
  }

  private delayAfter(outcome: SyncStepOutcome): number {
    switch (outcome.kind) {
      case 'caught-up':
        return this.config.idleIntervalMs;
      case 'fetch-failed':
      case 'initialization-failed':
        return this.config.retryIntervalMs;
      case 'advanced':
      case 'checkpoint-failed':
        return this.config.pacingIntervalMs;
    }
  }
}
