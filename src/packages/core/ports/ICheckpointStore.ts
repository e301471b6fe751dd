/**
 * Checkpoint Store Interface
 *
 * @module packages/core/ports/ICheckpointStore
 */

import type { ChainType, Checkpoint } from '../../../types/index.js';

export interface ICheckpointStore {
  load(chain: ChainType): Checkpoint | null;

  /**
   * Persist a checkpoint. The stored position is never lowered: saving a
   * smaller position keeps the old one (the cursor token is still replaced).
   */
  save(chain: ChainType, checkpoint: Checkpoint): void;
}
