/**
 * Chain Adapter Interface
 *
 * One implementation per chain family. The sync engine only talks to this
 * contract, so adding a chain means adding one adapter class.
 *
 * @module packages/core/ports/IChainAdapter
 */

import type {
  ChainFamily,
  ChainType,
  Checkpoint,
  FetchResult,
  VerificationResult,
} from '../../../types/index.js';

export interface IChainAdapter {
  /** Partition key for checkpoints, ledger rows and mappings */
  readonly name: ChainType;

  readonly family: ChainFamily;

  /** Resume point used when no checkpoint has been stored yet */
  initialCheckpoint(): Checkpoint;

  /**
   * Startup connectivity check. Rejects when the node cannot be reached.
   */
  checkConnectivity(): Promise<void>;

  /**
   * Fetch the next batch of Trade events after `checkpoint`.
   *
   * Resolves `caught-up` when there is nothing new. Rejects on transport
   * or node errors; the caller keeps its checkpoint and retries.
   */
  fetchBatch(checkpoint: Checkpoint, signal?: AbortSignal): Promise<FetchResult>;

  /**
   * Recover the address that signed `challenge`. Pure and synchronous.
   */
  verifySignature(challenge: string, signature: string): VerificationResult;

  /**
   * Live on-chain share balance of `user` for `subject`.
   *
   * @throws ChainQueryError when the read fails or the inputs are not addresses
   */
  getShareBalance(subject: string, user: string): Promise<bigint>;
}
