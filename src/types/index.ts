// =============================================================================
// Chain Types
// =============================================================================

/**
 * Partition key for everything chain-scoped: checkpoints, ledger entries,
 * identity mappings and communities. Configured per adapter ("monad", "sui").
 */
export type ChainType = string;

/**
 * The two shapes of event source the sync engine knows how to resume.
 */
export type ChainFamily = 'block-range' | 'cursor';

/**
 * Persisted resume point for one chain.
 *
 * `position` is the block number for block-range chains and a numeric
 * surrogate of the cursor for cursor chains. `cursorToken` is only set for
 * cursor chains and is the authoritative resume state there.
 */
export interface Checkpoint {
  position: bigint;
  cursorToken: string | null;
}

/**
 * A decoded Trade event, normalized across chains
 */
export interface TradeEvent {
  chain: ChainType;
  /** Unique within the chain: `<tx id>:<log index | event sequence>` */
  eventKey: string;
  trader: string;
  subject: string;
  isBuy: boolean;
  amount: bigint;
  source: {
    txId: string;
    sequence: string;
    blockNumber?: bigint;
  };
}

export type FetchResult =
  | { kind: 'caught-up'; head: string }
  | {
      kind: 'batch';
      events: TradeEvent[];
      /** Raw entries in the window that could not be decoded */
      skipped: number;
      next: Checkpoint;
      window: { from: string; to: string };
    };

// =============================================================================
// Identity Verification Types
// =============================================================================

export type VerificationErrorCode = 'MALFORMED_SIGNATURE' | 'RECOVERY_FAILED';

export interface VerificationError {
  code: VerificationErrorCode;
  message: string;
}

export type VerificationResult =
  | { ok: true; address: string }
  | { ok: false; error: VerificationError };

// =============================================================================
// Ledger Types
// =============================================================================

export interface LedgerTrade {
  trader: string;
  subject: string;
  chain: ChainType;
  amount: bigint;
  eventKey: string;
}

export interface ShareHolding {
  subject: string;
  amount: bigint;
}

export interface IdentityMapping {
  address: string;
  chain: ChainType;
  /** Chat-platform user id that signed the challenge */
  externalIdentity: string;
  gated: boolean;
}

export interface AccessTransition {
  kind: 'gate' | 'ungate';
  trader: string;
  subject: string;
  chain: ChainType;
  identity: string;
}

export type LedgerApplyResult =
  | { status: 'applied'; balance: bigint; transition: AccessTransition | null }
  | { status: 'duplicate' }
  | { status: 'missing-entry' };

// =============================================================================
// Access Types
// =============================================================================

export type PermissionLevel = 'full' | 'none';

export interface GateDecision {
  identity: string;
  chatId: string;
  permission: PermissionLevel;
  botToken: string;
}

/**
 * A registered Telegram group gated by holdings of one subject's shares
 */
export interface Community {
  agentName: string;
  bio: string | null;
  inviteUrl: string;
  botToken: string;
  chatGroupId: string;
  subjectAddress: string;
  chain: ChainType;
  createdAt: string;
}

export type NewCommunity = Omit<Community, 'createdAt'>;

export interface AccessCheckRequest {
  challenge: string;
  signature: string;
  user: string;
  chatId: string;
  chainType?: ChainType;
}

export type AccessCheckResult =
  | { success: true; granted: boolean }
  | { success: false; granted: false; error: string; code: string };
