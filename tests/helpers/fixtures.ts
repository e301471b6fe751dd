/**
 * Shared in-process stand-ins for tests
 */

import pino from 'pino';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../src/db/connection.js';
import { SqliteCheckpointStore } from '../../src/packages/adapters/storage/SqliteCheckpointStore.js';
import { SqliteCommunityRegistry } from '../../src/packages/adapters/storage/SqliteCommunityRegistry.js';
import { SqliteIdentityStore } from '../../src/packages/adapters/storage/SqliteIdentityStore.js';
import { SqliteLedgerStore } from '../../src/packages/adapters/storage/SqliteLedgerStore.js';
import type { IAccessNotifier } from '../../src/packages/core/ports/IAccessNotifier.js';
import type { IChainAdapter } from '../../src/packages/core/ports/IChainAdapter.js';
import { LedgerService } from '../../src/services/LedgerService.js';
import type {
  ChainFamily,
  Checkpoint,
  FetchResult,
  GateDecision,
  NewCommunity,
  TradeEvent,
  VerificationResult,
} from '../../src/types/index.js';

export const silentLogger = pino({ level: 'silent' });

export const TRADER = '0x00000000000000000000000000000000000000aa';
export const SUBJECT = '0x00000000000000000000000000000000000000bb';
export const OTHER_SUBJECT = '0x00000000000000000000000000000000000000cc';

/**
 * In-memory database with every store and the ledger service wired up
 */
export function createTestContext() {
  const db: Database.Database = openDatabase(':memory:');
  const ledgerStore = new SqliteLedgerStore(db);
  return {
    db,
    ledgerStore,
    checkpoints: new SqliteCheckpointStore(db),
    identities: new SqliteIdentityStore(db),
    communities: new SqliteCommunityRegistry(db),
    ledger: new LedgerService(ledgerStore, silentLogger),
  };
}

let eventCounter = 0;

export function tradeEvent(overrides: Partial<TradeEvent> = {}): TradeEvent {
  eventCounter++;
  return {
    chain: 'chainA',
    eventKey: `0xtx${eventCounter}:0`,
    trader: TRADER,
    subject: SUBJECT,
    isBuy: true,
    amount: 1n,
    source: { txId: `0xtx${eventCounter}`, sequence: '0' },
    ...overrides,
  };
}

export function community(overrides: Partial<NewCommunity> = {}): NewCommunity {
  return {
    agentName: 'test-agent',
    bio: 'A test community',
    inviteUrl: 'https://t.me/+test-invite',
    botToken: 'test-bot-token',
    chatGroupId: '-100123',
    subjectAddress: SUBJECT,
    chain: 'chainA',
    ...overrides,
  };
}

/**
 * Notifier that records every decision and optionally fails
 */
export class RecordingNotifier implements IAccessNotifier {
  readonly decisions: GateDecision[] = [];
  failure: Error | null = null;

  async setPermission(decision: GateDecision): Promise<void> {
    if (this.failure) throw this.failure;
    this.decisions.push(decision);
  }
}

type ScriptedFetch = FetchResult | Error;

/**
 * Chain adapter whose fetch results, signatures and balances are set by the test
 */
export class ScriptedChainAdapter implements IChainAdapter {
  family: ChainFamily = 'block-range';
  readonly fetches: Checkpoint[] = [];
  readonly balances = new Map<string, bigint>();
  signatures = new Map<string, VerificationResult>();
  balanceFailure: Error | null = null;

  private readonly script: ScriptedFetch[] = [];

  constructor(
    readonly name: string = 'chainA',
    private readonly initial: Checkpoint = { position: 0n, cursorToken: null }
  ) {}

  enqueue(...results: ScriptedFetch[]): this {
    this.script.push(...results);
    return this;
  }

  initialCheckpoint(): Checkpoint {
    return this.initial;
  }

  async checkConnectivity(): Promise<void> {}

  async fetchBatch(checkpoint: Checkpoint): Promise<FetchResult> {
    this.fetches.push(checkpoint);
    const next = this.script.shift();
    if (next === undefined) {
      return { kind: 'caught-up', head: checkpoint.position.toString() };
    }
    if (next instanceof Error) throw next;
    return next;
  }

  verifySignature(challenge: string, signature: string): VerificationResult {
    return (
      this.signatures.get(`${challenge}|${signature}`) ?? {
        ok: false,
        error: { code: 'RECOVERY_FAILED', message: 'Unknown signature' },
      }
    );
  }

  async getShareBalance(subject: string, user: string): Promise<bigint> {
    if (this.balanceFailure) throw this.balanceFailure;
    return this.balances.get(`${subject}|${user}`) ?? 0n;
  }
}

export function batch(
  events: TradeEvent[],
  from: bigint,
  to: bigint,
  skipped = 0
): FetchResult {
  return {
    kind: 'batch',
    events,
    skipped,
    next: { position: to, cursorToken: null },
    window: { from: from.toString(), to: to.toString() },
  };
}
