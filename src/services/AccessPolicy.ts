/**
 * Access Policy
 *
 * Turns ledger transitions and signed verification requests into chat
 * permission changes.
 *
 * Two paths reach the notifier:
 * - Ledger-driven: a gate/ungate transition from the sync workers. Every
 *   community gated by the subject receives it. Notifier failures are
 *   logged and dropped.
 * - Request-driven: a member proves control of an address by signing a
 *   challenge; a positive live balance grants full permissions. Notifier
 *   failures surface to the caller.
 */

import type { Logger } from 'pino';
import type { IChainAdapter } from '../packages/core/ports/IChainAdapter.js';
import type { ICommunityRegistry } from '../packages/core/ports/ICommunityRegistry.js';
import type { IIdentityStore } from '../packages/core/ports/IIdentityStore.js';
import type { IAccessNotifier } from '../packages/core/ports/IAccessNotifier.js';
import type {
  AccessCheckRequest,
  AccessCheckResult,
  AccessTransition,
  ChainType,
  Community,
  GateDecision,
} from '../types/index.js';
import { normalizeAddress } from '../utils/address.js';
import {
  NotFoundError,
  NotifierError,
  ValidationError,
  errorMessage,
} from '../utils/errors.js';

export interface AccessPolicyDeps {
  adapters: ReadonlyMap<ChainType, IChainAdapter>;
  identities: IIdentityStore;
  communities: ICommunityRegistry;
  notifier: IAccessNotifier;
  defaultChain: ChainType;
  logger: Logger;
}

export class AccessPolicy {
  private readonly adapters: ReadonlyMap<ChainType, IChainAdapter>;
  private readonly identities: IIdentityStore;
  private readonly communities: ICommunityRegistry;
  private readonly notifier: IAccessNotifier;
  private readonly defaultChain: ChainType;
  private readonly log: Logger;

  constructor(deps: AccessPolicyDeps) {
    this.adapters = deps.adapters;
    this.identities = deps.identities;
    this.communities = deps.communities;
    this.notifier = deps.notifier;
    this.defaultChain = deps.defaultChain;
    this.log = deps.logger.child({ component: 'AccessPolicy' });
  }

  /**
   * Dispatch a ledger transition to every community gated by its subject.
   *
   * Returns the decisions that were attempted. Never throws.
   */
  async enforceTransition(transition: AccessTransition): Promise<GateDecision[]> {
    const communities = this.communities.findBySubject(transition.subject, transition.chain);
    if (communities.length === 0) {
      this.log.warn(
        { subject: transition.subject, chain: transition.chain, kind: transition.kind },
        'No community registered for subject; skipping access change'
      );
      return [];
    }

    const permission = transition.kind === 'gate' ? 'none' : 'full';
    const decisions = communities.map((community) =>
      this.decisionFor(community, transition.identity, permission)
    );

    for (const decision of decisions) {
      try {
        await this.notifier.setPermission(decision);
      } catch (error) {
        this.log.error(
          {
            chatId: decision.chatId,
            identity: decision.identity,
            permission: decision.permission,
            error: errorMessage(error),
          },
          'Failed to apply access change'
        );
      }
    }

    return decisions;
  }

  /**
   * Verify a signed challenge and grant access when the signer holds shares
   * of the community's subject.
   *
   * @throws ValidationError for an unknown chain
   * @throws NotFoundError when no community is registered for the chat
   * @throws NotifierError when granting access fails
   */
  async checkAccess(request: AccessCheckRequest): Promise<AccessCheckResult> {
    const chain = request.chainType ?? this.defaultChain;
    const adapter = this.adapters.get(chain);
    if (!adapter) {
      throw new ValidationError(`Unsupported chain type: ${chain}`, 'chain_type');
    }

    const community = this.communities.findByChat(request.chatId, chain);
    if (!community) {
      throw new NotFoundError('Community', `chat ${request.chatId} on ${chain}`);
    }

    const verification = adapter.verifySignature(request.challenge, request.signature);
    if (!verification.ok) {
      this.log.info(
        { chain, chatId: request.chatId, code: verification.error.code },
        'Signature verification failed'
      );
      return {
        success: false,
        granted: false,
        error: verification.error.message,
        code: verification.error.code,
      };
    }

    const address = normalizeAddress(verification.address, adapter.family);
    if (address !== normalizeAddress(request.user, adapter.family)) {
      this.log.info({ chain, chatId: request.chatId }, 'Recovered address does not match claimed user');
      return {
        success: false,
        granted: false,
        error: 'Recovered address does not match claimed user',
        code: 'ADDRESS_MISMATCH',
      };
    }

    this.identities.upsert(address, chain, request.challenge);

    let balance = 0n;
    try {
      balance = await adapter.getShareBalance(community.subjectAddress, address);
    } catch (error) {
      this.log.warn(
        { chain, address, subject: community.subjectAddress, error: errorMessage(error) },
        'Balance query failed; treating as no holdings'
      );
    }

    if (balance <= 0n) {
      this.log.info({ chain, address, subject: community.subjectAddress }, 'No shares held; access not granted');
      return { success: true, granted: false };
    }

    const decision = this.decisionFor(community, request.challenge, 'full');
    try {
      await this.notifier.setPermission(decision);
    } catch (error) {
      if (error instanceof NotifierError) throw error;
      throw new NotifierError(errorMessage(error));
    }

    this.log.info(
      { chain, address, subject: community.subjectAddress, balance: balance.toString() },
      'Access granted'
    );
    return { success: true, granted: true };
  }

  private decisionFor(
    community: Community,
    identity: string,
    permission: GateDecision['permission']
  ): GateDecision {
    return {
      identity,
      chatId: community.chatGroupId,
      permission,
      botToken: community.botToken,
    };
  }
}
