/**
 * Community Registry Interface
 *
 * A community is a Telegram group, the bot that administers it and the
 * shares subject whose holders may speak there.
 *
 * @module packages/core/ports/ICommunityRegistry
 */

import type { ChainType, Community, NewCommunity } from '../../../types/index.js';

/**
 * Result of a paginated query
 */
export interface PaginatedResult<T> {
  /** Items for the current page */
  items: T[];
  /** Total count of items */
  total: number;
}

export interface ICommunityRegistry {
  /**
   * @throws ConflictError when the agent name is already registered
   */
  register(community: NewCommunity): Community;

  /** Newest first; `page` is 1-based */
  list(options: { page: number; pageSize: number }): PaginatedResult<Community>;

  findByName(agentName: string): Community | null;

  findByChat(chatGroupId: string, chain: ChainType): Community | null;

  findBySubject(subject: string, chain: ChainType): Community[];
}
