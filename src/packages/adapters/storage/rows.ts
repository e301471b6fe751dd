import type { Community, IdentityMapping } from '../../../types/index.js';

/**
 * Raw row shapes and their domain mappings
 */

export interface MappingRow {
  address: string;
  chain_type: string;
  external_identity: string;
  gated: number;
}

export interface CommunityRow {
  agent_name: string;
  bio: string | null;
  invite_url: string;
  bot_token: string;
  chat_group_id: string;
  subject_address: string;
  chain_type: string;
  created_at: string;
}

export function toIdentityMapping(row: MappingRow): IdentityMapping {
  return {
    address: row.address,
    chain: row.chain_type,
    externalIdentity: row.external_identity,
    gated: row.gated === 1,
  };
}

export function toCommunity(row: CommunityRow): Community {
  return {
    agentName: row.agent_name,
    bio: row.bio,
    inviteUrl: row.invite_url,
    botToken: row.bot_token,
    chatGroupId: row.chat_group_id,
    subjectAddress: row.subject_address,
    chain: row.chain_type,
    createdAt: row.created_at,
  };
}
