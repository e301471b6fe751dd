/**
 * Community (agent bot) registration and listing routes
 */

import { Router } from 'express';
import { z } from 'zod';
import type { ApiDependencies } from './types.js';
import type { Community } from '../../types/index.js';
import { parseRequest } from '../middleware.js';
import { normalizeAddress } from '../../utils/address.js';
import { ValidationError } from '../../utils/errors.js';

const addBotSchema = z.object({
  bot_token: z.string().min(1),
  chat_group_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  subject_address: z.string().regex(/^(0x)?[0-9a-fA-F]{1,64}$/, 'Invalid subject address'),
  agent_name: z.string().min(1).max(100),
  invite_url: z.string().url(),
  bio: z.string().max(2000).nullish(),
  chain_type: z.string().min(1).optional(),
});

/**
 * Integer query parameter; anything that is not an integer reads as `fallback`
 */
const integerParam = (fallback: number) =>
  z
    .string()
    .regex(/^[+-]?\d+$/)
    .transform(Number)
    .catch(fallback);

const paginationSchema = z.object({
  page: integerParam(1),
  page_size: integerParam(10),
});

function toAgentSummary(community: Community) {
  return {
    agent_name: community.agentName,
    subject_address: community.subjectAddress,
    created_at: community.createdAt,
  };
}

export function createAgentsRouter(deps: ApiDependencies): Router {
  const router = Router();

  /**
   * POST /add_tg_bot
   * Register a Telegram group gated by a subject's shares
   */
  router.post('/add_tg_bot', (req, res, next) => {
    try {
      const body = parseRequest(addBotSchema, req.body);
      const chain = body.chain_type ?? deps.defaultChain;
      const family = deps.chains.get(chain);
      if (!family) {
        throw new ValidationError(`Unsupported chain type: ${chain}`, 'chain_type');
      }

      deps.communities.register({
        agentName: body.agent_name,
        bio: body.bio ?? null,
        inviteUrl: body.invite_url,
        botToken: body.bot_token,
        chatGroupId: body.chat_group_id,
        subjectAddress: normalizeAddress(body.subject_address, family),
        chain,
      });

      res.json({ success: true });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /agents?page=1&page_size=10
   */
  router.get('/agents', (req, res, next) => {
    try {
      const { page, page_size } = paginationSchema.parse(req.query);
      if (page < 1 || page_size < 1) {
        throw new ValidationError('Invalid pagination parameters');
      }

      const result = deps.communities.list({ page, pageSize: page_size });

      res.json({
        agents: result.items.map(toAgentSummary),
        total: result.total,
        page,
        page_size,
      });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /agents/:agent_name
   */
  router.get('/agents/:agent_name', (req, res) => {
    const community = deps.communities.findByName(req.params.agent_name);
    res.json({ agent: community ? toAgentSummary(community) : null, success: true });
  });

  /**
   * GET /agent/detail/:agent_name
   */
  router.get('/agent/detail/:agent_name', (req, res) => {
    const community = deps.communities.findByName(req.params.agent_name);
    if (!community) {
      res.status(404).json({ success: false, error: 'Agent not found' });
      return;
    }

    res.json({
      agent_name: community.agentName,
      subject_address: community.subjectAddress,
      invite_url: community.inviteUrl,
      bio: community.bio,
      success: true,
    });
  });

  return router;
}
