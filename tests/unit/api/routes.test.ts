import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import request from 'supertest';
import type { Application } from 'express';
import { createApp } from '../../../src/api/server.js';
import type { AccessCheckRequest, AccessCheckResult } from '../../../src/types/index.js';
import { NotFoundError, NotifierError } from '../../../src/utils/errors.js';
import {
  community,
  createTestContext,
  silentLogger,
  SUBJECT,
  TRADER,
  tradeEvent,
} from '../../helpers/fixtures.js';

describe('HTTP API', () => {
  let ctx: ReturnType<typeof createTestContext>;
  let checkAccess: Mock<(request: AccessCheckRequest) => Promise<AccessCheckResult>>;
  let app: Application;

  beforeEach(() => {
    ctx = createTestContext();
    checkAccess = vi.fn<(request: AccessCheckRequest) => Promise<AccessCheckResult>>();
    app = createApp({
      accessPolicy: { checkAccess },
      ledger: ctx.ledger,
      communities: ctx.communities,
      chains: new Map([
        ['chainA', 'block-range'],
        ['chainB', 'cursor'],
      ]),
      defaultChain: 'chainA',
      workers: () => [{ name: 'chainA', running: true, restarts: 0, lastError: null }],
      logger: silentLogger,
    });
  });

  describe('GET /health', () => {
    it('reports worker status', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        status: 'ok',
        workers: [{ name: 'chainA', running: true, restarts: 0, lastError: null }],
      });
    });
  });

  describe('POST /verify-signature', () => {
    const body = {
      challenge: '7001',
      chat_id: '-100123',
      signature: '0xsigned',
      user: TRADER,
    };

    it('returns the grant decision', async () => {
      checkAccess.mockResolvedValue({ success: true, granted: true });

      const response = await request(app).post('/verify-signature').send(body);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, granted: true });
      expect(checkAccess).toHaveBeenCalledWith({
        challenge: '7001',
        signature: '0xsigned',
        user: TRADER,
        chatId: '-100123',
        chainType: undefined,
      });
    });

    it('accepts a numeric chat id and an explicit chain', async () => {
      checkAccess.mockResolvedValue({ success: true, granted: false });

      const response = await request(app)
        .post('/verify-signature')
        .send({ ...body, chat_id: -100123, chain_type: 'chainB' });

      expect(response.body).toEqual({ success: true, granted: false });
      expect(checkAccess).toHaveBeenCalledWith(
        expect.objectContaining({ chatId: '-100123', chainType: 'chainB' })
      );
    });

    it('answers 401 when the signature is rejected', async () => {
      checkAccess.mockResolvedValue({
        success: false,
        granted: false,
        error: 'Recovered address does not match claimed user',
        code: 'ADDRESS_MISMATCH',
      });

      const response = await request(app).post('/verify-signature').send(body);

      expect(response.status).toBe(401);
      expect(response.body).toEqual({
        success: false,
        error: 'Recovered address does not match claimed user',
        code: 'ADDRESS_MISMATCH',
      });
    });

    it('validates the body', async () => {
      const response = await request(app)
        .post('/verify-signature')
        .send({ challenge: '7001', chat_id: '-100123', user: TRADER });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error: 'signature: Required',
        code: 'VALIDATION_ERROR',
      });
      expect(checkAccess).not.toHaveBeenCalled();
    });

    it('rejects malformed JSON', async () => {
      const response = await request(app)
        .post('/verify-signature')
        .set('Content-Type', 'application/json')
        .send('{"challenge":');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error: 'Malformed JSON body',
        code: 'VALIDATION_ERROR',
      });
    });

    it('answers 404 for an unknown community', async () => {
      checkAccess.mockRejectedValue(new NotFoundError('Community', 'chat -100999 on chainA'));

      const response = await request(app).post('/verify-signature').send(body);

      expect(response.status).toBe(404);
      expect(response.body.code).toBe('NOT_FOUND');
    });

    it('answers 502 when the chat platform call fails', async () => {
      checkAccess.mockRejectedValue(new NotifierError('restrictChatMember failed: timeout'));

      const response = await request(app).post('/verify-signature').send(body);

      expect(response.status).toBe(502);
      expect(response.body).toEqual({
        success: false,
        error: 'restrictChatMember failed: timeout',
        code: 'NOTIFIER_ERROR',
      });
    });

    it('hides unexpected failures', async () => {
      checkAccess.mockRejectedValue(new Error('sqlite is on fire'));

      const response = await request(app).post('/verify-signature').send(body);

      expect(response.status).toBe(500);
      expect(response.body).toEqual({
        success: false,
        error: 'Internal server error',
        code: 'INTERNAL_ERROR',
      });
    });
  });

  describe('GET /users/:user_address/shares/:chain_type', () => {
    it('lists synced holdings with decimal string amounts', async () => {
      ctx.ledger.apply(tradeEvent({ amount: 15n }));
      ctx.ledger.apply(tradeEvent({ amount: 2n, chain: 'chainB' }));

      const response = await request(app).get(
        '/users/0x00000000000000000000000000000000000000AA/shares/chainA'
      );

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        user_address: TRADER,
        chain_type: 'chainA',
        shares: [{ subject_address: SUBJECT, shares_amount: '15' }],
      });
    });

    it('returns an empty list for an unknown user', async () => {
      const response = await request(app).get(`/users/${SUBJECT}/shares/chainA`);

      expect(response.body.shares).toEqual([]);
    });

    it('rejects an unsupported chain', async () => {
      const response = await request(app).get(`/users/${TRADER}/shares/solana`);

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Unsupported chain type: solana');
    });

    it('rejects a malformed address', async () => {
      const response = await request(app).get('/users/not-an-address/shares/chainA');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('user_address: Invalid address');
    });
  });

  describe('POST /add_tg_bot', () => {
    const body = {
      bot_token: 'test-bot-token',
      chat_group_id: '-100123',
      subject_address: '0x00000000000000000000000000000000000000BB',
      agent_name: 'test-agent',
      invite_url: 'https://t.me/+test-invite',
      bio: 'A test community',
    };

    it('registers a community on the default chain', async () => {
      const response = await request(app).post('/add_tg_bot').send(body);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true });
      expect(ctx.communities.findByName('test-agent')).toMatchObject({
        subjectAddress: SUBJECT,
        chain: 'chainA',
        botToken: 'test-bot-token',
        chatGroupId: '-100123',
      });
    });

    it('stores cursor-chain subjects in their padded form', async () => {
      const response = await request(app)
        .post('/add_tg_bot')
        .send({ ...body, subject_address: '0x2', chain_type: 'chainB' });

      expect(response.status).toBe(200);
      expect(ctx.communities.findByName('test-agent')?.subjectAddress).toBe(`0x${'0'.repeat(63)}2`);
    });

    it('rejects a duplicate agent name', async () => {
      await request(app).post('/add_tg_bot').send(body);
      const response = await request(app).post('/add_tg_bot').send(body);

      expect(response.status).toBe(409);
      expect(response.body).toEqual({
        success: false,
        error: 'Agent already registered: test-agent',
        code: 'CONFLICT',
      });
    });

    it('rejects an unsupported chain', async () => {
      const response = await request(app).post('/add_tg_bot').send({ ...body, chain_type: 'solana' });

      expect(response.status).toBe(400);
      expect(ctx.communities.findByName('test-agent')).toBeNull();
    });

    it('requires a valid invite url', async () => {
      const response = await request(app).post('/add_tg_bot').send({ ...body, invite_url: 'nope' });

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('invite_url: Invalid url');
    });
  });

  describe('GET /agents', () => {
    beforeEach(() => {
      for (const name of ['first', 'second', 'third']) {
        ctx.communities.register(community({ agentName: name }));
      }
    });

    it('pages newest first with default page size', async () => {
      const response = await request(app).get('/agents');

      expect(response.status).toBe(200);
      expect(response.body.total).toBe(3);
      expect(response.body.page).toBe(1);
      expect(response.body.page_size).toBe(10);
      expect(response.body.agents.map((agent: { agent_name: string }) => agent.agent_name)).toEqual([
        'third',
        'second',
        'first',
      ]);
    });

    it('honours page and page_size', async () => {
      const response = await request(app).get('/agents?page=2&page_size=2');

      expect(response.body.agents).toEqual([
        {
          agent_name: 'first',
          subject_address: SUBJECT,
          created_at: ctx.communities.findByName('first')?.createdAt,
        },
      ]);
    });

    it('falls back to the defaults for values that are not integers', async () => {
      const response = await request(app).get('/agents?page=abc&page_size=1.5');

      expect(response.status).toBe(200);
      expect(response.body.page).toBe(1);
      expect(response.body.page_size).toBe(10);
      expect(response.body.agents).toHaveLength(3);
    });

    it.each(['page=0', 'page_size=0', 'page=-2'])('rejects %s', async (query) => {
      const response = await request(app).get(`/agents?${query}`);

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Invalid pagination parameters');
    });
  });

  describe('agent lookups', () => {
    beforeEach(() => {
      ctx.communities.register(community());
    });

    it('returns an agent summary by name', async () => {
      const response = await request(app).get('/agents/test-agent');

      expect(response.body).toEqual({
        agent: {
          agent_name: 'test-agent',
          subject_address: SUBJECT,
          created_at: ctx.communities.findByName('test-agent')?.createdAt,
        },
        success: true,
      });
    });

    it('returns a null agent for an unknown name', async () => {
      const response = await request(app).get('/agents/nobody');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ agent: null, success: true });
    });

    it('returns agent detail without the bot token', async () => {
      const response = await request(app).get('/agent/detail/test-agent');

      expect(response.body).toEqual({
        agent_name: 'test-agent',
        subject_address: SUBJECT,
        invite_url: 'https://t.me/+test-invite',
        bio: 'A test community',
        success: true,
      });
    });

    it('answers 404 for unknown agent detail', async () => {
      const response = await request(app).get('/agent/detail/nobody');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ success: false, error: 'Agent not found' });
    });
  });

  it('answers 404 for unknown routes with a request id', async () => {
    const response = await request(app).get('/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ success: false, error: 'Not found' });
    expect(response.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
  });
});
