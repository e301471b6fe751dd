/**
 * Signature verification route
 *
 * A chat member signs their Telegram user id with the wallet that holds
 * shares; a verified holder is unmuted in the community's group.
 */

import { Router } from 'express';
import { z } from 'zod';
import type { ApiDependencies } from './types.js';
import { parseRequest } from '../middleware.js';

const verifySignatureSchema = z.object({
  /** Telegram user id, the message that was signed */
  challenge: z.string().min(1),
  chat_id: z.union([z.string().min(1), z.number().int()]).transform(String),
  signature: z.string().min(1),
  user: z.string().min(1),
  chain_type: z.string().min(1).optional(),
});

export function createVerifyRouter(deps: ApiDependencies): Router {
  const router = Router();

  router.post('/verify-signature', async (req, res, next) => {
    try {
      const body = parseRequest(verifySignatureSchema, req.body);
      const result = await deps.accessPolicy.checkAccess({
        challenge: body.challenge,
        signature: body.signature,
        user: body.user,
        chatId: body.chat_id,
        chainType: body.chain_type,
      });

      if (!result.success) {
        res.status(401).json({ success: false, error: result.error, code: result.code });
        return;
      }

      res.json({ success: true, granted: result.granted });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
