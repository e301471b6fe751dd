import { Router } from 'express';
import { z } from 'zod';
import type { ApiDependencies } from './types.js';
import { parseRequest } from '../middleware.js';
import { normalizeAddress } from '../../utils/address.js';
import { ValidationError } from '../../utils/errors.js';

const userSharesParamsSchema = z.object({
  user_address: z.string().regex(/^(0x)?[0-9a-fA-F]{1,64}$/, 'Invalid address'),
  chain_type: z.string().min(1),
});

/**
 * Ledger read routes
 */
export function createUsersRouter(deps: ApiDependencies): Router {
  const router = Router();

  /**
   * GET /users/:user_address/shares/:chain_type
   * Every subject the user holds an entry for, from the synced ledger
   */
  router.get('/users/:user_address/shares/:chain_type', (req, res, next) => {
    try {
      const params = parseRequest(userSharesParamsSchema, req.params);
      const family = deps.chains.get(params.chain_type);
      if (!family) {
        throw new ValidationError(`Unsupported chain type: ${params.chain_type}`, 'chain_type');
      }

      const userAddress = normalizeAddress(params.user_address, family);
      const holdings = deps.ledger.getHoldings(userAddress, params.chain_type);

      res.json({
        user_address: userAddress,
        chain_type: params.chain_type,
        shares: holdings.map((holding) => ({
          subject_address: holding.subject,
          shares_amount: holding.amount.toString(),
        })),
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
