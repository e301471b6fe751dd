/**
 * Identity Store Interface
 *
 * @module packages/core/ports/IIdentityStore
 */

import type { ChainType, IdentityMapping } from '../../../types/index.js';

export interface IIdentityStore {
  /**
   * Create the mapping or replace its external identity. The gated flag of
   * an existing mapping is left untouched.
   */
  upsert(address: string, chain: ChainType, externalIdentity: string): IdentityMapping;

  find(address: string, chain: ChainType): IdentityMapping | null;
}
