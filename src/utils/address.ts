import { normalizeSuiAddress } from '@mysten/sui/utils';
import type { ChainFamily } from '../types/index.js';

/**
 * Canonical form for addresses used as ledger and mapping keys: lower-case
 * with a 0x prefix. Cursor-chain (Sui) addresses are also zero-padded to
 * 32 bytes, so `0x2` and its long form are the same key.
 */
export function normalizeAddress(address: string, family: ChainFamily = 'block-range'): string {
  const lower = address.trim().toLowerCase();
  if (family === 'cursor') {
    return normalizeSuiAddress(lower);
  }
  return lower.startsWith('0x') ? lower : `0x${lower}`;
}
