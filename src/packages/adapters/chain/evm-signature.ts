import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToHex, hashMessage, hexToBytes, isHex } from 'viem';
import { publicKeyToAddress } from 'viem/accounts';
import type { VerificationResult } from '../../../types/index.js';
import { errorMessage } from '../../../utils/errors.js';

const SIGNATURE_LENGTH = 65;

/**
 * Recover the address that produced an EIP-191 `personal_sign` signature
 * over `challenge`.
 *
 * Accepts `r || s || v` as hex with or without a 0x prefix. `v` may be
 * 0/1 or 27/28.
 */
export function verifyPersonalSignature(challenge: string, signature: string): VerificationResult {
  const hex = signature.trim().startsWith('0x') ? signature.trim() : `0x${signature.trim()}`;
  if (!isHex(hex, { strict: true }) || hex.length % 2 !== 0) {
    return malformed('Invalid signature hex');
  }

  const bytes = hexToBytes(hex);
  if (bytes.length !== SIGNATURE_LENGTH) {
    return malformed('Signature must be 65 bytes');
  }

  const v = bytes[64] ?? 0;
  const recoveryBit = v >= 27 ? v - 27 : v;
  if (recoveryBit !== 0 && recoveryBit !== 1) {
    return malformed(`Invalid recovery byte: ${v}`);
  }

  try {
    const digest = hexToBytes(hashMessage(challenge));
    const publicKey = secp256k1.Signature.fromCompact(bytes.slice(0, 64))
      .addRecoveryBit(recoveryBit)
      .recoverPublicKey(digest)
      .toRawBytes(false);

    return { ok: true, address: publicKeyToAddress(bytesToHex(publicKey)).toLowerCase() };
  } catch (error) {
    return {
      ok: false,
      error: { code: 'RECOVERY_FAILED', message: `Recovery failed: ${errorMessage(error)}` },
    };
  }
}

function malformed(message: string): VerificationResult {
  return { ok: false, error: { code: 'MALFORMED_SIGNATURE', message } };
}
