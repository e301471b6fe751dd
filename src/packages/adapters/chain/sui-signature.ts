import { ed25519 } from '@noble/curves/ed25519';
import { blake2b } from '@noble/hashes/blake2b';
import { bcs } from '@mysten/sui/bcs';
import { messageWithIntent } from '@mysten/sui/cryptography';
import { Ed25519PublicKey } from '@mysten/sui/keypairs/ed25519';
import { fromBase64 } from '@mysten/sui/utils';
import type { VerificationResult } from '../../../types/index.js';
import { errorMessage } from '../../../utils/errors.js';

const ED25519_FLAG = 0x00;
const ED25519_SIGNATURE_LENGTH = 64;
const ED25519_PUBLIC_KEY_LENGTH = 32;
const SERIALIZED_LENGTH = 1 + ED25519_SIGNATURE_LENGTH + ED25519_PUBLIC_KEY_LENGTH;

const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

/**
 * Verify a Sui wallet `signPersonalMessage` signature over `challenge` and
 * return the signer's address.
 *
 * The signature is the base64 serialized form `flag || sig || pubkey`.
 * Only Ed25519 signatures are accepted.
 */
export function verifySuiPersonalMessage(challenge: string, signature: string): VerificationResult {
  const encoded = signature.trim();
  if (!BASE64_PATTERN.test(encoded) || encoded.length % 4 !== 0) {
    return malformed('Cannot decode signature');
  }

  const bytes = fromBase64(encoded);
  if (bytes[0] !== ED25519_FLAG) {
    return malformed(`Unsupported signature scheme flag: ${bytes[0] ?? 'none'}`);
  }
  if (bytes.length !== SERIALIZED_LENGTH) {
    return malformed(`Ed25519 signature must be ${SERIALIZED_LENGTH} bytes`);
  }

  const rawSignature = bytes.slice(1, 1 + ED25519_SIGNATURE_LENGTH);
  const publicKey = bytes.slice(1 + ED25519_SIGNATURE_LENGTH);

  const message = bcs.vector(bcs.u8()).serialize(new TextEncoder().encode(challenge)).toBytes();
  const digest = blake2b(messageWithIntent('PersonalMessage', message), { dkLen: 32 });

  let valid: boolean;
  try {
    valid = ed25519.verify(rawSignature, digest, publicKey);
  } catch (error) {
    return recoveryFailed(`Signature verification failed: ${errorMessage(error)}`);
  }
  if (!valid) {
    return recoveryFailed('Signature verification failed');
  }

  return { ok: true, address: new Ed25519PublicKey(publicKey).toSuiAddress().toLowerCase() };
}

function malformed(message: string): VerificationResult {
  return { ok: false, error: { code: 'MALFORMED_SIGNATURE', message } };
}

function recoveryFailed(message: string): VerificationResult {
  return { ok: false, error: { code: 'RECOVERY_FAILED', message } };
}
