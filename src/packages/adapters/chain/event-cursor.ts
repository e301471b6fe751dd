import { z } from 'zod';

/**
 * Position in a cursor chain's event stream, as returned by the node
 */
const eventCursorSchema = z.object({
  txDigest: z.string().min(1),
  eventSeq: z.string().regex(/^\d+$/),
});

export type EventCursor = z.infer<typeof eventCursorSchema>;

/**
 * Base58 encoding of the all-zero 32-byte transaction digest
 */
export const PLACEHOLDER_TX_DIGEST = '1'.repeat(32);

export type ParsedCursor =
  | { kind: 'none' }
  | { kind: 'cursor'; cursor: EventCursor }
  | { kind: 'placeholder'; cursor: EventCursor; raw: string };

/**
 * Parse a stored cursor token.
 *
 * Tokens that are not the JSON form written by `serializeCursor` resume
 * from a placeholder cursor whose sequence is the token itself when it
 * is a decimal integer and 0 otherwise.
 */
export function parseCursorToken(token: string | null): ParsedCursor {
  if (token === null || token.trim() === '') {
    return { kind: 'none' };
  }

  const trimmed = token.trim();
  if (trimmed.startsWith('{')) {
    const parsed = eventCursorSchema.safeParse(parseJson(trimmed));
    if (parsed.success) {
      return { kind: 'cursor', cursor: parsed.data };
    }
  }

  return {
    kind: 'placeholder',
    raw: token,
    cursor: {
      txDigest: PLACEHOLDER_TX_DIGEST,
      eventSeq: /^\d+$/.test(trimmed) ? trimmed : '0',
    },
  };
}

export function serializeCursor(cursor: EventCursor): string {
  return JSON.stringify({ txDigest: cursor.txDigest, eventSeq: cursor.eventSeq });
}

/**
 * Numeric stand-in for a cursor, stored as the checkpoint position.
 * The leading 15 hex digits of the digest (fits a signed 64-bit column),
 * or 0 when the digest does not start with 15 hex digits.
 */
export function cursorSurrogate(cursor: EventCursor): bigint {
  const match = /^[0-9a-fA-F]{15}/.exec(cursor.txDigest);
  return match ? BigInt(`0x${match[0]}`) : 0n;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
