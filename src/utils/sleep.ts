import { setTimeout as delay } from 'node:timers/promises';

/**
 * Wait for `ms`, returning early (without throwing) when `signal` aborts.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
}
