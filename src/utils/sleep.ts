// Longest delay a single timer accepts; Node fires longer ones after 1 ms.
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export async function sleep(ms: number): Promise<void> {
  let remaining = Math.max(0, ms);
  do {
    const chunk = Math.min(remaining, MAX_TIMEOUT_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  } while (remaining > 0);
}

/**
 * Time source for the retry loop. Waits go through `sleep` so tests can
 * observe them without real time passing.
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep,
};
