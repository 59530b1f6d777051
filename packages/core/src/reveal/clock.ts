/**
 * Timer source for reveal sessions and debounced persistence.
 * Returns a function that cancels the scheduled callback.
 */
export interface Clock {
  schedule(callback: () => void, delayMs: number): () => void;
}

export const systemClock: Clock = {
  schedule(callback, delayMs) {
    const handle = setTimeout(callback, delayMs);
    return () => clearTimeout(handle);
  },
};
