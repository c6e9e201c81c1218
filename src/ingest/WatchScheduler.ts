import { toError } from "../types/index.js";

/** Longest delay a Node timer accepts */
export const MAX_WATCH_INTERVAL_MS = 2 ** 31 - 1;
export const MAX_WATCH_INTERVAL_SECONDS = Math.floor(MAX_WATCH_INTERVAL_MS / 1000);

export interface WatchOptions {
  intervalMs: number;
  signal: AbortSignal;
  /** Called when a pass throws; the loop keeps going */
  onError?: (error: Error, pass: number) => void;
  /** Injectable for tests */
  setTimer?: (fn: () => void, ms: number) => NodeJS.Timeout;
  clearTimer?: (timer: NodeJS.Timeout) => void;
}

/**
 * Runs `pass` repeatedly until the signal aborts. The next pass is scheduled
 * only after the previous one settles, so passes never overlap. Resolves with
 * the number of passes started once the loop has stopped.
 */
export function runWatchLoop(
  pass: (passNumber: number) => Promise<void>,
  options: WatchOptions
): Promise<number> {
  const { intervalMs, signal } = options;
  if (!Number.isInteger(intervalMs) || intervalMs <= 0 || intervalMs > MAX_WATCH_INTERVAL_MS) {
    return Promise.reject(
      new RangeError(`Watch interval must be between 1 and ${MAX_WATCH_INTERVAL_MS} ms, got ${intervalMs}`)
    );
  }
  const setTimer = options.setTimer ?? setTimeout;
  const clearTimer = options.clearTimer ?? clearTimeout;
  const onError =
    options.onError ??
    ((error, passNumber) => console.error(`[Watch] Pass ${passNumber} failed: ${error.message}`));

  return new Promise((resolve) => {
    let passes = 0;
    let running = false;
    let timer: NodeJS.Timeout | undefined;

    const stop = () => {
      if (timer !== undefined) {
        clearTimer(timer);
        timer = undefined;
      }
      resolve(passes);
    };

    const tick = () => {
      timer = undefined;
      if (signal.aborted) {
        stop();
        return;
      }
      passes++;
      running = true;
      const passNumber = passes;
      void pass(passNumber)
        .catch((error: unknown) => onError(toError(error), passNumber))
        .finally(() => {
          running = false;
          if (signal.aborted) {
            stop();
          } else {
            timer = setTimer(tick, intervalMs);
          }
        });
    };

    if (signal.aborted) {
      resolve(0);
      return;
    }
    // An abort during a pass lets that pass finish first
    signal.addEventListener("abort", () => {
      if (!running) {
        stop();
      }
    }, { once: true });
    tick();
  });
}
