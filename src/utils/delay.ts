/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * delay.ts: Async delay utility for StationBase.
 */

/**
 * Creates a promise that resolves after the specified delay. Used to pace call sign lookups during enrichment. A delay of zero or less resolves on the next tick
 * without scheduling a timer.
 * @param ms - The delay duration in milliseconds.
 * @returns A promise that resolves after the specified delay.
 */
export async function delay(ms: number): Promise<void> {

  if(ms <= 0) {

    return Promise.resolve();
  }

  return new Promise<void>((resolve) => {

    setTimeout(resolve, ms);
  });
}
