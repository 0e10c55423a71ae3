/**
 * Resolve after `ms` milliseconds. Non-positive values resolve on the next tick.
 */
export const sleep = (ms: number): Promise<void> => new Promise(r => setTimeout(r, Math.max(0, ms)))
