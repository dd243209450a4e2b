/**
 * Sync clients expect timestamps like `2016-07-06T12:43:16.866Z`.
 */
export const createTimestamp = (now: Date = new Date()): string => now.toISOString();

/**
 * Later of two timestamps in the fixed ISO format. Strings of that format
 * sort lexicographically in time order.
 */
export const latestTimestamp = (a: string, b: string | null | undefined): string => {
  if (!b) return a;
  return b > a ? b : a;
};
