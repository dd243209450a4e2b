import { v4 as uuidv4, v5 as uuidv5 } from 'uuid';

/** Length of every sync identifier, in characters. */
export const SYNC_ID_LENGTH = 32;

/**
 * Produces a candidate identifier for the given store sequence number.
 */
export type SyncIdGenerator = (sequence: number) => string;

/**
 * Derive a sync identifier from fresh randomness and a store sequence number.
 *
 * A random v4 UUID serves as the namespace of a v5 (SHA-1) UUID whose name is
 * the hex sequence number; the 16 resulting bytes are rendered as 32
 * lowercase hex characters.
 */
export const generateSyncId: SyncIdGenerator = (sequence) => {
  const seed = uuidv4();
  return uuidv5(sequence.toString(16), seed).replace(/-/g, '');
};
