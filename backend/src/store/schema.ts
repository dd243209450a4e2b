/**
 * Storage layout: one table per logical collection, all keyed by sync ID,
 * plus a per-collection counter used to seed identifier generation.
 */
export const PAYLOAD_COLLECTION = 'payload';

export const SCHEMA_SQL = `
  -- Payload by sync ID (opaque client-encrypted bookmarks)
  CREATE TABLE IF NOT EXISTS sync_payloads (
    id TEXT PRIMARY KEY NOT NULL,
    payload TEXT NOT NULL DEFAULT ''
  ) WITHOUT ROWID;

  -- Last update timestamp by sync ID
  CREATE TABLE IF NOT EXISTS sync_timestamps (
    id TEXT PRIMARY KEY NOT NULL,
    value TEXT NOT NULL
  ) WITHOUT ROWID;

  -- Creating client version by sync ID
  CREATE TABLE IF NOT EXISTS sync_versions (
    id TEXT PRIMARY KEY NOT NULL,
    value TEXT NOT NULL
  ) WITHOUT ROWID;

  -- Monotonic counters, one row per collection
  CREATE TABLE IF NOT EXISTS sync_sequences (
    name TEXT PRIMARY KEY NOT NULL,
    value INTEGER NOT NULL
  ) WITHOUT ROWID;
`;
