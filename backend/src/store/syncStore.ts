import fs from 'fs';
import Database from 'better-sqlite3';
import type {
  CreatedSync,
  PutSyncResult,
  StoreStats,
  SyncSnapshot,
  TransactionStats,
} from '../models/types';
import { AllocationError, NotFoundError, StorageError, SyncError } from '../utils/errors';
import logger from '../utils/logger';
import { generateSyncId, type SyncIdGenerator } from '../utils/syncId';
import { createTimestamp, latestTimestamp } from '../utils/timestamp';
import { PAYLOAD_COLLECTION, SCHEMA_SQL } from './schema';

/** Consecutive identifier collisions tolerated before creation gives up. */
export const MAX_ID_ATTEMPTS = 8;

export const IN_MEMORY = ':memory:';

export interface SyncStoreOptions {
  /** Store file path, or `:memory:` for a throwaway store. */
  file: string;
  /** Upper bound on waiting for a lock held by another connection. */
  initTimeoutSeconds: number;
  idGenerator?: SyncIdGenerator;
  clock?: () => Date;
}

interface ValueRow {
  value: string;
}

interface PayloadRow {
  payload: string;
}

interface SequenceRow {
  value: number;
}

interface CountRow {
  count: number;
}

/**
 * Embedded sync store.
 *
 * Every operation touching more than one collection runs in a single SQLite
 * transaction: writes take the write lock up front (`BEGIN IMMEDIATE`) so
 * writers serialize, reads run deferred and see one WAL snapshot.
 */
export class SyncStore {
  private readonly idGenerator: SyncIdGenerator;
  private readonly clock: () => Date;
  private readonly txStats: TransactionStats = {
    readsStarted: 0,
    writesStarted: 0,
    commits: 0,
    rollbacks: 0,
  };

  private readonly statements: ReturnType<typeof prepareStatements>;

  private constructor(
    private readonly db: Database.Database,
    private readonly file: string,
    options: SyncStoreOptions
  ) {
    this.idGenerator = options.idGenerator ?? generateSyncId;
    this.clock = options.clock ?? (() => new Date());
    this.statements = prepareStatements(db);
  }

  /**
   * Open or create the store file and make sure every collection exists.
   * Any failure here leaves no usable store; callers treat it as fatal.
   */
  static open(options: SyncStoreOptions): SyncStore {
    let db: Database.Database | undefined;
    try {
      db = new Database(options.file, {
        timeout: Math.max(0, options.initTimeoutSeconds) * 1000,
      });
      db.pragma('journal_mode = WAL');
      db.pragma('synchronous = NORMAL');
      db.exec(SCHEMA_SQL);

      if (options.file !== IN_MEMORY && !fs.existsSync(options.file)) {
        throw new Error(`store file ${options.file} missing after open`);
      }

      const store = new SyncStore(db, options.file, options);
      logger.info(`✅ Sync store ready: ${options.file}`);
      return store;
    } catch (error) {
      if (db?.open) {
        db.close();
      }
      throw new StorageError(`Unable to open sync store at ${options.file}`, error);
    }
  }

  /**
   * Allocate a fresh sync ID and persist an empty record for it.
   */
  createSync(clientVersion: string): CreatedSync {
    const lastUpdated = createTimestamp(this.clock());

    const id = this.runWrite('createSync', () => {
      const sequence = this.statements.nextSequence.get(PAYLOAD_COLLECTION);
      if (!sequence) {
        throw new StorageError('Sequence counter returned no value');
      }

      let candidate: string | undefined;
      for (let attempt = 1; attempt <= MAX_ID_ATTEMPTS; attempt++) {
        const generated = this.idGenerator(sequence.value);
        if (!this.statements.payloadExists.get(generated)) {
          candidate = generated;
          break;
        }
        logger.warn('Duplicate sync ID generated, retrying', { attempt });
      }

      if (!candidate) {
        throw new AllocationError(MAX_ID_ATTEMPTS);
      }

      this.statements.insertPayload.run(candidate, '');
      this.statements.insertVersion.run(candidate, clientVersion);
      this.statements.insertTimestamp.run(candidate, lastUpdated);
      return candidate;
    });

    logger.debug('New sync ID created', { id, clientVersion });
    return { id, lastUpdated, clientVersion };
  }

  /**
   * Read a complete record from one snapshot.
   * @throws NotFoundError unless payload, timestamp and version are all present.
   */
  getSync(id: string): SyncSnapshot {
    const record = this.runRead('getSync', (): SyncSnapshot | null => {
      const payload = this.statements.selectPayload.get(id);
      const timestamp = this.statements.selectTimestamp.get(id);
      const version = this.statements.selectVersion.get(id);

      if (!payload || !timestamp || !version) {
        return null;
      }

      return {
        payload: payload.payload,
        lastUpdated: timestamp.value,
        clientVersion: version.value,
      };
    });

    if (!record) {
      throw new NotFoundError(id);
    }
    return record;
  }

  /**
   * Replace the payload of `id` and refresh its timestamp. Unknown IDs get a
   * payload and timestamp but no version, so they stay invisible to
   * {@link getSync}. Last writer wins.
   */
  putSync(id: string, payload: string): PutSyncResult {
    const now = createTimestamp(this.clock());

    return this.runWrite('putSync', () => {
      const previous = this.statements.selectTimestamp.get(id);
      const lastUpdated = latestTimestamp(now, previous?.value);

      this.statements.upsertPayload.run(id, payload);
      this.statements.upsertTimestamp.run(id, lastUpdated);
      return { lastUpdated };
    });
  }

  getLastUpdated(id: string): string | null {
    return this.runRead('getLastUpdated', () => this.statements.selectTimestamp.get(id)?.value ?? null);
  }

  getClientVersion(id: string): string | null {
    return this.runRead('getClientVersion', () => this.statements.selectVersion.get(id)?.value ?? null);
  }

  getStats(): StoreStats {
    return this.runRead('getStats', () => {
      const count = this.statements.countPayloads.get();
      const pageSize = Number(this.db.pragma('page_size', { simple: true }));
      const pageCount = Number(this.db.pragma('page_count', { simple: true }));
      const freelistCount = Number(this.db.pragma('freelist_count', { simple: true }));
      const journalMode = String(this.db.pragma('journal_mode', { simple: true }));

      return {
        recordCount: count?.count ?? 0,
        storageSizeBytes: pageSize * pageCount,
        engineStats: {
          file: this.file,
          journalMode,
          pageSize,
          pageCount,
          freelistCount,
          transactions: { ...this.txStats },
        },
      };
    });
  }

  /**
   * Cheap round trip used by readiness probes.
   */
  ping(): void {
    this.runRead('ping', () => this.statements.ping.get());
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      logger.info('Sync store closed');
    }
  }

  private runWrite<T>(operation: string, work: () => T): T {
    this.txStats.writesStarted++;
    return this.settle(operation, () => this.db.transaction(work).immediate());
  }

  private runRead<T>(operation: string, work: () => T): T {
    this.txStats.readsStarted++;
    return this.settle(operation, () => this.db.transaction(work).deferred());
  }

  private settle<T>(operation: string, transaction: () => T): T {
    try {
      const result = transaction();
      this.txStats.commits++;
      return result;
    } catch (error) {
      this.txStats.rollbacks++;
      if (error instanceof SyncError) {
        throw error;
      }
      logger.error(`Sync store ${operation} failed`, {
        error: error instanceof Error ? error.message : String(error),
      });
      throw new StorageError(`Sync store ${operation} failed`, error);
    }
  }
}

function prepareStatements(db: Database.Database) {
  return {
    nextSequence: db.prepare<[string], SequenceRow>(
      `INSERT INTO sync_sequences (name, value) VALUES (?, 1)
       ON CONFLICT(name) DO UPDATE SET value = value + 1
       RETURNING value`
    ),
    payloadExists: db.prepare<[string], { found: number }>('SELECT 1 AS found FROM sync_payloads WHERE id = ?'),
    selectPayload: db.prepare<[string], PayloadRow>('SELECT payload FROM sync_payloads WHERE id = ?'),
    selectTimestamp: db.prepare<[string], ValueRow>('SELECT value FROM sync_timestamps WHERE id = ?'),
    selectVersion: db.prepare<[string], ValueRow>('SELECT value FROM sync_versions WHERE id = ?'),
    insertPayload: db.prepare<[string, string]>('INSERT INTO sync_payloads (id, payload) VALUES (?, ?)'),
    insertTimestamp: db.prepare<[string, string]>('INSERT INTO sync_timestamps (id, value) VALUES (?, ?)'),
    insertVersion: db.prepare<[string, string]>('INSERT INTO sync_versions (id, value) VALUES (?, ?)'),
    upsertPayload: db.prepare<[string, string]>(
      `INSERT INTO sync_payloads (id, payload) VALUES (?, ?)
       ON CONFLICT(id) DO UPDATE SET payload = excluded.payload`
    ),
    upsertTimestamp: db.prepare<[string, string]>(
      `INSERT INTO sync_timestamps (id, value) VALUES (?, ?)
       ON CONFLICT(id) DO UPDATE SET value = excluded.value`
    ),
    countPayloads: db.prepare<[], CountRow>('SELECT COUNT(*) AS count FROM sync_payloads'),
    ping: db.prepare<[], { ok: number }>('SELECT 1 AS ok'),
  };
}
