// Sync record shapes shared by the store and the API layer

/**
 * One sync set as seen by readers. All three fields are present or the
 * record does not exist.
 */
export interface SyncRecord {
  id: string;
  payload: string;
  lastUpdated: string;
  clientVersion: string;
}

export interface CreatedSync {
  id: string;
  lastUpdated: string;
  clientVersion: string;
}

export type SyncSnapshot = Omit<SyncRecord, 'id'>;

export interface PutSyncResult {
  lastUpdated: string;
}

export interface TransactionStats {
  readsStarted: number;
  writesStarted: number;
  commits: number;
  rollbacks: number;
}

export interface EngineStats {
  file: string;
  journalMode: string;
  pageSize: number;
  pageCount: number;
  freelistCount: number;
  transactions: TransactionStats;
}

export interface StoreStats {
  recordCount: number;
  storageSizeBytes: number;
  engineStats: EngineStats;
}

// Responses (wire field names used by bookmark sync clients)

export interface CreateSyncResponse {
  id: string;
  lastUpdated: string;
  version: string;
}

export interface GetSyncResponse {
  bookmarks: string;
  lastUpdated: string;
  version: string;
}

export const ServiceStatus = {
  Online: 1,
  NoNewSyncs: 3,
} as const;

export type ServiceStatus = (typeof ServiceStatus)[keyof typeof ServiceStatus];

export interface ServiceInfoResponse {
  status: ServiceStatus;
  message: string;
  version: string;
  buildstamp: string;
  maxSyncSize: number;
}
