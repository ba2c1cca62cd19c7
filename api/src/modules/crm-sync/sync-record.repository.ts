import type {
  CrmSyncState,
  NewSyncRecord,
  SyncRecord,
  SyncState,
} from './sync.types';

export const SYNC_RECORD_REPOSITORY = Symbol('SYNC_RECORD_REPOSITORY');

export type SyncErrorSummary = { error: string; count: number };

/** Durable log of outbound sync attempts. */
export interface SyncRecordRepository {
  /** Null when a pending record for the same entity already exists. */
  create(input: NewSyncRecord, now: Date): Promise<SyncRecord | null>;
  get(id: string): Promise<SyncRecord | null>;
  listByState(
    tenantId: string,
    state: SyncState,
    limit: number,
  ): Promise<SyncRecord[]>;
  /**
   * Writes every mutable field. With `expectState` the write only happens
   * while the stored record is still in that state; null otherwise.
   */
  update(
    record: SyncRecord,
    opts?: { expectState?: SyncState },
  ): Promise<SyncRecord | null>;
  /** pending | retry → syncing. Null when another worker won the race. */
  claim(id: string, now: Date): Promise<SyncRecord | null>;
  /** pending / retry records whose backoff gate has passed, oldest first. */
  listDue(tenantId: string, now: Date, limit: number): Promise<SyncRecord[]>;
  /** syncing records untouched since `olderThan` go back to retry. */
  releaseStale(olderThan: Date, now: Date): Promise<number>;
  countByState(
    tenantId: string | null,
    since?: Date,
  ): Promise<Record<SyncState, number>>;
  errorSummary(
    tenantId: string,
    since: Date,
    limit: number,
  ): Promise<SyncErrorSummary[]>;

  findSyncState(tenantId: string): Promise<CrmSyncState | null>;
  saveSyncState(state: CrmSyncState, now: Date): Promise<void>;
}
