export const SYNC_ENTITY_TYPES = ['member', 'token'] as const;
export type SyncEntityType = (typeof SYNC_ENTITY_TYPES)[number];

export type SyncOperation = 'create' | 'update';

export const SYNC_STATES = [
  'pending',
  'syncing',
  'completed',
  'failed',
  'retry',
  'dead',
] as const;
export type SyncState = (typeof SYNC_STATES)[number];

export type CrmConnectionStatus = 'unknown' | 'connected' | 'error';

export type SyncRecord = {
  id: string;
  tenantId: string;
  entityType: SyncEntityType;
  /** member_id for members, token id for tokens. */
  entityId: string;
  operation: SyncOperation;
  state: SyncState;
  retryCount: number;
  maxRetries: number;
  lastError: string | null;
  externalId: string | null;
  nextAttemptAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

export type NewSyncRecord = {
  tenantId: string;
  entityType: SyncEntityType;
  entityId: string;
  operation: SyncOperation;
  maxRetries: number;
  externalId?: string | null;
};

export type CrmSyncState = {
  tenantId: string;
  lastRunAt: Date | null;
  connectionStatus: CrmConnectionStatus;
  lastError: string | null;
};

export const emptyStateCounts = (): Record<SyncState, number> => ({
  pending: 0,
  syncing: 0,
  completed: 0,
  failed: 0,
  retry: 0,
  dead: 0,
});
