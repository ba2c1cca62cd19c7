import type { CrmSettings } from '../ledger/ledger.types';
import type { CrmConnectionStatus, SyncEntityType } from './sync.types';

export const CRM_CLIENT_FACTORY = Symbol('CRM_CLIENT_FACTORY');

export type CrmFieldValue = string | number | boolean | null;
export type CrmPayload = Record<string, CrmFieldValue>;

export type CrmConnectionTest = {
  ok: boolean;
  status: CrmConnectionStatus;
  message: string;
  serverVersion?: string;
};

/**
 * One authenticated session against a tenant's CRM. Implementations throw
 * `ExternalSyncError` for every failure talking to the remote side.
 */
export interface ExternalCrmClient {
  /** Upsert by stable reference; returns the remote id. */
  create(entityType: SyncEntityType, payload: CrmPayload): Promise<string>;
  update(
    entityType: SyncEntityType,
    externalId: string,
    payload: CrmPayload,
  ): Promise<void>;
  testConnection(): Promise<CrmConnectionTest>;
  close(): Promise<void>;
}

export interface CrmClientFactory {
  create(tenantId: string, settings: CrmSettings): ExternalCrmClient;
}
