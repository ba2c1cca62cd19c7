import { Inject, Injectable, Logger } from '@nestjs/common';
import { logEvent } from '../../shared/logging/event-log.util';
import {
  conflictError,
  ExternalSyncError,
  fail,
  notFoundError,
  ok,
  validationError,
  type Result,
} from '../ledger/ledger.errors';
import type { TenantConfig } from '../ledger/ledger.types';
import { clampLimit, DAY_MS } from '../ledger/ledger.util';
import { TenantConfigService } from '../ledger/tenant-config.service';
import {
  CRM_CLIENT_FACTORY,
  type CrmClientFactory,
  type CrmConnectionTest,
} from './crm-client.types';
import { CrmConnectionPool } from './crm-connection-pool.service';
import { OutboundSyncWorker, type SyncRunSummary } from './outbound-sync.worker';
import {
  SYNC_RECORD_REPOSITORY,
  type SyncErrorSummary,
  type SyncRecordRepository,
} from './sync-record.repository';
import type {
  CrmConnectionStatus,
  SyncRecord,
  SyncState,
} from './sync.types';

export type SyncRunRequestResult =
  | { ran: true; summary: SyncRunSummary }
  | { ran: false; reason: 'not_due'; nextRunAt: Date };

export type SyncStats = {
  tenantId: string;
  windowDays: number;
  since: Date;
  byState: Record<SyncState, number>;
  total: number;
  /** completed / total, two decimals; 0 for an empty window. */
  successRate: number;
  topErrors: SyncErrorSummary[];
  lastRunAt: Date | null;
  connectionStatus: CrmConnectionStatus;
  lastError: string | null;
};

/** Operator surface over the sync pipeline. */
@Injectable()
export class CrmSyncService {
  private readonly logger = new Logger(CrmSyncService.name);

  constructor(
    @Inject(SYNC_RECORD_REPOSITORY)
    private readonly records: SyncRecordRepository,
    @Inject(CRM_CLIENT_FACTORY) private readonly clients: CrmClientFactory,
    private readonly tenants: TenantConfigService,
    private readonly worker: OutboundSyncWorker,
    private readonly pool: CrmConnectionPool,
  ) {}

  /** `force` skips the interval check; per-record backoff still applies. */
  async runNow(
    tenantId: string,
    opts: { force?: boolean } = {},
  ): Promise<Result<SyncRunRequestResult>> {
    const tenant = await this.requireCrmTenant(tenantId);
    if (!tenant.ok) return tenant;
    if (!opts.force && !(await this.worker.isDue(tenant.value))) {
      const state = await this.records.findSyncState(tenantId);
      const lastRun = state?.lastRunAt?.getTime() ?? Date.now();
      return ok({
        ran: false,
        reason: 'not_due',
        nextRunAt: new Date(lastRun + tenant.value.syncIntervalMinutes * 60_000),
      });
    }
    const summary = await this.worker.runTenant(tenant.value);
    if (summary.connectionStatus === 'error' && summary.claimed === 0) {
      // the session could not be opened; nothing was attempted
      return fail({
        kind: 'external_sync',
        message: summary.error ?? 'CRM unavailable',
        retryable: true,
      });
    }
    return ok({ ran: true, summary });
  }

  async listRecords(
    tenantId: string,
    state: SyncState,
    limit?: number,
  ): Promise<Result<SyncRecord[]>> {
    const tenant = await this.tenants.get(tenantId);
    if (!tenant) {
      return fail(notFoundError('tenant', `Tenant ${tenantId} not found`));
    }
    return ok(await this.records.listByState(tenantId, state, clampLimit(limit)));
  }

  /**
   * Puts a dead record back into `retry` with a fresh retry budget. The
   * worker picks it up on the tenant's next run.
   */
  async replay(recordId: string): Promise<Result<SyncRecord>> {
    const record = await this.records.get(recordId);
    if (!record) {
      return fail(
        notFoundError('sync_record', `Sync record ${recordId} not found`),
      );
    }
    if (record.state !== 'dead') {
      return fail(
        conflictError(
          'state_changed',
          `Only dead records can be replayed (state=${record.state})`,
        ),
      );
    }
    const now = new Date();
    const replayed = await this.records.update(
      {
        ...record,
        state: 'retry',
        retryCount: 0,
        nextAttemptAt: now,
        updatedAt: now,
      },
      { expectState: 'dead' },
    );
    if (!replayed) {
      return fail(
        conflictError('state_changed', `Sync record ${recordId} changed state`),
      );
    }
    logEvent(this.logger, 'crm.sync.replay', {
      tenantId: record.tenantId,
      recordId,
      entityType: record.entityType,
      entityId: record.entityId,
    });
    return ok(replayed);
  }

  async stats(tenantId: string, days = 30): Promise<Result<SyncStats>> {
    const tenant = await this.tenants.get(tenantId);
    if (!tenant) {
      return fail(notFoundError('tenant', `Tenant ${tenantId} not found`));
    }
    const windowDays = Math.min(365, Math.max(1, Math.floor(days)));
    const since = new Date(Date.now() - windowDays * DAY_MS);
    const [byState, topErrors, state] = await Promise.all([
      this.records.countByState(tenantId, since),
      this.records.errorSummary(tenantId, since, 10),
      this.records.findSyncState(tenantId),
    ]);
    const total = Object.values(byState).reduce((sum, n) => sum + n, 0);
    return ok({
      tenantId,
      windowDays,
      since,
      byState,
      total,
      successRate:
        total > 0 ? Math.round((byState.completed / total) * 100) / 100 : 0,
      topErrors,
      lastRunAt: state?.lastRunAt ?? null,
      connectionStatus: state?.connectionStatus ?? 'unknown',
      lastError: state?.lastError ?? null,
    });
  }

  /** Opens a throwaway session so a failed test never poisons the pool. */
  async testConnection(tenantId: string): Promise<Result<CrmConnectionTest>> {
    const tenant = await this.tenants.require(tenantId);
    if (!tenant.ok) return tenant;
    const settings = tenant.value.crm;
    if (!settings) {
      return fail(
        validationError('CRM connection settings are incomplete', 'crm'),
      );
    }
    let result: CrmConnectionTest;
    try {
      const client = this.clients.create(tenantId, settings);
      try {
        result = await client.testConnection();
      } finally {
        await client.close();
      }
    } catch (err) {
      if (!(err instanceof ExternalSyncError)) throw err;
      result = { ok: false, status: 'error', message: err.message };
    }
    const previous = await this.records.findSyncState(tenantId);
    await this.records.saveSyncState(
      {
        tenantId,
        lastRunAt: previous?.lastRunAt ?? null,
        connectionStatus: result.status,
        lastError: result.ok ? null : result.message,
      },
      new Date(),
    );
    this.pool.markStatus(tenantId, result.status);
    return ok(result);
  }

  private async requireCrmTenant(
    tenantId: string,
  ): Promise<Result<TenantConfig>> {
    const tenant = await this.tenants.require(tenantId);
    if (!tenant.ok) return tenant;
    if (!tenant.value.crmEnabled) {
      return fail(
        validationError(`CRM sync is disabled for tenant ${tenantId}`, 'crmEnabled'),
      );
    }
    return tenant;
  }
}
