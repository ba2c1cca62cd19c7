import {
  Inject,
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
} from '@nestjs/common';
import { AppConfigService } from '../../core/config/app-config.service';
import { MetricsService } from '../../core/metrics/metrics.service';
import { logEvent, safeMetric } from '../../shared/logging/event-log.util';
import { formatError, truncateError } from '../../shared/logging/format-error.util';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';
import { ExternalSyncError } from '../ledger/ledger.errors';
import { LEDGER_REPOSITORY, type LedgerRepository } from '../ledger/ledger.repository';
import type { TenantConfig } from '../ledger/ledger.types';
import { TenantConfigService } from '../ledger/tenant-config.service';
import type { ExternalCrmClient } from './crm-client.types';
import { CrmConnectionPool } from './crm-connection-pool.service';
import {
  externalIdOf,
  toCrmPayload,
  type SyncEntity,
} from './crm-payload.mapper';
import {
  SYNC_RECORD_REPOSITORY,
  type SyncRecordRepository,
} from './sync-record.repository';
import { computeBackoffMs, type BackoffPolicy } from './sync-backoff.util';
import type { CrmConnectionStatus, SyncRecord } from './sync.types';

export type SyncOutcome = 'completed' | 'retry' | 'dead' | 'lost' | 'error';

export type SyncRunSummary = {
  tenantId: string;
  startedAt: Date;
  finishedAt: Date;
  claimed: number;
  completed: number;
  retried: number;
  dead: number;
  /** Records another worker claimed first, or that moved while in flight. */
  lost: number;
  /** Records whose outcome could not be stored; stale release picks them up. */
  errors: number;
  connectionStatus: CrmConnectionStatus;
  error: string | null;
};

type ProcessResult = { outcome: SyncOutcome; error: string | null };

type Attempt =
  | { ok: true; externalId: string }
  | { ok: false; reason: string; terminal: boolean };

const entityKey = (record: SyncRecord) =>
  `${record.entityType}:${record.entityId}`;

/** Due records grouped per entity, oldest first within each group. */
function groupByEntity(records: SyncRecord[]): SyncRecord[][] {
  const groups = new Map<string, SyncRecord[]>();
  for (const record of records) {
    const key = entityKey(record);
    const group = groups.get(key);
    if (group) group.push(record);
    else groups.set(key, [record]);
  }
  return [...groups.values()];
}

/**
 * Drains pending / retry sync records per tenant into the tenant's CRM.
 *
 * A record is claimed with a conditional update before any remote call, so
 * several worker processes can run side by side; within one process a tenant
 * is never drained twice at the same time.
 */
@Injectable()
export class OutboundSyncWorker implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(OutboundSyncWorker.name);
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  public startedAt: Date | null = null;
  public lastTickAt: Date | null = null;
  private readonly inFlight = new Map<string, Promise<SyncRunSummary>>();
  private readonly backoff: BackoffPolicy;

  constructor(
    @Inject(SYNC_RECORD_REPOSITORY)
    private readonly records: SyncRecordRepository,
    @Inject(LEDGER_REPOSITORY) private readonly ledger: LedgerRepository,
    private readonly tenants: TenantConfigService,
    private readonly pool: CrmConnectionPool,
    private readonly metrics: MetricsService,
    private readonly config: AppConfigService,
  ) {
    this.backoff = {
      baseMs: config.getSyncBackoffBaseMs(),
      capMs: config.getSyncBackoffCapMs(),
      jitter: config.getSyncBackoffJitter(),
    };
  }

  onModuleInit() {
    if (!this.config.isWorkersEnabled()) {
      this.logger.log('Workers disabled (WORKERS_ENABLED!=1)');
      return;
    }
    const intervalMs = this.config.getSyncWorkerIntervalMs();
    this.timer = setInterval(() => {
      this.tick().catch((err: unknown) =>
        logIgnoredError(err, 'OutboundSyncWorker tick', this.logger),
      );
    }, intervalMs);
    this.timer.unref();
    this.startedAt = new Date();
    this.logger.log(`OutboundSyncWorker started, interval=${intervalMs}ms`);
  }

  onModuleDestroy() {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }

  isTenantRunning(tenantId: string): boolean {
    return this.inFlight.has(tenantId);
  }

  /** True when `sync_interval` has elapsed since the tenant's last run. */
  async isDue(tenant: TenantConfig, now = new Date()): Promise<boolean> {
    const state = await this.records.findSyncState(tenant.tenantId);
    if (!state?.lastRunAt) return true;
    const intervalMs = tenant.syncIntervalMinutes * 60_000;
    return now.getTime() - state.lastRunAt.getTime() >= intervalMs;
  }

  /**
   * Drains one tenant now, ignoring the interval (backoff gates still apply).
   * Joins the run already in flight for the tenant, if any.
   */
  runTenant(tenant: TenantConfig): Promise<SyncRunSummary> {
    const existing = this.inFlight.get(tenant.tenantId);
    if (existing) return existing;
    const run = this.drain(tenant).finally(() => {
      this.inFlight.delete(tenant.tenantId);
    });
    this.inFlight.set(tenant.tenantId, run);
    return run;
  }

  private async tick() {
    if (this.running) return;
    this.running = true;
    try {
      const now = new Date();
      this.lastTickAt = now;
      this.metrics.setGauge(
        'ledger_worker_last_tick_seconds',
        Math.floor(now.getTime() / 1000),
        { worker: 'crm_sync' },
      );
      const staleBefore = new Date(now.getTime() - this.config.getSyncStaleMs());
      const released = await this.records.releaseStale(staleBefore, now);
      if (released > 0) {
        this.logger.warn(`Released ${released} stale syncing record(s)`);
      }

      const tenants = await this.tenants.listCrmEnabled();
      const active = tenants.filter((tenant) => tenant.active);
      const closed = await this.pool.retainOnly(
        new Set(active.map((tenant) => tenant.tenantId)),
      );
      if (closed.length) {
        this.logger.log(`Closed CRM connections: ${closed.join(', ')}`);
      }

      for (const tenant of active) {
        try {
          if (!(await this.isDue(tenant, now))) continue;
          await this.runTenant(tenant);
        } catch (err) {
          logIgnoredError(err, 'OutboundSyncWorker tenant run', this.logger, 'warn', {
            tenantId: tenant.tenantId,
          });
        }
      }

      const counts = await this.records.countByState(null);
      this.metrics.setGauge('crm_sync_pending', counts.pending + counts.retry);
    } finally {
      this.running = false;
    }
  }

  private async drain(tenant: TenantConfig): Promise<SyncRunSummary> {
    const startedAt = new Date();
    const summary: SyncRunSummary = {
      tenantId: tenant.tenantId,
      startedAt,
      finishedAt: startedAt,
      claimed: 0,
      completed: 0,
      retried: 0,
      dead: 0,
      lost: 0,
      errors: 0,
      connectionStatus: 'unknown',
      error: null,
    };

    let client: ExternalCrmClient;
    try {
      client = await this.pool.acquire(tenant);
    } catch (err) {
      if (!(err instanceof ExternalSyncError)) throw err;
      summary.connectionStatus = 'error';
      summary.error = err.message;
      await this.saveState(tenant.tenantId, startedAt, 'error', err.message);
      this.logger.warn(
        `CRM unavailable tenant=${tenant.tenantId}: ${err.message}`,
      );
      return this.finish(summary);
    }

    const batch = this.config.getSyncWorkerBatch();
    const concurrency = this.config.getSyncWorkerConcurrency();
    const due = await this.records.listDue(tenant.tenantId, startedAt, batch);
    // records of one entity go one after another so a create is never doubled
    const groups = groupByEntity(due);
    let lastError: string | null = null;
    for (let i = 0; i < groups.length; i += concurrency) {
      const slice = groups.slice(i, i + concurrency);
      const settled = await Promise.all(
        slice.map((group) => this.processGroup(tenant, client, group)),
      );
      for (const result of settled.flat()) {
        if (result.outcome !== 'lost') summary.claimed++;
        if (result.error) lastError = result.error;
        switch (result.outcome) {
          case 'completed':
            summary.completed++;
            break;
          case 'retry':
            summary.retried++;
            break;
          case 'dead':
            summary.dead++;
            break;
          case 'lost':
            summary.lost++;
            break;
          case 'error':
            summary.errors++;
            break;
        }
      }
    }

    const failed = summary.retried + summary.dead;
    summary.connectionStatus =
      summary.completed > 0 || failed === 0 ? 'connected' : 'error';
    summary.error = summary.connectionStatus === 'error' ? lastError : null;
    this.pool.markStatus(tenant.tenantId, summary.connectionStatus);
    await this.saveState(
      tenant.tenantId,
      startedAt,
      summary.connectionStatus,
      summary.error,
    );
    return this.finish(summary);
  }

  private finish(summary: SyncRunSummary): SyncRunSummary {
    summary.finishedAt = new Date();
    logEvent(this.logger, 'crm.sync.run', {
      tenantId: summary.tenantId,
      claimed: summary.claimed,
      completed: summary.completed,
      retried: summary.retried,
      dead: summary.dead,
      lost: summary.lost,
      errors: summary.errors,
      connectionStatus: summary.connectionStatus,
      durationMs: summary.finishedAt.getTime() - summary.startedAt.getTime(),
    });
    return summary;
  }

  private async processGroup(
    tenant: TenantConfig,
    client: ExternalCrmClient,
    group: SyncRecord[],
  ): Promise<ProcessResult[]> {
    const results: ProcessResult[] = [];
    for (const record of group) {
      try {
        results.push(await this.process(tenant, client, record));
      } catch (err) {
        const message = formatError(err);
        this.logger.error(
          `Sync record ${record.id} could not be stored tenant=${record.tenantId}: ${message}`,
        );
        results.push({ outcome: 'error', error: message });
      }
    }
    return results;
  }

  private async process(
    tenant: TenantConfig,
    client: ExternalCrmClient,
    record: SyncRecord,
  ): Promise<ProcessResult> {
    const claimed = await this.records.claim(record.id, new Date());
    if (!claimed) return { outcome: 'lost', error: null };
    const attempt = await this.attempt(tenant, client, claimed);
    if (!attempt.ok) return this.fail(claimed, attempt.reason, attempt.terminal);
    const done = await this.records.update(
      {
        ...claimed,
        state: 'completed',
        externalId: attempt.externalId,
        lastError: null,
        nextAttemptAt: null,
        updatedAt: new Date(),
      },
      { expectState: 'syncing' },
    );
    if (!done) {
      this.logger.warn(`Sync record ${claimed.id} moved while syncing`);
      return { outcome: 'lost', error: null };
    }
    safeMetric(
      this.metrics,
      'crm_sync_records_total',
      { entity: claimed.entityType, result: 'completed' },
      1,
      this.logger,
    );
    return { outcome: 'completed', error: null };
  }

  /** Loads the entity and pushes it; every failure becomes a value. */
  private async attempt(
    tenant: TenantConfig,
    client: ExternalCrmClient,
    record: SyncRecord,
  ): Promise<Attempt> {
    try {
      const entity = await this.loadEntity(record);
      if (!entity) {
        return {
          ok: false,
          reason: `${record.entityType} ${record.entityId} no longer exists`,
          terminal: true,
        };
      }
      return {
        ok: true,
        externalId: await this.push(tenant, client, record, entity),
      };
    } catch (err) {
      return {
        ok: false,
        reason: formatError(err),
        terminal: err instanceof ExternalSyncError && !err.retryable,
      };
    }
  }

  /** Create-or-update keyed on the stored external id. */
  private async push(
    tenant: TenantConfig,
    client: ExternalCrmClient,
    record: SyncRecord,
    entity: SyncEntity,
  ): Promise<string> {
    const payload = toCrmPayload(tenant.tenantId, entity);
    const known = externalIdOf(entity) ?? record.externalId;
    if (known) {
      await client.update(record.entityType, known, payload);
      return known;
    }
    const created = await client.create(record.entityType, payload);
    await this.persistExternalId(record, created);
    return created;
  }

  private async loadEntity(record: SyncRecord): Promise<SyncEntity | null> {
    switch (record.entityType) {
      case 'member': {
        const member = await this.ledger.findMember(
          record.tenantId,
          record.entityId,
        );
        return member ? { entityType: 'member', member } : null;
      }
      case 'token': {
        const token = await this.ledger.findTokenById(
          record.tenantId,
          record.entityId,
        );
        return token ? { entityType: 'token', token } : null;
      }
    }
  }

  private async persistExternalId(record: SyncRecord, externalId: string) {
    switch (record.entityType) {
      case 'member':
        await this.ledger.setMemberExternalId(
          record.tenantId,
          record.entityId,
          externalId,
        );
        return;
      case 'token':
        await this.ledger.setTokenExternalId(record.entityId, externalId);
        return;
    }
  }

  /**
   * Classifies a failed attempt. Terminal failures and exhausted retries go to
   * `dead`; everything else waits out the backoff in `retry`.
   */
  private async fail(
    record: SyncRecord,
    reason: string,
    terminal: boolean,
  ): Promise<ProcessResult> {
    const now = new Date();
    const message = truncateError(reason) || 'unknown error';
    const failed: SyncRecord = {
      ...record,
      state: 'failed',
      retryCount: Math.min(record.maxRetries, record.retryCount + 1),
      lastError: message,
      updatedAt: now,
    };
    if (terminal || failed.retryCount >= record.maxRetries) {
      await this.records.update(
        { ...failed, state: 'dead', nextAttemptAt: null },
        { expectState: 'syncing' },
      );
      safeMetric(this.metrics, 'crm_sync_dead_total', undefined, 1, this.logger);
      safeMetric(
        this.metrics,
        'crm_sync_records_total',
        { entity: record.entityType, result: 'dead' },
        1,
        this.logger,
      );
      this.logger.error(
        `Sync record ${record.id} is dead after ${failed.retryCount} attempt(s) tenant=${record.tenantId} ${record.entityType}=${record.entityId}: ${message}`,
      );
      return { outcome: 'dead', error: message };
    }
    const delayMs = computeBackoffMs(this.backoff, record.retryCount);
    await this.records.update(
      {
        ...failed,
        state: 'retry',
        nextAttemptAt: new Date(now.getTime() + delayMs),
      },
      { expectState: 'syncing' },
    );
    safeMetric(
      this.metrics,
      'crm_sync_records_total',
      { entity: record.entityType, result: 'retry' },
      1,
      this.logger,
    );
    this.logger.warn(
      `Sync record ${record.id} failed (attempt ${failed.retryCount}/${record.maxRetries}), retry in ${delayMs}ms: ${message}`,
    );
    return { outcome: 'retry', error: message };
  }

  private async saveState(
    tenantId: string,
    lastRunAt: Date,
    connectionStatus: CrmConnectionStatus,
    lastError: string | null,
  ) {
    await this.records.saveSyncState(
      { tenantId, lastRunAt, connectionStatus, lastError },
      new Date(),
    );
  }
}
