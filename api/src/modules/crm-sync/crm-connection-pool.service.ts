import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { createHash } from 'crypto';
import { AppConfigService } from '../../core/config/app-config.service';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';
import { ExternalSyncError } from '../ledger/ledger.errors';
import type { CrmSettings, TenantConfig } from '../ledger/ledger.types';
import {
  CRM_CLIENT_FACTORY,
  type CrmClientFactory,
  type ExternalCrmClient,
} from './crm-client.types';
import type { CrmConnectionStatus } from './sync.types';

type PooledConnection = {
  client: ExternalCrmClient;
  settingsKey: string;
  openedAt: number;
  lastCheckedAt: number;
  status: CrmConnectionStatus;
};

export type PoolEntrySnapshot = {
  tenantId: string;
  openedAt: Date;
  lastCheckedAt: Date;
  status: CrmConnectionStatus;
};

const settingsKey = (settings: CrmSettings) =>
  createHash('sha256')
    .update(
      [settings.url, settings.database, settings.username, settings.secret].join(
        '\n',
      ),
    )
    .digest('hex');

/**
 * One CRM client per tenant, opened lazily and reused across sync runs.
 * Connections are health-checked every `CRM_HEALTHCHECK_MS`, replaced when the
 * tenant's settings change and closed when the tenant is deactivated or the
 * module shuts down.
 */
@Injectable()
export class CrmConnectionPool implements OnModuleDestroy {
  private readonly logger = new Logger(CrmConnectionPool.name);
  private readonly connections = new Map<string, PooledConnection>();
  private readonly healthcheckMs: number;

  constructor(
    @Inject(CRM_CLIENT_FACTORY) private readonly factory: CrmClientFactory,
    config: AppConfigService,
  ) {
    this.healthcheckMs = config.getCrmHealthcheckMs();
  }

  async acquire(tenant: TenantConfig): Promise<ExternalCrmClient> {
    if (!tenant.crm) {
      throw new ExternalSyncError(
        `CRM settings for tenant ${tenant.tenantId} are incomplete`,
        false,
      );
    }
    const key = settingsKey(tenant.crm);
    const existing = this.connections.get(tenant.tenantId);
    if (existing && existing.settingsKey !== key) {
      this.logger.log(`CRM settings changed, reopening tenant=${tenant.tenantId}`);
      await this.release(tenant.tenantId);
    } else if (existing) {
      const healthy = await this.checkHealth(tenant.tenantId, existing);
      if (healthy) return existing.client;
      await this.release(tenant.tenantId);
    }

    const now = Date.now();
    const client = this.factory.create(tenant.tenantId, tenant.crm);
    this.connections.set(tenant.tenantId, {
      client,
      settingsKey: key,
      openedAt: now,
      lastCheckedAt: now,
      status: 'unknown',
    });
    this.logger.log(`CRM connection opened tenant=${tenant.tenantId}`);
    return client;
  }

  async release(tenantId: string): Promise<boolean> {
    const entry = this.connections.get(tenantId);
    if (!entry) return false;
    this.connections.delete(tenantId);
    try {
      await entry.client.close();
    } catch (err) {
      logIgnoredError(err, 'CRM connection close', this.logger, 'warn', {
        tenantId,
      });
    }
    this.logger.log(`CRM connection closed tenant=${tenantId}`);
    return true;
  }

  /** Closes every connection whose tenant is not in `keep`. */
  async retainOnly(keep: ReadonlySet<string>): Promise<string[]> {
    const closed: string[] = [];
    for (const tenantId of Array.from(this.connections.keys())) {
      if (keep.has(tenantId)) continue;
      if (await this.release(tenantId)) closed.push(tenantId);
    }
    return closed;
  }

  markStatus(tenantId: string, status: CrmConnectionStatus) {
    const entry = this.connections.get(tenantId);
    if (entry) entry.status = status;
  }

  has(tenantId: string): boolean {
    return this.connections.has(tenantId);
  }

  snapshot(): PoolEntrySnapshot[] {
    return Array.from(this.connections.entries()).map(([tenantId, entry]) => ({
      tenantId,
      openedAt: new Date(entry.openedAt),
      lastCheckedAt: new Date(entry.lastCheckedAt),
      status: entry.status,
    }));
  }

  async onModuleDestroy() {
    await this.retainOnly(new Set());
  }

  private async checkHealth(
    tenantId: string,
    entry: PooledConnection,
  ): Promise<boolean> {
    if (this.healthcheckMs <= 0) return true;
    const now = Date.now();
    if (now - entry.lastCheckedAt < this.healthcheckMs) return true;
    const result = await entry.client.testConnection();
    entry.lastCheckedAt = now;
    entry.status = result.status;
    if (!result.ok) {
      this.logger.warn(
        `CRM health check failed tenant=${tenantId}: ${result.message}`,
      );
    }
    return result.ok;
  }
}
