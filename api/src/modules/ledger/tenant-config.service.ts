import { Inject, Injectable, Logger } from '@nestjs/common';
import { AppConfigService } from '../../core/config/app-config.service';
import { fail, notFoundError, ok, type Result } from './ledger.errors';
import { LEDGER_REPOSITORY, type LedgerRepository } from './ledger.repository';
import type { TenantConfig } from './ledger.types';

type CacheEntry<T> = {
  value: T | null;
  expiresAt: number;
};

/**
 * Read-only tenant configuration with a short in-process TTL cache. Callers
 * load the config once per operation and pass the value down.
 */
@Injectable()
export class TenantConfigService {
  private readonly logger = new Logger(TenantConfigService.name);
  private readonly cache = new Map<string, CacheEntry<TenantConfig>>();
  private readonly ttlMs: number;
  private readonly maxEntries = 5000;

  constructor(
    @Inject(LEDGER_REPOSITORY) private readonly repo: LedgerRepository,
    config: AppConfigService,
  ) {
    this.ttlMs = config.getTenantConfigTtlMs();
  }

  async get(tenantId: string): Promise<TenantConfig | null> {
    const cached = this.readCache(tenantId);
    if (cached !== undefined) return cached;
    const value = await this.repo.findTenantConfig(tenantId);
    this.writeCache(tenantId, value);
    return value;
  }

  /** Active tenant or `not_found`. */
  async require(tenantId: string): Promise<Result<TenantConfig>> {
    const config = await this.get(tenantId);
    if (!config) {
      return fail(notFoundError('tenant', `Tenant ${tenantId} not found`));
    }
    if (!config.active) {
      return fail(notFoundError('tenant', `Tenant ${tenantId} is inactive`));
    }
    return ok(config);
  }

  /** Uncached: the sync scheduler needs to notice deactivation promptly. */
  listCrmEnabled(): Promise<TenantConfig[]> {
    return this.repo.listTenantConfigs({ crmEnabled: true });
  }

  invalidate(tenantId?: string) {
    if (tenantId) this.cache.delete(tenantId);
    else this.cache.clear();
  }

  private readCache(tenantId: string): TenantConfig | null | undefined {
    if (this.ttlMs <= 0) return undefined;
    const entry = this.cache.get(tenantId);
    if (!entry) return undefined;
    if (entry.expiresAt <= Date.now()) {
      this.cache.delete(tenantId);
      return undefined;
    }
    return entry.value;
  }

  private writeCache(tenantId: string, value: TenantConfig | null) {
    if (this.ttlMs <= 0) return;
    if (this.cache.size >= this.maxEntries) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
      this.logger.debug(`tenant config cache full, evicted oldest entry`);
    }
    this.cache.set(tenantId, { value, expiresAt: Date.now() + this.ttlMs });
  }
}
