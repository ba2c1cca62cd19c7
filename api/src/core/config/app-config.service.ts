import { Injectable } from '@nestjs/common';

@Injectable()
export class AppConfigService {
  getNodeEnv(): string {
    return this.getString('NODE_ENV', 'development') || 'development';
  }

  isProduction(): boolean {
    return this.getNodeEnv() === 'production';
  }

  isTest(): boolean {
    return this.getNodeEnv() === 'test';
  }

  getString(key: string, fallback?: string): string | undefined {
    const value = process.env[key];
    if (value === undefined || value === '') return fallback;
    return value;
  }

  getNumber(key: string, fallback?: number): number | undefined {
    const raw = this.getString(key);
    if (raw === undefined) return fallback;
    const num = Number(raw);
    return Number.isFinite(num) ? num : fallback;
  }

  getBoolean(key: string, fallback = false): boolean {
    const raw = this.getString(key);
    if (raw === undefined) return fallback;
    const normalized = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
    return fallback;
  }

  getDatabaseUrl(): string | undefined {
    return this.getString('DATABASE_URL');
  }

  getDbPoolMax(): number {
    return Math.max(1, this.getNumber('DB_POOL_MAX', 10) ?? 10);
  }

  getDbSlowQueryMs(): number {
    return this.getNumber('DB_SLOW_QUERY_MS', 0) ?? 0;
  }

  getPort(): number {
    return this.getNumber('PORT', 3000) ?? 3000;
  }

  getNoHttp(): boolean {
    return this.getBoolean('NO_HTTP');
  }

  getLogLevel(): string {
    return (
      this.getString('LOG_LEVEL') || (this.isProduction() ? 'info' : 'debug')
    );
  }

  getAdminKey(): string | undefined {
    return this.getString('ADMIN_KEY');
  }

  isWorkersEnabled(): boolean {
    return this.getBoolean('WORKERS_ENABLED', false);
  }

  getTenantConfigTtlMs(): number {
    return Math.max(0, this.getNumber('TENANT_CONFIG_TTL_MS', 30000) ?? 30000);
  }

  getCodeMaxAttempts(): number {
    return Math.max(1, Math.floor(this.getNumber('CODE_MAX_ATTEMPTS', 5) ?? 5));
  }

  getSyncWorkerIntervalMs(): number {
    return Math.max(
      1000,
      this.getNumber('SYNC_WORKER_INTERVAL_MS', 15000) ?? 15000,
    );
  }

  getSyncWorkerBatch(): number {
    return Math.max(1, Math.floor(this.getNumber('SYNC_WORKER_BATCH', 25) ?? 25));
  }

  getSyncWorkerConcurrency(): number {
    return Math.max(
      1,
      Math.floor(this.getNumber('SYNC_WORKER_CONCURRENCY', 3) ?? 3),
    );
  }

  getSyncBackoffBaseMs(): number {
    return Math.max(0, this.getNumber('SYNC_BACKOFF_BASE_MS', 60000) ?? 60000);
  }

  getSyncBackoffCapMs(): number {
    return Math.max(
      0,
      this.getNumber('SYNC_BACKOFF_CAP_MS', 3600000) ?? 3600000,
    );
  }

  getSyncBackoffJitter(): number {
    const raw = this.getNumber('SYNC_BACKOFF_JITTER', 0.1) ?? 0.1;
    return Math.min(1, Math.max(0, raw));
  }

  getSyncStaleMs(): number {
    return Math.max(60000, this.getNumber('SYNC_STALE_MS', 300000) ?? 300000);
  }

  getCrmHttpTimeoutMs(): number {
    return Math.max(1000, this.getNumber('CRM_HTTP_TIMEOUT_MS', 10000) ?? 10000);
  }

  getCrmHealthcheckMs(): number {
    return Math.max(0, this.getNumber('CRM_HEALTHCHECK_MS', 300000) ?? 300000);
  }
}
