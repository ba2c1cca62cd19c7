import { Injectable, Logger } from '@nestjs/common';
import { AppConfigService } from '../../core/config/app-config.service';
import { MetricsService } from '../../core/metrics/metrics.service';
import {
  ExternalTimeoutError,
  fetchWithTimeout,
  readResponseJsonSafe,
  readResponseTextSafe,
  type ExternalHttpContext,
} from '../../shared/http/external-http.util';
import { formatError, truncateError } from '../../shared/logging/format-error.util';
import { isRecord } from '../../shared/common/record.util';
import { ExternalSyncError } from '../ledger/ledger.errors';
import type { CrmSettings } from '../ledger/ledger.types';
import { REFERENCE_FIELDS } from './crm-payload.mapper';
import type {
  CrmClientFactory,
  CrmConnectionTest,
  CrmPayload,
  ExternalCrmClient,
} from './crm-client.types';
import type { SyncEntityType } from './sync.types';

const MODELS: Record<SyncEntityType, string> = {
  member: 'res.partner',
  token: 'product.product',
};

/** Odoo exception classes caused by the payload itself; resending cannot help. */
const NON_RETRYABLE_ERRORS = [
  'odoo.exceptions.ValidationError',
  'odoo.exceptions.UserError',
  'odoo.exceptions.MissingError',
];

export type OdooClientOptions = {
  tenantId: string;
  timeoutMs: number;
  metrics?: MetricsService;
};

/**
 * Odoo external API over JSON-RPC (`/jsonrpc`): `common.login` once per
 * session, then `object.execute_kw` for model calls.
 */
export class OdooCrmClient implements ExternalCrmClient {
  private readonly logger = new Logger(OdooCrmClient.name);
  private readonly endpoint: string;
  private uid: number | null = null;
  private requestId = 0;

  constructor(
    private readonly settings: CrmSettings,
    private readonly options: OdooClientOptions,
  ) {
    try {
      this.endpoint = new URL('/jsonrpc', settings.url).toString();
    } catch {
      throw new ExternalSyncError(`Invalid CRM url: ${settings.url}`, false);
    }
  }

  async create(entityType: SyncEntityType, payload: CrmPayload): Promise<string> {
    const model = MODELS[entityType];
    const refField = REFERENCE_FIELDS[entityType];
    const ref = payload[refField];
    if (typeof ref === 'string' && ref) {
      const found = await this.executeKw(
        model,
        'search',
        [[[refField, '=', ref]]],
        { limit: 1 },
      );
      if (Array.isArray(found) && typeof found[0] === 'number') {
        const existingId = String(found[0]);
        await this.update(entityType, existingId, payload);
        return existingId;
      }
    }
    const created = await this.executeKw(model, 'create', [payload]);
    if (typeof created !== 'number') {
      throw new ExternalSyncError(
        `Odoo ${model}.create returned no id`,
        false,
      );
    }
    return String(created);
  }

  async update(
    entityType: SyncEntityType,
    externalId: string,
    payload: CrmPayload,
  ): Promise<void> {
    const model = MODELS[entityType];
    const id = Number(externalId);
    if (!Number.isInteger(id) || id <= 0) {
      throw new ExternalSyncError(`Invalid Odoo id: ${externalId}`, false);
    }
    const written = await this.executeKw(model, 'write', [[id], payload]);
    if (written !== true) {
      throw new ExternalSyncError(`Odoo ${model}.write was rejected`, false);
    }
  }

  async testConnection(): Promise<CrmConnectionTest> {
    try {
      const version = await this.call('common', 'version', []);
      this.uid = null;
      await this.login();
      const serverVersion =
        isRecord(version) && typeof version.server_version === 'string'
          ? version.server_version
          : undefined;
      return {
        ok: true,
        status: 'connected',
        message: 'Connection OK',
        serverVersion,
      };
    } catch (err) {
      if (err instanceof ExternalSyncError) {
        return { ok: false, status: 'error', message: err.message };
      }
      throw err;
    }
  }

  async close(): Promise<void> {
    this.uid = null;
  }

  private async login(): Promise<number> {
    if (this.uid !== null) return this.uid;
    const uid = await this.call('common', 'login', [
      this.settings.database,
      this.settings.username,
      this.settings.secret,
    ]);
    if (typeof uid !== 'number' || uid <= 0) {
      // credentials can be corrected by the tenant, so keep retrying
      throw new ExternalSyncError('Odoo authentication failed', true);
    }
    this.uid = uid;
    return uid;
  }

  private async executeKw(
    model: string,
    method: string,
    args: unknown[],
    kwargs: Record<string, unknown> = {},
  ): Promise<unknown> {
    const uid = await this.login();
    return this.call('object', 'execute_kw', [
      this.settings.database,
      uid,
      this.settings.secret,
      model,
      method,
      args,
      kwargs,
    ]);
  }

  private async call(
    service: 'common' | 'object',
    method: string,
    args: unknown[],
  ): Promise<unknown> {
    const context: ExternalHttpContext = {
      label: `OdooCrmClient ${service}.${method}`,
      provider: 'odoo',
      endpoint: `${service}.${method}`,
      tenantId: this.options.tenantId,
    };
    let res: Response;
    try {
      res = await fetchWithTimeout(
        this.endpoint,
        {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({
            jsonrpc: '2.0',
            method: 'call',
            params: { service, method, args },
            id: ++this.requestId,
          }),
        },
        {
          timeoutMs: this.options.timeoutMs,
          context,
          metrics: this.options.metrics,
        },
      );
    } catch (err) {
      if (err instanceof ExternalTimeoutError) {
        throw new ExternalSyncError(err.message, true);
      }
      throw new ExternalSyncError(
        `Odoo request failed: ${formatError(err)}`,
        true,
      );
    }
    if (!res.ok) {
      const text = await readResponseTextSafe(res, {
        context,
        logger: this.logger,
      });
      throw new ExternalSyncError(
        truncateError(`Odoo HTTP ${res.status}: ${text}`, 500),
        res.status >= 500 || res.status === 429 || res.status === 408,
        res.status,
      );
    }
    const body = await readResponseJsonSafe(res, {
      context,
      logger: this.logger,
    });
    if (!isRecord(body)) {
      throw new ExternalSyncError('Odoo returned a malformed response', true);
    }
    if (isRecord(body.error)) {
      throw this.rpcError(body.error);
    }
    return body.result;
  }

  private rpcError(error: Record<string, unknown>): ExternalSyncError {
    const data = isRecord(error.data) ? error.data : {};
    const name = typeof data.name === 'string' ? data.name : '';
    const detail =
      typeof data.message === 'string' && data.message
        ? data.message
        : typeof error.message === 'string'
          ? error.message
          : 'unknown error';
    return new ExternalSyncError(
      truncateError(`Odoo error${name ? ` (${name})` : ''}: ${detail}`, 500),
      !NON_RETRYABLE_ERRORS.includes(name),
    );
  }
}

@Injectable()
export class OdooCrmClientFactory implements CrmClientFactory {
  constructor(
    private readonly config: AppConfigService,
    private readonly metrics: MetricsService,
  ) {}

  create(tenantId: string, settings: CrmSettings): OdooCrmClient {
    return new OdooCrmClient(settings, {
      tenantId,
      timeoutMs: this.config.getCrmHttpTimeoutMs(),
      metrics: this.metrics,
    });
  }
}
