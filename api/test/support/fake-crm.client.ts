import type {
  CrmClientFactory,
  CrmConnectionTest,
  CrmPayload,
  ExternalCrmClient,
} from '../../src/modules/crm-sync/crm-client.types';
import { REFERENCE_FIELDS } from '../../src/modules/crm-sync/crm-payload.mapper';
import type { SyncEntityType } from '../../src/modules/crm-sync/sync.types';
import type { CrmSettings } from '../../src/modules/ledger/ledger.types';

export type CrmCall =
  | { op: 'create'; entityType: SyncEntityType; payload: CrmPayload }
  | {
      op: 'update';
      entityType: SyncEntityType;
      externalId: string;
      payload: CrmPayload;
    };

/**
 * Scripted CRM: keeps remote rows keyed by their reference field so repeated
 * creates resolve to the same id, like the search-then-write of the real
 * client. `failWith` queues errors thrown by the next create/update calls.
 * With `dedupeByRef: false` every create makes a new remote row, the way a
 * CRM without a reference lookup behaves.
 */
export class FakeCrmClient implements ExternalCrmClient {
  readonly calls: CrmCall[] = [];
  readonly remote = new Map<string, { id: string; payload: CrmPayload }>();
  closed = false;
  health: CrmConnectionTest = { ok: true, status: 'connected', message: 'ok' };
  private readonly failures: Error[] = [];
  private nextId = 100;

  constructor(private readonly opts: { dedupeByRef?: boolean } = {}) {}

  failWith(...errors: Error[]) {
    this.failures.push(...errors);
  }

  async create(entityType: SyncEntityType, payload: CrmPayload) {
    this.calls.push({ op: 'create', entityType, payload });
    this.throwIfScripted();
    if (this.opts.dedupeByRef === false) {
      const id = String(this.nextId++);
      this.remote.set(`${entityType}#${id}`, { id, payload });
      return id;
    }
    const key = this.refKey(entityType, payload);
    const existing = this.remote.get(key);
    if (existing) {
      this.remote.set(key, { id: existing.id, payload });
      return existing.id;
    }
    const id = String(this.nextId++);
    this.remote.set(key, { id, payload });
    return id;
  }

  async update(
    entityType: SyncEntityType,
    externalId: string,
    payload: CrmPayload,
  ) {
    this.calls.push({ op: 'update', entityType, externalId, payload });
    this.throwIfScripted();
    const key =
      this.opts.dedupeByRef === false
        ? `${entityType}#${externalId}`
        : this.refKey(entityType, payload);
    this.remote.set(key, { id: externalId, payload });
  }

  async testConnection() {
    return this.health;
  }

  async close() {
    this.closed = true;
  }

  private refKey(entityType: SyncEntityType, payload: CrmPayload) {
    return `${entityType}:${String(payload[REFERENCE_FIELDS[entityType]])}`;
  }

  private throwIfScripted() {
    const failure = this.failures.shift();
    if (failure) throw failure;
  }
}

export class FakeCrmClientFactory implements CrmClientFactory {
  readonly created: Array<{
    tenantId: string;
    settings: CrmSettings;
    client: FakeCrmClient;
  }> = [];

  constructor(private readonly make: () => FakeCrmClient = () => new FakeCrmClient()) {}

  create(tenantId: string, settings: CrmSettings): FakeCrmClient {
    const client = this.make();
    this.created.push({ tenantId, settings, client });
    return client;
  }
}
