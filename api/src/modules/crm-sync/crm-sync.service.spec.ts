import { AppConfigService } from '../../core/config/app-config.service';
import {
  FakeCrmClient,
  FakeCrmClientFactory,
} from '../../../test/support/fake-crm.client';
import {
  createLedgerHarness,
  TENANT_ID,
  type LedgerHarness,
} from '../../../test/support/ledger.fixtures';
import { ExternalSyncError } from '../ledger/ledger.errors';
import { CrmConnectionPool } from './crm-connection-pool.service';
import { CrmSyncService } from './crm-sync.service';
import { OutboundSyncWorker } from './outbound-sync.worker';
import type { SyncRecord } from './sync.types';

describe('CrmSyncService', () => {
  const origEnv = { ...process.env };
  let h: LedgerHarness;
  let client: FakeCrmClient;
  let factory: FakeCrmClientFactory;
  let pool: CrmConnectionPool;
  let service: CrmSyncService;

  const recordFor = (memberId: string): SyncRecord => {
    const record = h.store
      .allSyncRecords()
      .find((r) => r.entityType === 'member' && r.entityId === memberId);
    if (!record) throw new Error(`no sync record for ${memberId}`);
    return record;
  };

  beforeEach(async () => {
    process.env = { ...origEnv };
    process.env.SYNC_BACKOFF_JITTER = '0';
    process.env.CRM_HEALTHCHECK_MS = '0';
    h = createLedgerHarness();
    client = new FakeCrmClient();
    factory = new FakeCrmClientFactory(() => client);
    const config = new AppConfigService();
    pool = new CrmConnectionPool(factory, config);
    const worker = new OutboundSyncWorker(
      h.store,
      h.store,
      h.tenants,
      pool,
      h.metrics,
      config,
    );
    service = new CrmSyncService(h.store, factory, h.tenants, worker, pool);
    await h.members.register({ tenantId: TENANT_ID, memberId: 'm-1' });
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.env = { ...origEnv };
  });

  describe('runNow', () => {
    it('runs a due tenant and then waits for the interval', async () => {
      const first = await service.runNow(TENANT_ID);
      expect(first).toMatchObject({
        ok: true,
        value: { ran: true, summary: { completed: 1 } },
      });
      const state = await h.store.findSyncState(TENANT_ID);
      const lastRunAt = state?.lastRunAt?.getTime() ?? 0;

      const second = await service.runNow(TENANT_ID);

      expect(second).toEqual({
        ok: true,
        value: {
          ran: false,
          reason: 'not_due',
          nextRunAt: new Date(lastRunAt + 30 * 60_000),
        },
      });
    });

    it('runs immediately with force', async () => {
      await service.runNow(TENANT_ID);
      await h.members.register({ tenantId: TENANT_ID, memberId: 'm-2' });

      const forced = await service.runNow(TENANT_ID, { force: true });

      expect(forced).toMatchObject({
        ok: true,
        value: { ran: true, summary: { completed: 1 } },
      });
      expect(recordFor('m-2').state).toBe('completed');
    });

    it('refuses tenants with CRM sync disabled', async () => {
      h.store.patchTenant(TENANT_ID, { crmEnabled: false });
      h.tenants.invalidate();

      await expect(service.runNow(TENANT_ID)).resolves.toEqual({
        ok: false,
        error: {
          kind: 'validation',
          message: `CRM sync is disabled for tenant ${TENANT_ID}`,
          field: 'crmEnabled',
        },
      });
    });

    it('reports an unreachable CRM as an external sync failure', async () => {
      h.store.patchTenant(TENANT_ID, { crm: null });
      h.tenants.invalidate();

      await expect(service.runNow(TENANT_ID)).resolves.toEqual({
        ok: false,
        error: {
          kind: 'external_sync',
          message: `CRM settings for tenant ${TENANT_ID} are incomplete`,
          retryable: true,
        },
      });
    });
  });

  describe('dead letters', () => {
    beforeEach(async () => {
      await h.members.register({ tenantId: TENANT_ID, memberId: 'm-2' });
      h.store.deleteMember(TENANT_ID, 'm-2');
      await service.runNow(TENANT_ID);
    });

    it('lists dead records of a tenant', async () => {
      const listed = await service.listRecords(TENANT_ID, 'dead');

      expect(listed.ok && listed.value.map((record) => record.entityId)).toEqual([
        'm-2',
      ]);
      await expect(service.listRecords('nope', 'dead')).resolves.toMatchObject({
        ok: false,
        error: { kind: 'not_found', entity: 'tenant' },
      });
    });

    it('puts a dead record back in retry with a fresh budget', async () => {
      const dead = recordFor('m-2');

      const replayed = await service.replay(dead.id);

      expect(replayed).toMatchObject({
        ok: true,
        value: { id: dead.id, state: 'retry', retryCount: 0 },
      });
      expect(recordFor('m-2').nextAttemptAt).toBeInstanceOf(Date);
    });

    it('only replays dead records', async () => {
      const completed = recordFor('m-1');

      await expect(service.replay(completed.id)).resolves.toEqual({
        ok: false,
        error: {
          kind: 'conflict',
          reason: 'state_changed',
          message: 'Only dead records can be replayed (state=completed)',
        },
      });
      await expect(
        service.replay('00000000-0000-4000-8000-000000000000'),
      ).resolves.toMatchObject({
        ok: false,
        error: { kind: 'not_found', entity: 'sync_record' },
      });
    });

    it('summarises outcomes and errors over the window', async () => {
      const stats = await service.stats(TENANT_ID, 30);

      expect(stats).toMatchObject({
        ok: true,
        value: {
          tenantId: TENANT_ID,
          windowDays: 30,
          byState: {
            pending: 0,
            syncing: 0,
            completed: 1,
            failed: 0,
            retry: 0,
            dead: 1,
          },
          total: 2,
          successRate: 0.5,
          topErrors: [{ error: 'member m-2 no longer exists', count: 1 }],
          connectionStatus: 'connected',
          lastError: null,
        },
      });
      expect(stats.ok && stats.value.lastRunAt).toBeInstanceOf(Date);
    });

    it('clamps the stats window', async () => {
      const narrow = await service.stats(TENANT_ID, 0);
      const wide = await service.stats(TENANT_ID, 1000);

      expect(narrow.ok && narrow.value.windowDays).toBe(1);
      expect(wide.ok && wide.value.windowDays).toBe(365);
    });
  });

  describe('testConnection', () => {
    it('tests a throwaway client and stores the result', async () => {
      const result = await service.testConnection(TENANT_ID);

      expect(result).toEqual({
        ok: true,
        value: { ok: true, status: 'connected', message: 'ok' },
      });
      expect(client.closed).toBe(true);
      expect(pool.has(TENANT_ID)).toBe(false);
      await expect(h.store.findSyncState(TENANT_ID)).resolves.toEqual({
        tenantId: TENANT_ID,
        lastRunAt: null,
        connectionStatus: 'connected',
        lastError: null,
      });
    });

    it('records a failed test as a connection error', async () => {
      client.health = { ok: false, status: 'error', message: 'access denied' };

      const result = await service.testConnection(TENANT_ID);

      expect(result).toEqual({
        ok: true,
        value: { ok: false, status: 'error', message: 'access denied' },
      });
      await expect(h.store.findSyncState(TENANT_ID)).resolves.toMatchObject({
        connectionStatus: 'error',
        lastError: 'access denied',
      });
    });

    it('reports a client that cannot even be built', async () => {
      jest.spyOn(factory, 'create').mockImplementation(() => {
        throw new ExternalSyncError('Invalid CRM url: nope', false);
      });

      await expect(service.testConnection(TENANT_ID)).resolves.toEqual({
        ok: true,
        value: { ok: false, status: 'error', message: 'Invalid CRM url: nope' },
      });
    });

    it('needs complete connection settings', async () => {
      h.store.patchTenant(TENANT_ID, { crm: null });
      h.tenants.invalidate();

      await expect(service.testConnection(TENANT_ID)).resolves.toEqual({
        ok: false,
        error: {
          kind: 'validation',
          message: 'CRM connection settings are incomplete',
          field: 'crm',
        },
      });
    });
  });
});
