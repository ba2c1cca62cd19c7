import { INestApplication, ValidationPipe } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppConfigService } from '../../core/config/app-config.service';
import { HttpErrorFilter } from '../../core/filters/http-error.filter';
import { conflictError, fail, ok, type Result } from '../ledger/ledger.errors';
import { CrmSyncController } from './crm-sync.controller';
import { CrmSyncService } from './crm-sync.service';

type ResultMock = jest.Mock<Promise<Result<unknown>>, unknown[]>;
type SyncServiceStub = {
  runNow: ResultMock;
  listRecords: ResultMock;
  replay: ResultMock;
  stats: ResultMock;
  testConnection: ResultMock;
};

const resultMock = (): ResultMock => jest.fn<Promise<Result<unknown>>, unknown[]>();

const RECORD_ID = '5f0c7a3e-2b1d-4c8e-9a6f-0d3b2e1c4a5f';

describe('CrmSyncController (http)', () => {
  const origEnv = { ...process.env };
  let app: INestApplication;
  let sync: SyncServiceStub;

  beforeEach(async () => {
    process.env = { ...origEnv };
    process.env.ADMIN_KEY = 'test-secret';
    sync = {
      runNow: resultMock(),
      listRecords: resultMock(),
      replay: resultMock(),
      stats: resultMock(),
      testConnection: resultMock(),
    };
    const moduleFixture: TestingModule = await Test.createTestingModule({
      controllers: [CrmSyncController],
      providers: [
        AppConfigService,
        { provide: CrmSyncService, useValue: sync },
      ],
    }).compile();
    app = moduleFixture.createNestApplication();
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    app.useGlobalFilters(new HttpErrorFilter());
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    process.env = { ...origEnv };
  });

  it('rejects calls without the admin key', async () => {
    const res = await request(app.getHttpServer()).post(
      '/admin/tenants/acme-coffee/sync',
    );

    expect(res.status).toBe(401);
    expect(res.body).toMatchObject({
      code: 'Unauthorized',
      message: 'Missing or invalid admin key',
      statusCode: 401,
    });
    expect(sync.runNow).not.toHaveBeenCalled();
  });

  it('passes force through and returns the run result', async () => {
    sync.runNow.mockResolvedValue(ok({ ran: true, summary: { completed: 2 } }));

    const res = await request(app.getHttpServer())
      .post('/admin/tenants/acme-coffee/sync?force=1')
      .set('x-admin-key', 'test-secret');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ran: true, summary: { completed: 2 } });
    expect(sync.runNow).toHaveBeenCalledWith('acme-coffee', { force: true });
  });

  it('defaults to a regular run', async () => {
    sync.runNow.mockResolvedValue(ok({ ran: false, reason: 'not_due' }));

    await request(app.getHttpServer())
      .post('/admin/tenants/acme-coffee/sync')
      .set('x-admin-key', 'test-secret')
      .expect(200);

    expect(sync.runNow).toHaveBeenCalledWith('acme-coffee', { force: false });
  });

  it('lists dead records unless another state is asked for', async () => {
    sync.listRecords.mockResolvedValue(ok([]));

    await request(app.getHttpServer())
      .get('/admin/tenants/acme-coffee/sync/records')
      .set('x-admin-key', 'test-secret')
      .expect(200);
    await request(app.getHttpServer())
      .get('/admin/tenants/acme-coffee/sync/records?state=Retry&limit=10')
      .set('x-admin-key', 'test-secret')
      .expect(200);

    expect(sync.listRecords.mock.calls).toEqual([
      ['acme-coffee', 'dead', undefined],
      ['acme-coffee', 'retry', 10],
    ]);
  });

  it('refuses unknown record states', async () => {
    const res = await request(app.getHttpServer())
      .get('/admin/tenants/acme-coffee/sync/records?state=lost')
      .set('x-admin-key', 'test-secret');

    expect(res.status).toBe(400);
    expect(res.body.code).toBe('BadRequest');
    expect(sync.listRecords).not.toHaveBeenCalled();
  });

  it('maps ledger conflicts to 409 with the reason in details', async () => {
    sync.replay.mockResolvedValue(
      fail(
        conflictError(
          'state_changed',
          'Only dead records can be replayed (state=completed)',
        ),
      ),
    );

    const res = await request(app.getHttpServer())
      .post(`/admin/sync/records/${RECORD_ID}/replay`)
      .set('x-admin-key', 'test-secret');

    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({
      error: 'conflict',
      code: 'conflict',
      message: 'Only dead records can be replayed (state=completed)',
      statusCode: 409,
      path: `/admin/sync/records/${RECORD_ID}/replay`,
      details: { reason: 'state_changed' },
    });
    expect(sync.replay).toHaveBeenCalledWith(RECORD_ID);
  });

  it('validates the record id before replaying', async () => {
    const res = await request(app.getHttpServer())
      .post('/admin/sync/records/not-a-uuid/replay')
      .set('x-admin-key', 'test-secret');

    expect(res.status).toBe(400);
    expect(sync.replay).not.toHaveBeenCalled();
  });

  it('reads the stats window from the query', async () => {
    sync.stats.mockResolvedValue(ok({ tenantId: 'acme-coffee', windowDays: 7 }));

    const res = await request(app.getHttpServer())
      .get('/admin/tenants/acme-coffee/sync/stats?days=7')
      .set('x-admin-key', 'test-secret');

    expect(res.status).toBe(200);
    expect(sync.stats).toHaveBeenCalledWith('acme-coffee', 7);

    await request(app.getHttpServer())
      .get('/admin/tenants/acme-coffee/sync/stats?days=900')
      .set('x-admin-key', 'test-secret')
      .expect(400);
  });

  it('maps an unreachable CRM to 502', async () => {
    sync.testConnection.mockResolvedValue(
      fail({ kind: 'external_sync', message: 'CRM unavailable', retryable: true }),
    );

    const res = await request(app.getHttpServer())
      .post('/admin/tenants/acme-coffee/crm/test')
      .set('x-admin-key', 'test-secret');

    expect(res.status).toBe(502);
    expect(res.body).toMatchObject({
      code: 'external_sync',
      message: 'CRM unavailable',
      details: { retryable: true },
    });
  });
});
