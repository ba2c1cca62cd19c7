import {
  createLedgerHarness,
  TENANT_ID,
  type LedgerHarness,
} from '../../../test/support/ledger.fixtures';

describe('MembersService', () => {
  let h: LedgerHarness;

  beforeEach(() => {
    h = createLedgerHarness();
  });

  it('registers a member with a trimmed profile and queues a CRM create', async () => {
    const result = await h.members.register({
      tenantId: TENANT_ID,
      memberId: ' m-7 ',
      displayName: '  Dana  ',
      email: 'dana@example.test',
      phone: '',
    });

    expect(result).toMatchObject({
      ok: true,
      value: {
        tenantId: TENANT_ID,
        memberId: 'm-7',
        displayName: 'Dana',
        email: 'dana@example.test',
        phone: null,
        pointsBalance: 0,
        totalDiscountPercent: 0,
        tokensIssued: 0,
        externalId: null,
      },
    });
    expect(h.store.allSyncRecords()).toEqual([
      expect.objectContaining({
        entityType: 'member',
        entityId: 'm-7',
        operation: 'create',
        state: 'pending',
        externalId: null,
      }),
    ]);
    expect(h.sink.events).toEqual([
      {
        tenantId: TENANT_ID,
        memberId: 'm-7',
        kind: 'member.registered',
        payload: { displayName: 'Dana' },
      },
    ]);
  });

  it('rejects a second registration of the same member', async () => {
    await h.members.register({ tenantId: TENANT_ID, memberId: 'm-7' });

    const again = await h.members.register({ tenantId: TENANT_ID, memberId: 'm-7' });

    expect(again).toEqual({
      ok: false,
      error: {
        kind: 'conflict',
        reason: 'already_exists',
        message: 'Member m-7 already exists',
      },
    });
    expect(h.store.allSyncRecords()).toHaveLength(1);
    expect(h.sink.kinds()).toEqual(['member.registered']);
  });

  it('validates the member id and e-mail', async () => {
    await expect(
      h.members.register({ tenantId: TENANT_ID, memberId: 'has space' }),
    ).resolves.toEqual({
      ok: false,
      error: { kind: 'validation', message: 'invalid member id', field: 'memberId' },
    });
    await expect(
      h.members.register({
        tenantId: TENANT_ID,
        memberId: 'm-8',
        email: 'not-an-email',
      }),
    ).resolves.toEqual({
      ok: false,
      error: { kind: 'validation', message: 'invalid email', field: 'email' },
    });
  });

  it('treats an inactive tenant as not found', async () => {
    h.store.patchTenant(TENANT_ID, { active: false });

    await expect(
      h.members.register({ tenantId: TENANT_ID, memberId: 'm-9' }),
    ).resolves.toEqual({
      ok: false,
      error: {
        kind: 'not_found',
        entity: 'tenant',
        message: `Tenant ${TENANT_ID} is inactive`,
      },
    });
  });

  it('finds registered members', async () => {
    await h.members.register({ tenantId: TENANT_ID, memberId: 'm-7' });

    await expect(h.members.find(TENANT_ID, 'm-7')).resolves.toMatchObject({
      ok: true,
      value: { memberId: 'm-7' },
    });
    await expect(h.members.find(TENANT_ID, 'm-0')).resolves.toMatchObject({
      ok: false,
      error: { kind: 'not_found', entity: 'member' },
    });
  });
});
