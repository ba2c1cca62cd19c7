import {
  createLedgerHarness,
  TENANT_ID,
  tenantConfig,
  type LedgerHarness,
} from '../../../test/support/ledger.fixtures';
import type { DiscountToken, TokenKind } from './ledger.types';
import { DAY_MS } from './ledger.util';

describe('DiscountTokenService', () => {
  const ctx = { tenantId: TENANT_ID, memberId: 'm-1' };
  const past = () => new Date(Date.now() - 60_000);
  let h: LedgerHarness;

  const issueOk = async (
    kind: TokenKind = 'video',
    percent = 5,
  ): Promise<DiscountToken> => {
    const result = await h.tokens.issue(ctx, kind, percent);
    if (!result.ok) throw new Error(`issue failed: ${result.error.message}`);
    return result.value.token;
  };

  beforeEach(async () => {
    h = createLedgerHarness();
    await h.members.register({ tenantId: TENANT_ID, memberId: 'm-1' });
  });

  describe('issue', () => {
    it('issues a token and raises the member total', async () => {
      const result = await h.tokens.issue(ctx, 'video', 5);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const { token, member } = result.value;
      expect(token.code).toMatch(/^ACMVID[A-HJ-NP-Z2-9]{5}$/);
      expect(token).toMatchObject({
        tenantId: TENANT_ID,
        memberId: 'm-1',
        discountPercent: 5,
        kind: 'video',
        state: 'issued',
        redeemedAt: null,
        externalId: null,
      });
      expect(token.expiresAt.getTime() - token.issuedAt.getTime()).toBe(
        30 * DAY_MS,
      );
      expect(member.totalDiscountPercent).toBe(5);
      expect(
        h.store
          .allSyncRecords()
          .map((record) => `${record.entityType}:${record.entityId}`)
          .sort(),
      ).toEqual([`member:m-1`, `token:${token.id}`]);
      expect(h.sink.kinds()).toEqual(['member.registered', 'token.issued']);
    });

    it('rejects a request over the cap instead of clamping it', async () => {
      h.store.patchMember(TENANT_ID, 'm-1', { totalDiscountPercent: 15 });

      const result = await h.tokens.issue(ctx, 'review', 10);

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'cap_exceeded',
          message: 'Discount cap of 20% would be exceeded',
          currentPercent: 15,
          requestedPercent: 10,
          maxPercent: 20,
        },
      });
      const member = await h.members.find(TENANT_ID, 'm-1');
      expect(member.ok && member.value.totalDiscountPercent).toBe(15);
      expect(h.store.allTokens()).toHaveLength(0);
      expect(await h.metrics.exportProm()).toContain(
        'ledger_tokens_rejected_total{reason="cap_exceeded"} 1',
      );
    });

    it('accepts a request that lands exactly on the cap', async () => {
      h.store.patchMember(TENANT_ID, 'm-1', { totalDiscountPercent: 15 });

      const result = await h.tokens.issue(ctx, 'review', 5);

      expect(result.ok && result.value.member.totalDiscountPercent).toBe(20);
    });

    it('never exceeds the cap under concurrent issues', async () => {
      const results = await Promise.all(
        Array.from({ length: 10 }, () => h.tokens.issue(ctx, 'social', 5)),
      );

      expect(results.filter((r) => r.ok)).toHaveLength(4);
      expect(
        results.filter((r) => !r.ok && r.error.kind === 'cap_exceeded'),
      ).toHaveLength(6);
      const member = await h.members.find(TENANT_ID, 'm-1');
      expect(member.ok && member.value.totalDiscountPercent).toBe(20);
      const codes = h.store.allTokens().map((token) => token.code);
      expect(codes).toHaveLength(4);
      expect(new Set(codes).size).toBe(4);
    });

    it('validates the percent and the expiry', async () => {
      for (const percent of [0, 101, 2.5]) {
        await expect(h.tokens.issue(ctx, 'video', percent)).resolves.toEqual({
          ok: false,
          error: {
            kind: 'validation',
            message: 'discount percent must be an integer between 1 and 100',
            field: 'requestedPercent',
          },
        });
      }
      await expect(h.tokens.issue(ctx, 'video', 5, past())).resolves.toEqual({
        ok: false,
        error: {
          kind: 'validation',
          message: 'expiry must be in the future',
          field: 'expiresAt',
        },
      });
    });

    it('fails for an unknown member without changing anything', async () => {
      const result = await h.tokens.issue(
        { tenantId: TENANT_ID, memberId: 'ghost' },
        'video',
        5,
      );

      expect(result).toEqual({
        ok: false,
        error: { kind: 'not_found', entity: 'member', message: 'Member ghost not found' },
      });
      expect(h.store.allTokens()).toHaveLength(0);
    });

    it('uses discount_per_action for action rewards', async () => {
      const result = await h.tokens.issueForAction(ctx, 'review');

      expect(result).toMatchObject({
        ok: true,
        value: { token: { kind: 'review', discountPercent: 5 } },
      });
    });

    it('credits the points of the token kind with the issue', async () => {
      const result = await h.tokens.issue(ctx, 'video', 5);

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const { token, member, pointsAwarded } = result.value;
      expect(pointsAwarded).toBe(5);
      expect(member).toMatchObject({
        pointsBalance: 5,
        tokensIssued: 1,
        totalDiscountPercent: 5,
      });
      await expect(h.points.balance(ctx)).resolves.toEqual({ ok: true, value: 5 });
      const history = await h.points.history(ctx);
      expect(history.ok && history.value).toEqual([
        expect.objectContaining({
          memberId: 'm-1',
          pointsDelta: 5,
          action: 'video',
          idempotencyKey: `token:${token.id}`,
          externalRef: token.code,
        }),
      ]);
      expect(await h.metrics.exportProm()).toContain(
        'ledger_points_awarded_total{action="video"} 5',
      );
    });

    it('issues without points when the kind has none configured', async () => {
      const result = await h.tokens.issue(ctx, 'social', 5);

      expect(result.ok && result.value.pointsAwarded).toBe(0);
      expect(result.ok && result.value.member).toMatchObject({
        pointsBalance: 0,
        tokensIssued: 1,
      });
      const history = await h.points.history(ctx);
      expect(history.ok && history.value).toEqual([]);
    });

    it('awards nothing when the cap rejects the issue', async () => {
      h.store.patchMember(TENANT_ID, 'm-1', { totalDiscountPercent: 18 });

      const result = await h.tokens.issue(ctx, 'review', 5);

      expect(result.ok).toBe(false);
      await expect(h.points.balance(ctx)).resolves.toEqual({ ok: true, value: 0 });
      const member = await h.store.findMember(TENANT_ID, 'm-1');
      expect(member?.tokensIssued).toBe(0);
      const history = await h.points.history(ctx);
      expect(history.ok && history.value).toEqual([]);
    });
  });

  describe('validate', () => {
    it('reports a live token as valid, normalising the input', async () => {
      const token = await issueOk();

      const result = await h.tokens.validate(
        `  ${token.code.toLowerCase()} `,
        TENANT_ID,
      );

      expect(result).toMatchObject({
        ok: true,
        value: { status: 'valid', discountPercent: 5 },
      });
    });

    it('treats malformed and unknown codes as invalid', async () => {
      await expect(h.tokens.validate('hello', TENANT_ID)).resolves.toEqual({
        ok: true,
        value: { status: 'invalid' },
      });
      await expect(h.tokens.validate('ACMVIDAAAAA', TENANT_ID)).resolves.toEqual({
        ok: true,
        value: { status: 'invalid' },
      });
    });

    it('expires an issued token past its expiry and keeps it expired', async () => {
      const token = await issueOk();
      h.store.patchToken(token.id, { expiresAt: past() });

      const first = await h.tokens.validate(token.code, TENANT_ID);
      const second = await h.tokens.validate(token.code, TENANT_ID);

      expect(first.ok && first.value.status).toBe('expired');
      expect(second.ok && second.value.status).toBe('expired');
      expect(h.store.allTokens()[0].state).toBe('expired');
      expect(await h.metrics.exportProm()).toContain(
        'ledger_tokens_expired_total 1',
      );
      await expect(h.tokens.redeem(token.code, TENANT_ID)).resolves.toEqual({
        ok: false,
        error: {
          kind: 'conflict',
          reason: 'token_expired',
          message: `Token ${token.code} has expired`,
        },
      });
    });
  });

  describe('redeem', () => {
    it('redeems once and reports later attempts as used', async () => {
      const token = await issueOk();

      const first = await h.tokens.redeem(token.code, TENANT_ID, {
        memberId: 'm-1',
        redeemedBy: ' till-3 ',
      });
      const second = await h.tokens.redeem(token.code, TENANT_ID);

      expect(first).toMatchObject({
        ok: true,
        value: { id: token.id, state: 'redeemed', redeemedBy: 'till-3' },
      });
      expect(second).toEqual({
        ok: false,
        error: {
          kind: 'conflict',
          reason: 'token_used',
          message: `Token ${token.code} already redeemed`,
        },
      });
      await expect(h.tokens.validate(token.code, TENANT_ID)).resolves.toMatchObject({
        ok: true,
        value: { status: 'used' },
      });
      expect(h.sink.kinds()).toEqual([
        'member.registered',
        'token.issued',
        'token.redeemed',
      ]);
    });

    it('lets exactly one of many concurrent redeems win', async () => {
      const token = await issueOk();

      const results = await Promise.all(
        Array.from({ length: 5 }, () => h.tokens.redeem(token.code, TENANT_ID)),
      );

      expect(results.filter((r) => r.ok)).toHaveLength(1);
      expect(
        results.filter(
          (r) =>
            !r.ok && r.error.kind === 'conflict' && r.error.reason === 'token_used',
        ),
      ).toHaveLength(4);
    });

    it('does not give back discount on redemption', async () => {
      const token = await issueOk('video', 10);
      await h.tokens.redeem(token.code, TENANT_ID);

      const member = await h.members.find(TENANT_ID, 'm-1');

      expect(member.ok && member.value.totalDiscountPercent).toBe(10);
    });

    it('rejects a token presented by another member', async () => {
      const token = await issueOk();

      await expect(
        h.tokens.redeem(token.code, TENANT_ID, { memberId: 'm-2' }),
      ).resolves.toEqual({
        ok: false,
        error: {
          kind: 'validation',
          message: 'token belongs to another member',
          field: 'memberId',
        },
      });
      expect(h.store.allTokens()[0].state).toBe('issued');
    });

    it('scopes codes to their tenant', async () => {
      h.store.seedTenant(tenantConfig({ tenantId: 'other-shop', name: 'Other' }));
      const token = await issueOk();

      await expect(h.tokens.redeem(token.code, 'other-shop')).resolves.toEqual({
        ok: false,
        error: {
          kind: 'not_found',
          entity: 'token',
          message: `Token ${token.code} not found`,
        },
      });
    });
  });

  it('summarises token usage per tenant and member', async () => {
    const redeemed = await issueOk('video');
    const expired = await issueOk('review');
    await issueOk('review');
    await h.tokens.redeem(redeemed.code, TENANT_ID);
    h.store.patchToken(expired.id, { expiresAt: past() });
    await h.tokens.validate(expired.code, TENANT_ID);

    await expect(h.tokens.stats(TENANT_ID, 'm-1')).resolves.toEqual({
      ok: true,
      value: {
        total: 3,
        issued: 1,
        redeemed: 1,
        expired: 1,
        usageRate: 0.33,
        byKind: { signup: 0, social: 0, review: 2, video: 1, special: 0 },
      },
    });
    const listed = await h.tokens.listForMember(ctx, { state: 'issued' });
    expect(listed.ok && listed.value.map((token) => token.kind)).toEqual([
      'review',
    ]);
  });
});
