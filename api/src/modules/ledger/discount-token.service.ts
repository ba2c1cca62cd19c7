import { Inject, Injectable, Logger } from '@nestjs/common';
import { MetricsService } from '../../core/metrics/metrics.service';
import { safeMetric } from '../../shared/logging/event-log.util';
import { CodeGeneratorService } from './code-generator.service';
import {
  conflictError,
  fail,
  LedgerFailure,
  notFoundError,
  ok,
  runLedger,
  validationError,
  type Failure,
  type LedgerError,
  type Result,
} from './ledger.errors';
import { LedgerEventPublisher } from './ledger-events';
import { LEDGER_REPOSITORY, type LedgerRepository } from './ledger.repository';
import type {
  AuthContext,
  DiscountToken,
  Member,
  TenantConfig,
  TokenKind,
  TokenState,
  TokenStats,
} from './ledger.types';
import {
  addDays,
  clampLimit,
  memberSyncRecord,
  tokenSyncRecord,
} from './ledger.util';
import { TenantConfigService } from './tenant-config.service';

export type TokenValidation =
  | { status: 'invalid' }
  | { status: 'used'; token: DiscountToken }
  | { status: 'expired'; token: DiscountToken }
  | { status: 'valid'; discountPercent: number; token: DiscountToken };

export type IssueResult = {
  token: DiscountToken;
  member: Member;
  /** Points credited for the token's kind; 0 when the tenant sets none. */
  pointsAwarded: number;
};

export type RedeemOptions = {
  /** When set, the token must belong to this member. */
  memberId?: string;
  /** Free-form: cashier, outlet or channel that accepted the code. */
  redeemedBy?: string;
};

@Injectable()
export class DiscountTokenService {
  private readonly logger = new Logger(DiscountTokenService.name);

  constructor(
    @Inject(LEDGER_REPOSITORY) private readonly repo: LedgerRepository,
    private readonly tenants: TenantConfigService,
    private readonly codes: CodeGeneratorService,
    private readonly events: LedgerEventPublisher,
    private readonly metrics: MetricsService,
  ) {}

  /**
   * Issues a token and raises the member's total discount in one transaction.
   * A request that would push the total over the tenant cap is rejected as a
   * whole; the percent is never reduced to fit. The same transaction credits
   * the tenant's `points_per_action` for the token kind, keyed `token:<id>`.
   */
  async issue(
    ctx: AuthContext,
    kind: TokenKind,
    requestedPercent: number,
    expiresAt?: Date,
  ): Promise<Result<IssueResult>> {
    if (
      !Number.isInteger(requestedPercent) ||
      requestedPercent < 1 ||
      requestedPercent > 100
    ) {
      return this.reject(
        validationError(
          'discount percent must be an integer between 1 and 100',
          'requestedPercent',
        ),
      );
    }
    const tenant = await this.tenants.require(ctx.tenantId);
    if (!tenant.ok) return tenant;
    return this.issueWithConfig(
      tenant.value,
      ctx.memberId,
      kind,
      requestedPercent,
      expiresAt,
    );
  }

  /** Issues a token worth the tenant's `discount_per_action`. */
  async issueForAction(
    ctx: AuthContext,
    kind: TokenKind,
  ): Promise<Result<IssueResult>> {
    const tenant = await this.tenants.require(ctx.tenantId);
    if (!tenant.ok) return tenant;
    const percent = tenant.value.discountPerAction;
    if (!Number.isInteger(percent) || percent < 1 || percent > 100) {
      return this.reject(
        validationError(
          `tenant ${ctx.tenantId} has no valid discount_per_action`,
          'discountPerAction',
        ),
      );
    }
    return this.issueWithConfig(tenant.value, ctx.memberId, kind, percent);
  }

  /** Read-mostly check; an issued token past its expiry is marked expired. */
  async validate(
    code: string,
    tenantId: string,
  ): Promise<Result<TokenValidation>> {
    const tenant = await this.tenants.require(tenantId);
    if (!tenant.ok) return tenant;
    const normalized = normalizeCode(code);
    if (!this.codes.isWellFormed(normalized)) return ok({ status: 'invalid' });
    const token = await this.repo.findTokenByCode(tenantId, normalized);
    if (!token) return ok({ status: 'invalid' });
    return ok(await this.classify(tenant.value, token, new Date()));
  }

  /**
   * At-most-once: the state flip is a conditional update on
   * `state = issued AND expires_at > now`, so concurrent redeems of one code
   * produce exactly one success.
   */
  async redeem(
    code: string,
    tenantId: string,
    opts: RedeemOptions = {},
  ): Promise<Result<DiscountToken>> {
    const tenant = await this.tenants.require(tenantId);
    if (!tenant.ok) return tenant;
    const config = tenant.value;
    const normalized = normalizeCode(code);
    const token = await this.repo.findTokenByCode(tenantId, normalized);
    if (!token) {
      return fail(notFoundError('token', `Token ${normalized} not found`));
    }
    if (opts.memberId && token.memberId !== opts.memberId) {
      return fail(
        validationError('token belongs to another member', 'memberId'),
      );
    }

    const now = new Date();
    const redeemed = await this.repo.transaction(async (tx) => {
      const updated = await tx.transitionToken(token.id, {
        to: 'redeemed',
        at: now,
        redeemedBy: opts.redeemedBy?.trim() || null,
      });
      if (updated) await tx.enqueueSync(tokenSyncRecord(config, updated), now);
      return updated;
    });

    if (!redeemed) {
      const latest = (await this.repo.findTokenById(tenantId, token.id)) ?? token;
      const current = await this.classify(config, latest, now);
      switch (current.status) {
        case 'used':
          return this.reject(
            conflictError('token_used', `Token ${normalized} already redeemed`),
          );
        case 'expired':
          return this.reject(
            conflictError('token_expired', `Token ${normalized} has expired`),
          );
        default:
          return this.reject(
            conflictError('state_changed', `Token ${normalized} changed state`),
          );
      }
    }

    safeMetric(
      this.metrics,
      'ledger_tokens_redeemed_total',
      { kind: redeemed.kind },
      1,
      this.logger,
    );
    this.events.publish({
      tenantId,
      memberId: redeemed.memberId,
      kind: 'token.redeemed',
      payload: {
        tokenId: redeemed.id,
        code: redeemed.code,
        discountPercent: redeemed.discountPercent,
        redeemedBy: redeemed.redeemedBy,
      },
    });
    return ok(redeemed);
  }

  async listForMember(
    ctx: AuthContext,
    filter: { state?: TokenState; limit?: number } = {},
  ): Promise<Result<DiscountToken[]>> {
    const member = await this.repo.findMember(ctx.tenantId, ctx.memberId);
    if (!member) {
      return fail(notFoundError('member', `Member ${ctx.memberId} not found`));
    }
    return ok(
      await this.repo.listTokens(ctx.tenantId, {
        memberId: ctx.memberId,
        state: filter.state,
        limit: clampLimit(filter.limit),
      }),
    );
  }

  async stats(tenantId: string, memberId?: string): Promise<Result<TokenStats>> {
    const tenant = await this.tenants.require(tenantId);
    if (!tenant.ok) return tenant;
    const counts = await this.repo.countTokens(tenantId, memberId);
    const { issued, redeemed, expired } = counts.byState;
    const total = issued + redeemed + expired;
    return ok({
      total,
      issued,
      redeemed,
      expired,
      usageRate: total > 0 ? Math.round((redeemed / total) * 100) / 100 : 0,
      byKind: counts.byKind,
    });
  }

  private async issueWithConfig(
    config: TenantConfig,
    memberId: string,
    kind: TokenKind,
    percent: number,
    expiresAt?: Date,
  ): Promise<Result<IssueResult>> {
    const now = new Date();
    const expiry = expiresAt ?? addDays(now, config.tokenExpirationDays);
    if (Number.isNaN(expiry.getTime()) || expiry.getTime() <= now.getTime()) {
      return this.reject(
        validationError('expiry must be in the future', 'expiresAt'),
      );
    }

    const result = await runLedger(() =>
      this.repo.transaction(async (tx) => {
        const member = await tx.findMember(config.tenantId, memberId);
        if (!member) {
          throw new LedgerFailure(
            notFoundError('member', `Member ${memberId} not found`),
          );
        }
        const capped = await tx.increaseDiscountWithinCap(
          config.tenantId,
          memberId,
          percent,
          config.maxDiscountPercent,
          now,
        );
        if (!capped) {
          throw new LedgerFailure({
            kind: 'cap_exceeded',
            message: `Discount cap of ${config.maxDiscountPercent}% would be exceeded`,
            currentPercent: member.totalDiscountPercent,
            requestedPercent: percent,
            maxPercent: config.maxDiscountPercent,
          });
        }
        const generated = await this.codes.generate(
          config.tenantId,
          kind,
          (code) =>
            tx.insertTokenIfCodeAbsent({
              tenantId: config.tenantId,
              memberId,
              code,
              discountPercent: percent,
              kind,
              issuedAt: now,
              expiresAt: expiry,
            }),
        );
        if (!generated.ok) throw new LedgerFailure(generated.error);
        const token = generated.value.value;
        const pointsAwarded = config.pointsPerAction[kind] ?? 0;
        let updated = capped;
        if (pointsAwarded > 0) {
          const entry = await tx.insertLedgerEntry({
            tenantId: config.tenantId,
            memberId,
            pointsDelta: pointsAwarded,
            action: kind,
            reason: `token issued: ${kind}`,
            idempotencyKey: `token:${token.id}`,
            externalRef: token.code,
            createdAt: now,
          });
          if (!entry) {
            throw new LedgerFailure(
              conflictError(
                'duplicate_idempotency_key',
                `Points already awarded for token ${token.code}`,
              ),
            );
          }
          const credited = await tx.addPoints(
            config.tenantId,
            memberId,
            pointsAwarded,
            now,
          );
          if (!credited) {
            throw new LedgerFailure(
              notFoundError('member', `Member ${memberId} not found`),
            );
          }
          updated = credited;
        }
        await tx.enqueueSync(tokenSyncRecord(config, token), now);
        await tx.enqueueSync(memberSyncRecord(config, updated), now);
        return { token, member: updated, pointsAwarded };
      }),
    );
    if (!result.ok) return this.reject(result.error);

    const { token, member, pointsAwarded } = result.value;
    safeMetric(
      this.metrics,
      'ledger_tokens_issued_total',
      { kind },
      1,
      this.logger,
    );
    if (pointsAwarded > 0) {
      safeMetric(
        this.metrics,
        'ledger_points_awarded_total',
        { action: kind },
        pointsAwarded,
        this.logger,
      );
    }
    this.events.publish({
      tenantId: config.tenantId,
      memberId,
      kind: 'token.issued',
      payload: {
        tokenId: token.id,
        code: token.code,
        tokenKind: kind,
        discountPercent: token.discountPercent,
        expiresAt: token.expiresAt.toISOString(),
        totalDiscountPercent: member.totalDiscountPercent,
        pointsAwarded,
        pointsBalance: member.pointsBalance,
      },
    });
    return result;
  }

  private async classify(
    config: TenantConfig,
    token: DiscountToken,
    now: Date,
  ): Promise<TokenValidation> {
    switch (token.state) {
      case 'redeemed':
        return { status: 'used', token };
      case 'expired':
        return { status: 'expired', token };
      case 'issued':
        break;
    }
    if (token.expiresAt.getTime() > now.getTime()) {
      return { status: 'valid', discountPercent: token.discountPercent, token };
    }
    const expired = await this.repo.transaction(async (tx) => {
      const updated = await tx.transitionToken(token.id, {
        to: 'expired',
        at: now,
      });
      if (updated) await tx.enqueueSync(tokenSyncRecord(config, updated), now);
      return updated;
    });
    if (expired) {
      safeMetric(this.metrics, 'ledger_tokens_expired_total', {}, 1, this.logger);
      return { status: 'expired', token: expired };
    }
    // lost the race: another request redeemed or expired it first
    const current = await this.repo.findTokenById(config.tenantId, token.id);
    if (current?.state === 'redeemed') return { status: 'used', token: current };
    return { status: 'expired', token: current ?? token };
  }

  private reject(error: LedgerError): Failure {
    const reason = error.kind === 'conflict' ? error.reason : error.kind;
    safeMetric(
      this.metrics,
      'ledger_tokens_rejected_total',
      { reason },
      1,
      this.logger,
    );
    if (error.kind === 'cap_exceeded') {
      this.logger.debug(
        `issue rejected: cap ${error.maxPercent}% current=${error.currentPercent}% requested=${error.requestedPercent}%`,
      );
    }
    return fail(error);
  }
}

const normalizeCode = (code: string) => code.trim().toUpperCase();
