import { Inject, Injectable, Logger } from '@nestjs/common';
import { MetricsService } from '../../core/metrics/metrics.service';
import { safeMetric } from '../../shared/logging/event-log.util';
import {
  conflictError,
  fail,
  LedgerFailure,
  notFoundError,
  ok,
  runLedger,
  validationError,
  type Result,
} from './ledger.errors';
import { LedgerEventPublisher } from './ledger-events';
import { LEDGER_REPOSITORY, type LedgerRepository } from './ledger.repository';
import {
  isPointsAction,
  type AuthContext,
  type PointsAction,
  type PointsLedgerEntry,
  type TenantConfig,
} from './ledger.types';
import { clampLimit, memberSyncRecord } from './ledger.util';
import { TenantConfigService } from './tenant-config.service';

export type AwardOptions = {
  action?: PointsAction;
  idempotencyKey?: string;
  externalRef?: string;
};

export type AwardResult = {
  entry: PointsLedgerEntry;
  balance: number;
};

export type BalanceCheck = {
  cached: number;
  computed: number;
  drift: number;
};

export const LEVELS = [
  { name: 'Beginner', minPoints: 0 },
  { name: 'Bronze', minPoints: 50 },
  { name: 'Silver', minPoints: 200 },
  { name: 'Gold', minPoints: 500 },
  { name: 'Diamond', minPoints: 1000 },
] as const;

export type LevelName = (typeof LEVELS)[number]['name'];

export type LevelInfo = {
  name: LevelName;
  minPoints: number;
  nextLevel: LevelName | null;
  pointsToNext: number;
  /** 0..100 within the current level; 100 at the top level. */
  progressPercent: number;
};

@Injectable()
export class PointsLedgerService {
  private readonly logger = new Logger(PointsLedgerService.name);

  constructor(
    @Inject(LEDGER_REPOSITORY) private readonly repo: LedgerRepository,
    private readonly tenants: TenantConfigService,
    private readonly events: LedgerEventPublisher,
    private readonly metrics: MetricsService,
  ) {}

  /**
   * Appends a ledger entry and bumps the cached balance in one transaction.
   * A repeated idempotency key is reported as `conflict` and awards nothing.
   */
  async award(
    ctx: AuthContext,
    reason: string,
    points: number,
    opts: AwardOptions = {},
  ): Promise<Result<AwardResult>> {
    if (!Number.isInteger(points) || points < 0) {
      return fail(
        validationError('points must be a non-negative integer', 'points'),
      );
    }
    const trimmedReason = reason.trim();
    if (!trimmedReason) {
      return fail(validationError('reason is required', 'reason'));
    }
    const tenant = await this.tenants.require(ctx.tenantId);
    if (!tenant.ok) return tenant;
    return this.appendEntry(tenant.value, ctx.memberId, trimmedReason, points, {
      ...opts,
      action: opts.action ?? 'special',
    });
  }

  /** Awards the tenant's configured amount for `action`. */
  async awardForAction(
    ctx: AuthContext,
    action: string,
    opts: Omit<AwardOptions, 'action'> & { reason?: string } = {},
  ): Promise<Result<AwardResult>> {
    if (!isPointsAction(action)) {
      return fail(validationError(`unknown action: ${action}`, 'action'));
    }
    const tenant = await this.tenants.require(ctx.tenantId);
    if (!tenant.ok) return tenant;
    const points = tenant.value.pointsPerAction[action];
    if (points === undefined) {
      return fail(
        validationError(`no points configured for action ${action}`, 'action'),
      );
    }
    return this.appendEntry(
      tenant.value,
      ctx.memberId,
      opts.reason?.trim() || `action:${action}`,
      points,
      { ...opts, action },
    );
  }

  async balance(ctx: AuthContext): Promise<Result<number>> {
    const member = await this.repo.findMember(ctx.tenantId, ctx.memberId);
    if (!member) {
      return fail(notFoundError('member', `Member ${ctx.memberId} not found`));
    }
    return ok(member.pointsBalance);
  }

  /** Re-sums the ledger and repairs the cached balance when they disagree. */
  async recomputeBalance(ctx: AuthContext): Promise<Result<BalanceCheck>> {
    const now = new Date();
    const result = await runLedger(() =>
      this.repo.transaction(async (tx) => {
        const member = await tx.findMember(ctx.tenantId, ctx.memberId);
        if (!member) {
          throw new LedgerFailure(
            notFoundError('member', `Member ${ctx.memberId} not found`),
          );
        }
        const computed = await tx.sumLedger(ctx.tenantId, ctx.memberId);
        const drift = computed - member.pointsBalance;
        if (drift !== 0) {
          await tx.setPointsBalance(ctx.tenantId, ctx.memberId, computed, now);
        }
        return { cached: member.pointsBalance, computed, drift };
      }),
    );
    if (result.ok && result.value.drift !== 0) {
      this.logger.warn(
        `points balance drift repaired tenant=${ctx.tenantId} member=${ctx.memberId} drift=${result.value.drift}`,
      );
    }
    return result;
  }

  /** Newest entries first. */
  async history(
    ctx: AuthContext,
    limit?: number,
  ): Promise<Result<PointsLedgerEntry[]>> {
    const member = await this.repo.findMember(ctx.tenantId, ctx.memberId);
    if (!member) {
      return fail(notFoundError('member', `Member ${ctx.memberId} not found`));
    }
    return ok(
      await this.repo.listLedgerEntries(
        ctx.tenantId,
        ctx.memberId,
        clampLimit(limit),
      ),
    );
  }

  level(points: number): LevelInfo {
    const safePoints = Math.max(0, Math.floor(points));
    let index = 0;
    for (let i = 0; i < LEVELS.length; i++) {
      if (safePoints >= LEVELS[i].minPoints) index = i;
    }
    const current = LEVELS[index];
    const next = index + 1 < LEVELS.length ? LEVELS[index + 1] : null;
    if (!next) {
      return {
        name: current.name,
        minPoints: current.minPoints,
        nextLevel: null,
        pointsToNext: 0,
        progressPercent: 100,
      };
    }
    const span = next.minPoints - current.minPoints;
    return {
      name: current.name,
      minPoints: current.minPoints,
      nextLevel: next.name,
      pointsToNext: next.minPoints - safePoints,
      progressPercent: Math.floor(
        ((safePoints - current.minPoints) / span) * 100,
      ),
    };
  }

  private async appendEntry(
    config: TenantConfig,
    memberId: string,
    reason: string,
    points: number,
    opts: AwardOptions & { action: PointsAction },
  ): Promise<Result<AwardResult>> {
    const now = new Date();
    const result = await runLedger(() =>
      this.repo.transaction(async (tx) => {
        const member = await tx.findMember(config.tenantId, memberId);
        if (!member) {
          throw new LedgerFailure(
            notFoundError('member', `Member ${memberId} not found`),
          );
        }
        const entry = await tx.insertLedgerEntry({
          tenantId: config.tenantId,
          memberId,
          pointsDelta: points,
          action: opts.action,
          reason,
          idempotencyKey: opts.idempotencyKey ?? null,
          externalRef: opts.externalRef ?? null,
          createdAt: now,
        });
        if (!entry) {
          throw new LedgerFailure(
            conflictError(
              'duplicate_idempotency_key',
              `Points already awarded for key ${opts.idempotencyKey ?? ''}`,
            ),
          );
        }
        const updated = await tx.addPoints(
          config.tenantId,
          memberId,
          points,
          now,
        );
        if (!updated) {
          throw new LedgerFailure(
            notFoundError('member', `Member ${memberId} not found`),
          );
        }
        await tx.enqueueSync(memberSyncRecord(config, updated), now);
        return { entry, balance: updated.pointsBalance };
      }),
    );
    if (!result.ok) return result;

    safeMetric(
      this.metrics,
      'ledger_points_awarded_total',
      { action: opts.action },
      points,
      this.logger,
    );
    this.events.publish({
      tenantId: config.tenantId,
      memberId,
      kind: 'points.awarded',
      payload: {
        entryId: result.value.entry.id,
        action: opts.action,
        points,
        reason,
        balance: result.value.balance,
      },
    });
    return result;
  }
}
