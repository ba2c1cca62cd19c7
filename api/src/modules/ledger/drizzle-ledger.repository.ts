import { and, count, desc, eq, gt, isNull, lte, sql } from 'drizzle-orm';
import type { Database, QueryTimer } from '../../core/database/database.service';
import {
  discountTokens,
  members,
  pointsLedgerEntries,
  tenantConfigs,
  type TenantConfigRow,
} from '../../core/database/schema';
import { DrizzleSyncRecordRepository } from '../crm-sync/drizzle-sync-record.repository';
import type { NewSyncRecord, SyncRecord } from '../crm-sync/sync.types';
import type { LedgerRepository } from './ledger.repository';
import {
  isPointsAction,
  type DiscountToken,
  type Member,
  type NewDiscountToken,
  type NewMember,
  type NewPointsLedgerEntry,
  type PointsAction,
  type PointsLedgerEntry,
  type TenantConfig,
  type TokenCounts,
  type TokenState,
  type TokenTransition,
} from './ledger.types';
import { emptyTokenCounts } from './ledger.util';

export function toTenantConfig(row: TenantConfigRow): TenantConfig {
  const pointsPerAction: Partial<Record<PointsAction, number>> = {};
  for (const [action, points] of Object.entries(row.pointsPerAction)) {
    if (isPointsAction(action) && Number.isInteger(points) && points >= 0) {
      pointsPerAction[action] = points;
    }
  }
  const crm =
    row.crmUrl && row.crmDatabase && row.crmUsername && row.crmSecret
      ? {
          url: row.crmUrl,
          database: row.crmDatabase,
          username: row.crmUsername,
          secret: row.crmSecret,
        }
      : null;
  return {
    tenantId: row.tenantId,
    name: row.name,
    active: row.active,
    maxDiscountPercent: row.maxDiscountPercent,
    discountPerAction: row.discountPerAction,
    tokenExpirationDays: row.tokenExpirationDays,
    pointsPerAction,
    syncIntervalMinutes: row.syncIntervalMinutes,
    maxRetries: row.maxRetries,
    crmEnabled: row.crmEnabled,
    crm,
  };
}

export class DrizzleLedgerRepository implements LedgerRepository {
  constructor(
    private readonly db: Database,
    private readonly timer: QueryTimer,
  ) {}

  transaction<T>(work: (repo: LedgerRepository) => Promise<T>): Promise<T> {
    return this.db.transaction((tx) =>
      work(new DrizzleLedgerRepository(tx, this.timer)),
    );
  }

  async findTenantConfig(tenantId: string): Promise<TenantConfig | null> {
    const rows = await this.db
      .select()
      .from(tenantConfigs)
      .where(eq(tenantConfigs.tenantId, tenantId))
      .limit(1);
    return rows[0] ? toTenantConfig(rows[0]) : null;
  }

  async listTenantConfigs(filter: {
    crmEnabled?: boolean;
  }): Promise<TenantConfig[]> {
    const rows = await this.db
      .select()
      .from(tenantConfigs)
      .where(
        filter.crmEnabled === undefined
          ? undefined
          : eq(tenantConfigs.crmEnabled, filter.crmEnabled),
      )
      .orderBy(tenantConfigs.tenantId);
    return rows.map(toTenantConfig);
  }

  async findMember(tenantId: string, memberId: string): Promise<Member | null> {
    const rows = await this.db
      .select()
      .from(members)
      .where(and(eq(members.tenantId, tenantId), eq(members.memberId, memberId)))
      .limit(1);
    return rows[0] ?? null;
  }

  async insertMember(input: NewMember, now: Date): Promise<Member | null> {
    const rows = await this.db
      .insert(members)
      .values({
        tenantId: input.tenantId,
        memberId: input.memberId,
        displayName: input.displayName ?? null,
        email: input.email ?? null,
        phone: input.phone ?? null,
        createdAt: now,
        updatedAt: now,
      })
      .onConflictDoNothing()
      .returning();
    return rows[0] ?? null;
  }

  async increaseDiscountWithinCap(
    tenantId: string,
    memberId: string,
    percent: number,
    maxPercent: number,
    now: Date,
  ): Promise<Member | null> {
    const rows = await this.timer.measure('members.increaseDiscount', () =>
      this.db
        .update(members)
        .set({
          totalDiscountPercent: sql`${members.totalDiscountPercent} + ${percent}`,
          tokensIssued: sql`${members.tokensIssued} + 1`,
          updatedAt: now,
        })
        .where(
          and(
            eq(members.tenantId, tenantId),
            eq(members.memberId, memberId),
            sql`${members.totalDiscountPercent} + ${percent} <= ${maxPercent}`,
          ),
        )
        .returning(),
    );
    return rows[0] ?? null;
  }

  async addPoints(
    tenantId: string,
    memberId: string,
    delta: number,
    now: Date,
  ): Promise<Member | null> {
    const rows = await this.db
      .update(members)
      .set({
        pointsBalance: sql`${members.pointsBalance} + ${delta}`,
        updatedAt: now,
      })
      .where(and(eq(members.tenantId, tenantId), eq(members.memberId, memberId)))
      .returning();
    return rows[0] ?? null;
  }

  async setPointsBalance(
    tenantId: string,
    memberId: string,
    balance: number,
    now: Date,
  ): Promise<Member | null> {
    const rows = await this.db
      .update(members)
      .set({ pointsBalance: balance, updatedAt: now })
      .where(and(eq(members.tenantId, tenantId), eq(members.memberId, memberId)))
      .returning();
    return rows[0] ?? null;
  }

  async setMemberExternalId(
    tenantId: string,
    memberId: string,
    externalId: string,
  ): Promise<boolean> {
    const rows = await this.db
      .update(members)
      .set({ externalId })
      .where(
        and(
          eq(members.tenantId, tenantId),
          eq(members.memberId, memberId),
          isNull(members.externalId),
        ),
      )
      .returning({ memberId: members.memberId });
    return rows.length === 1;
  }

  async insertTokenIfCodeAbsent(
    input: NewDiscountToken,
  ): Promise<DiscountToken | null> {
    const rows = await this.timer.measure('discountTokens.insert', () =>
      this.db
        .insert(discountTokens)
        .values({
          ...input,
          state: 'issued',
          updatedAt: input.issuedAt,
        })
        .onConflictDoNothing({ target: discountTokens.code })
        .returning(),
    );
    return rows[0] ?? null;
  }

  async findTokenByCode(
    tenantId: string,
    code: string,
  ): Promise<DiscountToken | null> {
    const rows = await this.db
      .select()
      .from(discountTokens)
      .where(
        and(eq(discountTokens.tenantId, tenantId), eq(discountTokens.code, code)),
      )
      .limit(1);
    return rows[0] ?? null;
  }

  async findTokenById(
    tenantId: string,
    id: string,
  ): Promise<DiscountToken | null> {
    const rows = await this.db
      .select()
      .from(discountTokens)
      .where(
        and(eq(discountTokens.tenantId, tenantId), eq(discountTokens.id, id)),
      )
      .limit(1);
    return rows[0] ?? null;
  }

  async transitionToken(
    id: string,
    transition: TokenTransition,
  ): Promise<DiscountToken | null> {
    const issued = and(
      eq(discountTokens.id, id),
      eq(discountTokens.state, 'issued'),
    );
    switch (transition.to) {
      case 'redeemed': {
        const rows = await this.db
          .update(discountTokens)
          .set({
            state: 'redeemed',
            redeemedAt: transition.at,
            redeemedBy: transition.redeemedBy,
            updatedAt: transition.at,
          })
          .where(and(issued, gt(discountTokens.expiresAt, transition.at)))
          .returning();
        return rows[0] ?? null;
      }
      case 'expired': {
        const rows = await this.db
          .update(discountTokens)
          .set({ state: 'expired', updatedAt: transition.at })
          .where(and(issued, lte(discountTokens.expiresAt, transition.at)))
          .returning();
        return rows[0] ?? null;
      }
    }
  }

  async setTokenExternalId(id: string, externalId: string): Promise<boolean> {
    const rows = await this.db
      .update(discountTokens)
      .set({ externalId })
      .where(and(eq(discountTokens.id, id), isNull(discountTokens.externalId)))
      .returning({ id: discountTokens.id });
    return rows.length === 1;
  }

  async listTokens(
    tenantId: string,
    filter: { memberId?: string; state?: TokenState; limit: number },
  ): Promise<DiscountToken[]> {
    return this.db
      .select()
      .from(discountTokens)
      .where(
        and(
          eq(discountTokens.tenantId, tenantId),
          filter.memberId
            ? eq(discountTokens.memberId, filter.memberId)
            : undefined,
          filter.state ? eq(discountTokens.state, filter.state) : undefined,
        ),
      )
      .orderBy(desc(discountTokens.issuedAt))
      .limit(filter.limit);
  }

  async countTokens(tenantId: string, memberId?: string): Promise<TokenCounts> {
    const rows = await this.timer.measure('discountTokens.count', () =>
      this.db
        .select({
          kind: discountTokens.kind,
          state: discountTokens.state,
          total: count(),
        })
        .from(discountTokens)
        .where(
          and(
            eq(discountTokens.tenantId, tenantId),
            memberId ? eq(discountTokens.memberId, memberId) : undefined,
          ),
        )
        .groupBy(discountTokens.kind, discountTokens.state),
    );
    const counts = emptyTokenCounts();
    for (const row of rows) {
      counts.byState[row.state] += row.total;
      counts.byKind[row.kind] += row.total;
    }
    return counts;
  }

  async insertLedgerEntry(
    input: NewPointsLedgerEntry,
  ): Promise<PointsLedgerEntry | null> {
    const rows = await this.db
      .insert(pointsLedgerEntries)
      .values(input)
      .onConflictDoNothing()
      .returning();
    return rows[0] ?? null;
  }

  async sumLedger(tenantId: string, memberId: string): Promise<number> {
    const rows = await this.db
      .select({
        total: sql<number>`coalesce(sum(${pointsLedgerEntries.pointsDelta}), 0)`.mapWith(
          Number,
        ),
      })
      .from(pointsLedgerEntries)
      .where(
        and(
          eq(pointsLedgerEntries.tenantId, tenantId),
          eq(pointsLedgerEntries.memberId, memberId),
        ),
      );
    return rows[0]?.total ?? 0;
  }

  async listLedgerEntries(
    tenantId: string,
    memberId: string,
    limit: number,
  ): Promise<PointsLedgerEntry[]> {
    return this.db
      .select()
      .from(pointsLedgerEntries)
      .where(
        and(
          eq(pointsLedgerEntries.tenantId, tenantId),
          eq(pointsLedgerEntries.memberId, memberId),
        ),
      )
      .orderBy(desc(pointsLedgerEntries.createdAt))
      .limit(limit);
  }

  enqueueSync(input: NewSyncRecord, now: Date): Promise<SyncRecord | null> {
    return new DrizzleSyncRecordRepository(this.db, this.timer).create(
      input,
      now,
    );
  }
}
