import {
  and,
  asc,
  count,
  desc,
  eq,
  gte,
  inArray,
  isNotNull,
  isNull,
  lt,
  lte,
  or,
} from 'drizzle-orm';
import type { Database, QueryTimer } from '../../core/database/database.service';
import { crmSyncStates, syncRecords } from '../../core/database/schema';
import type {
  SyncErrorSummary,
  SyncRecordRepository,
} from './sync-record.repository';
import {
  emptyStateCounts,
  type CrmSyncState,
  type NewSyncRecord,
  type SyncRecord,
  type SyncState,
} from './sync.types';

export class DrizzleSyncRecordRepository implements SyncRecordRepository {
  constructor(
    private readonly db: Database,
    private readonly timer: QueryTimer,
  ) {}

  async create(input: NewSyncRecord, now: Date): Promise<SyncRecord | null> {
    const rows = await this.timer.measure('syncRecords.create', () =>
      this.db
        .insert(syncRecords)
        .values({
          tenantId: input.tenantId,
          entityType: input.entityType,
          entityId: input.entityId,
          operation: input.operation,
          state: 'pending',
          retryCount: 0,
          maxRetries: input.maxRetries,
          externalId: input.externalId ?? null,
          createdAt: now,
          updatedAt: now,
        })
        .onConflictDoNothing()
        .returning(),
    );
    return rows[0] ?? null;
  }

  async get(id: string): Promise<SyncRecord | null> {
    const rows = await this.db
      .select()
      .from(syncRecords)
      .where(eq(syncRecords.id, id))
      .limit(1);
    return rows[0] ?? null;
  }

  async listByState(
    tenantId: string,
    state: SyncState,
    limit: number,
  ): Promise<SyncRecord[]> {
    return this.timer.measure('syncRecords.listByState', () =>
      this.db
        .select()
        .from(syncRecords)
        .where(
          and(eq(syncRecords.tenantId, tenantId), eq(syncRecords.state, state)),
        )
        .orderBy(desc(syncRecords.updatedAt))
        .limit(limit),
    );
  }

  async update(
    record: SyncRecord,
    opts: { expectState?: SyncState } = {},
  ): Promise<SyncRecord | null> {
    const rows = await this.db
      .update(syncRecords)
      .set({
        state: record.state,
        retryCount: record.retryCount,
        lastError: record.lastError,
        externalId: record.externalId,
        nextAttemptAt: record.nextAttemptAt,
        updatedAt: record.updatedAt,
      })
      .where(
        and(
          eq(syncRecords.id, record.id),
          opts.expectState ? eq(syncRecords.state, opts.expectState) : undefined,
        ),
      )
      .returning();
    return rows[0] ?? null;
  }

  async claim(id: string, now: Date): Promise<SyncRecord | null> {
    const rows = await this.db
      .update(syncRecords)
      .set({ state: 'syncing', updatedAt: now })
      .where(
        and(
          eq(syncRecords.id, id),
          inArray(syncRecords.state, ['pending', 'retry']),
        ),
      )
      .returning();
    return rows[0] ?? null;
  }

  async listDue(
    tenantId: string,
    now: Date,
    limit: number,
  ): Promise<SyncRecord[]> {
    return this.timer.measure('syncRecords.listDue', () =>
      this.db
        .select()
        .from(syncRecords)
        .where(
          and(
            eq(syncRecords.tenantId, tenantId),
            inArray(syncRecords.state, ['pending', 'retry']),
            or(
              isNull(syncRecords.nextAttemptAt),
              lte(syncRecords.nextAttemptAt, now),
            ),
          ),
        )
        .orderBy(asc(syncRecords.createdAt))
        .limit(limit),
    );
  }

  async releaseStale(olderThan: Date, now: Date): Promise<number> {
    const rows = await this.db
      .update(syncRecords)
      .set({
        state: 'retry',
        nextAttemptAt: now,
        lastError: 'stale syncing',
        updatedAt: now,
      })
      .where(
        and(
          eq(syncRecords.state, 'syncing'),
          lt(syncRecords.updatedAt, olderThan),
        ),
      )
      .returning({ id: syncRecords.id });
    return rows.length;
  }

  async countByState(
    tenantId: string | null,
    since?: Date,
  ): Promise<Record<SyncState, number>> {
    const rows = await this.timer.measure('syncRecords.countByState', () =>
      this.db
        .select({ state: syncRecords.state, total: count() })
        .from(syncRecords)
        .where(
          and(
            tenantId ? eq(syncRecords.tenantId, tenantId) : undefined,
            since ? gte(syncRecords.createdAt, since) : undefined,
          ),
        )
        .groupBy(syncRecords.state),
    );
    const counts = emptyStateCounts();
    for (const row of rows) counts[row.state] = row.total;
    return counts;
  }

  async errorSummary(
    tenantId: string,
    since: Date,
    limit: number,
  ): Promise<SyncErrorSummary[]> {
    const total = count();
    const rows = await this.db
      .select({ error: syncRecords.lastError, total })
      .from(syncRecords)
      .where(
        and(
          eq(syncRecords.tenantId, tenantId),
          inArray(syncRecords.state, ['retry', 'dead']),
          isNotNull(syncRecords.lastError),
          gte(syncRecords.updatedAt, since),
        ),
      )
      .groupBy(syncRecords.lastError)
      .orderBy(desc(total))
      .limit(limit);
    const summary: SyncErrorSummary[] = [];
    for (const row of rows) {
      if (row.error) summary.push({ error: row.error, count: row.total });
    }
    return summary;
  }

  async findSyncState(tenantId: string): Promise<CrmSyncState | null> {
    const rows = await this.db
      .select({
        tenantId: crmSyncStates.tenantId,
        lastRunAt: crmSyncStates.lastRunAt,
        connectionStatus: crmSyncStates.connectionStatus,
        lastError: crmSyncStates.lastError,
      })
      .from(crmSyncStates)
      .where(eq(crmSyncStates.tenantId, tenantId))
      .limit(1);
    return rows[0] ?? null;
  }

  async saveSyncState(state: CrmSyncState, now: Date): Promise<void> {
    const values = {
      lastRunAt: state.lastRunAt,
      connectionStatus: state.connectionStatus,
      lastError: state.lastError,
      updatedAt: now,
    };
    await this.db
      .insert(crmSyncStates)
      .values({ tenantId: state.tenantId, ...values })
      .onConflictDoUpdate({ target: crmSyncStates.tenantId, set: values });
  }
}
