import { sql } from 'drizzle-orm';
import {
  boolean,
  check,
  index,
  integer,
  jsonb,
  pgEnum,
  pgTable,
  primaryKey,
  text,
  timestamp,
  uniqueIndex,
  uuid,
  varchar,
} from 'drizzle-orm/pg-core';

const createdAt = timestamp('created_at', { withTimezone: true })
  .defaultNow()
  .notNull();
const updatedAt = timestamp('updated_at', { withTimezone: true })
  .defaultNow()
  .notNull();

export const tokenKindEnum = pgEnum('discount_token_kind', [
  'signup',
  'social',
  'review',
  'video',
  'special',
]);

export const tokenStateEnum = pgEnum('discount_token_state', [
  'issued',
  'redeemed',
  'expired',
]);

export const pointsActionEnum = pgEnum('points_action', [
  'signup',
  'social',
  'review',
  'video',
  'like',
  'comment',
  'special',
]);

export const syncEntityTypeEnum = pgEnum('sync_entity_type', [
  'member',
  'token',
]);

export const syncOperationEnum = pgEnum('sync_operation', ['create', 'update']);

export const syncStateEnum = pgEnum('sync_state', [
  'pending',
  'syncing',
  'completed',
  'failed',
  'retry',
  'dead',
]);

export const crmConnectionStatusEnum = pgEnum('crm_connection_status', [
  'unknown',
  'connected',
  'error',
]);

/**
 * tenant_configs
 *
 * One row per onboarded business. Read-only from the ledger's point of view;
 * edited by onboarding tooling outside this service.
 */
export const tenantConfigs = pgTable(
  'tenant_configs',
  {
    tenantId: varchar('tenant_id', { length: 64 }).primaryKey(),
    name: varchar('name', { length: 200 }).notNull(),
    active: boolean('active').default(true).notNull(),
    maxDiscountPercent: integer('max_discount_percent').default(15).notNull(),
    discountPerAction: integer('discount_per_action').default(5).notNull(),
    tokenExpirationDays: integer('token_expiration_days')
      .default(30)
      .notNull(),
    /** Points per action, e.g. `{ "video": 10, "like": 1 }`. */
    pointsPerAction: jsonb('points_per_action')
      .$type<Record<string, number>>()
      .default({})
      .notNull(),
    syncIntervalMinutes: integer('sync_interval_minutes').default(30).notNull(),
    maxRetries: integer('max_retries').default(3).notNull(),
    crmEnabled: boolean('crm_enabled').default(false).notNull(),
    crmUrl: varchar('crm_url', { length: 500 }),
    crmDatabase: varchar('crm_database', { length: 100 }),
    crmUsername: varchar('crm_username', { length: 100 }),
    crmSecret: varchar('crm_secret', { length: 255 }),
    createdAt,
    updatedAt,
  },
  (table) => ({
    maxDiscountBoundsCheck: check(
      'tenant_configs_max_discount_bounds_check',
      sql`${table.maxDiscountPercent} BETWEEN 0 AND 100`,
    ),
    maxRetriesCheck: check(
      'tenant_configs_max_retries_check',
      sql`${table.maxRetries} >= 1`,
    ),
  }),
);

export const members = pgTable(
  'members',
  {
    tenantId: varchar('tenant_id', { length: 64 })
      .references(() => tenantConfigs.tenantId)
      .notNull(),
    memberId: varchar('member_id', { length: 64 }).notNull(),
    displayName: varchar('display_name', { length: 200 }),
    email: varchar('email', { length: 320 }),
    phone: varchar('phone', { length: 40 }),
    pointsBalance: integer('points_balance').default(0).notNull(),
    totalDiscountPercent: integer('total_discount_percent')
      .default(0)
      .notNull(),
    tokensIssued: integer('tokens_issued').default(0).notNull(),
    externalId: varchar('external_id', { length: 64 }),
    createdAt,
    updatedAt,
  },
  (table) => ({
    pk: primaryKey({ columns: [table.tenantId, table.memberId] }),
    discountNonNegative: check(
      'members_total_discount_non_negative',
      sql`${table.totalDiscountPercent} >= 0`,
    ),
  }),
);

export const discountTokens = pgTable(
  'discount_tokens',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    tenantId: varchar('tenant_id', { length: 64 }).notNull(),
    memberId: varchar('member_id', { length: 64 }).notNull(),
    /** Redemption code, unique across every tenant. */
    code: varchar('code', { length: 20 }).notNull(),
    discountPercent: integer('discount_percent').notNull(),
    kind: tokenKindEnum('kind').notNull(),
    state: tokenStateEnum('state').default('issued').notNull(),
    issuedAt: timestamp('issued_at', { withTimezone: true })
      .defaultNow()
      .notNull(),
    expiresAt: timestamp('expires_at', { withTimezone: true }).notNull(),
    redeemedAt: timestamp('redeemed_at', { withTimezone: true }),
    redeemedBy: varchar('redeemed_by', { length: 100 }),
    externalId: varchar('external_id', { length: 64 }),
    updatedAt,
  },
  (table) => ({
    codeUnique: uniqueIndex('discount_tokens_code_unique').on(table.code),
    tenantMemberIdx: index('discount_tokens_tenant_member_idx').on(
      table.tenantId,
      table.memberId,
    ),
    percentBounds: check(
      'discount_tokens_percent_bounds_check',
      sql`${table.discountPercent} BETWEEN 1 AND 100`,
    ),
  }),
);

/** Append-only. Rows are never updated or deleted. */
export const pointsLedgerEntries = pgTable(
  'points_ledger_entries',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    tenantId: varchar('tenant_id', { length: 64 }).notNull(),
    memberId: varchar('member_id', { length: 64 }).notNull(),
    pointsDelta: integer('points_delta').notNull(),
    action: pointsActionEnum('action').notNull(),
    reason: varchar('reason', { length: 300 }).notNull(),
    idempotencyKey: varchar('idempotency_key', { length: 200 }),
    externalRef: varchar('external_ref', { length: 200 }),
    createdAt,
  },
  (table) => ({
    tenantMemberIdx: index('points_ledger_entries_tenant_member_idx').on(
      table.tenantId,
      table.memberId,
    ),
    idempotencyUnique: uniqueIndex('points_ledger_entries_idempotency_unique')
      .on(table.tenantId, table.memberId, table.idempotencyKey)
      .where(sql`${table.idempotencyKey} IS NOT NULL`),
    deltaNonNegative: check(
      'points_ledger_entries_delta_non_negative',
      sql`${table.pointsDelta} >= 0`,
    ),
  }),
);

export const syncRecords = pgTable(
  'sync_records',
  {
    id: uuid('id').defaultRandom().primaryKey(),
    tenantId: varchar('tenant_id', { length: 64 }).notNull(),
    entityType: syncEntityTypeEnum('entity_type').notNull(),
    entityId: varchar('entity_id', { length: 64 }).notNull(),
    operation: syncOperationEnum('operation').notNull(),
    state: syncStateEnum('state').default('pending').notNull(),
    retryCount: integer('retry_count').default(0).notNull(),
    maxRetries: integer('max_retries').notNull(),
    lastError: text('last_error'),
    externalId: varchar('external_id', { length: 64 }),
    nextAttemptAt: timestamp('next_attempt_at', { withTimezone: true }),
    createdAt,
    updatedAt,
  },
  (table) => ({
    tenantStateIdx: index('sync_records_tenant_state_idx').on(
      table.tenantId,
      table.state,
    ),
    // later enqueues for the same entity coalesce into the open pending row
    pendingEntityUnique: uniqueIndex('sync_records_pending_entity_unique')
      .on(table.tenantId, table.entityType, table.entityId)
      .where(sql`${table.state} = 'pending'`),
    retryBound: check(
      'sync_records_retry_bound_check',
      sql`${table.retryCount} <= ${table.maxRetries}`,
    ),
  }),
);

export const crmSyncStates = pgTable('crm_sync_states', {
  tenantId: varchar('tenant_id', { length: 64 }).primaryKey(),
  lastRunAt: timestamp('last_run_at', { withTimezone: true }),
  connectionStatus: crmConnectionStatusEnum('connection_status')
    .default('unknown')
    .notNull(),
  lastError: text('last_error'),
  updatedAt,
});

export type TenantConfigRow = typeof tenantConfigs.$inferSelect;
export type MemberRow = typeof members.$inferSelect;
export type DiscountTokenRow = typeof discountTokens.$inferSelect;
export type PointsLedgerEntryRow = typeof pointsLedgerEntries.$inferSelect;
export type SyncRecordRow = typeof syncRecords.$inferSelect;
export type CrmSyncStateRow = typeof crmSyncStates.$inferSelect;
