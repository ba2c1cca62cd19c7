import type { NewSyncRecord, SyncRecord } from '../crm-sync/sync.types';
import type {
  DiscountToken,
  Member,
  NewDiscountToken,
  NewMember,
  NewPointsLedgerEntry,
  PointsLedgerEntry,
  TenantConfig,
  TokenCounts,
  TokenState,
  TokenTransition,
} from './ledger.types';

export const LEDGER_REPOSITORY = Symbol('LEDGER_REPOSITORY');

/**
 * Persistence seam for the ledger. Every mutating method is a single
 * conditional statement: a `null` / `false` result means the guard did not
 * hold (row missing, cap reached, state already moved) and nothing changed.
 */
export interface LedgerRepository {
  /** Runs `work` in one database transaction; a throw rolls everything back. */
  transaction<T>(work: (repo: LedgerRepository) => Promise<T>): Promise<T>;

  findTenantConfig(tenantId: string): Promise<TenantConfig | null>;
  listTenantConfigs(filter: { crmEnabled?: boolean }): Promise<TenantConfig[]>;

  findMember(tenantId: string, memberId: string): Promise<Member | null>;
  /** Returns null when the member already exists. */
  insertMember(input: NewMember, now: Date): Promise<Member | null>;
  /**
   * `total_discount_percent += percent` and `tokens_issued += 1`, only while
   * the total stays within `maxPercent`.
   */
  increaseDiscountWithinCap(
    tenantId: string,
    memberId: string,
    percent: number,
    maxPercent: number,
    now: Date,
  ): Promise<Member | null>;
  addPoints(
    tenantId: string,
    memberId: string,
    delta: number,
    now: Date,
  ): Promise<Member | null>;
  setPointsBalance(
    tenantId: string,
    memberId: string,
    balance: number,
    now: Date,
  ): Promise<Member | null>;
  /** Sets the CRM id only if none is stored yet. */
  setMemberExternalId(
    tenantId: string,
    memberId: string,
    externalId: string,
  ): Promise<boolean>;

  /** Insert-if-absent on the global code index; null when the code is taken. */
  insertTokenIfCodeAbsent(input: NewDiscountToken): Promise<DiscountToken | null>;
  findTokenByCode(tenantId: string, code: string): Promise<DiscountToken | null>;
  findTokenById(tenantId: string, id: string): Promise<DiscountToken | null>;
  /**
   * issued → redeemed requires `expires_at > at`; issued → expired requires
   * `expires_at <= at`. Returns the updated token, or null when the guard
   * failed.
   */
  transitionToken(
    id: string,
    transition: TokenTransition,
  ): Promise<DiscountToken | null>;
  setTokenExternalId(id: string, externalId: string): Promise<boolean>;
  listTokens(
    tenantId: string,
    filter: { memberId?: string; state?: TokenState; limit: number },
  ): Promise<DiscountToken[]>;
  countTokens(tenantId: string, memberId?: string): Promise<TokenCounts>;

  /** Null when the idempotency key was already used for this member. */
  insertLedgerEntry(
    input: NewPointsLedgerEntry,
  ): Promise<PointsLedgerEntry | null>;
  sumLedger(tenantId: string, memberId: string): Promise<number>;
  listLedgerEntries(
    tenantId: string,
    memberId: string,
    limit: number,
  ): Promise<PointsLedgerEntry[]>;

  /** Null when a pending record for the entity already exists. */
  enqueueSync(input: NewSyncRecord, now: Date): Promise<SyncRecord | null>;
}
