import type { NewSyncRecord } from '../crm-sync/sync.types';
import type {
  DiscountToken,
  Member,
  TenantConfig,
  TokenCounts,
  TokenKind,
} from './ledger.types';

export const emptyTokenCounts = (): TokenCounts => ({
  byState: { issued: 0, redeemed: 0, expired: 0 },
  byKind: emptyKindCounts(),
});

export const emptyKindCounts = (): Record<TokenKind, number> => ({
  signup: 0,
  social: 0,
  review: 0,
  video: 0,
  special: 0,
});

export const DAY_MS = 24 * 60 * 60 * 1000;

export const addDays = (date: Date, days: number): Date =>
  new Date(date.getTime() + days * DAY_MS);

export const clampLimit = (
  limit: number | undefined,
  fallback = 50,
  max = 500,
): number => {
  if (limit === undefined || !Number.isFinite(limit)) return fallback;
  return Math.min(max, Math.max(1, Math.floor(limit)));
};

export const memberSyncRecord = (
  config: TenantConfig,
  member: Pick<Member, 'memberId' | 'externalId'>,
): NewSyncRecord => ({
  tenantId: config.tenantId,
  entityType: 'member',
  entityId: member.memberId,
  operation: member.externalId ? 'update' : 'create',
  maxRetries: config.maxRetries,
  externalId: member.externalId,
});

export const tokenSyncRecord = (
  config: TenantConfig,
  token: Pick<DiscountToken, 'id' | 'externalId'>,
): NewSyncRecord => ({
  tenantId: config.tenantId,
  entityType: 'token',
  entityId: token.id,
  operation: token.externalId ? 'update' : 'create',
  maxRetries: config.maxRetries,
  externalId: token.externalId,
});
