export const TOKEN_KINDS = [
  'signup',
  'social',
  'review',
  'video',
  'special',
] as const;
export type TokenKind = (typeof TOKEN_KINDS)[number];

export const TOKEN_STATES = ['issued', 'redeemed', 'expired'] as const;
export type TokenState = (typeof TOKEN_STATES)[number];

export const POINTS_ACTIONS = [
  'signup',
  'social',
  'review',
  'video',
  'like',
  'comment',
  'special',
] as const;
export type PointsAction = (typeof POINTS_ACTIONS)[number];

export const isPointsAction = (value: string): value is PointsAction =>
  POINTS_ACTIONS.some((action) => action === value);

/** Caller identity handed in by the (external) auth layer. */
export type AuthContext = {
  tenantId: string;
  memberId: string;
};

export type CrmSettings = {
  url: string;
  database: string;
  username: string;
  secret: string;
};

export type TenantConfig = {
  tenantId: string;
  name: string;
  active: boolean;
  maxDiscountPercent: number;
  discountPerAction: number;
  tokenExpirationDays: number;
  pointsPerAction: Partial<Record<PointsAction, number>>;
  syncIntervalMinutes: number;
  maxRetries: number;
  crmEnabled: boolean;
  /** null unless every connection field is filled in. */
  crm: CrmSettings | null;
};

export type Member = {
  tenantId: string;
  memberId: string;
  displayName: string | null;
  email: string | null;
  phone: string | null;
  pointsBalance: number;
  totalDiscountPercent: number;
  /** Tokens ever issued to the member; bumped with the cap update. */
  tokensIssued: number;
  externalId: string | null;
  createdAt: Date;
  updatedAt: Date;
};

export type NewMember = {
  tenantId: string;
  memberId: string;
  displayName?: string | null;
  email?: string | null;
  phone?: string | null;
};

export type DiscountToken = {
  id: string;
  tenantId: string;
  memberId: string;
  code: string;
  discountPercent: number;
  kind: TokenKind;
  state: TokenState;
  issuedAt: Date;
  expiresAt: Date;
  redeemedAt: Date | null;
  redeemedBy: string | null;
  externalId: string | null;
  updatedAt: Date;
};

export type NewDiscountToken = {
  tenantId: string;
  memberId: string;
  code: string;
  discountPercent: number;
  kind: TokenKind;
  issuedAt: Date;
  expiresAt: Date;
};

export type TokenTransition =
  | { to: 'redeemed'; at: Date; redeemedBy: string | null }
  | { to: 'expired'; at: Date };

export type PointsLedgerEntry = {
  id: string;
  tenantId: string;
  memberId: string;
  pointsDelta: number;
  action: PointsAction;
  reason: string;
  idempotencyKey: string | null;
  externalRef: string | null;
  createdAt: Date;
};

export type NewPointsLedgerEntry = {
  tenantId: string;
  memberId: string;
  pointsDelta: number;
  action: PointsAction;
  reason: string;
  idempotencyKey: string | null;
  externalRef: string | null;
  createdAt: Date;
};

export type TokenStats = {
  total: number;
  issued: number;
  redeemed: number;
  expired: number;
  /** redeemed / total, rounded to two decimals; 0 when nothing was issued. */
  usageRate: number;
  byKind: Record<TokenKind, number>;
};

export type TokenCounts = {
  byState: Record<TokenState, number>;
  byKind: Record<TokenKind, number>;
};
