import type { DiscountToken, Member } from '../ledger/ledger.types';
import type { CrmPayload } from './crm-client.types';

export type SyncEntity =
  | { entityType: 'member'; member: Member }
  | { entityType: 'token'; token: DiscountToken };

/** Field that carries our stable reference on the remote model. */
export const REFERENCE_FIELDS = {
  member: 'ref',
  token: 'default_code',
} as const;

export function externalIdOf(entity: SyncEntity): string | null {
  switch (entity.entityType) {
    case 'member':
      return entity.member.externalId;
    case 'token':
      return entity.token.externalId;
  }
}

/**
 * Maps a local entity onto res.partner / product.product. Loyalty data goes
 * into `x_` custom fields that the tenant's CRM module defines.
 */
export function toCrmPayload(
  tenantId: string,
  entity: SyncEntity,
): CrmPayload {
  switch (entity.entityType) {
    case 'member': {
      const { member } = entity;
      return {
        [REFERENCE_FIELDS.member]: member.memberId,
        name: member.displayName || member.memberId,
        email: member.email,
        phone: member.phone,
        x_tenant_id: tenantId,
        x_loyalty_points: member.pointsBalance,
        x_total_discount: member.totalDiscountPercent,
        x_tokens_issued: member.tokensIssued,
      };
    }
    case 'token': {
      const { token } = entity;
      return {
        [REFERENCE_FIELDS.token]: token.code,
        name: `Discount ${token.discountPercent}% - ${token.code}`,
        list_price: 0,
        sale_ok: false,
        x_tenant_id: tenantId,
        x_member_ref: token.memberId,
        x_discount_percent: token.discountPercent,
        x_token_kind: token.kind,
        x_token_state: token.state,
        x_expires_at: token.expiresAt.toISOString(),
        x_redeemed_at: token.redeemedAt ? token.redeemedAt.toISOString() : null,
      };
    }
  }
}
