import { Inject, Injectable } from '@nestjs/common';
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
import type { Member } from './ledger.types';
import { memberSyncRecord } from './ledger.util';
import { TenantConfigService } from './tenant-config.service';

export type RegisterMemberInput = {
  tenantId: string;
  memberId: string;
  displayName?: string;
  email?: string;
  phone?: string;
};

const MEMBER_ID_PATTERN = /^[A-Za-z0-9_.:@-]{1,64}$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const optionalText = (value: string | undefined): string | null => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
};

@Injectable()
export class MembersService {
  constructor(
    @Inject(LEDGER_REPOSITORY) private readonly repo: LedgerRepository,
    private readonly tenants: TenantConfigService,
    private readonly events: LedgerEventPublisher,
  ) {}

  /** Signup: creates the member row and queues its first CRM push. */
  async register(input: RegisterMemberInput): Promise<Result<Member>> {
    const memberId = input.memberId.trim();
    if (!MEMBER_ID_PATTERN.test(memberId)) {
      return fail(validationError('invalid member id', 'memberId'));
    }
    const email = optionalText(input.email);
    if (email && !EMAIL_PATTERN.test(email)) {
      return fail(validationError('invalid email', 'email'));
    }
    const tenant = await this.tenants.require(input.tenantId);
    if (!tenant.ok) return tenant;
    const config = tenant.value;

    const now = new Date();
    const result = await runLedger(() =>
      this.repo.transaction(async (tx) => {
        const member = await tx.insertMember(
          {
            tenantId: config.tenantId,
            memberId,
            displayName: optionalText(input.displayName),
            email,
            phone: optionalText(input.phone),
          },
          now,
        );
        if (!member) {
          throw new LedgerFailure(
            conflictError('already_exists', `Member ${memberId} already exists`),
          );
        }
        await tx.enqueueSync(memberSyncRecord(config, member), now);
        return member;
      }),
    );
    if (result.ok) {
      this.events.publish({
        tenantId: config.tenantId,
        memberId,
        kind: 'member.registered',
        payload: { displayName: result.value.displayName },
      });
    }
    return result;
  }

  async find(tenantId: string, memberId: string): Promise<Result<Member>> {
    const member = await this.repo.findMember(tenantId, memberId);
    if (!member) {
      return fail(notFoundError('member', `Member ${memberId} not found`));
    }
    return ok(member);
  }
}
