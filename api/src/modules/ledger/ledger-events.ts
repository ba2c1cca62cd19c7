import { Inject, Injectable, Logger } from '@nestjs/common';
import { logEvent } from '../../shared/logging/event-log.util';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';

export const LEDGER_EVENT_SINK = Symbol('LEDGER_EVENT_SINK');

export type LedgerEventKind =
  | 'member.registered'
  | 'points.awarded'
  | 'token.issued'
  | 'token.redeemed';

export type LedgerEvent = {
  tenantId: string;
  memberId: string;
  kind: LedgerEventKind;
  payload: Record<string, unknown>;
};

/** Delivery transport for ledger notifications (push, e-mail, chat bots). */
export interface LedgerEventSink {
  emit(event: LedgerEvent): void | Promise<void>;
}

@Injectable()
export class LoggingEventSink implements LedgerEventSink {
  private readonly logger = new Logger('LedgerEvents');

  emit(event: LedgerEvent) {
    logEvent(this.logger, event.kind, {
      tenantId: event.tenantId,
      memberId: event.memberId,
      ...event.payload,
    });
  }
}

/** Hands events to the sink without awaiting delivery. */
@Injectable()
export class LedgerEventPublisher {
  private readonly logger = new Logger(LedgerEventPublisher.name);

  constructor(@Inject(LEDGER_EVENT_SINK) private readonly sink: LedgerEventSink) {}

  publish(event: LedgerEvent): void {
    const context = {
      kind: event.kind,
      tenantId: event.tenantId,
      memberId: event.memberId,
    };
    try {
      const pending = this.sink.emit(event);
      if (pending) {
        void pending.catch((err: unknown) =>
          logIgnoredError(err, 'ledger event sink', this.logger, 'warn', context),
        );
      }
    } catch (err) {
      logIgnoredError(err, 'ledger event sink', this.logger, 'warn', context);
    }
  }
}
