import { Module } from '@nestjs/common';
import { DatabaseService } from '../../core/database/database.service';
import { CodeGeneratorService } from './code-generator.service';
import { DiscountTokenService } from './discount-token.service';
import { DrizzleLedgerRepository } from './drizzle-ledger.repository';
import {
  LEDGER_EVENT_SINK,
  LedgerEventPublisher,
  LoggingEventSink,
} from './ledger-events';
import { LEDGER_REPOSITORY } from './ledger.repository';
import { MembersService } from './members.service';
import { PointsLedgerService } from './points-ledger.service';
import { TenantConfigService } from './tenant-config.service';

@Module({
  providers: [
    {
      provide: LEDGER_REPOSITORY,
      useFactory: (database: DatabaseService) =>
        new DrizzleLedgerRepository(database.db, database.timer),
      inject: [DatabaseService],
    },
    { provide: LEDGER_EVENT_SINK, useClass: LoggingEventSink },
    LedgerEventPublisher,
    TenantConfigService,
    CodeGeneratorService,
    PointsLedgerService,
    MembersService,
    DiscountTokenService,
  ],
  exports: [
    LEDGER_REPOSITORY,
    TenantConfigService,
    PointsLedgerService,
    MembersService,
    DiscountTokenService,
  ],
})
export class LedgerModule {}
