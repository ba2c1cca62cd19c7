import { Module } from '@nestjs/common';
import { DatabaseService } from '../../core/database/database.service';
import { LedgerModule } from '../ledger/ledger.module';
import { CRM_CLIENT_FACTORY } from './crm-client.types';
import { CrmConnectionPool } from './crm-connection-pool.service';
import { CrmSyncController } from './crm-sync.controller';
import { CrmSyncService } from './crm-sync.service';
import { DrizzleSyncRecordRepository } from './drizzle-sync-record.repository';
import { OdooCrmClientFactory } from './odoo-crm.client';
import { OutboundSyncWorker } from './outbound-sync.worker';
import { SYNC_RECORD_REPOSITORY } from './sync-record.repository';

@Module({
  imports: [LedgerModule],
  controllers: [CrmSyncController],
  providers: [
    {
      provide: SYNC_RECORD_REPOSITORY,
      useFactory: (database: DatabaseService) =>
        new DrizzleSyncRecordRepository(database.db, database.timer),
      inject: [DatabaseService],
    },
    { provide: CRM_CLIENT_FACTORY, useClass: OdooCrmClientFactory },
    CrmConnectionPool,
    OutboundSyncWorker,
    CrmSyncService,
  ],
  exports: [CrmSyncService, OutboundSyncWorker],
})
export class CrmSyncModule {}
