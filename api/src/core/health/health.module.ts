import { Module } from '@nestjs/common';
import { CrmSyncModule } from '../../modules/crm-sync/crm-sync.module';
import { HealthController } from './health.controller';

@Module({
  imports: [CrmSyncModule],
  controllers: [HealthController],
})
export class HealthModule {}
