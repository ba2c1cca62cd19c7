import {
  Controller,
  Get,
  HttpCode,
  Param,
  ParseUUIDPipe,
  Post,
  Query,
  UseGuards,
} from '@nestjs/common';
import {
  ApiHeader,
  ApiOperation,
  ApiResponse,
  ApiTags,
} from '@nestjs/swagger';
import { AdminGuard } from '../../core/guards/admin.guard';
import { unwrapOrThrow } from '../ledger/ledger.errors';
import { CrmSyncService } from './crm-sync.service';
import {
  ListSyncRecordsQueryDto,
  RunSyncQueryDto,
  SyncStatsQueryDto,
} from './dto';

@ApiTags('CRM Sync')
@ApiHeader({ name: 'x-admin-key', required: true })
@Controller('admin')
@UseGuards(AdminGuard)
export class CrmSyncController {
  constructor(private readonly sync: CrmSyncService) {}

  @Post('tenants/:tenantId/sync')
  @HttpCode(200)
  @ApiOperation({ summary: 'Run the outbound CRM sync for a tenant now' })
  @ApiResponse({ status: 200, description: 'Run summary, or not_due' })
  async run(
    @Param('tenantId') tenantId: string,
    @Query() query: RunSyncQueryDto,
  ) {
    return unwrapOrThrow(
      await this.sync.runNow(tenantId, { force: query.force ?? false }),
    );
  }

  @Get('tenants/:tenantId/sync/records')
  @ApiOperation({ summary: 'List sync records by state (dead by default)' })
  async records(
    @Param('tenantId') tenantId: string,
    @Query() query: ListSyncRecordsQueryDto,
  ) {
    return unwrapOrThrow(
      await this.sync.listRecords(tenantId, query.state ?? 'dead', query.limit),
    );
  }

  @Post('sync/records/:id/replay')
  @HttpCode(200)
  @ApiOperation({ summary: 'Return a dead sync record to the retry queue' })
  async replay(@Param('id', new ParseUUIDPipe()) id: string) {
    return unwrapOrThrow(await this.sync.replay(id));
  }

  @Get('tenants/:tenantId/sync/stats')
  @ApiOperation({ summary: 'Sync outcome counts and top errors' })
  async stats(
    @Param('tenantId') tenantId: string,
    @Query() query: SyncStatsQueryDto,
  ) {
    return unwrapOrThrow(await this.sync.stats(tenantId, query.days ?? 30));
  }

  @Post('tenants/:tenantId/crm/test')
  @HttpCode(200)
  @ApiOperation({ summary: 'Check the tenant CRM credentials' })
  async testConnection(@Param('tenantId') tenantId: string) {
    return unwrapOrThrow(await this.sync.testConnection(tenantId));
  }
}
