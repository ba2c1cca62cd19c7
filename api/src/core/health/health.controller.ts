import { Controller, Get, Res } from '@nestjs/common';
import type { Response } from 'express';
import { DatabaseService } from '../database/database.service';
import { logIgnoredError } from '../../shared/logging/ignore-error.util';
import { OutboundSyncWorker } from '../../modules/crm-sync/outbound-sync.worker';

@Controller()
export class HealthController {
  constructor(
    private readonly database: DatabaseService,
    private readonly worker: OutboundSyncWorker,
  ) {}

  @Get('healthz')
  async health(@Res({ passthrough: true }) res: Response) {
    const ts = new Date().toISOString();
    try {
      await this.database.ping();
      res.status(200);
      return { ok: true, ts };
    } catch (err) {
      logIgnoredError(err, 'HealthController healthz', undefined, 'debug');
      res.status(503);
      return { ok: false, ts };
    }
  }

  @Get('readyz')
  async ready(@Res({ passthrough: true }) res: Response) {
    const ts = new Date().toISOString();
    let database = false;
    try {
      await this.database.ping();
      database = true;
    } catch (err) {
      logIgnoredError(err, 'HealthController readyz', undefined, 'debug');
    }
    res.status(database ? 200 : 503);
    return {
      ready: database,
      ts,
      checks: { database },
      worker: {
        startedAt: this.worker.startedAt?.toISOString() ?? null,
        lastTickAt: this.worker.lastTickAt?.toISOString() ?? null,
      },
    };
  }
}
