import {
  Controller,
  Get,
  Header,
  Req,
  UnauthorizedException,
} from '@nestjs/common';
import type { Request } from 'express';
import { MetricsService } from './metrics.service';
import { AppConfigService } from '../config/app-config.service';
import { safeEqual } from '../../shared/security/secret-compare.util';

@Controller()
export class MetricsController {
  constructor(
    private readonly metrics: MetricsService,
    private readonly config: AppConfigService,
  ) {}

  @Get('metrics')
  @Header('Content-Type', 'text/plain; version=0.0.4')
  async metricsEndpoint(@Req() req: Request): Promise<string> {
    const token = this.config.getString('METRICS_TOKEN', '') ?? '';
    if (this.config.isProduction() && !token) {
      throw new UnauthorizedException('Metrics token required');
    }
    if (token) {
      const header = req.headers['x-metrics-token'];
      const got = typeof header === 'string' ? header : '';
      const auth = req.headers.authorization ?? '';
      const bearer = auth.startsWith('Bearer ')
        ? auth.slice('Bearer '.length)
        : '';
      if (!safeEqual(got, token) && !safeEqual(bearer, token)) {
        throw new UnauthorizedException('Metrics token required');
      }
    }
    return this.metrics.exportProm();
  }
}
