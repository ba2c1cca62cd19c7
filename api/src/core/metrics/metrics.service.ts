import { Injectable } from '@nestjs/common';
import {
  Counter,
  Gauge,
  Registry,
  collectDefaultMetrics,
} from 'prom-client';

type Labels = Record<string, string>;

/**
 * Thin facade over a private prom-client registry. Known metrics are declared
 * up front with their label names; unknown names are created lazily as
 * counters/gauges labelled by whatever keys the first call supplies.
 */
@Injectable()
export class MetricsService {
  private readonly registry = new Registry();
  private readonly counters = new Map<string, Counter<string>>();
  private readonly gauges = new Map<string, Gauge<string>>();

  constructor() {
    const enableDefaults =
      process.env.METRICS_DEFAULTS === '1' || process.env.NODE_ENV !== 'test';
    if (enableDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
    this.declareCounter('ledger_tokens_issued_total', 'Discount tokens issued', [
      'kind',
    ]);
    this.declareCounter(
      'ledger_tokens_rejected_total',
      'Discount token issuances rejected',
      ['reason'],
    );
    this.declareCounter(
      'ledger_tokens_redeemed_total',
      'Discount tokens redeemed',
      ['kind'],
    );
    this.declareCounter(
      'ledger_tokens_expired_total',
      'Discount tokens moved to expired on validation',
    );
    this.declareCounter('ledger_points_awarded_total', 'Points awarded', [
      'action',
    ]);
    this.declareCounter('crm_sync_records_total', 'Sync record outcomes', [
      'entity',
      'result',
    ]);
    this.declareCounter('crm_sync_dead_total', 'Sync records moved to dead');
    this.declareCounter('external_requests_total', 'Outbound HTTP requests', [
      'provider',
      'endpoint',
      'result',
      'status',
    ]);
    this.declareGauge('crm_sync_pending', 'Sync records waiting to be sent');
    this.declareGauge(
      'ledger_worker_last_tick_seconds',
      'Unix time of the last worker tick',
      ['worker'],
    );
  }

  private declareCounter(name: string, help: string, labelNames: string[] = []) {
    const counter = new Counter({
      name,
      help,
      labelNames,
      registers: [this.registry],
    });
    this.counters.set(name, counter);
    return counter;
  }

  private declareGauge(name: string, help: string, labelNames: string[] = []) {
    const gauge = new Gauge({
      name,
      help,
      labelNames,
      registers: [this.registry],
    });
    this.gauges.set(name, gauge);
    return gauge;
  }

  inc(name: string, labels?: Labels, value = 1) {
    const counter =
      this.counters.get(name) ??
      this.declareCounter(name, name, Object.keys(labels ?? {}));
    if (labels && Object.keys(labels).length) counter.inc(labels, value);
    else counter.inc(value);
  }

  setGauge(name: string, value: number, labels?: Labels) {
    const gauge =
      this.gauges.get(name) ??
      this.declareGauge(name, name, Object.keys(labels ?? {}));
    if (labels && Object.keys(labels).length) gauge.set(labels, value);
    else gauge.set(value);
  }

  async exportProm(): Promise<string> {
    return this.registry.metrics();
  }
}
