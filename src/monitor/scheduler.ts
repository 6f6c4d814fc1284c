import { setTimeout as delay } from 'node:timers/promises';
import type { AnomalyDetection, MonitoringConfig } from '../types/index.js';
import type { AnomalyFeed } from '../feed/index.js';
import type { RuleEngine } from '../rules/index.js';
import type { Dispatcher, DispatchResult } from '../dispatch/index.js';
import type { WatermarkStore } from '../store/index.js';
import { mapPool } from '../concurrency/index.js';
import { audit } from '../audit/index.js';
import type { Logger } from '../logging/index.js';
import { silentLogger } from '../logging/index.js';
import { UpstreamUnavailableError, errorMessage } from '../errors.js';

export interface TickSummary {
  startedAt: string;
  finishedAt: string;
  since: string;
  fetched: number;
  critical: number;
  processed: number;
  alertsCreated: number;
  suppressed: number;
  duplicates: number;
  notificationFailures: number;
  errors: number;
  /** True when the tick stopped early; the watermark was left where it was */
  aborted: boolean;
  watermark?: string;
  error?: string;
}

export interface MonitorStatus {
  enabled: boolean;
  running: boolean;
  ticking: boolean;
  intervalMs: number;
  lookbackMinutes: number;
  batchSize: number;
  lastTickAt?: string;
  watermark?: string;
  lastTick?: TickSummary;
}

export interface SchedulerDeps {
  feed: AnomalyFeed;
  engine: RuleEngine;
  dispatcher: Dispatcher;
  watermark: WatermarkStore;
  config: MonitoringConfig;
  log?: Logger;
  now?: () => Date;
}

const MINUTE_MS = 60_000;

function isCritical(a: AnomalyDetection, config: MonitoringConfig): boolean {
  return (
    a.isAnomaly &&
    a.confidence >= config.criticalConfidence &&
    (a.anomalyScore ?? 0) >= config.criticalScore
  );
}

/**
 * Polls the anomaly feed on a fixed delay and runs each new anomaly through
 * rule evaluation and dispatch.
 */
export class AnomalyMonitorScheduler {
  private readonly log: Logger;
  private readonly now: () => Date;
  private controller: AbortController | undefined;
  private loopDone: Promise<void> | undefined;
  private inFlight: Promise<TickSummary> | undefined;
  private lastTick: TickSummary | undefined;
  // Set when the last batch came back full; the next fetch skips the lookback
  // so a burst larger than one batch still makes progress.
  private backlog = false;

  constructor(private readonly deps: SchedulerDeps) {
    this.log = deps.log ?? silentLogger;
    this.now = deps.now ?? (() => new Date());
  }

  get running(): boolean {
    return this.controller !== undefined;
  }

  start(): void {
    if (!this.deps.config.enabled) {
      this.log.warn('Anomaly monitoring is disabled; not starting');
      return;
    }
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.log.info(`Anomaly monitor started, checking every ${this.deps.config.intervalMs}ms`);
    this.loopDone = this.loop(controller.signal).catch((err: unknown) => {
      this.log.error('Anomaly monitor loop stopped unexpectedly', { error: errorMessage(err) });
    });
  }

  /** Cancel the loop and any in-flight tick, and wait for both to settle. */
  async stop(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    await this.loopDone;
    this.controller = undefined;
    this.loopDone = undefined;
    this.log.info('Anomaly monitor stopped');
  }

  tick(signal?: AbortSignal): Promise<TickSummary> {
    // One tick at a time; a manual tick during a scheduled one joins it.
    if (this.inFlight) return this.inFlight;
    const run = this.runTick(signal).finally(() => {
      this.inFlight = undefined;
    });
    this.inFlight = run;
    return run;
  }

  async getStatus(): Promise<MonitorStatus> {
    const { config } = this.deps;
    return {
      enabled: config.enabled,
      running: this.running,
      ticking: this.inFlight !== undefined,
      intervalMs: config.intervalMs,
      lookbackMinutes: config.lookbackMinutes,
      batchSize: config.batchSize,
      lastTickAt: this.lastTick?.startedAt,
      watermark: await this.deps.watermark.get(),
      lastTick: this.lastTick,
    };
  }

  /** Rewind the watermark to one lookback before `at`. */
  async resetWatermark(at: Date = this.now(), actor?: string): Promise<string> {
    const to = new Date(at.getTime() - this.deps.config.lookbackMinutes * MINUTE_MS).toISOString();
    await this.deps.watermark.reset(to);
    this.backlog = false;
    this.log.info(`Watermark reset to ${to}`);
    await audit('monitor.reset', { actor, detail: { watermark: to } });
    return to;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.tick(signal);
      } catch (err) {
        this.log.error('Anomaly monitor tick failed', { error: errorMessage(err) });
      }
      try {
        await delay(this.deps.config.intervalMs, undefined, { signal });
      } catch (err) {
        if (signal.aborted) return;
        throw err;
      }
    }
  }

  private async runTick(outer?: AbortSignal): Promise<TickSummary> {
    const { config, feed, watermark } = this.deps;
    const startedAt = this.now();

    // Stops new work on shutdown, or as soon as an upstream dependency fails.
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    if (outer?.aborted) controller.abort();
    outer?.addEventListener('abort', onAbort, { once: true });

    const summary: TickSummary = {
      startedAt: startedAt.toISOString(),
      finishedAt: startedAt.toISOString(),
      since: startedAt.toISOString(),
      fetched: 0,
      critical: 0,
      processed: 0,
      alertsCreated: 0,
      suppressed: 0,
      duplicates: 0,
      notificationFailures: 0,
      errors: 0,
      aborted: false,
    };

    try {
      let mark = await watermark.get();
      if (!mark) {
        mark = await watermark.advance(startedAt.toISOString());
        this.log.info(`No watermark yet; starting from ${mark}`);
      }
      const lookbackMs = this.backlog ? 0 : config.lookbackMinutes * MINUTE_MS;
      summary.since = new Date(Date.parse(mark) - lookbackMs).toISOString();
      summary.watermark = mark;

      const batch = await feed.fetchUnprocessed(summary.since, config.batchSize);
      summary.fetched = batch.length;
      if (batch.length === 0) return summary;

      const critical = batch.filter((a) => isCritical(a, config));
      const rest = batch.filter((a) => !isCritical(a, config));
      summary.critical = critical.length;
      if (critical.length > 0) {
        this.log.warn(`${critical.length} critical anomal${critical.length === 1 ? 'y' : 'ies'} in batch`);
      }

      for (const group of [critical, rest]) {
        if (controller.signal.aborted) break;
        const results = await mapPool(
          group,
          config.concurrency,
          (anomaly) => this.processAnomaly(anomaly),
          controller.signal,
        );
        for (const r of results) {
          if (r.status === 'fulfilled' && r.value) {
            summary.processed++;
            this.count(summary, r.value);
          } else if (r.status === 'rejected') {
            if (r.reason instanceof UpstreamUnavailableError) {
              summary.error = r.reason.message;
              controller.abort();
            } else {
              summary.errors++;
              this.log.error(`Failed to process anomaly ${r.item.logId}`, {
                error: errorMessage(r.reason),
              });
            }
          }
        }
      }

      if (controller.signal.aborted) {
        summary.aborted = true;
        return summary;
      }

      const newest = batch.reduce((max, a) => (a.detectedAt > max ? a.detectedAt : max), mark);
      summary.watermark = await watermark.advance(newest);
      this.backlog = batch.length >= config.batchSize;
      return summary;
    } catch (err) {
      if (!(err instanceof UpstreamUnavailableError)) throw err;
      summary.aborted = true;
      summary.error = err.message;
      return summary;
    } finally {
      outer?.removeEventListener('abort', onAbort);
      summary.finishedAt = this.now().toISOString();
      this.lastTick = summary;
      await this.report(summary);
    }
  }

  private async processAnomaly(anomaly: AnomalyDetection): Promise<DispatchResult[]> {
    const rules = await this.deps.engine.evaluateBatch(anomaly);
    const results: DispatchResult[] = [];
    for (const rule of rules) {
      results.push(await this.deps.dispatcher.handleTrigger(rule, anomaly));
    }
    return results;
  }

  private count(summary: TickSummary, results: DispatchResult[]): void {
    for (const r of results) {
      switch (r.status) {
        case 'created':
          summary.alertsCreated++;
          break;
        case 'created_with_failures':
          summary.alertsCreated++;
          summary.notificationFailures += r.outcomes.filter((o) => !o.success).length;
          break;
        case 'suppressed':
          summary.suppressed++;
          break;
        case 'duplicate':
          summary.duplicates++;
          break;
      }
    }
  }

  private async report(summary: TickSummary): Promise<void> {
    if (summary.aborted) {
      this.log.warn('Anomaly monitor tick aborted; watermark not advanced', {
        error: summary.error,
        processed: summary.processed,
      });
    } else if (summary.fetched > 0) {
      this.log.info(`Processed ${summary.processed} anomalies`, {
        alerts: summary.alertsCreated,
        suppressed: summary.suppressed,
        duplicates: summary.duplicates,
        errors: summary.errors,
      });
    }
    if (summary.fetched > 0 || summary.aborted) {
      await audit('monitor.tick', {
        success: !summary.aborted,
        error: summary.error,
        detail: {
          fetched: summary.fetched,
          processed: summary.processed,
          alertsCreated: summary.alertsCreated,
          suppressed: summary.suppressed,
          duplicates: summary.duplicates,
          errors: summary.errors,
          watermark: summary.watermark,
        },
      });
    }
  }
}
