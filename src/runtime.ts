import type { Config } from './types/index.js';
import { loadConfig } from './config/index.js';
import type { Logger } from './logging/index.js';
import { getLogger } from './logging/index.js';
import { createStores } from './store/index.js';
import type { AlertingStores, AlertStore } from './store/index.js';
import { createFeed } from './feed/index.js';
import type { AnomalyFeed } from './feed/index.js';
import { RuleEngine } from './rules/index.js';
import { RateLimiter } from './ratelimit/index.js';
import { createDrivers } from './notify/index.js';
import type { DriverDeps, DriverRegistry } from './notify/index.js';
import { Dispatcher } from './dispatch/index.js';
import { AlertService } from './alerts/index.js';
import { AnomalyMonitorScheduler } from './monitor/index.js';
import { DynamoAuditStore, JsonAuditStore, setAuditStore } from './audit/index.js';
import { createDynamoDBClient } from './aws/clients.js';
import { AlertingService } from './service.js';

export interface Runtime {
  config: Config;
  log: Logger;
  stores: AlertingStores;
  feed: AnomalyFeed;
  engine: RuleEngine;
  limiter: RateLimiter;
  drivers: DriverRegistry;
  dispatcher: Dispatcher;
  alerts: AlertService;
  scheduler: AnomalyMonitorScheduler;
  service: AlertingService;
}

export interface RuntimeOverrides {
  config?: Config;
  stores?: AlertingStores;
  feed?: AnomalyFeed;
  log?: Logger;
  /** State directory for the JSON backends */
  dir?: string;
  driverDeps?: Omit<DriverDeps, 'log'>;
  now?: () => Date;
}

const MINUTE_MS = 60_000;
const WARM_LIMIT = 10_000;

/** Load alerts still inside the rate-limit window into the limiter. */
export async function warmRateLimiter(
  limiter: RateLimiter,
  alerts: AlertStore,
  config: Config,
  now: Date,
): Promise<void> {
  if (!config.rateLimit.enabled) return;
  const since = new Date(now.getTime() - config.rateLimit.timeWindowMinutes * MINUTE_MS);
  const recent = await alerts.list({ since: since.toISOString(), limit: WARM_LIMIT });
  const byRule = new Map<string, Date[]>();
  for (const alert of recent) {
    const times = byRule.get(alert.alertRuleId) ?? [];
    times.push(new Date(alert.createdAt));
    byRule.set(alert.alertRuleId, times);
  }
  for (const [ruleId, times] of byRule) limiter.hydrate(ruleId, times, now);
}

/** Wire every component from configuration. */
export async function createRuntime(overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const config = overrides.config ?? (await loadConfig());
  const log = overrides.log ?? getLogger();

  if (!overrides.stores) {
    if (config.storage === 'dynamodb') {
      const auditStore = new DynamoAuditStore(
        createDynamoDBClient(config),
        `${config.dynamoTablePrefix}-audit`,
      );
      await auditStore.ensureTable();
      setAuditStore(auditStore);
    } else if (overrides.dir) {
      setAuditStore(new JsonAuditStore(overrides.dir));
    }
  }

  const stores = overrides.stores ?? (await createStores(config, overrides.dir));
  const feed = overrides.feed ?? createFeed(config.feed, overrides.dir);
  const engine = new RuleEngine(stores.rules, log);
  const limiter = new RateLimiter(config.rateLimit, log);
  await warmRateLimiter(limiter, stores.alerts, config, overrides.now?.() ?? new Date());
  const drivers = createDrivers(config.notification, { ...overrides.driverDeps, log });
  const dispatcher = new Dispatcher({ stores, limiter, drivers, log, now: overrides.now });
  const alerts = new AlertService(stores.alerts, log);
  const scheduler = new AnomalyMonitorScheduler({
    feed,
    engine,
    dispatcher,
    watermark: stores.watermark,
    config: config.monitoring,
    log,
    now: overrides.now,
  });
  const service = new AlertingService(engine, dispatcher, alerts);

  return { config, log, stores, feed, engine, limiter, drivers, dispatcher, alerts, scheduler, service };
}
