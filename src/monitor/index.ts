export { AnomalyMonitorScheduler } from './scheduler.js';
export type { MonitorStatus, SchedulerDeps, TickSummary } from './scheduler.js';
