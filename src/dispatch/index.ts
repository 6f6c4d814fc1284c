export { Dispatcher } from './dispatcher.js';
export type {
  ChannelOutcome,
  DispatchResult,
  DispatchStatus,
  DispatcherDeps,
  ManualAlertInput,
  SuppressionReason,
} from './dispatcher.js';
export { alertFromAnomaly, alertTitle, alertDescription } from './content.js';
