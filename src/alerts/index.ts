export { AlertService } from './service.js';
export type { AlertStatistics } from './service.js';
export { TRANSITIONS, canTransition, assertTransition, isTerminal, transitionFields } from './lifecycle.js';
