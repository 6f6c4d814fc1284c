export { KeyedLock } from './lock.js';
export { mapPool } from './pool.js';
export type { PoolResult } from './pool.js';
