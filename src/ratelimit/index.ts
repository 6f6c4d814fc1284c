export { RateLimiter } from './limiter.js';
export type { RateLimitDecision, RateLimitStatus } from './limiter.js';
