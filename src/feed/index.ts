import type { Config } from '../types/index.js';
import { ValidationError } from '../errors.js';
import type { AnomalyFeed } from './feed.js';
import { HttpAnomalyFeed } from './http-feed.js';
import { JsonAnomalyFeed } from './json-feed.js';

export { JsonAnomalyFeed } from './json-feed.js';
export { HttpAnomalyFeed } from './http-feed.js';
export type { HttpAnomalyFeedOptions } from './http-feed.js';
export type { AnomalyFeed } from './feed.js';

export function createFeed(config: Config['feed'], dir?: string): AnomalyFeed {
  if (config.source === 'http') {
    if (!config.url) throw new ValidationError('feed.url is required when feed.source is "http"');
    return new HttpAnomalyFeed({ url: config.url, timeoutMs: config.timeoutMs });
  }
  return new JsonAnomalyFeed(dir);
}
