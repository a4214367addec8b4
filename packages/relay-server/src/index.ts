/**
 * @fileoverview Public API of @iqbridge/relay-server.
 *
 * @module @iqbridge/relay-server
 */

export { FeedRelayServer } from './server/feed-relay.js';
export type { FeedRelayConfig, WatchJob } from './server/feed-relay.js';
export { runBarJob, toLiveBarLine } from './jobs/bar-job.js';
export type { BarJobDeps, HistorySource, HistorySourceFactory } from './jobs/bar-job.js';
export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';
