/**
 * Bar job: fetch one trading day of interval bars from the upstream lookup
 * port and render them as live-bar push lines.
 */

import { IntervalType, type Bar } from '@iqbridge/contracts';
import { createChildLogger, describeError, startTimer, type Logger } from '@iqbridge/logger';
import {
  HistoryClient,
  LIVE_BAR,
  NO_DATA_PUSH,
  TerminationStyle,
  formatTimestamp,
  parseClockTime,
  parseCompactDate,
  toDateTime,
} from '@iqbridge/provider-iqfeed';
import type { Config } from '../config/index.js';

/**
 * The part of {@link HistoryClient} a bar job uses.
 */
export interface HistorySource {
  readonly connected: boolean;
  connect(host: string, port: number, terminationStyle?: TerminationStyle): Promise<void>;
  requestBarsInPeriod(
    ticker: string,
    start: Date,
    end: Date,
    intervalLength: number,
    intervalType?: IntervalType,
    timeoutSeconds?: number
  ): Promise<Bar[]>;
  disconnect(): Promise<void>;
}

export type HistorySourceFactory = (logger: Logger) => HistorySource;

export interface BarJobDeps {
  config: Pick<Config, 'upstream' | 'session'>;
  logger: Logger;
  /** Builds the upstream client (default: a {@link HistoryClient}) */
  createSource?: HistorySourceFactory;
}

const defaultSourceFactory: HistorySourceFactory = (logger) => new HistoryClient({ logger });

/**
 * Renders a bar as the line a streaming client receives for a live bar.
 *
 * @example
 * ```typescript
 * toLiveBarLine(bar, 60);
 * // 'B-AAPL-0060-s,BC,AAPL,2019-11-29 11:37:00,267.8,268,267.7,267.9,1502000,12000,85'
 * ```
 */
export function toLiveBarLine(bar: Bar, intervalSeconds: number): string {
  const streamId = `B-${bar.ticker}-${String(intervalSeconds).padStart(4, '0')}-${IntervalType.SECONDS}`;
  return [
    streamId,
    LIVE_BAR,
    bar.ticker,
    formatTimestamp(bar.date, bar.time),
    bar.open,
    bar.high,
    bar.low,
    bar.close,
    bar.cumulativeVolume,
    bar.intervalVolume,
    bar.numTrades,
  ].join(',');
}

/**
 * Fetches the session bars of `ticker` on `day` (`YYYYMMDD`).
 *
 * Upstream failures are logged and answered with the single no-data line
 * `n,<ticker>`. The upstream connection is closed in every case.
 *
 * @throws {MalformedFieldError} If `day` is not a valid `YYYYMMDD` date
 */
export async function runBarJob(ticker: string, day: string, deps: BarJobDeps): Promise<string[]> {
  const { config } = deps;
  const logger = createChildLogger(deps.logger, { component: 'bar-job', ticker });

  const date = parseCompactDate(day);
  const start = toDateTime(date, parseClockTime(config.session.open));
  const end = toDateTime(date, parseClockTime(config.session.close));

  const timer = startTimer();
  const source = (deps.createSource ?? defaultSourceFactory)(logger);
  try {
    await source.connect(config.upstream.host, config.upstream.lookupPort, TerminationStyle.RUN_FOREVER);
    const bars = await source.requestBarsInPeriod(
      ticker,
      start,
      end,
      config.session.intervalSeconds,
      IntervalType.SECONDS,
      config.upstream.requestTimeoutSec
    );
    logger.info('Bar job complete', { day, count: bars.length, duration_ms: timer.stop() });
    return bars.map((bar) => toLiveBarLine(bar, config.session.intervalSeconds));
  } catch (error) {
    logger.error('Bar job failed', { day, error: describeError(error), duration_ms: timer.stop() });
    return [`${NO_DATA_PUSH},${ticker}`];
  } finally {
    if (source.connected) {
      try {
        await source.disconnect();
      } catch (error) {
        logger.warn('Could not disconnect from upstream', { error: describeError(error) });
      }
    }
  }
}
