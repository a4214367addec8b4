/**
 * Bounded historical queries on the lookup port.
 */

import { IntervalType, type Bar, type DailyBar } from '@iqbridge/contracts';
import { measureAsync } from '@iqbridge/logger';
import {
  DAILY_BARS_PREFIX,
  DEFAULT_REQUEST_TIMEOUT_SECONDS,
  HISTORY_BARS_PREFIX,
} from './constants.js';
import { IQFeedConnection } from './connection.js';
import { MalformedFieldError, NoDataError, ProtocolUsageError } from './errors.js';
import { formatDate, formatDateTime } from './field-codec.js';
import { parseDailyBar, parseHistoryBar } from './parser.js';
import type { ConnectionOptions } from './types.js';

/**
 * @example
 * ```typescript
 * const history = new HistoryClient({ logger });
 * await history.connect('127.0.0.1', 9100, TerminationStyle.TERMINATE_ON_IDLE);
 * const bars = await history.requestBarsInPeriod(
 *   'AAPL',
 *   new Date(Date.UTC(2019, 10, 29, 9, 30)),
 *   new Date(Date.UTC(2019, 10, 29, 16, 0)),
 *   60
 * );
 * await history.disconnect();
 * ```
 */
export class HistoryClient extends IQFeedConnection {
  constructor(options: ConnectionOptions = {}) {
    super({ component: 'history-client', ...options });
  }

  /**
   * Requests the interval bars of `ticker` between `start` and `end`, in the
   * order the server sends them. An empty period yields an empty list.
   *
   * @throws {NoDataError} If the server reports no data for the ticker
   * @throws {RequestTimeoutError} If the result does not end in time
   */
  async requestBarsInPeriod(
    ticker: string,
    start: Date,
    end: Date,
    intervalLength: number,
    intervalType: IntervalType = IntervalType.SECONDS,
    timeoutSeconds: number = DEFAULT_REQUEST_TIMEOUT_SECONDS
  ): Promise<Bar[]> {
    if (!Number.isInteger(intervalLength) || intervalLength <= 0) {
      throw new ProtocolUsageError('Interval length must be a positive integer', { intervalLength });
    }

    const requestId = this.issueRequestId(HISTORY_BARS_PREFIX, ticker);
    const command =
      `HIT,${ticker},${intervalLength},${formatDateTime(start)},${formatDateTime(end)},` +
      `,,,1,${requestId},,${intervalType},`;

    const { result: bars, duration_ms } = await measureAsync(() =>
      this.awaitCommand(command, ticker, requestId, parseHistoryBar, timeoutSeconds)
    );
    if (!Array.isArray(bars)) {
      throw new MalformedFieldError('Bars result is not a list', { ticker, requestId });
    }

    this.logger.debug('Bars received', {
      ticker,
      feed_request_id: requestId,
      count: bars.length,
      duration_ms,
    });
    return bars;
  }

  /**
   * Requests the daily bar of `ticker` for `day`. When the server sends more
   * than one line, the last one wins.
   *
   * @throws {NoDataError} If no daily bar arrives
   */
  async requestDailyBarForDate(
    ticker: string,
    day: Date,
    timeoutSeconds: number = DEFAULT_REQUEST_TIMEOUT_SECONDS
  ): Promise<DailyBar> {
    const requestId = this.issueRequestId(DAILY_BARS_PREFIX, ticker);
    const wireDay = formatDate(day);
    const command = `HDT,${ticker},${wireDay},${wireDay},,1,${requestId},,`;

    const bars = await this.awaitCommand(command, ticker, requestId, parseDailyBar, timeoutSeconds);
    const last = bars.at(-1);
    if (last === undefined) {
      throw new NoDataError(ticker, { day: wireDay, requestId });
    }
    return last;
  }
}
