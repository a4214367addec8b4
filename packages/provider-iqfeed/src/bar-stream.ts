/**
 * Streaming bars: subscribe to tickers and fan pushed bars out to observers.
 *
 * Historical pushes (`BH`) reach history observers unconditionally. Live
 * pushes (`BC`) reach live observers only when they differ from the last live
 * bar delivered for the same ticker.
 */

import { IntervalType, barsEqual, type Bar } from '@iqbridge/contracts';
import { describeError } from '@iqbridge/logger';
import {
  HISTORY_BAR,
  LIVE_BAR,
  NO_DATA_PUSH,
  UNWATCH_COMMAND,
  WATCH_COMMAND,
} from './constants.js';
import { IQFeedConnection } from './connection.js';
import { formatDateTime, getField } from './field-codec.js';
import { parseStreamBar } from './parser.js';
import { HandlerResult, type ConnectionOptions } from './types.js';

/**
 * Receives one bar. A returned promise is awaited before the next line is read.
 */
export type BarObserver = (bar: Bar) => void | Promise<void>;

/**
 * @example
 * ```typescript
 * const stream = new BarStream({ logger });
 * stream.registerLiveBarObserver((bar) => console.log(bar.ticker, bar.close));
 * await stream.connect('127.0.0.1', 9400);
 * await stream.watch('AAPL', new Date(Date.UTC(2019, 10, 29, 9, 30)));
 * ```
 */
export class BarStream extends IQFeedConnection {
  private historyObservers: BarObserver[] = [];
  private liveObservers: BarObserver[] = [];
  private readonly lastBars = new Map<string, Bar>();

  constructor(options: ConnectionOptions = {}) {
    super({ component: 'bar-stream', ...options });
  }

  /**
   * Subscribes to interval bars for `ticker` starting at `start`.
   */
  async watch(
    ticker: string,
    start: Date,
    intervalLength = 60,
    intervalType: IntervalType = IntervalType.SECONDS
  ): Promise<void> {
    await this.sendCommand(
      `${WATCH_COMMAND},${ticker},${intervalLength},${formatDateTime(start)},,,,,,${intervalType},,`
    );
  }

  async unwatch(ticker: string): Promise<void> {
    await this.sendCommand(`${UNWATCH_COMMAND},${ticker}`);
  }

  /**
   * Adds an observer of historical bars. Returns a function that removes it.
   */
  registerHistoryBarObserver(observer: BarObserver): () => void {
    this.historyObservers.push(observer);
    return () => {
      this.historyObservers = this.historyObservers.filter((o) => o !== observer);
    };
  }

  /**
   * Adds an observer of live bars. Returns a function that removes it.
   */
  registerLiveBarObserver(observer: BarObserver): () => void {
    this.liveObservers.push(observer);
    return () => {
      this.liveObservers = this.liveObservers.filter((o) => o !== observer);
    };
  }

  /**
   * Disconnects and forgets every observer and every cached live bar.
   */
  override async disconnect(): Promise<void> {
    await super.disconnect();
    this.historyObservers = [];
    this.liveObservers = [];
    this.lastBars.clear();
  }

  override async handleFields(fields: string[]): Promise<HandlerResult> {
    if (getField(fields, 0) === NO_DATA_PUSH) {
      this.logger.error('No data for ticker', { ticker: getField(fields, 1) });
      return HandlerResult.HANDLED;
    }

    const tag = getField(fields, 1);
    if (tag !== HISTORY_BAR && tag !== LIVE_BAR) {
      return HandlerResult.UNKNOWN_MESSAGE;
    }

    let bar: Bar;
    try {
      bar = parseStreamBar(fields);
    } catch (error) {
      this.logger.error('Error processing bar', { line: fields.join(','), error: describeError(error) });
      return HandlerResult.HANDLED;
    }

    if (tag === HISTORY_BAR) {
      await this.notify(this.historyObservers, bar);
    } else if (!this.isRepeat(bar)) {
      this.lastBars.set(bar.ticker, bar);
      await this.notify(this.liveObservers, bar);
    }
    return HandlerResult.HANDLED;
  }

  private isRepeat(bar: Bar): boolean {
    const previous = this.lastBars.get(bar.ticker);
    return previous !== undefined && barsEqual(previous, bar);
  }

  private async notify(observers: readonly BarObserver[], bar: Bar): Promise<void> {
    for (const observer of [...observers]) {
      try {
        await observer(bar);
      } catch (error) {
        this.logger.error('Bar observer failed', { ticker: bar.ticker, error: describeError(error) });
      }
    }
  }
}
