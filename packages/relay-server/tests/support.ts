/**
 * Shared fixtures for relay tests
 */

import type { Bar, IntervalType } from '@iqbridge/contracts';
import type { TerminationStyle } from '@iqbridge/provider-iqfeed';
import type { HistorySource } from '../src/jobs/bar-job.js';
import type { Config } from '../src/config/index.js';

export const TEST_CONFIG: Pick<Config, 'upstream' | 'session'> = {
  upstream: { host: 'feed.test', lookupPort: 9100, requestTimeoutSec: 30 },
  session: { open: '09:30', close: '16:00', intervalSeconds: 60 },
};

export function makeBar(minute: number, close: number): Bar {
  return {
    ticker: 'AAPL',
    date: { year: 2019, month: 11, day: 29 },
    time: { hour: 11, minute, second: 0 },
    open: 267.8,
    high: 268,
    low: 267.7,
    close,
    cumulativeVolume: 1502000,
    intervalVolume: 12000,
    numTrades: 85,
  };
}

export interface BarsRequest {
  ticker: string;
  start: Date;
  end: Date;
  intervalLength: number;
  intervalType?: IntervalType;
  timeoutSeconds?: number;
}

/**
 * History source that answers from memory and records how it was used.
 */
export class FakeHistorySource implements HistorySource {
  connected = false;
  connectedTo: { host: string; port: number; terminationStyle?: TerminationStyle } | null = null;
  requests: BarsRequest[] = [];
  disconnects = 0;
  connectError: Error | null = null;
  disconnectError: Error | null = null;

  constructor(private readonly outcome: Bar[] | Error) {}

  async connect(host: string, port: number, terminationStyle?: TerminationStyle): Promise<void> {
    if (this.connectError) {
      throw this.connectError;
    }
    this.connectedTo = { host, port, terminationStyle };
    this.connected = true;
  }

  async requestBarsInPeriod(
    ticker: string,
    start: Date,
    end: Date,
    intervalLength: number,
    intervalType?: IntervalType,
    timeoutSeconds?: number
  ): Promise<Bar[]> {
    this.requests.push({ ticker, start, end, intervalLength, intervalType, timeoutSeconds });
    if (this.outcome instanceof Error) {
      throw this.outcome;
    }
    return this.outcome;
  }

  async disconnect(): Promise<void> {
    this.disconnects += 1;
    if (this.disconnectError) {
      throw this.disconnectError;
    }
    this.connected = false;
  }
}
