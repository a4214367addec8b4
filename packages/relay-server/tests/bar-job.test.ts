/**
 * Tests for the bar job
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { IntervalType } from '@iqbridge/contracts';
import { createMemoryLogger, type Logger, type MemoryTransport } from '@iqbridge/logger';
import { HistoryClient, MalformedFieldError, NoDataError, TerminationStyle } from '@iqbridge/provider-iqfeed';
import { runBarJob, toLiveBarLine } from '../src/jobs/bar-job.js';
import { MockFeed, commandField } from '../../provider-iqfeed/tests/support/mock-feed.js';
import { FakeHistorySource, TEST_CONFIG, makeBar } from './support.js';

describe('toLiveBarLine', () => {
  it('should render a live-bar push line', () => {
    expect(toLiveBarLine(makeBar(37, 267.9), 60)).toBe(
      'B-AAPL-0060-s,BC,AAPL,2019-11-29 11:37:00,267.8,268,267.7,267.9,1502000,12000,85'
    );
  });
});

describe('runBarJob', () => {
  let logger: Logger;
  let memory: MemoryTransport;

  beforeEach(() => {
    ({ logger, memory } = createMemoryLogger('debug'));
  });

  it('should request the session window and render every bar', async () => {
    const source = new FakeHistorySource([makeBar(36, 267.75), makeBar(37, 267.9)]);

    const lines = await runBarJob('AAPL', '20191129', {
      config: TEST_CONFIG,
      logger,
      createSource: () => source,
    });

    expect(lines).toEqual([
      'B-AAPL-0060-s,BC,AAPL,2019-11-29 11:36:00,267.8,268,267.7,267.75,1502000,12000,85',
      'B-AAPL-0060-s,BC,AAPL,2019-11-29 11:37:00,267.8,268,267.7,267.9,1502000,12000,85',
    ]);
    expect(source.connectedTo).toEqual({
      host: 'feed.test',
      port: 9100,
      terminationStyle: TerminationStyle.RUN_FOREVER,
    });
    expect(source.requests).toEqual([
      {
        ticker: 'AAPL',
        start: new Date(Date.UTC(2019, 10, 29, 9, 30)),
        end: new Date(Date.UTC(2019, 10, 29, 16, 0)),
        intervalLength: 60,
        intervalType: IntervalType.SECONDS,
        timeoutSeconds: 30,
      },
    ]);
    expect(source.disconnects).toBe(1);
  });

  it('should answer an upstream failure with a no-data line and disconnect', async () => {
    const source = new FakeHistorySource(new NoDataError('AAPL'));

    const lines = await runBarJob('AAPL', '20191129', { config: TEST_CONFIG, logger, createSource: () => source });

    expect(lines).toEqual(['n,AAPL']);
    expect(source.connected).toBe(false);
    await vi.waitFor(() => {
      expect(memory.find('error', 'Bar job failed')).toHaveLength(1);
    });
  });

  it('should not disconnect when connecting failed', async () => {
    const source = new FakeHistorySource([]);
    source.connectError = new Error('connect ECONNREFUSED');

    const lines = await runBarJob('AAPL', '20191129', { config: TEST_CONFIG, logger, createSource: () => source });

    expect(lines).toEqual(['n,AAPL']);
    expect(source.disconnects).toBe(0);
  });

  it('should keep the result when disconnecting fails', async () => {
    const source = new FakeHistorySource([makeBar(37, 267.9)]);
    source.disconnectError = new Error('socket hang up');

    const lines = await runBarJob('AAPL', '20191129', { config: TEST_CONFIG, logger, createSource: () => source });

    expect(lines).toHaveLength(1);
    await vi.waitFor(() => {
      expect(memory.find('warn', 'Could not disconnect from upstream')).toHaveLength(1);
    });
  });

  it('should reject a malformed day before connecting', async () => {
    const createSource = vi.fn(() => new FakeHistorySource([]));

    await expect(
      runBarJob('AAPL', '2019-11-29', { config: TEST_CONFIG, logger, createSource })
    ).rejects.toBeInstanceOf(MalformedFieldError);
    expect(createSource).not.toHaveBeenCalled();
  });

  describe('against an upstream lookup port', () => {
    let upstream: MockFeed;

    beforeEach(async () => {
      upstream = await MockFeed.start();
    });

    afterEach(async () => {
      await upstream.close();
    });

    it('should wait for an upstream slower than the idle timeout', async () => {
      const lines = runBarJob('AAPL', '20191129', {
        config: { ...TEST_CONFIG, upstream: { host: upstream.host, lookupPort: upstream.port, requestTimeoutSec: 5 } },
        logger,
        createSource: (sourceLogger) => new HistoryClient({ logger: sourceLogger, idleTimeoutMs: 100 }),
      });
      const command = await upstream.waitForLine((line) => line.startsWith('HIT,'));
      await new Promise((resolve) => setTimeout(resolve, 400));

      const id = commandField(command, 9);
      upstream.send(`${id},2019-11-29 11:37:00,268,267.7,267.8,267.9,1502000,12000,85,`, `${id},!ENDMSG!,`);

      await expect(lines).resolves.toEqual([
        'B-AAPL-0060-s,BC,AAPL,2019-11-29 11:37:00,267.8,268,267.7,267.9,1502000,12000,85',
      ]);
    });

    it('should fetch bars through a history client', async () => {
      upstream.respond((line) => {
        if (!line.startsWith('HIT,')) {
          return undefined;
        }
        const id = commandField(line, 9);
        return [
          `${id},2019-11-29 11:37:00,268,267.7,267.8,267.9,1502000,12000,85,`,
          `${id},!ENDMSG!,`,
        ];
      });

      const lines = await runBarJob('AAPL', '20191129', {
        config: { ...TEST_CONFIG, upstream: { host: upstream.host, lookupPort: upstream.port, requestTimeoutSec: 5 } },
        logger,
      });

      expect(lines).toEqual([
        'B-AAPL-0060-s,BC,AAPL,2019-11-29 11:37:00,267.8,268,267.7,267.9,1502000,12000,85',
      ]);
      await upstream.waitForLine((line) => line === 'S,DISCONNECT');
      expect(
        upstream.received.find((line) => line.startsWith('HIT,'))?.startsWith(
          'HIT,AAPL,60,20191129 093000,20191129 160000,,,,1,H_AAPL'
        )
      ).toBe(true);
    });
  });
});
