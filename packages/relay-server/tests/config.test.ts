/**
 * Tests for relay configuration loading
 */

import { describe, it, expect, vi } from 'vitest';
import { createMemoryLogger } from '@iqbridge/logger';
import { getConfigSummary, loadConfig } from '../src/config/index.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.relay).toEqual({ host: '0.0.0.0', port: 9999, idleProbeMs: 5000 });
    expect(config.upstream).toEqual({ host: '127.0.0.1', lookupPort: 9100, requestTimeoutSec: 30 });
    expect(config.session).toEqual({ open: '09:30', close: '16:00', intervalSeconds: 60 });
    expect(config.logging).toEqual({ level: 'info', format: 'pretty' });
    expect(config.app.env).toBe('development');
  });

  it('should map environment variables onto settings', () => {
    const config = loadConfig({
      IQFEED_HOST: 'feed.example.internal',
      IQFEED_PORT_LOOKUP: '9200',
      RELAY_PORT: '10999',
      LOG_LEVEL: 'debug',
      LOG_FORMAT: 'json',
      SESSION_OPEN: '04:00',
      NODE_ENV: 'production',
    });

    expect(config.upstream.host).toBe('feed.example.internal');
    expect(config.upstream.lookupPort).toBe(9200);
    expect(config.relay.port).toBe(10999);
    expect(config.logging.level).toBe('debug');
    expect(config.logging.format).toBe('json');
    expect(config.session.open).toBe('04:00');
    expect(config.app.env).toBe('production');
  });

  it('should ignore empty variables', () => {
    expect(loadConfig({ IQFEED_HOST: '' }).upstream.host).toBe('127.0.0.1');
  });

  it('should list every invalid setting', () => {
    let message = '';
    try {
      loadConfig({ RELAY_PORT: '70000', SESSION_CLOSE: '4pm' });
    } catch (error) {
      message = error instanceof Error ? error.message : '';
    }

    expect(message.startsWith('Configuration validation failed:\n')).toBe(true);
    expect(message).toContain('relay.port: ');
    expect(message).toContain('session.close: Expected HH:mm');
  });

  it('should log a summary when given a logger', async () => {
    const { logger, memory } = createMemoryLogger('info');

    const config = loadConfig({ IQFEED_HOST: 'feed.example.internal' }, logger);

    expect(getConfigSummary(config)).toEqual({
      environment: 'development',
      relay: '0.0.0.0:9999',
      upstream: 'feed.example.internal:9100',
      session: '09:30-16:00/60s',
      logging: { level: 'info', format: 'pretty' },
    });
    await vi.waitFor(() => {
      expect(memory.find('info', 'Configuration loaded')).toHaveLength(1);
    });
  });
});
