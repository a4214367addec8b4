/**
 * Feed relay server.
 *
 * Speaks the streaming-bar side of the IQFeed protocol to its clients. A
 * watch request is answered by replaying the requested day of historical
 * bars as live-bar pushes.
 */

import net from 'node:net';
import type { AddressInfo } from 'node:net';
import { createChildLogger, describeError, withRequestContext, type Logger } from '@iqbridge/logger';
import {
  CONNECT,
  CURRENT_PROTOCOL,
  DISCONNECT,
  LINE_TERMINATOR,
  LineSocket,
  NO_DATA_PUSH,
  PROTOCOL_VERSION,
  SERVER_CONNECTED_MESSAGE,
  SET_PROTOCOL,
  SYSTEM_MESSAGE,
  UNWATCH_COMMAND,
  WATCH_COMMAND,
  getField,
  isMalformedFieldError,
  splitFields,
} from '@iqbridge/provider-iqfeed';

/**
 * Produces the lines answering a watch request for `ticker` on `day` (`YYYYMMDD`).
 */
export type WatchJob = (ticker: string, day: string) => Promise<string[]>;

export interface FeedRelayConfig {
  host: string;
  port: number;
  /** How long a session may stay silent before it is probed */
  idleProbeMs: number;
  logger: Logger;
  runJob: WatchJob;
}

/**
 * @example
 * ```typescript
 * const relay = new FeedRelayServer({
 *   host: '0.0.0.0',
 *   port: 9999,
 *   idleProbeMs: 5000,
 *   logger,
 *   runJob: (ticker, day) => runBarJob(ticker, day, { config, logger }),
 * });
 * await relay.start();
 * ```
 */
export class FeedRelayServer {
  private readonly logger: Logger;
  private server?: net.Server;
  private readonly sessions = new Set<LineSocket>();

  constructor(private readonly config: FeedRelayConfig) {
    this.logger = createChildLogger(config.logger, { component: 'feed-relay' });
  }

  /** Bound address once started */
  get address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address !== 'string' ? address : null;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Start listening
   */
  async start(): Promise<void> {
    const server = net.createServer((socket) => {
      withRequestContext(() => this.serve(socket), undefined, {
        remote: `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? 0}`,
      }).catch((error: unknown) => {
        this.logger.error('Session failed', { error: describeError(error) });
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', (error) => {
        this.logger.error('Relay server error', { error: describeError(error) });
        reject(error);
      });
      server.listen(this.config.port, this.config.host, () => {
        this.logger.info('Relay server started', {
          host: this.config.host,
          port: this.address?.port ?? this.config.port,
        });
        resolve();
      });
    });
  }

  /**
   * Stop listening and close every open session
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    await Promise.all([...this.sessions].map((session) => session.close()));

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          this.logger.error('Error stopping relay server', { error: describeError(error) });
          reject(error);
        } else {
          this.logger.info('Relay server stopped');
          resolve();
        }
      });
    });
  }

  private async serve(socket: net.Socket): Promise<void> {
    const session = new LineSocket(socket);
    this.sessions.add(session);
    this.logger.info('Client connected', { remote: session.remoteAddress });

    try {
      for (;;) {
        const read = await session.nextLine(this.config.idleProbeMs);
        if (read.kind === 'closed') {
          break;
        }
        if (read.kind === 'idle') {
          if (!(await this.reply(session, [SERVER_CONNECTED_MESSAGE]))) {
            break;
          }
          continue;
        }

        const message = read.line.trim();
        if (message && !(await this.handleMessage(session, message))) {
          break;
        }
      }
    } finally {
      this.sessions.delete(session);
      await session.close();
      this.logger.info('Client disconnected', { remote: session.remoteAddress });
    }
  }

  /**
   * Handles one client line. Returns false when the session should end.
   */
  private async handleMessage(session: LineSocket, message: string): Promise<boolean> {
    const fields = splitFields(message);
    const command = getField(fields, 0);

    if (command === SYSTEM_MESSAGE) {
      switch (getField(fields, 1)) {
        case CONNECT:
          return this.reply(session, [SERVER_CONNECTED_MESSAGE]);
        case DISCONNECT:
          return false;
        case SET_PROTOCOL:
          return this.reply(session, [`${SYSTEM_MESSAGE},${CURRENT_PROTOCOL},${PROTOCOL_VERSION}`]);
      }
    }
    if (command === WATCH_COMMAND) {
      const ticker = getField(fields, 1);
      const day = getField(fields, 3).split(' ')[0] ?? '';
      return this.reply(session, await this.watch(ticker, day));
    }
    if (command === UNWATCH_COMMAND) {
      this.logger.debug('Unwatch ignored', { ticker: getField(fields, 1) });
      return true;
    }

    this.logger.warn('Unknown client message', { line: message });
    return true;
  }

  private async watch(ticker: string, day: string): Promise<string[]> {
    this.logger.info('Watch requested', { ticker, day });
    try {
      return await this.config.runJob(ticker, day);
    } catch (error) {
      if (!isMalformedFieldError(error)) {
        throw error;
      }
      this.logger.warn('Bad watch request', { ticker, day, error: describeError(error) });
      return [`${NO_DATA_PUSH},${ticker}`];
    }
  }

  /**
   * Writes lines to the client. Returns false when the client is gone.
   */
  private async reply(session: LineSocket, lines: string[]): Promise<boolean> {
    if (lines.length === 0) {
      return true;
    }
    try {
      await session.write(lines.map((line) => `${line}${LINE_TERMINATOR}`).join(''));
      return true;
    } catch (error) {
      this.logger.info('Client write failed, ending session', { error: describeError(error) });
      return false;
    }
  }
}
