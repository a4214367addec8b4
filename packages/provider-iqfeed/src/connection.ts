/**
 * IQFeed connection: one TCP socket, a read loop that classifies every
 * inbound line, and a table of requests waiting for their result lines.
 *
 * Subclasses claim push-style lines by overriding {@link IQFeedConnection.handleFields};
 * anything they leave is matched by its first field against the request table.
 */

import { createChildLogger, createLogger, describeError, type Logger } from '@iqbridge/logger';
import {
  CURRENT_PROTOCOL,
  DISCONNECT_COMMAND,
  END_MSG,
  ERROR_MARKER,
  IDLE_TIMEOUT_MS,
  LINE_TERMINATOR,
  NO_DATA,
  PROTOCOL_VERSION,
  REQUEST_JITTER,
  REQUEST_NUMBER_WIDTH,
  SERVER_CONNECTED,
  SET_PROTOCOL_COMMAND,
  SYSTEM_MESSAGE,
} from './constants.js';
import {
  ConnectionClosedError,
  NoDataError,
  ProtocolUsageError,
  RequestTimeoutError,
  ServerError,
} from './errors.js';
import { getField, splitFields } from './field-codec.js';
import { LineSocket } from './line-socket.js';
import { PendingRequest, type RequestEntry } from './pending-request.js';
import {
  ConnectionState,
  HandlerResult,
  TerminationStyle,
  type ConnectionOptions,
  type LineHandler,
  type MessageClassifier,
} from './types.js';

type Outcome<T> = { ok: true; value: T } | { ok: false; error: unknown };

let fallbackLogger: Logger | undefined;

function defaultLogger(): Logger {
  fallbackLogger ??= createLogger({ level: 'info' });
  return fallbackLogger;
}

/**
 * Connection to an IQFeed port.
 *
 * @example
 * ```typescript
 * const connection = new IQFeedConnection({ logger });
 * await connection.connect('127.0.0.1', 9100);
 * await connection.sendCommand('S,CONNECT');
 * await connection.disconnect();
 * ```
 */
export class IQFeedConnection implements MessageClassifier {
  protected readonly logger: Logger;

  private readonly requests = new Map<string, RequestEntry>();
  private readonly idleTimeoutMs: number;
  private readonly random: () => number;
  private socket: LineSocket | null = null;
  private readLoop: Promise<void> | null = null;
  private requestCounter = 0;
  private currentState = ConnectionState.NOT_RUNNING;
  private terminationStyle = TerminationStyle.RUN_FOREVER;

  constructor(options: ConnectionOptions = {}) {
    this.logger = createChildLogger(options.logger ?? defaultLogger(), {
      component: options.component ?? 'iqfeed-connection',
    });
    this.idleTimeoutMs = options.idleTimeoutMs ?? IDLE_TIMEOUT_MS;
    this.random = options.random ?? Math.random;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  /** Number of requests still waiting for their result */
  get pendingRequestCount(): number {
    return this.requests.size;
  }

  get connected(): boolean {
    return this.socket !== null;
  }

  /**
   * Opens the socket, negotiates the protocol version and starts the read loop.
   * When the negotiation cannot be sent the socket is closed again and the
   * instance can be connected anew.
   *
   * @throws {ProtocolUsageError} If a socket is already open
   */
  async connect(
    host: string,
    port: number,
    terminationStyle: TerminationStyle = TerminationStyle.RUN_FOREVER
  ): Promise<void> {
    if (this.socket) {
      throw new ProtocolUsageError('Already connected', { host, port });
    }

    let socket: LineSocket;
    try {
      socket = await LineSocket.connect(host, port);
    } catch (error) {
      this.logger.error('Could not connect', { host, port, error: describeError(error) });
      throw error;
    }

    this.socket = socket;
    this.terminationStyle = terminationStyle;

    try {
      await this.sendCommand(SET_PROTOCOL_COMMAND);
    } catch (error) {
      this.logger.error('Protocol negotiation failed', { host, port, error: describeError(error) });
      this.socket = null;
      await socket.close();
      throw error;
    }

    this.logger.info('Connected', { host, port, terminationStyle });
    this.currentState = ConnectionState.READING_MESSAGES;
    this.readLoop = this.runReadLoop(socket).catch((error: unknown) => {
      this.logger.error('Read loop failed', { error: describeError(error) });
    });
  }

  /**
   * Stops reading, tells the server goodbye and closes the socket. Requests
   * still waiting are rejected with {@link ConnectionClosedError}.
   *
   * @throws {ProtocolUsageError} If not connected
   */
  async disconnect(): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.readLoop) {
      throw new ProtocolUsageError('Not connected');
    }

    socket.discard();
    this.currentState = ConnectionState.NOT_RUNNING;
    this.failPendingRequests('Connection closed by disconnect');

    try {
      await this.sendCommand(DISCONNECT_COMMAND);
    } catch (error) {
      this.logger.warn('Could not send disconnect', { error: describeError(error) });
    }

    this.socket = null;
    this.readLoop = null;
    await socket.close();
    this.logger.info('Disconnected');
  }

  /**
   * Sends one command line and waits until it has been written out.
   *
   * @throws {ProtocolUsageError} If not connected
   */
  async sendCommand(text: string): Promise<void> {
    if (!this.socket) {
      throw new ProtocolUsageError('Not connected', { command: text });
    }
    this.logger.debug('Sending command', { command: text });
    await this.socket.write(`${text}${LINE_TERMINATOR}`);
  }

  /**
   * Builds a request id from `prefix`, `ticker` and a ten-digit number. The
   * number grows with every call and carries a random offset in its last two
   * digits.
   *
   * @example
   * ```typescript
   * connection.issueRequestId('H_', 'AAPL'); // e.g. 'H_AAPL0000000042'
   * ```
   */
  issueRequestId(prefix: string, ticker: string): string {
    const jitter = 1 + Math.floor(this.random() * REQUEST_JITTER);
    const sequence = this.requestCounter * REQUEST_JITTER + jitter;
    this.requestCounter += 1;
    return `${prefix}${ticker}${String(sequence).padStart(REQUEST_NUMBER_WIDTH, '0')}`;
  }

  /**
   * Sends `command` and collects the records of every line tagged with
   * `requestId` until the server ends the result.
   *
   * The table entry is removed whatever the outcome.
   *
   * @throws {ProtocolUsageError} If `requestId` is already waiting
   * @throws {RequestTimeoutError} If the result does not end within `timeoutSeconds`
   * @throws {NoDataError} If the server reports no data
   * @throws {ServerError} If the server reports an error
   * @throws {ConnectionClosedError} If the connection goes away first
   */
  async awaitCommand<T>(
    command: string,
    ticker: string,
    requestId: string,
    lineHandler: LineHandler<T>,
    timeoutSeconds: number
  ): Promise<T[]> {
    if (this.requests.has(requestId)) {
      throw new ProtocolUsageError('Request id already in use', { requestId });
    }

    const request = new PendingRequest<T>(ticker, lineHandler);
    const outcome = request.promise.then(
      (value): Outcome<T[]> => ({ ok: true, value }),
      (error: unknown): Outcome<T[]> => ({ ok: false, error })
    );
    this.requests.set(requestId, request);

    let timer: NodeJS.Timeout | undefined;
    try {
      await this.sendCommand(command);
      const deadline = new Promise<Outcome<T[]>>((resolve) => {
        timer = setTimeout(
          () => resolve({ ok: false, error: new RequestTimeoutError(requestId, timeoutSeconds) }),
          timeoutSeconds * 1000
        );
      });
      const result = await Promise.race([outcome, deadline]);
      if (!result.ok) {
        throw result.error;
      }
      return result.value;
    } finally {
      clearTimeout(timer);
      this.requests.delete(requestId);
    }
  }

  /**
   * Claims lines before the request table sees them. Returns
   * {@link HandlerResult.UNKNOWN_MESSAGE} for lines it leaves alone.
   */
  async handleFields(_fields: string[]): Promise<HandlerResult> {
    return HandlerResult.UNKNOWN_MESSAGE;
  }

  private async runReadLoop(socket: LineSocket): Promise<void> {
    try {
      for (;;) {
        const read = await socket.nextLine(this.idleTimeoutMs);
        if (read.kind === 'closed') {
          break;
        }
        if (read.kind === 'idle') {
          if (this.terminationStyle === TerminationStyle.TERMINATE_ON_IDLE) {
            this.logger.debug('Read loop idle, stopping');
            break;
          }
          continue;
        }

        const message = read.line.trim();
        if (message) {
          await this.dispatch(message);
        }
      }
    } finally {
      // Requests outlive an idle stop and end by their own deadline
      if (this.socket === socket) {
        this.currentState = ConnectionState.NOT_RUNNING;
        if (socket.closed) {
          this.failPendingRequests('Connection closed by peer');
        }
      }
    }
  }

  private async dispatch(message: string): Promise<void> {
    const fields = splitFields(message);
    const first = getField(fields, 0);
    const second = getField(fields, 1);

    if (first === SYSTEM_MESSAGE && second === CURRENT_PROTOCOL) {
      this.checkProtocol(fields);
      return;
    }
    if (first === SYSTEM_MESSAGE && second === SERVER_CONNECTED) {
      return;
    }

    try {
      if ((await this.handleFields(fields)) === HandlerResult.HANDLED) {
        return;
      }
    } catch (error) {
      this.logger.error('Message handler failed', { line: message, error: describeError(error) });
      return;
    }

    const request = this.requests.get(first);
    if (request) {
      this.processRequestResult(first, fields, request, message);
      return;
    }

    this.logger.debug('Unrecognized message', { line: message });
  }

  private checkProtocol(fields: string[]): void {
    const version = getField(fields, 2);
    if (version !== PROTOCOL_VERSION) {
      this.logger.error('Bad protocol received', { expected: PROTOCOL_VERSION, received: version });
    }
  }

  private processRequestResult(
    requestId: string,
    fields: string[],
    request: RequestEntry,
    line: string
  ): void {
    if (request.settled) {
      return;
    }

    if (getField(fields, 2) === NO_DATA) {
      request.fail(new NoDataError(request.ticker, { requestId }));
    } else if (getField(fields, 1) === END_MSG) {
      request.complete();
    } else if (getField(fields, 1) === ERROR_MARKER) {
      request.fail(new ServerError(getField(fields, 2), { requestId, ticker: request.ticker }));
    } else {
      try {
        request.addLine([request.ticker, ...fields.slice(1)]);
      } catch (error) {
        this.logger.error('Could not interpret fields', {
          feed_request_id: requestId,
          line,
          error: describeError(error),
        });
      }
    }
  }

  private failPendingRequests(reason: string): void {
    for (const [requestId, request] of this.requests) {
      if (request.fail(new ConnectionClosedError(reason, { requestId, ticker: request.ticker }))) {
        this.logger.warn('Request abandoned', { feed_request_id: requestId, reason });
      }
    }
  }
}
