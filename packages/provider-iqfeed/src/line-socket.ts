/**
 * Line-oriented wrapper around a TCP socket.
 *
 * Incoming bytes are decoded as latin1 and split on LF (a preceding CR is
 * dropped). Complete lines are queued until a reader takes them with
 * {@link LineSocket.nextLine}. There is a single reader at a time.
 */

import net from 'node:net';
import { ConnectionClosedError } from './errors.js';

export type LineRead =
  | { readonly kind: 'line'; readonly line: string }
  | { readonly kind: 'idle' }
  | { readonly kind: 'closed' };

const IDLE: LineRead = { kind: 'idle' };
const CLOSED: LineRead = { kind: 'closed' };

export class LineSocket {
  private buffer = '';
  private readonly lines: string[] = [];
  private waiter: ((read: LineRead) => void) | null = null;
  private ended = false;
  private discarded = false;
  private lastError: Error | null = null;

  constructor(private readonly socket: net.Socket) {
    socket.setNoDelay(true);
    socket.on('data', (chunk: Buffer) => this.onData(chunk.toString('latin1')));
    socket.on('end', () => this.onEnd());
    socket.on('close', () => this.onEnd());
    socket.on('error', (error: Error) => {
      this.lastError = error;
      this.onEnd();
    });
  }

  /**
   * Opens a TCP connection and wraps it.
   */
  static connect(host: string, port: number): Promise<LineSocket> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({ host, port });
      const onError = (error: Error): void => {
        socket.destroy();
        reject(error);
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(new LineSocket(socket));
      });
    });
  }

  /** Whether the peer has closed or the socket failed */
  get closed(): boolean {
    return this.ended || this.discarded;
  }

  /** The last socket error, if the socket failed */
  get error(): Error | null {
    return this.lastError;
  }

  get remoteAddress(): string {
    return `${this.socket.remoteAddress ?? 'unknown'}:${this.socket.remotePort ?? 0}`;
  }

  /**
   * Takes the next complete line, waiting at most `timeoutMs` for one.
   *
   * Lines already received are returned before a close is reported.
   */
  nextLine(timeoutMs: number): Promise<LineRead> {
    const line = this.discarded ? undefined : this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve({ kind: 'line', line });
    }
    if (this.closed) {
      return Promise.resolve(CLOSED);
    }
    if (this.waiter) {
      return Promise.reject(new Error('LineSocket supports a single reader'));
    }

    return new Promise<LineRead>((resolve) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        resolve(IDLE);
      }, timeoutMs);
      this.waiter = (read: LineRead) => {
        clearTimeout(timer);
        this.waiter = null;
        resolve(read);
      };
    });
  }

  /**
   * Writes `text` as latin1 and resolves once it has been handed to the
   * kernel, so a slow peer holds the writer back.
   */
  write(text: string): Promise<void> {
    if (this.ended || this.socket.destroyed || !this.socket.writable) {
      return Promise.reject(
        new ConnectionClosedError('Socket is closed', { remote: this.remoteAddress })
      );
    }
    return new Promise((resolve, reject) => {
      this.socket.write(Buffer.from(text, 'latin1'), (error?: Error | null) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  /**
   * Drops every buffered line and ends the current and future reads. The
   * socket stays writable.
   */
  discard(): void {
    this.discarded = true;
    this.lines.length = 0;
    this.buffer = '';
    this.wake(CLOSED);
  }

  /**
   * Ends the socket after pending writes are flushed and waits until it is
   * fully closed.
   */
  close(): Promise<void> {
    this.discard();
    if (this.socket.destroyed) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.socket.once('close', () => resolve());
      this.socket.end(() => this.socket.destroy());
    });
  }

  private onData(chunk: string): void {
    if (this.discarded) {
      return;
    }
    const parts = (this.buffer + chunk).split('\n');
    this.buffer = parts.pop() ?? '';
    for (const part of parts) {
      const line = part.endsWith('\r') ? part.slice(0, -1) : part;
      if (this.waiter) {
        this.wake({ kind: 'line', line });
      } else {
        this.lines.push(line);
      }
    }
  }

  private onEnd(): void {
    if (this.ended) {
      return;
    }
    this.ended = true;
    if (this.buffer && !this.discarded) {
      this.lines.push(this.buffer);
      this.buffer = '';
    }
    const line = this.lines.shift();
    this.wake(line === undefined ? CLOSED : { kind: 'line', line });
  }

  private wake(read: LineRead): void {
    const waiter = this.waiter;
    if (waiter) {
      waiter(read);
    } else if (read.kind === 'line') {
      this.lines.unshift(read.line);
    }
  }
}
