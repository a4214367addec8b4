import { Deferred } from './deferred.js';
import type { LineHandler } from './types.js';

/**
 * The request table's view of an outstanding request, independent of the
 * record type its lines parse into.
 */
export interface RequestEntry {
  readonly ticker: string;
  readonly settled: boolean;
  addLine(fields: string[]): void;
  complete(): boolean;
  fail(error: Error): boolean;
}

/**
 * One outstanding request: its ticker, the parser for its lines, the records
 * parsed so far, and the signal its caller waits on.
 */
export class PendingRequest<T> implements RequestEntry {
  private readonly results: T[] = [];
  private readonly completion = new Deferred<T[]>();

  constructor(
    readonly ticker: string,
    private readonly lineHandler: LineHandler<T>
  ) {}

  get promise(): Promise<T[]> {
    return this.completion.promise;
  }

  get settled(): boolean {
    return this.completion.settled;
  }

  /**
   * Parses one result line and appends the record. Parser errors propagate.
   */
  addLine(fields: string[]): void {
    this.results.push(this.lineHandler(fields));
  }

  complete(): boolean {
    return this.completion.resolve(this.results);
  }

  fail(error: Error): boolean {
    return this.completion.reject(error);
  }
}
