import { createWriteStream, type WriteStream } from 'node:fs';
import type { PendingRequest } from '../core/request.js';
import type { FetchResponse } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import { safeWrap } from '../utils/wrap.js';
import { dumpRequest, dumpResponse, frame } from './dump.js';
import type { DebugObserver } from './types.js';

/**
 * Appends framed request/response dumps to a file.
 *
 * The file is opened in append mode (created with mode 0600). If it cannot be
 * opened, or any write fails, capture is disabled for the sink's lifetime.
 * Each dump is a single write on one stream, so concurrent calls never
 * interleave within a record. While the stream has more buffered than its
 * high-water mark, new records are dropped until it drains.
 */
export class FileDebugSink implements DebugObserver {
  /** Open stream, `null` once closed or disabled. */
  #stream: WriteStream | null = null;
  /** Path of the debug file. */
  #path: string;
  #logger: Logger;

  private constructor(path: string, logger: Logger) {
    this.#path = path;
    this.#logger = logger;
  }

  /**
   * Opens a sink for `path`. Never fails: a sink that cannot open is returned disabled.
   */
  static open(path: string, logger: Logger): FileDebugSink {
    const sink = new FileDebugSink(path, logger);
    const [errOpen, stream] = safeWrap(() => createWriteStream(path, { flags: 'a', mode: 0o600 }));
    if (errOpen) {
      logger.warn({ err: errOpen, path }, 'debug capture disabled, could not open log file');
      return sink;
    }

    stream.on('error', (err) => sink.#disable(stream, err));
    sink.#stream = stream;
    return sink;
  }

  /** Path of the debug file. */
  get path(): string {
    return this.#path;
  }

  /** Whether dumps are still being written. */
  get isOpen(): boolean {
    return this.#stream !== null;
  }

  onRequest(request: PendingRequest): void {
    if (!this.#stream) {
      return;
    }

    this.#write(frame('Request', dumpRequest(request)));
  }

  async onResponse(response: FetchResponse): Promise<void> {
    if (!this.#stream) {
      return;
    }

    const [errDump, dump] = await dumpResponse(response);
    if (errDump) {
      throw errDump;
    }

    this.#write(frame('Response', dump));
  }

  /** Flushes and closes the file. Safe to call more than once. */
  close(): Promise<void> {
    const stream = this.#stream;
    if (!stream) {
      return Promise.resolve();
    }

    this.#stream = null;
    return new Promise((resolve) => {
      stream.once('close', () => resolve());
      stream.end();
    });
  }

  #write(record: string): void {
    const stream = this.#stream;
    if (!stream) {
      return;
    }

    if (stream.writableNeedDrain) {
      this.#logger.debug({ path: this.#path }, 'debug record dropped, log file is not draining');
      return;
    }

    stream.write(record);
  }

  #disable(stream: WriteStream, err: Error): void {
    if (this.#stream !== stream) {
      return;
    }

    this.#logger.warn({ err, path: this.#path }, 'debug capture disabled after write failure');
    this.#stream = null;
    stream.destroy();
  }
}
