// src/query-dispatcher.ts
import { Mutex } from 'async-mutex';
import { ResponseFramer } from './framers/response-framer.js';
import { classifyReply } from './framers/reply-classifier.js';
import { bridgeLogger } from './logger.js';
import {
  BridgeAbortError,
  BridgeQueryLengthError,
  BridgeTimeoutError,
  SerialChannelError,
} from './errors.js';
import { BUFFER_MAX_LEN, BRIDGE_DEFAULTS } from './constants/constants.js';
import { fromAscii, printable, toAscii } from './utils/utils.js';
import type {
  ClassifiedReply,
  DiagnosticsRecorder,
  DispatchOptions,
  InFlightQuery,
  LoggerInstance,
  QueryDispatcherOptions,
  SerialChannel,
} from './types/bridge-types.js';

const defaultLogger = bridgeLogger.createLogger('Dispatcher');

interface ActiveCycle {
  query: string;
  startedAt: number;
  controller: AbortController;
}

/**
 * Sole reader and writer of the serial channel. Each `dispatch` is one
 * write / frame / classify cycle; concurrent calls wait their turn.
 */
export class QueryDispatcher {
  private readonly _mutex: Mutex = new Mutex();
  private readonly _framer: ResponseFramer;
  private readonly _maxQueryLength: number;
  private readonly _replyTimeoutMs: number;
  private readonly _lateReplyTimeoutMs: number;
  private readonly _logger: LoggerInstance;
  private readonly _diagnostics: DiagnosticsRecorder | null;
  private _active: ActiveCycle | null = null;
  private _closed: boolean = false;
  // Set when a cycle gave up before the ready prompt; the interpreter may still answer it.
  private _lateReplyExpected: boolean = false;

  constructor(
    private _channel: SerialChannel,
    options: QueryDispatcherOptions = {}
  ) {
    this._framer = new ResponseFramer(_channel, options);
    this._maxQueryLength = options.maxQueryLength ?? BUFFER_MAX_LEN;
    this._replyTimeoutMs = options.replyTimeoutMs ?? BRIDGE_DEFAULTS.REPLY_TIMEOUT_MS;
    this._lateReplyTimeoutMs = options.lateReplyTimeoutMs ?? BRIDGE_DEFAULTS.LATE_REPLY_TIMEOUT_MS;
    this._logger = options.logger ?? defaultLogger;
    this._diagnostics = options.diagnostics ?? null;
  }

  public get channel(): SerialChannel {
    return this._channel;
  }

  /**
   * Snapshot of the cycle holding the serial channel, or null when idle.
   */
  public get inFlight(): InFlightQuery | null {
    if (!this._active) return null;
    return {
      query: this._active.query,
      partial: this._framer.partial,
      startedAt: this._active.startedAt,
    };
  }

  public get busy(): boolean {
    return this._mutex.isLocked();
  }

  /**
   * Aborts the in-flight cycle. Its `dispatch` rejects with BridgeAbortError
   * after the receive buffer has been flushed.
   * @returns false when nothing was in flight
   */
  public cancel(): boolean {
    if (!this._active) return false;
    this._logger.warn(`Cancelling query ${printable(this._active.query)}`);
    this._active.controller.abort();
    return true;
  }

  /**
   * Sends one query to the interpreter and returns the classified reply.
   * @throws BridgeQueryLengthError for an empty or over-long query; nothing is written
   * @throws BridgeAbortError when `options.signal` fired while the query was waiting
   * @throws BridgeTimeoutError, BridgeAbortError, BridgeReplyOverflowError from framing
   */
  public async dispatch(
    query: Uint8Array | string,
    options: DispatchOptions = {}
  ): Promise<ClassifiedReply> {
    const bytes = typeof query === 'string' ? fromAscii(query) : query;
    if (bytes.length < 1 || bytes.length > this._maxQueryLength) {
      this._diagnostics?.recordRejected();
      this._logger.warn(`Bad query length: ${bytes.length}`);
      throw new BridgeQueryLengthError(bytes.length, this._maxQueryLength);
    }
    if (this._closed) {
      throw new SerialChannelError('Dispatcher is closed');
    }

    const release = await this._mutex.acquire();
    try {
      if (options.signal?.aborted) {
        this._logger.debug(`Query ${printable(toAscii(bytes))} dropped before sending`);
        throw new BridgeAbortError();
      }
      return await this._exchange(bytes);
    } finally {
      release();
    }
  }

  /**
   * Cancels the in-flight cycle, waits for the channel to go idle and closes it.
   */
  public async close(): Promise<void> {
    if (this._closed) return;
    this._closed = true;
    this.cancel();
    const release = await this._mutex.acquire();
    try {
      if (this._channel.isOpen) {
        await this._channel.close();
      }
    } finally {
      release();
    }
  }

  private async _exchange(bytes: Uint8Array): Promise<ClassifiedReply> {
    const query = toAscii(bytes);
    const cycle: ActiveCycle = { query, startedAt: Date.now(), controller: new AbortController() };
    this._active = cycle;

    try {
      if (this._lateReplyExpected) {
        await this._discardLateReply(cycle.controller.signal);
      }
      this._diagnostics?.recordRequest(bytes.length);
      await this._channel.write(bytes);
      await this._channel.flushTx();
      this._logger.info(`TXD: ${printable(query)}`, { bytes: bytes.length });

      const framed = await this._framer.frame(this._replyTimeoutMs, cycle.controller.signal);
      const reply = classifyReply(framed.text);
      const responseTime = Date.now() - cycle.startedAt;

      if (reply.kind === 'unknown') {
        this._logger.warn(`RXD unknown ECU message: ${printable(reply.framed)}`, { responseTime });
      } else {
        this._logger.info(`RXD: ${reply.payload}`, { kind: reply.kind, responseTime });
      }
      this._diagnostics?.recordReply(reply.kind, responseTime, framed.length);
      return reply;
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new SerialChannelError(String(err));
      if (error instanceof BridgeTimeoutError || error instanceof BridgeAbortError) {
        this._lateReplyExpected = true;
      }
      this._logger.error(`Query ${printable(query)} failed: ${error.message}`);
      this._diagnostics?.recordError(error);
      throw error;
    } finally {
      this._active = null;
    }
  }

  /**
   * Reads up to the next ready prompt before anything new is written, so the
   * answer to an abandoned query is not taken as the answer to this one.
   */
  private async _discardLateReply(signal: AbortSignal): Promise<void> {
    try {
      const late = await this._framer.frame(this._lateReplyTimeoutMs, signal);
      this._logger.warn(`Discarded late reply: ${printable(late.text)}`);
    } catch (err: unknown) {
      if (err instanceof BridgeAbortError) throw err;
      const message = err instanceof Error ? err.message : String(err);
      this._logger.debug(`No late reply to discard: ${message}`);
    }
    this._lateReplyExpected = false;
  }
}
