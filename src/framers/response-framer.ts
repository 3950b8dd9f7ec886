// src/framers/response-framer.ts
import type { FramedReply, ResponseFramerOptions, SerialChannel } from '../types/bridge-types.js';
import {
  BUFFER_MAX_LEN,
  BRIDGE_DEFAULTS,
  ELM_BYTES,
  MAX_SERIAL_BUF_LEN,
} from '../constants/constants.js';
import { BridgeAbortError, BridgeReplyOverflowError, BridgeTimeoutError } from '../errors.js';
import { sleep, toAscii } from '../utils/utils.js';
import { bridgeLogger } from '../logger.js';

const logger = bridgeLogger.createLogger('ResponseFramer');

/**
 * Reassembles interpreter replies from the serial byte stream.
 *
 * Control bytes are dropped, except CR which becomes the `!` delimiter. The
 * `>` prompt is kept and ends the reply. The reply buffer has a fixed
 * capacity; bytes past it are counted but not stored.
 */
export class ResponseFramer {
  private readonly _buffer: Uint8Array;
  private _length: number = 0;
  private _received: number = 0;
  private _complete: boolean = false;
  private readonly _pollIntervalMs: number;
  private readonly _pollChunkSize: number;

  constructor(
    private _channel: SerialChannel,
    options: ResponseFramerOptions = {}
  ) {
    this._buffer = new Uint8Array(options.maxReplyLength ?? BUFFER_MAX_LEN);
    this._pollIntervalMs = options.pollIntervalMs ?? BRIDGE_DEFAULTS.POLL_INTERVAL_MS;
    this._pollChunkSize = options.pollChunkSize ?? MAX_SERIAL_BUF_LEN;
  }

  /**
   * Reply text assembled so far.
   */
  public get partial(): string {
    return toAscii(this._buffer.subarray(0, this._length));
  }

  public get complete(): boolean {
    return this._complete;
  }

  public get overflowed(): boolean {
    return this._received > this._buffer.length;
  }

  public get capacity(): number {
    return this._buffer.length;
  }

  public reset(): void {
    this._length = 0;
    this._received = 0;
    this._complete = false;
  }

  /**
   * Applies the framing rules to one chunk.
   * @returns true once the ready prompt has been seen; the rest of the chunk is dropped
   */
  public feed(chunk: Uint8Array): boolean {
    if (this._complete) return true;

    for (const byte of chunk) {
      if (byte < ELM_BYTES.FIRST_PRINTABLE) {
        if (byte === ELM_BYTES.CARRIAGE_RETURN) {
          this._append(ELM_BYTES.DELIMITER);
        }
        continue;
      }

      this._append(byte);

      if (byte === ELM_BYTES.READY_SENTINEL) {
        this._complete = true;
        return true;
      }
    }
    return false;
  }

  /**
   * Polls the channel until the ready prompt arrives.
   * The receive buffer is flushed whatever the outcome.
   * @param timeoutMs - deadline for the whole reply
   * @param signal - cancels the wait
   * @throws BridgeTimeoutError when the deadline passes first
   * @throws BridgeAbortError when `signal` fires first
   * @throws BridgeReplyOverflowError when the reply did not fit the buffer
   */
  public async frame(timeoutMs: number, signal?: AbortSignal): Promise<FramedReply> {
    this.reset();
    const startTime = Date.now();

    try {
      while (!this._complete) {
        if (signal?.aborted) {
          throw new BridgeAbortError(this.partial);
        }
        const elapsed = Date.now() - startTime;
        if (elapsed >= timeoutMs) {
          throw new BridgeTimeoutError(elapsed, this.partial);
        }

        const chunk = await this._channel.poll(this._pollChunkSize);
        if (chunk.length === 0) {
          await sleep(this._pollIntervalMs);
          continue;
        }
        this.feed(chunk);
      }
    } catch (err: unknown) {
      await this._flushAfterFailure();
      throw err;
    }
    await this._channel.flushRx();

    if (this.overflowed) {
      throw new BridgeReplyOverflowError(this._received, this._buffer.length);
    }

    return { text: this.partial, length: this._length };
  }

  // The framing error is what the caller sees; a flush failure on top of it is only logged.
  private async _flushAfterFailure(): Promise<void> {
    try {
      await this._channel.flushRx();
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      logger.warn(`Receive buffer flush failed: ${message}`);
    }
  }

  private _append(byte: number): void {
    this._received++;
    if (this._length < this._buffer.length) {
      this._buffer[this._length++] = byte;
    }
  }
}
