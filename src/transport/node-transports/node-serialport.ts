import { SerialPort } from 'serialport';
import { Mutex } from 'async-mutex';
import { concatUint8Arrays, sliceUint8Array, allocUint8Array, toHex } from '../../utils/utils.js';
import { bridgeLogger } from '../../logger.js';
import {
  BridgeConfigError,
  SerialBufferOverflowError,
  SerialChannelError,
  SerialConnectionError,
  SerialPortNotFoundError,
  SerialReadError,
  SerialWriteError,
} from '../../errors.js';
import { BRIDGE_DEFAULTS } from '../../constants/constants.js';
import type { NodeSerialChannelOptions, SerialChannel } from '../../types/bridge-types.js';

// ========== CONSTANTS ==========
const NODE_SERIAL_CONSTANTS = {
  MIN_BAUD_RATE: 300,
  MAX_BAUD_RATE: 115200,
} as const;

// ========== LOGGER ==========
const logger = bridgeLogger.createLogger('NodeSerialChannel');

const toError = (err: unknown): Error =>
  err instanceof Error ? err : new SerialChannelError(String(err));

/**
 * Serial channel on top of the `serialport` package. Received bytes are
 * buffered until polled; the buffer keeps the newest bytes when it fills up.
 */
export class NodeSerialChannel implements SerialChannel {
  private readonly path: string;
  private readonly options: Required<NodeSerialChannelOptions>;
  private port: SerialPort | null = null;
  private readBuffer: Uint8Array = allocUint8Array(0);
  private _isOpen: boolean = false;
  private _operationMutex: Mutex = new Mutex();

  constructor(path: string, options: NodeSerialChannelOptions = {}) {
    this.path = path;
    this.options = {
      baudRate: BRIDGE_DEFAULTS.BAUD_RATE,
      dataBits: 8,
      stopBits: 1,
      parity: 'none',
      maxBufferSize: BRIDGE_DEFAULTS.SERIAL_RX_BUFFER_SIZE,
      ...options,
    };
  }

  /**
   * Finds the device path for a symbolic port name such as `ttyUSB0`.
   * A name that already is a listed path is returned unchanged.
   * @throws SerialPortNotFoundError when no listed port matches
   */
  static async resolvePortPath(name: string): Promise<string> {
    const ports = await SerialPort.list();
    logger.debug(`Serial ports: ${ports.map(p => p.path).join(', ') || 'none'}`);
    const match = ports.find(
      p => p.path === name || p.path.endsWith(`/${name}`) || p.path.endsWith(`\\${name}`)
    );
    if (!match) {
      throw new SerialPortNotFoundError(name);
    }
    return match.path;
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  get portPath(): string {
    return this.path;
  }

  async open(): Promise<void> {
    if (this._isOpen) {
      logger.warn(`Serial port ${this.path} is already open`);
      return;
    }
    if (
      this.options.baudRate < NODE_SERIAL_CONSTANTS.MIN_BAUD_RATE ||
      this.options.baudRate > NODE_SERIAL_CONSTANTS.MAX_BAUD_RATE
    ) {
      throw new BridgeConfigError(`Invalid baud rate: ${this.options.baudRate}`);
    }

    try {
      await this._createAndOpenPort();
      logger.info(`Serial port ${this.path} opened at ${this.options.baudRate} baud`);
    } catch (err: unknown) {
      const error = toError(err);
      logger.error(`Failed to open serial port ${this.path}: ${error.message}`);
      this.port = null;
      throw error;
    }
  }

  private _createAndOpenPort(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const port = new SerialPort({
        path: this.path,
        baudRate: this.options.baudRate,
        dataBits: this.options.dataBits,
        stopBits: this.options.stopBits,
        parity: this.options.parity,
        autoOpen: false,
      });
      this.port = port;

      port.open((_err: Error | null) => {
        if (_err) {
          this._isOpen = false;
          const message = _err.message.toLowerCase();
          if (message.includes('permission')) {
            reject(new SerialConnectionError('Permission denied'));
          } else if (message.includes('busy')) {
            reject(new SerialConnectionError('Serial port is busy'));
          } else if (message.includes('no such file')) {
            reject(new SerialConnectionError('Serial port does not exist'));
          } else {
            reject(new SerialConnectionError(_err.message));
          }
          return;
        }

        this._isOpen = true;
        this.readBuffer = allocUint8Array(0);
        port.on('data', this._onData.bind(this));
        port.on('error', this._onError.bind(this));
        port.on('close', this._onClose.bind(this));
        resolve();
      });
    });
  }

  private _onData(data: Buffer): void {
    if (!this._isOpen) return;
    const chunk = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
    logger.trace(`RX ${toHex(chunk)}`);
    this.readBuffer = concatUint8Arrays([this.readBuffer, chunk]);
    if (this.readBuffer.length > this.options.maxBufferSize) {
      const overflow = new SerialBufferOverflowError(
        this.readBuffer.length,
        this.options.maxBufferSize
      );
      logger.warn(`${overflow.message}; oldest bytes dropped`);
      this.readBuffer = sliceUint8Array(this.readBuffer, -this.options.maxBufferSize);
    }
  }

  private _onError(err: Error): void {
    logger.error(`Serial port ${this.path} error: ${err.message}`);
  }

  private _onClose(): void {
    if (this._isOpen) {
      logger.warn(`Serial port ${this.path} closed unexpectedly`);
    }
    this._isOpen = false;
  }

  private _requirePort(): SerialPort {
    if (!this._isOpen || !this.port?.isOpen) {
      throw new SerialChannelError(`Serial port ${this.path} is not open`);
    }
    return this.port;
  }

  async write(buffer: Uint8Array): Promise<void> {
    if (!this._isOpen || !this.port?.isOpen) throw new SerialWriteError('Port closed');
    const port = this.port;
    const release = await this._operationMutex.acquire();
    try {
      logger.trace(`TX ${toHex(buffer)}`);
      await new Promise<void>((resolve, reject) => {
        port.write(Buffer.from(buffer), (_err: Error | null | undefined) => {
          if (_err) {
            reject(new SerialWriteError(_err.message));
            return;
          }
          resolve();
        });
      });
    } catch (err: unknown) {
      const error = toError(err);
      logger.error(`Write to ${this.path} failed: ${error.message}`);
      throw error;
    } finally {
      release();
    }
  }

  async poll(maxLength: number): Promise<Uint8Array> {
    if (!this._isOpen) throw new SerialReadError('Port closed');
    const data = sliceUint8Array(this.readBuffer, 0, maxLength);
    this.readBuffer = sliceUint8Array(this.readBuffer, data.length);
    return data;
  }

  async flushTx(): Promise<void> {
    const port = this._requirePort();
    const release = await this._operationMutex.acquire();
    try {
      await new Promise<void>((resolve, reject) => {
        port.drain((_err: Error | null | undefined) => {
          if (_err) {
            reject(new SerialWriteError(_err.message));
            return;
          }
          resolve();
        });
      });
    } finally {
      release();
    }
  }

  async flushRx(): Promise<void> {
    const port = this._requirePort();
    await new Promise<void>((resolve, reject) => {
      port.flush((_err: Error | null | undefined) => {
        if (_err) {
          reject(new SerialReadError(_err.message));
          return;
        }
        resolve();
      });
    });
    this.readBuffer = allocUint8Array(0);
  }

  async close(): Promise<void> {
    const port = this.port;
    this._isOpen = false;
    this.port = null;
    this.readBuffer = allocUint8Array(0);
    if (!port) return;

    port.removeAllListeners('data');
    port.removeAllListeners('error');
    port.removeAllListeners('close');
    if (!port.isOpen) return;

    await new Promise<void>((resolve, reject) => {
      port.close((_err: Error | null | undefined) => {
        if (_err) {
          reject(new SerialConnectionError(_err.message));
          return;
        }
        logger.info(`Serial port ${this.path} closed`);
        resolve();
      });
    });
  }
}

export default NodeSerialChannel;
