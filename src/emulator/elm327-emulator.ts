// src/emulator/elm327-emulator.ts

import { bridgeLogger } from '../logger.js';
import { SerialReadError, SerialWriteError } from '../errors.js';
import { ELM_BYTES } from '../constants/constants.js';
import { concatUint8Arrays, fromAscii, printable } from '../utils/utils.js';
import type { Elm327EmulatorOptions, LoggerInstance, SerialChannel } from '../types/bridge-types.js';

const DEFAULT_VERSION = 'ELM327 v1.5';
const DEFAULT_PROTOCOL = 'AUTO, ISO 15765-4 (CAN 11/500)';
const DEFAULT_VOLTAGE = '12.3V';

const HEX_COMMAND = /^[0-9A-F]+$/;

/**
 * In-process stand-in for an ELM327 interpreter on the serial channel.
 * Commands end with CR; every answer ends with an empty line and the `>` prompt.
 */
export class Elm327Emulator implements SerialChannel {
  private echo: boolean;
  private linefeeds: boolean;
  private readonly chunkSize: number;
  private readonly silent: boolean;
  private readonly version: string;
  private readonly protocol: string;
  private voltage: string;
  private readonly responses: Map<string, string>;
  private readonly logger: LoggerInstance;
  private _isOpen: boolean = false;
  private inputLine: string = '';
  private output: Uint8Array = new Uint8Array(0);
  private readonly commands: string[] = [];

  constructor(options: Elm327EmulatorOptions = {}) {
    this.echo = options.echo ?? true;
    this.linefeeds = options.linefeeds ?? false;
    this.chunkSize = options.chunkSize ?? Infinity;
    this.silent = !!options.silent;
    this.version = options.version ?? DEFAULT_VERSION;
    this.protocol = options.protocol ?? DEFAULT_PROTOCOL;
    this.voltage = options.voltage ?? DEFAULT_VOLTAGE;
    this.responses = new Map();
    for (const [command, reply] of Object.entries(options.responses ?? {})) {
      this.setResponse(command, reply);
    }

    this.logger = bridgeLogger.createLogger('Elm327Emulator');
    this.logger.setLevel(options.loggerEnabled ? 'info' : 'error');
  }

  get isOpen(): boolean {
    return this._isOpen;
  }

  /**
   * Every complete command received so far, without its CR.
   */
  get receivedCommands(): readonly string[] {
    return this.commands;
  }

  /**
   * Bytes waiting to be polled.
   */
  get pending(): number {
    return this.output.length;
  }

  async open(): Promise<void> {
    this._isOpen = true;
    this.logger.info('Emulator opened');
  }

  async close(): Promise<void> {
    this._isOpen = false;
    this.inputLine = '';
    this.output = new Uint8Array(0);
    this.logger.info('Emulator closed');
  }

  /**
   * Sets the answer to an OBD command; multi-line answers use CR between lines.
   * @param command - e.g. '01 00' or '0100'
   */
  setResponse(command: string, reply: string): void {
    this.responses.set(normalizeCommand(command), reply);
  }

  setVoltage(voltage: string): void {
    this.voltage = voltage;
  }

  /**
   * Queues raw interpreter output as if it had arrived on the wire.
   */
  inject(data: string | Uint8Array): void {
    const bytes = typeof data === 'string' ? fromAscii(data) : data;
    this.output = concatUint8Arrays([this.output, bytes]);
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this._isOpen) throw new SerialWriteError('Port closed');

    for (const byte of data) {
      if (byte === ELM_BYTES.CARRIAGE_RETURN) {
        const line = this.inputLine;
        this.inputLine = '';
        this.handleCommand(line);
      } else {
        this.inputLine += String.fromCharCode(byte);
      }
    }
  }

  async poll(maxLength: number): Promise<Uint8Array> {
    if (!this._isOpen) throw new SerialReadError('Port closed');
    const size = Math.min(maxLength, this.chunkSize, this.output.length);
    const chunk = this.output.slice(0, size);
    this.output = this.output.slice(size);
    return chunk;
  }

  async flushTx(): Promise<void> {}

  async flushRx(): Promise<void> {
    this.output = new Uint8Array(0);
  }

  private handleCommand(line: string): void {
    this.commands.push(line);
    if (this.silent) {
      this.logger.debug(`Ignoring ${printable(line)}`);
      return;
    }

    // The command is echoed as received, before any setting it carries applies.
    let text = this.echo ? line + (this.linefeeds ? '\r\n' : '\r') : '';
    const lines = this.answer(normalizeCommand(line));
    this.logger.info(`Command ${printable(line)}`, { reply: lines.join(' | ') });

    const eol = this.linefeeds ? '\r\n' : '\r';
    for (const answerLine of lines) {
      text += answerLine + eol;
    }
    this.inject(`${text}${eol}>`);
  }

  private answer(command: string): string[] {
    if (command.length === 0) return [];
    if (command.startsWith('AT')) return this.answerAt(command.slice(2));
    if (HEX_COMMAND.test(command)) {
      return (this.responses.get(command) ?? 'NO DATA').split('\r');
    }
    return ['?'];
  }

  private answerAt(setting: string): string[] {
    switch (setting) {
      case 'Z':
      case 'WS':
        this.echo = true;
        this.linefeeds = false;
        return [this.version];
      case 'I':
        return [this.version];
      case 'E0':
      case 'E1':
        this.echo = setting === 'E1';
        return ['OK'];
      case 'L0':
      case 'L1':
        this.linefeeds = setting === 'L1';
        return ['OK'];
      case 'RV':
        return [this.voltage];
      case 'DP':
        return [this.protocol];
      case 'D':
      case 'H0':
      case 'H1':
      case 'S0':
      case 'S1':
        return ['OK'];
      default:
        return /^SP[0-9A-C]$/.test(setting) ? ['OK'] : ['?'];
    }
  }
}

function normalizeCommand(command: string): string {
  return command.replace(/\s+/g, '').toUpperCase();
}

export default Elm327Emulator;
