// src/gateway/udp-gateway.ts

import { createSocket } from 'dgram';
import type { RemoteInfo } from 'dgram';
import type { AddressInfo } from 'net';
import { bridgeLogger } from '../logger.js';
import { BridgeTimeoutError, GatewaySocketError } from '../errors.js';
import { BRIDGE_DEFAULTS } from '../constants/constants.js';
import { fromAscii } from '../utils/utils.js';
import type { QueryDispatcher } from '../query-dispatcher.js';
import type {
  ClientEndpoint,
  DiagnosticsRecorder,
  GatewayState,
  LoggerInstance,
  UdpGatewayOptions,
} from '../types/bridge-types.js';

/**
 * The part of `dgram.Socket` the gateway uses.
 */
export interface DatagramSocket {
  bind(port: number, address: string, callback: () => void): unknown;
  send(
    msg: Uint8Array,
    port: number,
    address: string,
    callback: (error: Error | null) => void
  ): void;
  on(event: 'message', listener: (msg: Buffer, rinfo: RemoteInfo) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  close(callback: () => void): unknown;
  address(): AddressInfo;
}

export type DatagramSocketFactory = () => DatagramSocket;

interface CloseWaiter {
  resolve: () => void;
  reject: (reason: Error) => void;
}

const defaultLogger = bridgeLogger.createLogger('UdpGateway');

const createUdp4Socket: DatagramSocketFactory = () => createSocket('udp4');

/**
 * Serves one ELM327 query per datagram and answers the sender with the
 * reply payload.
 */
export class UdpGateway {
  private readonly _port: number;
  private readonly _host: string;
  private readonly _timeoutReply: string;
  private readonly _maxPendingRequests: number;
  private readonly _logger: LoggerInstance;
  private readonly _diagnostics: DiagnosticsRecorder | null;
  private _socket: DatagramSocket | null = null;
  private _state: GatewayState = 'idle';
  private _bindReject: ((reason: Error) => void) | null = null;
  private _stopping: Promise<void> | null = null;
  private _fatalError: Error | null = null;
  private readonly _pending: Set<Promise<void>> = new Set();
  // Aborted on shutdown so that queued requests never reach the serial channel.
  private readonly _queued: AbortController = new AbortController();
  private _closeWaiters: CloseWaiter[] = [];

  constructor(
    private _dispatcher: QueryDispatcher,
    options: UdpGatewayOptions,
    private _createSocket: DatagramSocketFactory = createUdp4Socket
  ) {
    this._port = options.port;
    this._host = options.host ?? BRIDGE_DEFAULTS.UDP_HOST;
    this._timeoutReply = options.timeoutReply ?? BRIDGE_DEFAULTS.TIMEOUT_REPLY;
    this._maxPendingRequests = options.maxPendingRequests ?? BRIDGE_DEFAULTS.MAX_PENDING_REQUESTS;
    this._logger = options.logger ?? defaultLogger;
    this._diagnostics = options.diagnostics ?? null;
  }

  public get state(): GatewayState {
    return this._state;
  }

  /**
   * Bound address, or null when not listening.
   */
  public get address(): AddressInfo | null {
    return this._socket && this._state === 'listening' ? this._socket.address() : null;
  }

  /**
   * Requests whose reply cycle has not finished yet.
   */
  public get pendingRequests(): number {
    return this._pending.size;
  }

  /**
   * Settles when the gateway has stopped: resolves after `stop()`, rejects
   * with the socket error that brought it down.
   */
  public get closed(): Promise<void> {
    if (this._state === 'stopped') {
      return this._fatalError ? Promise.reject(this._fatalError) : Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this._closeWaiters.push({ resolve, reject });
    });
  }

  /**
   * Binds the socket and starts serving.
   * @throws GatewaySocketError when the socket cannot be bound
   */
  public async start(): Promise<void> {
    if (this._state !== 'idle') {
      throw new GatewaySocketError(`Gateway cannot start from state ${this._state}`);
    }

    const socket = this._createSocket();
    this._socket = socket;
    this._state = 'binding';
    socket.on('message', (msg, rinfo) => this._onMessage(msg, rinfo));
    socket.on('error', err => this._onSocketError(err));

    try {
      await new Promise<void>((resolve, reject) => {
        this._bindReject = reject;
        socket.bind(this._port, this._host, () => resolve());
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this._logger.error(`Cannot bind ${this._host}:${this._port}: ${message}`);
      await this._closeSocket(socket);
      this._settle(null);
      throw new GatewaySocketError(`Cannot bind ${this._host}:${this._port}: ${message}`);
    } finally {
      this._bindReject = null;
    }

    this._state = 'listening';
    const bound = socket.address();
    this._logger.info(`Listening on ${bound.address}:${bound.port}`);
  }

  /**
   * Stops accepting datagrams, drops queued requests, lets the running reply
   * cycle finish and closes the socket.
   */
  public stop(): Promise<void> {
    if (this._stopping) return this._stopping;
    if (this._state === 'stopped') return Promise.resolve();
    if (this._state === 'idle') {
      this._settle(null);
      return Promise.resolve();
    }
    this._stopping = this._shutdown(null);
    return this._stopping;
  }

  private _onMessage(msg: Buffer, rinfo: RemoteInfo): void {
    if (this._state !== 'listening') {
      this._logger.debug(`Datagram from ${rinfo.address}:${rinfo.port} ignored while ${this._state}`);
      return;
    }
    if (this._pending.size >= this._maxPendingRequests) {
      this._logger.warn(
        `Datagram from ${rinfo.address}:${rinfo.port} dropped: ${this._pending.size} requests pending`
      );
      this._diagnostics?.recordRejected();
      return;
    }
    const client: ClientEndpoint = { address: rinfo.address, port: rinfo.port };
    const task: Promise<void> = this._serve(new Uint8Array(msg), client).finally(() => {
      this._pending.delete(task);
    });
    this._pending.add(task);
  }

  private _onSocketError(err: Error): void {
    if (this._state === 'binding' && this._bindReject) {
      this._bindReject(err);
      return;
    }
    if (this._state !== 'listening') {
      this._logger.warn(`Socket error while ${this._state}: ${err.message}`);
      return;
    }

    const error = new GatewaySocketError(`Socket error: ${err.message}`);
    this._logger.error(error.message);
    this._stopping = this._shutdown(error);
  }

  /**
   * One request/reply cycle. Never rejects: every failure ends with a log line.
   */
  private async _serve(query: Uint8Array, client: ClientEndpoint): Promise<void> {
    const who = `${client.address}:${client.port}`;
    this._logger.debug(`Request from ${who}: ${query.length} bytes`);

    let payload: string;
    try {
      const reply = await this._dispatcher.dispatch(query, { signal: this._queued.signal });
      payload = reply.payload;
    } catch (err: unknown) {
      if (err instanceof BridgeTimeoutError && this._timeoutReply.length > 0) {
        payload = this._timeoutReply;
      } else {
        const message = err instanceof Error ? err.message : String(err);
        this._logger.warn(`No reply for ${who}: ${message}`);
        return;
      }
    }

    if (payload.length === 0) return;
    await this._send(payload, client);
  }

  private async _send(payload: string, client: ClientEndpoint): Promise<void> {
    const socket = this._socket;
    if (!socket) return;

    const bytes = fromAscii(payload);
    const error = await new Promise<Error | null>(resolve => {
      socket.send(bytes, client.port, client.address, resolve);
    });

    if (error) {
      this._logger.error(`Send to ${client.address}:${client.port} failed: ${error.message}`);
      this._diagnostics?.recordSendFailure(error);
      return;
    }
    this._diagnostics?.recordDatagramSent(bytes.length);
    this._logger.debug(`Sent ${bytes.length} bytes to ${client.address}:${client.port}`);
  }

  private async _shutdown(fatal: Error | null): Promise<void> {
    this._state = 'stopping';
    this._queued.abort();
    if (fatal) {
      this._dispatcher.cancel();
    }
    await Promise.allSettled([...this._pending]);

    const socket = this._socket;
    if (socket) {
      await this._closeSocket(socket);
    }
    this._logger.info(fatal ? 'Gateway stopped after a socket error' : 'Gateway stopped');
    this._settle(fatal);
  }

  private async _closeSocket(socket: DatagramSocket): Promise<void> {
    try {
      await new Promise<void>(resolve => {
        socket.close(() => resolve());
      });
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      this._logger.warn(`Socket close failed: ${message}`);
    }
    this._socket = null;
  }

  private _settle(fatal: Error | null): void {
    this._state = 'stopped';
    this._fatalError = fatal;
    const waiters = this._closeWaiters;
    this._closeWaiters = [];
    for (const waiter of waiters) {
      if (fatal) waiter.reject(fatal);
      else waiter.resolve();
    }
  }
}

export default UdpGateway;
