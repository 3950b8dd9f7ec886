// src/types/bridge-types.ts

// !=============================================================================
// ! Serial channel
// !=============================================================================

/**
 * The serial link to the interpreter. The bridge is the only reader and
 * writer; implementations own every device-specific detail.
 */
export interface SerialChannel {
  readonly isOpen: boolean;
  open(): Promise<void>;
  close(): Promise<void>;
  write(data: Uint8Array): Promise<void>;
  /**
   * Takes whatever has arrived, at most `maxLength` bytes. Never waits:
   * an empty array means nothing is pending.
   */
  poll(maxLength: number): Promise<Uint8Array>;
  /** Blocks until every written byte has left the transmit buffer. */
  flushTx(): Promise<void>;
  /** Discards everything received and not yet polled. */
  flushRx(): Promise<void>;
}

/** Options for the serialport-backed channel */
export interface NodeSerialChannelOptions {
  baudRate?: number;
  dataBits?: 5 | 6 | 7 | 8;
  stopBits?: 1 | 2;
  parity?: 'none' | 'even' | 'mark' | 'odd' | 'space';
  maxBufferSize?: number;
}

export interface Elm327EmulatorOptions {
  /** Echo every received command back before the reply (ATE1). Default: true */
  echo?: boolean;
  /** Send LF after every CR (ATL1). Default: false */
  linefeeds?: boolean;
  /** Largest chunk returned by one poll. Default: unlimited */
  chunkSize?: number;
  /** Swallow commands without ever answering. */
  silent?: boolean;
  /** Battery voltage reported by ATRV. Default: '12.3V' */
  voltage?: string;
  /** Version string reported by ATZ/ATI. Default: 'ELM327 v1.5' */
  version?: string;
  /** Protocol name reported by ATDP. */
  protocol?: string;
  /** OBD responses keyed by command with spaces removed, e.g. '0100'. */
  responses?: Record<string, string>;
  loggerEnabled?: boolean;
}

// !=============================================================================
// ! Framing and classification
// !=============================================================================

export interface FramedReply {
  text: string;
  length: number;
}

export type ReplyKind = 'at' | 'obd' | 'unknown';

export type ClassifiedReply =
  | { kind: 'at'; payload: string; framed: string }
  | { kind: 'obd'; echo: string; payload: string; framed: string }
  | { kind: 'unknown'; payload: ''; framed: string };

export interface ResponseFramerOptions {
  maxReplyLength?: number;
  pollIntervalMs?: number;
  pollChunkSize?: number;
}

// !=============================================================================
// ! Dispatcher and gateway
// !=============================================================================

export interface InFlightQuery {
  query: string;
  partial: string;
  startedAt: number;
}

export interface QueryDispatcherOptions extends ResponseFramerOptions {
  maxQueryLength?: number;
  replyTimeoutMs?: number;
  /** How long to wait for the rest of an abandoned reply before the next write */
  lateReplyTimeoutMs?: number;
  logger?: LoggerInstance;
  diagnostics?: DiagnosticsRecorder;
}

export interface DispatchOptions {
  /** Drops the query if it fires before the query gets the channel. A running cycle is not affected. */
  signal?: AbortSignal;
}

export interface ClientEndpoint {
  address: string;
  port: number;
}

export interface UdpGatewayOptions {
  port: number;
  host?: string;
  /** Sent to the client when the interpreter misses the deadline. Empty disables it. */
  timeoutReply?: string;
  /** Datagrams arriving while this many requests are queued are dropped */
  maxPendingRequests?: number;
  logger?: LoggerInstance;
  diagnostics?: DiagnosticsRecorder;
}

export type GatewayState = 'idle' | 'binding' | 'listening' | 'stopping' | 'stopped';

// !=============================================================================
// ! Diagnostics
// !=============================================================================

export interface DiagnosticsRecorder {
  recordRequest(byteLength: number): void;
  recordRejected(): void;
  recordReply(kind: ReplyKind, responseTimeMs: number, byteLength: number): void;
  recordError(error: Error): void;
  recordDatagramSent(byteLength: number): void;
  recordSendFailure(error: Error): void;
}

export interface DiagnosticsStats {
  uptimeSeconds: number;
  totalRequests: number;
  rejectedQueries: number;
  repliesByKind: Record<ReplyKind, number>;
  timeouts: number;
  overflows: number;
  otherErrors: number;
  datagramsSent: number;
  sendFailures: number;
  totalDataSent: number;
  totalDataReceived: number;
  lastResponseTime: number | null;
  minResponseTime: number | null;
  maxResponseTime: number | null;
  averageResponseTime: number | null;
  lastErrorMessage: string | null;
  lastRequestTimestamp: string | null;
}

// !=============================================================================
// ! Self-test
// !=============================================================================

export interface SelfTestCommand {
  label: string;
  command: string;
}

export type SelfTestResult =
  | { label: string; command: string; ok: true; reply: ClassifiedReply }
  | { label: string; command: string; ok: false; error: Error };

// !=============================================================================
// ! Configuration
// !=============================================================================

export interface BridgeConfig {
  udpPort: number;
  udpHost: string;
  serialPort: string;
  baudRate: number;
  replyTimeoutMs: number;
  timeoutReply: string;
  logFile: string;
  logLevel: LogLevel;
  selfTest: boolean;
  emulate: boolean;
}

// !=============================================================================
// ! Logger
// !=============================================================================

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  logger?: string;
  query?: string;
  kind?: ReplyKind;
  bytes?: number;
  responseTime?: number;
  client?: string;
  [key: string]: unknown;
}

export type LogField = 'timestamp' | 'level' | 'logger';

export interface LogEvent {
  level: LogLevel;
  args: unknown[];
  context: LogContext;
}

/** A category logger created by `Logger.createLogger` */
export interface LoggerInstance {
  trace(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
  setLevel(lvl: LogLevel): void;
  pause(): void;
}
