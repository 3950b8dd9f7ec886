// src/utils/diagnostics.ts

import { bridgeLogger } from '../logger.js';
import { BridgeReplyOverflowError, BridgeTimeoutError } from '../errors.js';
import type {
  DiagnosticsRecorder,
  DiagnosticsStats,
  LoggerInstance,
  ReplyKind,
} from '../types/bridge-types.js';

interface BridgeDiagnosticsOptions {
  loggerName?: string;
  /** Warn once the error rate (%) goes above this. Default: 25 */
  errorRateThreshold?: number;
}

/**
 * Collects statistics about the bridge traffic of the running process.
 */
export class BridgeDiagnostics implements DiagnosticsRecorder {
  private readonly errorRateThreshold: number;
  private readonly logger: LoggerInstance;
  private startTime: number = Date.now();
  private totalRequests: number = 0;
  private rejectedQueries: number = 0;
  private repliesByKind: Record<ReplyKind, number> = { at: 0, obd: 0, unknown: 0 };
  private timeouts: number = 0;
  private overflows: number = 0;
  private otherErrors: number = 0;
  private datagramsSent: number = 0;
  private sendFailures: number = 0;
  private totalDataSent: number = 0;
  private totalDataReceived: number = 0;
  private lastResponseTime: number | null = null;
  private minResponseTime: number | null = null;
  private maxResponseTime: number | null = null;
  private _totalResponseTime: number = 0;
  private _timedResponses: number = 0;
  private lastErrorMessage: string | null = null;
  private lastRequestTimestamp: string | null = null;
  private _warnedErrorRate: boolean = false;

  constructor(options: BridgeDiagnosticsOptions = {}) {
    this.errorRateThreshold = options.errorRateThreshold ?? 25;
    this.logger = bridgeLogger.createLogger(options.loggerName ?? 'Diagnostics');
  }

  /**
   * Resets all statistics and counters to their initial state.
   */
  reset(): void {
    this.startTime = Date.now();
    this.totalRequests = 0;
    this.rejectedQueries = 0;
    this.repliesByKind = { at: 0, obd: 0, unknown: 0 };
    this.timeouts = 0;
    this.overflows = 0;
    this.otherErrors = 0;
    this.datagramsSent = 0;
    this.sendFailures = 0;
    this.totalDataSent = 0;
    this.totalDataReceived = 0;
    this.lastResponseTime = null;
    this.minResponseTime = null;
    this.maxResponseTime = null;
    this._totalResponseTime = 0;
    this._timedResponses = 0;
    this.lastErrorMessage = null;
    this.lastRequestTimestamp = null;
    this._warnedErrorRate = false;
  }

  recordRequest(byteLength: number): void {
    this.totalRequests++;
    this.totalDataSent += byteLength;
    this.lastRequestTimestamp = new Date().toISOString();
    this.logger.trace('Request sent', { bytes: byteLength });
  }

  recordRejected(): void {
    this.rejectedQueries++;
  }

  recordReply(kind: ReplyKind, responseTimeMs: number, byteLength: number): void {
    this.repliesByKind[kind]++;
    this.totalDataReceived += byteLength;
    this._recordResponseTime(responseTimeMs);
  }

  recordError(error: Error): void {
    if (error instanceof BridgeTimeoutError) {
      this.timeouts++;
    } else if (error instanceof BridgeReplyOverflowError) {
      this.overflows++;
    } else {
      this.otherErrors++;
    }
    this.lastErrorMessage = error.message;

    const rate = this.errorRate;
    if (!this._warnedErrorRate && rate !== null && rate > this.errorRateThreshold) {
      this._warnedErrorRate = true;
      this.logger.warn('Excessive errors detected', {
        errorRate: rate.toFixed(2),
        lastError: this.lastErrorMessage,
      });
    }
  }

  recordDatagramSent(byteLength: number): void {
    this.datagramsSent++;
    this.logger.trace(`Datagram sent: ${byteLength} bytes`);
  }

  recordSendFailure(error: Error): void {
    this.sendFailures++;
    this.lastErrorMessage = error.message;
  }

  /**
   * Average response time of answered queries, in milliseconds.
   */
  get averageResponseTime(): number | null {
    return this._timedResponses === 0 ? null : this._totalResponseTime / this._timedResponses;
  }

  /**
   * Errors as a percentage of all transmitted queries.
   */
  get errorRate(): number | null {
    if (this.totalRequests === 0) return null;
    return ((this.timeouts + this.overflows + this.otherErrors) / this.totalRequests) * 100;
  }

  getStats(): DiagnosticsStats {
    return {
      uptimeSeconds: Math.floor((Date.now() - this.startTime) / 1000),
      totalRequests: this.totalRequests,
      rejectedQueries: this.rejectedQueries,
      repliesByKind: { ...this.repliesByKind },
      timeouts: this.timeouts,
      overflows: this.overflows,
      otherErrors: this.otherErrors,
      datagramsSent: this.datagramsSent,
      sendFailures: this.sendFailures,
      totalDataSent: this.totalDataSent,
      totalDataReceived: this.totalDataReceived,
      lastResponseTime: this.lastResponseTime,
      minResponseTime: this.minResponseTime,
      maxResponseTime: this.maxResponseTime,
      averageResponseTime: this.averageResponseTime,
      lastErrorMessage: this.lastErrorMessage,
      lastRequestTimestamp: this.lastRequestTimestamp,
    };
  }

  printStats(): void {
    this.logger.info('Bridge statistics', { ...this.getStats() });
  }

  private _recordResponseTime(responseTimeMs: number): void {
    this.lastResponseTime = responseTimeMs;
    this.minResponseTime =
      this.minResponseTime == null
        ? responseTimeMs
        : Math.min(this.minResponseTime, responseTimeMs);
    this.maxResponseTime =
      this.maxResponseTime == null
        ? responseTimeMs
        : Math.max(this.maxResponseTime, responseTimeMs);
    this._totalResponseTime += responseTimeMs;
    this._timedResponses++;
  }
}
