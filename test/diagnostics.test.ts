import { describe, expect, it } from 'vitest';
import { BridgeDiagnostics } from '../src/utils/diagnostics.js';
import {
  BridgeReplyOverflowError,
  BridgeTimeoutError,
  SerialWriteError,
} from '../src/errors.js';

describe('BridgeDiagnostics', () => {
  it('counts traffic and response times', () => {
    const diagnostics = new BridgeDiagnostics();

    diagnostics.recordRequest(5);
    diagnostics.recordReply('obd', 40, 22);
    diagnostics.recordDatagramSent(14);
    diagnostics.recordRequest(5);
    diagnostics.recordReply('at', 20, 13);
    diagnostics.recordRequest(4);
    diagnostics.recordReply('unknown', 30, 10);
    diagnostics.recordRejected();

    expect(diagnostics.getStats()).toMatchObject({
      totalRequests: 3,
      rejectedQueries: 1,
      repliesByKind: { at: 1, obd: 1, unknown: 1 },
      datagramsSent: 1,
      totalDataSent: 14,
      totalDataReceived: 45,
      lastResponseTime: 30,
      minResponseTime: 20,
      maxResponseTime: 40,
      averageResponseTime: 30,
      lastErrorMessage: null,
    });
    expect(diagnostics.errorRate).toBe(0);
  });

  it('sorts errors by kind', () => {
    const diagnostics = new BridgeDiagnostics({ errorRateThreshold: 100 });

    for (let i = 0; i < 4; i++) diagnostics.recordRequest(5);
    diagnostics.recordError(new BridgeTimeoutError(5000));
    diagnostics.recordError(new BridgeReplyOverflowError(300, 256));
    diagnostics.recordError(new SerialWriteError('Port closed'));
    diagnostics.recordSendFailure(new Error('EHOSTUNREACH'));

    expect(diagnostics.getStats()).toMatchObject({
      timeouts: 1,
      overflows: 1,
      otherErrors: 1,
      sendFailures: 1,
      lastErrorMessage: 'EHOSTUNREACH',
      averageResponseTime: null,
    });
    expect(diagnostics.errorRate).toBe(75);
  });

  it('starts over on reset', () => {
    const diagnostics = new BridgeDiagnostics();
    diagnostics.recordRequest(5);
    diagnostics.recordReply('obd', 12, 20);

    diagnostics.reset();

    expect(diagnostics.getStats()).toMatchObject({
      totalRequests: 0,
      repliesByKind: { at: 0, obd: 0, unknown: 0 },
      lastResponseTime: null,
      averageResponseTime: null,
    });
    expect(diagnostics.errorRate).toBeNull();
  });
});
