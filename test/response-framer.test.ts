import { describe, expect, it } from 'vitest';
import { ResponseFramer } from '../src/framers/response-framer.js';
import {
  BridgeAbortError,
  BridgeReplyOverflowError,
  BridgeTimeoutError,
  SerialChannelError,
  SerialReadError,
} from '../src/errors.js';
import { fromAscii } from '../src/utils/utils.js';
import { ScriptedChannel } from './helpers/scripted-channel.js';

describe('ResponseFramer', () => {
  it('turns CR into the delimiter and stops at the prompt', async () => {
    const channel = new ScriptedChannel('0100\r41 00 BE 3E A1\r\r>');
    const framer = new ResponseFramer(channel, { pollIntervalMs: 1 });

    const reply = await framer.frame(1000);

    expect(reply).toEqual({ text: '0100!41 00 BE 3E A1!!>', length: 22 });
    expect(framer.complete).toBe(true);
  });

  it('drops LF and other control bytes', async () => {
    const channel = new ScriptedChannel(
      Uint8Array.from([0x41, 0x54, 0x0d, 0x0a, 0x00, 0x09, 0x4f, 0x4b, 0x1b, 0x0d, 0x3e])
    );
    const framer = new ResponseFramer(channel, { pollIntervalMs: 1 });

    await expect(framer.frame(1000)).resolves.toEqual({ text: 'AT!OK!>', length: 7 });
  });

  it('joins a reply split across polls at any point', async () => {
    const channel = new ScriptedChannel('01', '', '00\r41 0', '0\r', '', '\r>');
    const framer = new ResponseFramer(channel, { pollIntervalMs: 1 });

    const reply = await framer.frame(1000);

    expect(reply.text).toBe('0100!41 00!!>');
  });

  it('takes at most pollChunkSize bytes per poll', async () => {
    const channel = new ScriptedChannel('ATI\rELM327\r\r>');
    const framer = new ResponseFramer(channel, { pollIntervalMs: 1, pollChunkSize: 4 });

    const reply = await framer.frame(1000);

    expect(reply.text).toBe('ATI!ELM327!!>');
    expect(channel.calls.filter(call => call === 'poll')).toHaveLength(4);
  });

  it('discards bytes that follow the prompt and flushes the receive buffer', async () => {
    const channel = new ScriptedChannel('OK\r>STRAY', 'MORE');
    const framer = new ResponseFramer(channel, { pollIntervalMs: 1 });

    const reply = await framer.frame(1000);

    expect(reply.text).toBe('OK!>');
    expect(channel.calls).toEqual(['poll', 'flushRx']);
    expect(channel.queued).toBe(0);
  });

  it('ignores chunks fed after completion', () => {
    const framer = new ResponseFramer(new ScriptedChannel());

    expect(framer.feed(fromAscii('AT>junk'))).toBe(true);
    expect(framer.feed(fromAscii('more'))).toBe(true);
    expect(framer.partial).toBe('AT>');

    framer.reset();
    expect(framer.partial).toBe('');
    expect(framer.complete).toBe(false);
  });

  it('times out with the partial reply and flushes', async () => {
    const channel = new ScriptedChannel('ATZ\r');
    const framer = new ResponseFramer(channel, { pollIntervalMs: 2 });

    const error = await framer.frame(30).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BridgeTimeoutError);
    expect(error).toMatchObject({ partial: 'ATZ!' });
    expect(channel.calls.at(-1)).toBe('flushRx');
  });

  it('stops when the signal aborts', async () => {
    const channel = new ScriptedChannel('09 02\r');
    const framer = new ResponseFramer(channel, { pollIntervalMs: 2 });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const error = await framer.frame(5000, controller.signal).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BridgeAbortError);
    expect(error).toMatchObject({ partial: '09 02!' });
    expect(channel.calls.at(-1)).toBe('flushRx');
  });

  it('does not poll when the signal is already aborted', async () => {
    const channel = new ScriptedChannel('OK\r>');
    const framer = new ResponseFramer(channel);
    const controller = new AbortController();
    controller.abort();

    await expect(framer.frame(1000, controller.signal)).rejects.toBeInstanceOf(BridgeAbortError);
    expect(channel.calls).toEqual(['flushRx']);
  });

  it('reads an over-long reply to its prompt, then reports the overflow', async () => {
    const channel = new ScriptedChannel('ABCDEF', 'GHIJKL>');
    const framer = new ResponseFramer(channel, { maxReplyLength: 8, pollIntervalMs: 1 });

    const error = await framer.frame(1000).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(BridgeReplyOverflowError);
    expect(error).toMatchObject({ received: 13, maxLength: 8 });
    expect(framer.partial).toBe('ABCDEFGH');
    expect(framer.overflowed).toBe(true);
    expect(channel.calls.at(-1)).toBe('flushRx');
  });

  it('accepts a reply that exactly fills the buffer', async () => {
    const channel = new ScriptedChannel('ABCDEFG>');
    const framer = new ResponseFramer(channel, { maxReplyLength: 8 });

    await expect(framer.frame(1000)).resolves.toEqual({ text: 'ABCDEFG>', length: 8 });
  });

  it('keeps the read error when the flush after it fails too', async () => {
    const channel = new ScriptedChannel('ATRV\r');
    channel.pollError = new SerialReadError('Port closed');
    channel.flushRxError = new SerialChannelError('Serial port /dev/ttyUSB0 is not open');
    const framer = new ResponseFramer(channel, { pollIntervalMs: 1 });

    await expect(framer.frame(1000)).rejects.toBeInstanceOf(SerialReadError);
    expect(channel.calls).toEqual(['poll', 'flushRx']);
  });

  it('reports a failed flush after a complete reply', async () => {
    const channel = new ScriptedChannel('OK\r\r>');
    channel.flushRxError = new SerialChannelError('Serial port /dev/ttyUSB0 is not open');
    const framer = new ResponseFramer(channel, { pollIntervalMs: 1 });

    await expect(framer.frame(1000)).rejects.toThrow('Serial port /dev/ttyUSB0 is not open');
  });
});
