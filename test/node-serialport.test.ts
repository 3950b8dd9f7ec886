import { beforeEach, describe, expect, it, vi } from 'vitest';
import { NodeSerialChannel } from '../src/transport/node-transports/node-serialport.js';
import {
  BridgeConfigError,
  SerialConnectionError,
  SerialPortNotFoundError,
  SerialWriteError,
} from '../src/errors.js';
import { fromAscii, toAscii } from '../src/utils/utils.js';
import { createSerialChannel } from '../src/transport/factory.js';
import { Elm327Emulator } from '../src/emulator/elm327-emulator.js';

interface PortStandIn {
  options: { path: string; baudRate: number };
  isOpen: boolean;
  written: string[];
  flushed: number;
  emit(event: string, ...args: unknown[]): boolean;
}

interface SerialState {
  ports: Array<{ path: string }>;
  instances: PortStandIn[];
  openError: Error | null;
}

const serial = vi.hoisted(
  (): SerialState => ({
    ports: [],
    instances: [],
    openError: null,
  })
);

vi.mock('serialport', async () => {
  const { EventEmitter } = await import('events');

  class SerialPort extends EventEmitter implements PortStandIn {
    static async list(): Promise<Array<{ path: string }>> {
      return serial.ports;
    }

    isOpen = false;
    written: string[] = [];
    flushed = 0;

    constructor(readonly options: { path: string; baudRate: number }) {
      super();
      serial.instances.push(this);
    }

    open(callback: (err: Error | null) => void): void {
      const error = serial.openError;
      this.isOpen = !error;
      setImmediate(() => callback(error));
    }

    write(data: Buffer, callback: (err: Error | null) => void): boolean {
      this.written.push(data.toString('latin1'));
      setImmediate(() => callback(null));
      return true;
    }

    drain(callback: (err: Error | null) => void): void {
      setImmediate(() => callback(null));
    }

    flush(callback: (err: Error | null) => void): void {
      this.flushed++;
      setImmediate(() => callback(null));
    }

    close(callback: (err: Error | null) => void): void {
      this.isOpen = false;
      setImmediate(() => callback(null));
    }
  }

  return { SerialPort };
});

const lastPort = (): PortStandIn => {
  const port = serial.instances.at(-1);
  if (!port) throw new Error('No port was created');
  return port;
};

describe('NodeSerialChannel', () => {
  beforeEach(() => {
    serial.ports = [{ path: '/dev/ttyS0' }, { path: '/dev/ttyUSB0' }];
    serial.instances = [];
    serial.openError = null;
  });

  it('resolves a symbolic port name to its device path', async () => {
    await expect(NodeSerialChannel.resolvePortPath('ttyUSB0')).resolves.toBe('/dev/ttyUSB0');
    await expect(NodeSerialChannel.resolvePortPath('/dev/ttyS0')).resolves.toBe('/dev/ttyS0');
  });

  it('fails for a port that is not listed', async () => {
    await expect(NodeSerialChannel.resolvePortPath('ttyUSB3')).rejects.toThrow(
      new SerialPortNotFoundError('ttyUSB3')
    );
  });

  it('opens with the configured settings and passes bytes both ways', async () => {
    const channel = new NodeSerialChannel('/dev/ttyUSB0', { baudRate: 38400 });
    await channel.open();

    expect(channel.isOpen).toBe(true);
    expect(lastPort().options).toMatchObject({ path: '/dev/ttyUSB0', baudRate: 38400 });

    await channel.write(fromAscii('ATZ\r'));
    await channel.flushTx();
    expect(lastPort().written).toEqual(['ATZ\r']);

    lastPort().emit('data', Buffer.from('ATZ\rELM', 'latin1'));
    expect(toAscii(await channel.poll(4))).toBe('ATZ\r');
    expect(toAscii(await channel.poll(100))).toBe('ELM');
    expect((await channel.poll(100)).length).toBe(0);
  });

  it('discards buffered input on flushRx', async () => {
    const channel = new NodeSerialChannel('/dev/ttyUSB0');
    await channel.open();

    lastPort().emit('data', Buffer.from('SEARCHING...\r', 'latin1'));
    await channel.flushRx();

    expect(lastPort().flushed).toBe(1);
    expect((await channel.poll(100)).length).toBe(0);
  });

  it('keeps the newest bytes when the receive buffer fills up', async () => {
    const channel = new NodeSerialChannel('/dev/ttyUSB0', { maxBufferSize: 8 });
    await channel.open();

    lastPort().emit('data', Buffer.from('ABCDEFGHIJ', 'latin1'));

    expect(toAscii(await channel.poll(100))).toBe('CDEFGHIJ');
  });

  it('maps open failures to connection errors', async () => {
    serial.openError = new Error('Error: Permission denied, cannot open /dev/ttyUSB0');
    const channel = new NodeSerialChannel('/dev/ttyUSB0');

    await expect(channel.open()).rejects.toThrow(new SerialConnectionError('Permission denied'));
    expect(channel.isOpen).toBe(false);
  });

  it('rejects a baud rate out of range before touching the port', async () => {
    const channel = new NodeSerialChannel('/dev/ttyUSB0', { baudRate: 50 });

    await expect(channel.open()).rejects.toBeInstanceOf(BridgeConfigError);
    expect(serial.instances).toHaveLength(0);
  });

  it('refuses writes once closed', async () => {
    const channel = new NodeSerialChannel('/dev/ttyUSB0');
    await channel.open();
    const port = lastPort();

    await channel.close();

    expect(port.isOpen).toBe(false);
    expect(channel.isOpen).toBe(false);
    await expect(channel.write(fromAscii('ATZ\r'))).rejects.toBeInstanceOf(SerialWriteError);
  });

  it('notices when the device goes away', async () => {
    const channel = new NodeSerialChannel('/dev/ttyUSB0');
    await channel.open();

    lastPort().emit('close');

    expect(channel.isOpen).toBe(false);
  });
});

describe('createSerialChannel', () => {
  beforeEach(() => {
    serial.ports = [{ path: '/dev/ttyUSB0' }];
    serial.instances = [];
    serial.openError = null;
  });

  it('creates a closed serialport channel for a listed port', async () => {
    const channel = await createSerialChannel({ type: 'node', port: 'ttyUSB0' });

    expect(channel).toBeInstanceOf(NodeSerialChannel);
    expect(channel.isOpen).toBe(false);
    expect(channel instanceof NodeSerialChannel && channel.portPath).toBe('/dev/ttyUSB0');
  });

  it('fails for a port that is not listed', async () => {
    await expect(createSerialChannel({ type: 'node', port: 'ttyACM0' })).rejects.toBeInstanceOf(
      SerialPortNotFoundError
    );
  });

  it('creates the emulator', async () => {
    const channel = await createSerialChannel({ type: 'emulator', options: { voltage: '12.3V' } });

    expect(channel).toBeInstanceOf(Elm327Emulator);
  });
});
