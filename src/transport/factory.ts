// src/transport/factory.ts

import { bridgeLogger } from '../logger.js';
import { BridgeConfigError } from '../errors.js';
import type {
  Elm327EmulatorOptions,
  NodeSerialChannelOptions,
  SerialChannel,
} from '../types/bridge-types.js';

const logger = bridgeLogger.createLogger('ChannelFactory');

export type SerialChannelDescriptor =
  | { type: 'node'; port: string; options?: NodeSerialChannelOptions }
  | { type: 'emulator'; options?: Elm327EmulatorOptions };

/**
 * Creates the serial channel the bridge talks through. The channel is returned closed.
 *
 * - `'node'`: a real device through serialport. `port` is a symbolic name
 *   (`ttyUSB0`) or a device path; it must be listed by the system.
 * - `'emulator'`: an in-process ELM327 stand-in.
 *
 * @throws SerialPortNotFoundError if the named port does not exist
 */
export async function createSerialChannel(descriptor: SerialChannelDescriptor): Promise<SerialChannel> {
  try {
    switch (descriptor.type) {
      case 'node': {
        if (!descriptor.port) {
          throw new BridgeConfigError('Missing serial port name');
        }
        const { NodeSerialChannel } = await import('./node-transports/node-serialport.js');
        const path = await NodeSerialChannel.resolvePortPath(descriptor.port);
        logger.info(`Using serial port ${descriptor.port} (${path})`);
        return new NodeSerialChannel(path, descriptor.options);
      }

      case 'emulator': {
        const { Elm327Emulator } = await import('../emulator/elm327-emulator.js');
        logger.info('Using the built-in ELM327 emulator');
        return new Elm327Emulator(descriptor.options);
      }
    }
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`Failed to create ${descriptor.type} channel: ${message}`);
    throw err;
  }
}
