#!/usr/bin/env node
// src/cli.ts
import { config as loadEnv } from 'dotenv';
import Logger, { bridgeLogger } from './logger.js';
import { loadConfig } from './config.js';
import { createSerialChannel } from './transport/factory.js';
import { QueryDispatcher } from './query-dispatcher.js';
import { UdpGateway } from './gateway/udp-gateway.js';
import { BridgeDiagnostics } from './utils/diagnostics.js';
import { runSelfTest } from './self-test.js';
import { EMULATOR_RESPONSES } from './constants/constants.js';
import type { BridgeConfig, SerialChannel } from './types/bridge-types.js';

const logger = bridgeLogger.createLogger('Bridge');

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

async function run(config: BridgeConfig): Promise<number> {
  const diagnostics = new BridgeDiagnostics();
  let channel: SerialChannel | null = null;
  let dispatcher: QueryDispatcher | null = null;

  try {
    channel = await createSerialChannel(
      config.emulate
        ? { type: 'emulator', options: { responses: { ...EMULATOR_RESPONSES } } }
        : { type: 'node', port: config.serialPort, options: { baudRate: config.baudRate } }
    );
    await channel.open();

    dispatcher = new QueryDispatcher(channel, {
      replyTimeoutMs: config.replyTimeoutMs,
      diagnostics,
    });

    if (config.selfTest) {
      await runSelfTest(dispatcher);
    }

    const gateway = new UdpGateway(dispatcher, {
      port: config.udpPort,
      host: config.udpHost,
      timeoutReply: config.timeoutReply,
      diagnostics,
    });
    await gateway.start();

    const shutdown = (signal: NodeJS.Signals): void => {
      logger.info(`${signal} received, shutting down`);
      gateway.stop().catch((err: unknown) => {
        logger.error(`Shutdown failed: ${errorMessage(err)}`);
      });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    await gateway.closed;
    return 0;
  } catch (err: unknown) {
    logger.error(`Fatal: ${errorMessage(err)}`);
    return 1;
  } finally {
    try {
      if (dispatcher) {
        await dispatcher.close();
      } else if (channel?.isOpen) {
        await channel.close();
      }
    } catch (err: unknown) {
      logger.error(`Serial channel close failed: ${errorMessage(err)}`);
    }
    diagnostics.printStats();
  }
}

async function main(argv: string[]): Promise<number> {
  loadEnv();

  let config: BridgeConfig;
  try {
    config = loadConfig(argv);
  } catch (err: unknown) {
    console.error(errorMessage(err));
    return 1;
  }

  bridgeLogger.setLevel(config.logLevel);
  if (!process.stdout.isTTY) {
    bridgeLogger.disableColors();
  }
  try {
    await Logger.openLogFile(config.logFile);
  } catch (err: unknown) {
    console.error(`Cannot open log file ${config.logFile}: ${errorMessage(err)}`);
    return 1;
  }

  logger.info('ELM327 UDP bridge starting', {
    udp: `${config.udpHost}:${config.udpPort}`,
    serial: config.emulate ? 'emulator' : config.serialPort,
    baudRate: config.baudRate,
  });

  try {
    return await run(config);
  } finally {
    await Logger.closeLogFile();
  }
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  }
);
