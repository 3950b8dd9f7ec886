// src/config.ts
import { parseArgs } from 'util';
import { BridgeConfigError } from './errors.js';
import { BRIDGE_DEFAULTS } from './constants/constants.js';
import type { BridgeConfig, LogLevel } from './types/bridge-types.js';

export const USAGE =
  'Usage: elm-udp-bridge <udp-port> [--serial <name>] [--baud <rate>] [--emulate] [--no-self-test]';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

type Env = Record<string, string | undefined>;

function parseInteger(name: string, raw: string, min: number, max: number): number {
  const text = raw.trim();
  if (!/^\d+$/.test(text)) {
    throw new BridgeConfigError(`Invalid ${name}: "${raw}"`);
  }
  const value = Number(text);
  if (value < min || value > max) {
    throw new BridgeConfigError(`Invalid ${name}: ${value}. Must be between ${min}-${max}.`);
  }
  return value;
}

function parseBoolean(name: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
    case 'on':
      return true;
    case 'false':
    case '0':
    case 'no':
    case 'off':
      return false;
    default:
      throw new BridgeConfigError(`Invalid ${name}: "${raw}"`);
  }
}

function parseLogLevel(raw: string): LogLevel {
  const level = LOG_LEVELS.find(l => l === raw.trim().toLowerCase());
  if (!level) {
    throw new BridgeConfigError(
      `Invalid BRIDGE_LOG_LEVEL: "${raw}". Use one of ${LOG_LEVELS.join(', ')}.`
    );
  }
  return level;
}

/**
 * Builds the bridge settings from the command line and the environment.
 * Command-line flags win over environment variables.
 * @param argv - arguments after the script name
 * @throws BridgeConfigError for a missing or invalid setting
 */
export function loadConfig(argv: string[], env: Env = process.env): BridgeConfig {
  let parsed: ReturnType<typeof parseCommandLine>;
  try {
    parsed = parseCommandLine(argv);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new BridgeConfigError(`${message}\n${USAGE}`);
  }
  const { values, positionals } = parsed;

  const [rawPort, ...extra] = positionals;
  if (rawPort === undefined) {
    throw new BridgeConfigError(`Missing UDP port\n${USAGE}`);
  }
  if (extra.length > 0) {
    throw new BridgeConfigError(`Unexpected arguments: ${extra.join(' ')}\n${USAGE}`);
  }

  const baudRate = values.baud ?? env.BRIDGE_BAUD_RATE;
  const replyTimeout = env.BRIDGE_REPLY_TIMEOUT_MS;
  const logLevel = env.BRIDGE_LOG_LEVEL;
  const selfTest = env.BRIDGE_SELF_TEST;
  const emulate = env.BRIDGE_EMULATOR;

  return {
    udpPort: parseInteger('UDP port', rawPort, 1, 65535),
    udpHost: env.BRIDGE_UDP_HOST || BRIDGE_DEFAULTS.UDP_HOST,
    serialPort: values.serial ?? (env.BRIDGE_SERIAL_PORT || BRIDGE_DEFAULTS.SERIAL_PORT),
    baudRate: baudRate
      ? parseInteger('baud rate', baudRate, 1, Number.MAX_SAFE_INTEGER)
      : BRIDGE_DEFAULTS.BAUD_RATE,
    replyTimeoutMs: replyTimeout
      ? parseInteger('BRIDGE_REPLY_TIMEOUT_MS', replyTimeout, 1, Number.MAX_SAFE_INTEGER)
      : BRIDGE_DEFAULTS.REPLY_TIMEOUT_MS,
    // An empty value turns the timeout reply off.
    timeoutReply: env.BRIDGE_TIMEOUT_REPLY ?? BRIDGE_DEFAULTS.TIMEOUT_REPLY,
    logFile: env.BRIDGE_LOG_FILE || BRIDGE_DEFAULTS.LOG_FILE,
    logLevel: logLevel ? parseLogLevel(logLevel) : 'info',
    selfTest: values['no-self-test']
      ? false
      : selfTest
        ? parseBoolean('BRIDGE_SELF_TEST', selfTest)
        : true,
    emulate: values.emulate ? true : emulate ? parseBoolean('BRIDGE_EMULATOR', emulate) : false,
  };
}

function parseCommandLine(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      serial: { type: 'string', short: 's' },
      baud: { type: 'string', short: 'b' },
      emulate: { type: 'boolean', short: 'e' },
      'no-self-test': { type: 'boolean' },
    },
  });
}
