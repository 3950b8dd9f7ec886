// src/constants/constants.ts

/**
 * Capacity of every text buffer on the bridge path: the longest query a client
 * may send and the longest framed reply the interpreter may return.
 */
export const BUFFER_MAX_LEN = 256;

/**
 * Largest chunk taken from the serial channel by one poll.
 */
export const MAX_SERIAL_BUF_LEN = 256;

/**
 * Bytes with special meaning in the interpreter's reply stream.
 */
export const ELM_BYTES = {
  /** First printable byte; everything below is a control byte. */
  FIRST_PRINTABLE: 0x20,
  /** Line terminator of the interpreter. */
  CARRIAGE_RETURN: 0x0d,
  /** Prompt: the interpreter is ready for the next command. */
  READY_SENTINEL: 0x3e,
  /** Synthetic delimiter written in place of every carriage return. */
  DELIMITER: 0x21,
} as const;

export const READY_SENTINEL_CHAR = '>';
export const DELIMITER_CHAR = '!';

/**
 * Leading characters that select a reply kind.
 */
export const REPLY_PREFIXES = {
  AT: 'A',
  OBD: '0',
} as const;

export const BRIDGE_DEFAULTS = {
  UDP_HOST: '0.0.0.0',
  SERIAL_PORT: 'ttyUSB0',
  BAUD_RATE: 9600,
  REPLY_TIMEOUT_MS: 5000,
  POLL_INTERVAL_MS: 10,
  LATE_REPLY_TIMEOUT_MS: 1000,
  MAX_PENDING_REQUESTS: 16,
  TIMEOUT_REPLY: 'BRIDGE TIMEOUT',
  LOG_FILE: './elm-bridge.log',
  SERIAL_RX_BUFFER_SIZE: 4096,
} as const;

/**
 * Interface check issued once at startup.
 */
export const SELF_TEST_COMMANDS: ReadonlyArray<{ label: string; command: string }> = [
  { label: 'ATZ', command: 'ATZ\r' }, // reset the interpreter
  { label: 'ATRV', command: 'ATRV\r' }, // battery voltage
  { label: 'ATDP', command: 'ATDP\r' }, // protocol name
  { label: 'ATI', command: 'ATI\r' }, // interpreter version
  { label: 'VIN', command: '09 02\r' },
  { label: 'ECUName', command: '09 0A\r' },
  { label: 'MIL', command: '01 01\r' }, // DTC count and MIL status
  { label: 'PID01', command: '01 00\r' }, // supported PIDs 01-20, mode 1
  { label: 'PID09', command: '09 00\r' }, // supported PIDs 01-20, mode 9
  { label: 'DTC', command: '03\r' }, // stored DTCs
];

/**
 * Canned answers of the built-in emulator, keyed by command without spaces.
 */
export const EMULATOR_RESPONSES: Readonly<Record<string, string>> = {
  '0100': '41 00 BE 3E A8 13',
  '0101': '41 01 00 07 E5 00',
  '0900': '49 00 54 40 00 00',
  '0902': '49 02 01 54 45 53 54',
  '090A': '49 0A 01 45 43 4D 00',
  '03': '43 00',
};
