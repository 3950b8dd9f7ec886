// src/errors.ts

/**
 * Base class for all bridge errors
 */
export class BridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'BridgeError';
  }
}

/**
 * Error class for invalid or missing configuration
 */
export class BridgeConfigError extends BridgeError {
  constructor(message: string = 'Bridge configuration error') {
    super(message);
    this.name = 'BridgeConfigError';
  }
}

// --- Errors for a single query cycle ---

/**
 * Error class for a query that is empty or longer than the buffer capacity
 */
export class BridgeQueryLengthError extends BridgeError {
  length: number;
  maxLength: number;

  constructor(length: number, maxLength: number) {
    super(`Bad query length: ${length}. Must be between 1-${maxLength} bytes.`);
    this.name = 'BridgeQueryLengthError';
    this.length = length;
    this.maxLength = maxLength;
  }
}

/**
 * Error class for an interpreter that did not send its ready prompt in time
 */
export class BridgeTimeoutError extends BridgeError {
  partial: string;

  constructor(elapsedMs: number, partial: string = '') {
    super(`No ready prompt from interpreter after ${elapsedMs}ms`);
    this.name = 'BridgeTimeoutError';
    this.partial = partial;
  }
}

/**
 * Error class for a reply cycle cancelled while waiting for the interpreter
 */
export class BridgeAbortError extends BridgeError {
  partial: string;

  constructor(partial: string = '') {
    super('Reply cycle cancelled');
    this.name = 'BridgeAbortError';
    this.partial = partial;
  }
}

/**
 * Error class for a reply longer than the framing buffer
 */
export class BridgeReplyOverflowError extends BridgeError {
  received: number;
  maxLength: number;

  constructor(received: number, maxLength: number) {
    super(`Reply overflow: received ${received} bytes, capacity ${maxLength}`);
    this.name = 'BridgeReplyOverflowError';
    this.received = received;
    this.maxLength = maxLength;
  }
}

// --- Errors for the serial channel ---

/**
 * Error class for serial channel failures
 */
export class SerialChannelError extends BridgeError {
  constructor(message: string = 'Serial channel error') {
    super(message);
    this.name = 'SerialChannelError';
  }
}

/**
 * Error class for a serial port that cannot be opened
 */
export class SerialConnectionError extends SerialChannelError {
  constructor(message: string = 'Serial connection error') {
    super(message);
    this.name = 'SerialConnectionError';
  }
}

/**
 * Error class for a symbolic port name with no matching device
 */
export class SerialPortNotFoundError extends SerialChannelError {
  portName: string;

  constructor(portName: string) {
    super(`Cannot find serial port: ${portName}`);
    this.name = 'SerialPortNotFoundError';
    this.portName = portName;
  }
}

/**
 * Error class for serial write failures
 */
export class SerialWriteError extends SerialChannelError {
  constructor(message: string = 'Serial write error') {
    super(message);
    this.name = 'SerialWriteError';
  }
}

/**
 * Error class for serial read failures
 */
export class SerialReadError extends SerialChannelError {
  constructor(message: string = 'Serial read error') {
    super(message);
    this.name = 'SerialReadError';
  }
}

/**
 * Error class for a receive buffer that filled up before being polled
 */
export class SerialBufferOverflowError extends SerialChannelError {
  constructor(size: number, max: number) {
    super(`Receive buffer overflow: ${size} bytes exceeds ${max} bytes`);
    this.name = 'SerialBufferOverflowError';
  }
}

// --- Errors for the datagram gateway ---

/**
 * Error class for datagram socket failures
 */
export class GatewaySocketError extends BridgeError {
  constructor(message: string = 'Datagram socket error') {
    super(message);
    this.name = 'GatewaySocketError';
  }
}
