// src/utils/utils.ts

const HEX_TABLE = '0123456789abcdef';


/**
 * Concatenates an array of Uint8Arrays into a single Uint8Array.
 * @param arrays - An array of Uint8Arrays to concatenate.
 * @returns A new Uint8Array containing all elements from the input arrays.
 */
export function concatUint8Arrays(arrays: Uint8Array[]): Uint8Array {
  const totalLength: number = arrays.reduce((sum: number, arr: Uint8Array) => sum + arr.length, 0);
  const result: Uint8Array = new Uint8Array(totalLength);
  let offset: number = 0;
  for (const arr of arrays) {
    result.set(arr, offset);
    offset += arr.length;
  }
  return result;
}

/**
 * Returns a view of a slice of the input array (no copy).
 */
export function sliceUint8Array(arr: Uint8Array, start: number, end?: number): Uint8Array {
  return arr.subarray(start, end);
}

export function allocUint8Array(size: number): Uint8Array {
  return new Uint8Array(size);
}

/**
 * Converts a Uint8Array to a hex string (lookup table).
 */
export function toHex(uint8arr: Uint8Array): string {
  let hex = '';
  for (let i = 0; i < uint8arr.length; i++) {
    const b = uint8arr[i] ?? 0;
    hex += (HEX_TABLE[(b >> 4) & 0xf] ?? '') + (HEX_TABLE[b & 0xf] ?? '');
  }
  return hex;
}

/**
 * Encodes interpreter text. Commands are plain ASCII.
 */
export function fromAscii(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'latin1'));
}

/**
 * Decodes bytes one-to-one into characters.
 */
export function toAscii(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1');
}

/**
 * Makes control characters visible so that a query or reply stays on one log line.
 * @example printable('0100\r') === '0100\\r'
 */
export function printable(text: string): string {
  return text.replace(/[\x00-\x1f]/g, ch => {
    switch (ch) {
      case '\r':
        return '\\r';
      case '\n':
        return '\\n';
      case '\t':
        return '\\t';
      default:
        return `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`;
    }
  });
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
