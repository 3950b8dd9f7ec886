// src/framers/reply-classifier.ts
import type { ClassifiedReply, ReplyKind } from '../types/bridge-types.js';
import { DELIMITER_CHAR, READY_SENTINEL_CHAR, REPLY_PREFIXES } from '../constants/constants.js';

/**
 * Extraction rule for each reply kind. `body` is the framed reply without its ready prompt.
 */
const EXTRACTORS: Record<Exclude<ReplyKind, 'unknown'>, (body: string, framed: string) => ClassifiedReply | null> = {
  // AT responses are one logical line: delimiters become spaces.
  at: (body, framed) => ({
    kind: 'at',
    payload: body.split(DELIMITER_CHAR).join(' ').trimEnd(),
    framed,
  }),
  // The interpreter echoes the request line before the ECU data line.
  obd: (body, framed) => {
    const tokens = body.split(DELIMITER_CHAR).filter(token => token.length > 0);
    const echo = tokens[0];
    const payload = tokens[1];
    if (echo === undefined || payload === undefined) return null;
    return { kind: 'obd', echo, payload, framed };
  },
};

/**
 * Resolves the reply kind from the leading character.
 */
export function detectReplyKind(framed: string): ReplyKind {
  switch (framed.charAt(0)) {
    case REPLY_PREFIXES.AT:
      return 'at';
    case REPLY_PREFIXES.OBD:
      return 'obd';
    default:
      return 'unknown';
  }
}

/**
 * Reduces a framed reply to the part a client should see.
 * @example
 * classifyReply('0100!41 00 BE 3E A1!').payload === '41 00 BE 3E A1'
 * classifyReply('ATRV!12.3V!').payload === 'ATRV 12.3V'
 */
export function classifyReply(framed: string): ClassifiedReply {
  const kind = detectReplyKind(framed);
  if (kind !== 'unknown') {
    const body = framed.endsWith(READY_SENTINEL_CHAR) ? framed.slice(0, -1) : framed;
    const classified = EXTRACTORS[kind](body, framed);
    if (classified) return classified;
  }
  return { kind: 'unknown', payload: '', framed };
}
