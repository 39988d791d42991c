/**
 * Powerlink frame parser and encoder.
 * Frame format: 0x0D + command + payload + 0x43 + checksum + 0x0A
 *
 * B0 frames declare their size (payload byte 2 is the content length).
 * Standard frames end at the first 0x43/checksum/0x0A trailer whose checksum holds.
 */

export const START_MARKER = 0x0d;
export const END_MARKER = 0x43;
export const TRAILER = 0x0a;

export enum Command {
  Ack = 0x02,
  B0 = 0xb0,
}

export interface Frame {
  command: number;
  /** Bytes between the command and the end marker. */
  payload: Buffer;
  checksum: number;
  raw: Buffer;
}

export type ExtractResult =
  | { kind: 'frame'; frame: Frame; consumed: number }
  | { kind: 'incomplete'; consumed: number }
  | { kind: 'invalid'; reason: string; consumed: number };

export interface RejectedBytes {
  reason: string;
  bytes: Buffer;
}

const B0_HEADER_SIZE = 5; // start + command + type + sub-command + length
const TRAILER_SIZE = 3; // end marker + checksum + trailer
export const MAX_STANDARD_FRAME = 256;

export function computeChecksum(command: number, payload: Uint8Array): number {
  let sum = command + END_MARKER;
  for (const byte of payload) sum += byte;
  const checksum = 0xff - (sum % 0xff);
  return checksum === 0xff ? 0x00 : checksum;
}

/**
 * A B0 payload reads back through extractFrame only when byte 2 holds its
 * content length, `payload.length - 3`.
 */
export function encodeFrame(command: number, payload: Uint8Array): Buffer {
  return Buffer.concat([
    Buffer.from([START_MARKER, command]),
    payload,
    Buffer.from([END_MARKER, computeChecksum(command, payload), TRAILER]),
  ]);
}

function validate(buffer: Buffer, size: number): ExtractResult {
  const command = buffer[1];
  if (buffer[size - 3] !== END_MARKER) {
    return { kind: 'invalid', reason: 'end marker missing', consumed: 1 };
  }
  if (buffer[size - 1] !== TRAILER) {
    return { kind: 'invalid', reason: 'trailer missing', consumed: 1 };
  }
  const payload = Buffer.from(buffer.subarray(2, size - 3));
  const expected = computeChecksum(command, payload);
  const checksum = buffer[size - 2];
  if (checksum !== expected) {
    return {
      kind: 'invalid',
      reason: `checksum mismatch (got ${hexByte(checksum)}, expected ${hexByte(expected)})`,
      consumed: 1,
    };
  }
  return {
    kind: 'frame',
    frame: { command, payload, checksum, raw: Buffer.from(buffer.subarray(0, size)) },
    consumed: size,
  };
}

/**
 * Extract the first frame from the head of an accumulating buffer.
 * Bytes ahead of a start marker are rejected as a run; a frame that fails
 * validation consumes only its start marker so scanning resumes at the
 * next 0x0D candidate.
 */
export function extractFrame(buffer: Buffer): ExtractResult {
  return extract(buffer, true);
}

function extract(buffer: Buffer, waitForTrailer: boolean): ExtractResult {
  if (buffer.length === 0) return { kind: 'incomplete', consumed: 0 };

  const start = buffer.indexOf(START_MARKER);
  if (start === -1) {
    return { kind: 'invalid', reason: 'no start marker', consumed: buffer.length };
  }
  if (start > 0) {
    return { kind: 'invalid', reason: 'bytes before start marker', consumed: start };
  }
  if (buffer.length < 2) return { kind: 'incomplete', consumed: 0 };

  if (buffer[1] === Command.B0) {
    if (buffer.length < B0_HEADER_SIZE) return { kind: 'incomplete', consumed: 0 };
    const size = B0_HEADER_SIZE + buffer[4] + TRAILER_SIZE;
    if (buffer.length < size) return { kind: 'incomplete', consumed: 0 };
    return validate(buffer, size);
  }

  // Standard frame: the first `43 ?? 0A` whose checksum holds. The payload
  // may contain the same pattern.
  const limit = Math.min(buffer.length, MAX_STANDARD_FRAME);
  let rejected: ExtractResult | undefined;
  let rejectedEnd = 0;
  for (let i = 2; i + 2 < limit; i++) {
    if (buffer[i] !== END_MARKER || buffer[i + 2] !== TRAILER) continue;
    const result = validate(buffer, i + TRAILER_SIZE);
    if (result.kind === 'frame') return result;
    if (!rejected) {
      rejected = result;
      rejectedEnd = i + TRAILER_SIZE;
    }
  }
  if (buffer.length >= MAX_STANDARD_FRAME) {
    return rejected ?? { kind: 'invalid', reason: 'no end marker within frame limit', consumed: 1 };
  }
  // A failed trailer is final once a valid frame follows it; until then the
  // real trailer may still be on its way.
  if (rejected && (!waitForTrailer || validFrameFrom(buffer, rejectedEnd))) return rejected;
  return { kind: 'incomplete', consumed: 0 };
}

function validFrameFrom(buffer: Buffer, offset: number): boolean {
  for (let i = buffer.indexOf(START_MARKER, offset); i !== -1; i = buffer.indexOf(START_MARKER, i + 1)) {
    if (extract(buffer.subarray(i), false).kind === 'frame') return true;
  }
  return false;
}

export function parseFrames(buffer: Buffer): {
  frames: Frame[];
  rejected: RejectedBytes[];
  remainder: Buffer;
} {
  const frames: Frame[] = [];
  const rejected: RejectedBytes[] = [];
  let offset = 0;

  while (offset < buffer.length) {
    const view = buffer.subarray(offset);
    const result = extractFrame(view);
    if (result.kind === 'incomplete') break;
    if (result.kind === 'frame') {
      frames.push(result.frame);
    } else {
      rejected.push({
        reason: result.reason,
        bytes: Buffer.from(view.subarray(0, result.consumed)),
      });
    }
    offset += result.consumed;
  }

  return { frames, rejected, remainder: Buffer.from(buffer.subarray(offset)) };
}

/**
 * Build a frame from operator/offline hex: `[0D] command ... 43 [checksum [0A]]`.
 * Any checksum in the input is discarded and recomputed.
 */
export function normalizeFrameHex(hex: string): Buffer {
  const bytes = parseHex(hex);
  let body = bytes[0] === START_MARKER ? bytes.subarray(1) : bytes;

  if (body.length >= 3 && body[body.length - 1] === TRAILER && body[body.length - 3] === END_MARKER) {
    body = body.subarray(0, body.length - 2);
  }
  if (body.length < 2 || body[body.length - 1] !== END_MARKER) {
    throw new Error('Frame must end with the 43 end marker');
  }
  return encodeFrame(body[0], body.subarray(1, body.length - 1));
}

export function parseHex(input: string): Buffer {
  const compact = input.replace(/[\s:,-]/g, '');
  if (compact.length === 0) throw new Error('No hex data');
  if (!/^[0-9a-fA-F]+$/.test(compact)) throw new Error(`Invalid hex: ${input.trim()}`);
  if (compact.length % 2 !== 0) throw new Error('Hex data has an odd number of digits');
  return Buffer.from(compact, 'hex');
}

export function toHex(data: Uint8Array): string {
  return Buffer.from(data).toString('hex').replace(/(..)(?!$)/g, '$1 ');
}

export function hexByte(value: number): string {
  return value.toString(16).padStart(2, '0');
}
