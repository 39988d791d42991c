import { Command, END_MARKER, encodeFrame, normalizeFrameHex, parseHex } from '../protocol/framing.js';
import { settingsIdToBytes } from '../b0/tables.js';
import { B0MessageType, B0SubCommand } from '../b0/types.js';

/** Rolling message counter carried by injected B0 requests: 1..255, then 1 again. */
export class MessageCounter {
  private value = 0;

  next(): number {
    this.value = this.value >= 0xff ? 1 : this.value + 1;
    return this.value;
  }

  get current(): number {
    return this.value;
  }
}

export interface RequestParams {
  paramSize: number;
  data: number[];
}

const PARAM_DATA_TYPE = 0x08;

/**
 * B0 request payload:
 *   01 | sub-command | length | [param size, FF, 08, FF, n, data(n)] | counter
 */
export function buildB0Request(
  subCommand: number,
  params: RequestParams | undefined,
  counter: number,
): Buffer {
  const content =
    params && params.data.length > 0
      ? [params.paramSize, 0xff, PARAM_DATA_TYPE, 0xff, params.data.length, ...params.data, counter]
      : [counter];
  if (content.length > 0xff) {
    throw new Error(`Too many parameters (${params?.data.length ?? 0} bytes)`);
  }
  return Buffer.from([B0MessageType.Request, subCommand, content.length, ...content]);
}

export type InjectorCommand =
  | { kind: 'frame'; frame: Buffer; source: 'shortcode' | 'hex' }
  | { kind: 'show' }
  | { kind: 'help' };

export const INJECTOR_HELP = [
  'B0 <sub> [args...]   B0 request, e.g. "B0 24", "B0 17 24 58", "B0 35 0f 00 15 01"',
  '                     0x35/0x42 take (id, 00) byte pairs, or whole IDs such as 0115',
  '<hex> 43 [cs [0a]]   frame as hex ending in the 43 end marker; checksum is recomputed',
  'show                 list connected panels',
  'help                 this text',
];

function parseByte(token: string): number {
  if (!/^[0-9a-fA-F]{1,2}$/.test(token)) {
    throw new Error(`Invalid byte: ${token}`);
  }
  return Number.parseInt(token, 16);
}

/** A whole settings ID of 1-4 hex digits, sent as a (low, high) pair. */
function parseSettingsId(token: string): [number, number] {
  if (!/^[0-9a-fA-F]{1,4}$/.test(token)) {
    throw new Error(`Invalid settings ID: ${token}`);
  }
  return settingsIdToBytes(Number.parseInt(token, 16));
}

/**
 * Single-byte args are the wire pairs themselves, `0f 00 15 01`. Any longer
 * arg switches the line to whole IDs, `0f 0115`.
 */
function settingsParams(args: string[]): number[] {
  if (args.some((arg) => arg.length > 2)) {
    return args.flatMap(parseSettingsId);
  }
  if (args.length % 2 !== 0) {
    throw new Error(`Settings IDs need byte pairs (got ${args.length} bytes)`);
  }
  return args.map(parseByte);
}

function expandShortcode(tokens: string[], counter: MessageCounter): Buffer {
  const [, subToken, ...args] = tokens;
  if (subToken === undefined) {
    throw new Error('Missing B0 sub-command');
  }
  const subCommand = parseByte(subToken);

  let params: RequestParams | undefined;
  if (args.length > 0) {
    if (subCommand === B0SubCommand.Settings || subCommand === B0SubCommand.SettingsList) {
      params = { paramSize: 2, data: settingsParams(args) };
    } else {
      params = { paramSize: 1, data: args.map(parseByte) };
    }
  }
  return encodeFrame(Command.B0, buildB0Request(subCommand, params, counter.next()));
}

/**
 * A `b0 ...` line is a full frame only when it ends in the end marker and
 * its length byte agrees with the bytes present; otherwise it is a shortcode.
 */
function isFullB0Frame(bytes: Buffer): boolean {
  let body = bytes[0] === 0x0d ? bytes.subarray(1) : bytes;
  if (body.length >= 3 && body[body.length - 1] === 0x0a && body[body.length - 3] === 0x43) {
    body = body.subarray(0, body.length - 2);
  }
  return (
    body[0] === Command.B0 &&
    body.length >= 5 &&
    body.length - 5 === body[3] &&
    body[body.length - 1] === END_MARKER
  );
}

function looksLikeFrame(compact: string): boolean {
  return /^0d/i.test(compact) || /43$/i.test(compact) || /43[0-9a-f]{2}0a$/i.test(compact);
}

/** Turn one operator line into a command. Throws with a reason on bad input. */
export function parseInjectorLine(line: string, counter: MessageCounter): InjectorCommand {
  const text = line.trim();
  if (text === '') throw new Error('Empty line');

  const word = text.toLowerCase();
  if (word === 'show') return { kind: 'show' };
  if (word === 'help' || word === '?') return { kind: 'help' };

  const tokens = text.split(/[\s,]+/);
  const compact = tokens.join('');

  if (tokens[0].toLowerCase() === 'b0') {
    if (/^[0-9a-fA-F]+$/.test(compact) && compact.length % 2 === 0) {
      const bytes = parseHex(compact);
      if (isFullB0Frame(bytes)) {
        return { kind: 'frame', frame: normalizeFrameHex(compact), source: 'hex' };
      }
    }
    return { kind: 'frame', frame: expandShortcode(tokens, counter), source: 'shortcode' };
  }

  if (!looksLikeFrame(compact)) {
    throw new Error(`Unrecognised command: ${text}`);
  }
  return { kind: 'frame', frame: normalizeFrameHex(compact), source: 'hex' };
}
