/**
 * B0 sub-command decoder. Pure: frames in, sub-messages out.
 */

import { Command, hexByte, toHex, type Frame } from '../protocol/framing.js';
import { readUInt16LE, splitBuffer } from '../util/bytes.js';
import { DATA_DECODERS, genericDecoder } from './data-decoders.js';
import {
  SETTING_FORMATTERS,
  TABLE_FORMATTERS,
  collapse,
  decodeSettingValue,
} from './settings-decoders.js';
import {
  mergeChunks,
  parseB0Structure,
  parseResponseBody,
  responseBody,
} from './structure.js';
import {
  formatSettingsId,
  isSettingsCommand,
  lookupSetting,
  settingsIdFromBytes,
  subCommandName,
} from './tables.js';
import {
  B0MessageType,
  B0SubCommand,
  type B0DataChunk,
  type B0Structure,
  type B0SubMessage,
  type DecodedValue,
} from './types.js';

export type B0DecodeResult = B0SubMessage | B0SubMessage[];

export interface ResponseContext {
  messageType?: B0MessageType;
  page?: number;
  pages?: number;
  counter?: number;
}

const SETTINGS_HEADER_SIZE = 3;
const TABLE_HEADER_SIZE = 14;

export function isKnownSubCommand(subCommand: number): boolean {
  return DATA_DECODERS.has(subCommand) || isSettingsCommand(subCommand);
}

function single(messages: B0SubMessage[]): B0DecodeResult {
  return messages.length === 1 ? messages[0] : messages;
}

/** Flatten a decode result into a list. */
export function toMessageList(result: B0DecodeResult): B0SubMessage[] {
  return Array.isArray(result) ? result : [result];
}

function baseMessage(
  messageType: B0MessageType,
  subCommand: number,
  counter: number | undefined,
): Omit<B0SubMessage, 'data' | 'decoded'> {
  return {
    kind: 'b0',
    messageType,
    subCommand,
    name: subCommandName(subCommand),
    known: isKnownSubCommand(subCommand),
    counter,
  };
}

// --- requests ---

function decodeRequest(structure: B0Structure): B0DecodeResult {
  const { subCommand, params, counter } = structure;
  const base = baseMessage(B0MessageType.Request, subCommand, counter);
  if (!params) {
    return { ...base, data: Buffer.alloc(0), decoded: null };
  }

  const entries = splitBuffer(params.data, params.paramSize);

  if (isSettingsCommand(subCommand)) {
    const messages = entries
      .filter((entry) => entry.length === 2)
      .map((entry): B0SubMessage => {
        const id = settingsIdFromBytes(entry[0], entry[1]);
        const setting = lookupSetting(id, subCommand);
        return {
          ...base,
          settingsId: id,
          setting,
          data: entry,
          decoded: { id: formatSettingsId(id), setting: setting.label },
        };
      });
    if (messages.length > 0) return single(messages);
  }

  if (subCommand === B0SubCommand.RequestList) {
    return {
      ...base,
      data: params.data,
      decoded: entries.map((entry) => ({
        command: toHex(entry),
        name: subCommandName(entry[0]),
      })),
    };
  }

  return { ...base, data: params.data, decoded: entries.map((entry) => toHex(entry)) };
}

// --- settings responses ---

interface SettingsPart {
  id: number;
  dataType: number;
  itemSize: number;
  values: Buffer;
}

/** `id(2) | data type | value` */
function settingsPart(chunk: B0DataChunk): SettingsPart | undefined {
  if (chunk.data.length < SETTINGS_HEADER_SIZE) return undefined;
  const values = Buffer.from(chunk.data.subarray(SETTINGS_HEADER_SIZE));
  return {
    id: readUInt16LE(chunk.data),
    dataType: chunk.data[2],
    itemSize: values.length,
    values,
  };
}

/**
 * `id(2) | max entries(2) | entry bits(2) | ?(2) | data type | ? |
 *  start entry(2) | entries(2) | values`
 */
function tablePart(chunk: B0DataChunk): SettingsPart | undefined {
  if (chunk.data.length < TABLE_HEADER_SIZE) return undefined;
  const entryBits = readUInt16LE(chunk.data, 4);
  return {
    id: readUInt16LE(chunk.data),
    dataType: chunk.data[8],
    itemSize: Math.max(1, Math.floor(entryBits / 8)),
    values: Buffer.from(chunk.data.subarray(TABLE_HEADER_SIZE)),
  };
}

/** Group parts by settings ID in first-seen order, joining their values. */
function groupParts(parts: SettingsPart[]): SettingsPart[] {
  const grouped = new Map<number, SettingsPart>();
  for (const part of parts) {
    const existing = grouped.get(part.id);
    grouped.set(
      part.id,
      existing ? { ...existing, values: Buffer.concat([existing.values, part.values]) } : part,
    );
  }
  return [...grouped.values()];
}

function decodeSettingsValue(subCommand: number, part: SettingsPart): DecodedValue {
  if (subCommand === B0SubCommand.SettingsList) {
    const items = splitBuffer(part.values, part.itemSize);
    const formatter = TABLE_FORMATTERS.get(part.id);
    if (formatter) return formatter(part.values, items);
    return collapse(items.map((item) => decodeSettingValue(part.dataType, item)));
  }
  const formatter = SETTING_FORMATTERS.get(part.id);
  if (formatter) return formatter(part.values, [part.values]);
  return decodeSettingValue(part.dataType, part.values);
}

function decodeSettingsResponse(
  subCommand: number,
  chunks: B0DataChunk[],
  context: ResponseContext,
): B0SubMessage[] {
  const extract = subCommand === B0SubCommand.SettingsList ? tablePart : settingsPart;
  const parts = groupParts(
    chunks.map(extract).filter((part): part is SettingsPart => part !== undefined),
  );
  const base = baseMessage(context.messageType ?? B0MessageType.Response, subCommand, context.counter);
  return parts.map((part) => ({
    ...base,
    settingsId: part.id,
    setting: lookupSetting(part.id, subCommand),
    page: context.page,
    pages: context.pages,
    data: part.values,
    decoded: decodeSettingsValue(subCommand, part),
  }));
}

// --- responses ---

function decodeChunks(
  subCommand: number,
  chunks: B0DataChunk[],
  body: Buffer,
  structure: B0Structure,
  context: ResponseContext,
): B0DecodeResult {
  if (isSettingsCommand(subCommand)) {
    const messages = decodeSettingsResponse(subCommand, chunks, context);
    if (messages.length > 0) return single(messages);
  }

  const base = baseMessage(context.messageType ?? B0MessageType.Response, subCommand, context.counter);
  const decoder = DATA_DECODERS.get(subCommand) ?? genericDecoder;
  return {
    ...base,
    page: context.page,
    pages: context.pages,
    data: body,
    decoded: decoder(mergeChunks(chunks), structure),
  };
}

/** Decode the chunk bytes of a response, e.g. a reassembled paged body. */
export function decodeB0Body(
  subCommand: number,
  body: Buffer,
  context: ResponseContext = {},
): B0DecodeResult {
  const chunks = parseResponseBody(subCommand, body);
  const structure: B0Structure = {
    messageType: context.messageType ?? B0MessageType.Response,
    subCommand,
    length: body.length + 2,
    content: body,
    page: context.page,
    chunks,
    counter: context.counter,
  };
  return decodeChunks(subCommand, chunks, body, structure, context);
}

export function decodeB0Structure(structure: B0Structure): B0DecodeResult {
  const { messageType, subCommand, counter } = structure;

  if (messageType === B0MessageType.Request) {
    return decodeRequest(structure);
  }

  if (messageType === B0MessageType.Add || messageType === B0MessageType.Remove) {
    return {
      ...baseMessage(messageType, subCommand, counter),
      data: structure.content,
      decoded: {
        downloadCode: structure.downloadCode ? toHex(structure.downloadCode) : null,
        chunks: genericDecoder(structure.chunks),
      },
    };
  }

  const context: ResponseContext = { messageType, page: structure.page, counter };
  return decodeChunks(subCommand, structure.chunks, responseBody(structure), structure, context);
}

export function decodeB0(frame: Frame): B0DecodeResult {
  if (frame.command !== Command.B0) {
    throw new Error(`Not a B0 frame (command ${hexByte(frame.command)})`);
  }
  return decodeB0Structure(parseB0Structure(frame.payload));
}
