/**
 * B0 payload layout:
 *   type(1) + sub-command(1) + length(1) + content(length)
 *
 * Response content: page(1) + chunks + counter(1)
 *   chunk = data type(1) + index(1) + length(1) + data(length)
 * Request content: [param size, FF, data type, FF, n, data(n)] + counter
 * Add/remove content: download code(2) + 2 bytes + chunk
 */

import { splitBuffer } from '../util/bytes.js';
import {
  B0MessageType,
  B0SubCommand,
  type B0DataChunk,
  type B0RequestParams,
  type B0Structure,
} from './types.js';

export const FINAL_PAGE = 0xff;

const REQUEST_HEADER_SIZE = 5;
const ENROLMENT_CHUNK_OFFSET = 4;

export function toMessageType(value: number): B0MessageType {
  return value in B0MessageType ? value : B0MessageType.Unknown;
}

export function parseChunks(bytes: Buffer): B0DataChunk[] {
  const chunks: B0DataChunk[] = [];
  let offset = 0;
  while (offset + 3 <= bytes.length) {
    const length = bytes[offset + 2];
    chunks.push({
      dataType: bytes[offset],
      index: bytes[offset + 1],
      length,
      data: Buffer.from(bytes.subarray(offset + 3, offset + 3 + length)),
    });
    offset += 3 + length;
  }
  return chunks;
}

/**
 * Parse the chunk area of a response (page byte and counter removed).
 * Also used on reassembled paged bodies.
 */
export function parseResponseBody(subCommand: number, body: Buffer): B0DataChunk[] {
  if (subCommand === B0SubCommand.Unknown0F) {
    // 0x0F carries its data type but no index/length header
    if (body.length < 2) return [];
    const data = Buffer.from(body.subarray(2));
    return [{ dataType: body[0], index: 0xff, length: data.length, data }];
  }

  const chunks = parseChunks(body);
  const first = chunks[0];
  if (first && first.dataType === 0 && first.data.length >= 3) {
    // A type 0 chunk wraps one inner chunk
    const innerLength = first.data[2];
    chunks[0] = {
      dataType: first.data[0],
      index: first.data[1],
      length: innerLength,
      data: Buffer.from(first.data.subarray(3, 3 + innerLength)),
    };
  }
  return chunks;
}

/** Combine chunks that share an index, keeping first-seen order. */
export function mergeChunks(chunks: B0DataChunk[]): B0DataChunk[] {
  const merged = new Map<number, B0DataChunk>();
  for (const chunk of chunks) {
    const existing = merged.get(chunk.index);
    if (existing) {
      merged.set(chunk.index, {
        ...existing,
        length: existing.length + chunk.length,
        data: Buffer.concat([existing.data, chunk.data]),
      });
    } else {
      merged.set(chunk.index, chunk);
    }
  }
  return [...merged.values()];
}

/** Items of a chunk, each `max(1, dataType / 8)` bytes. */
export function chunkItems(chunk: B0DataChunk): Buffer[] {
  return splitBuffer(chunk.data, Math.max(1, Math.floor(chunk.dataType / 8)));
}

/** Chunk bytes of a response: content without the page byte and counter. */
export function responseBody(structure: B0Structure): Buffer {
  const { content } = structure;
  if (content.length < 2) return Buffer.alloc(0);
  return Buffer.from(content.subarray(1, content.length - 1));
}

function parseRequest(length: number, content: Buffer): Partial<B0Structure> {
  if (length <= 1 || content.length < REQUEST_HEADER_SIZE) {
    return { counter: content.length > 0 ? content[content.length - 1] : undefined };
  }
  const count = content[4];
  const params: B0RequestParams = {
    paramSize: content[0],
    dataType: content[2],
    data: Buffer.from(content.subarray(REQUEST_HEADER_SIZE, REQUEST_HEADER_SIZE + count)),
  };
  const rest = content.subarray(REQUEST_HEADER_SIZE + count);
  return { params, counter: rest.length === 1 ? rest[0] : undefined };
}

function parseEnrolment(content: Buffer): Partial<B0Structure> {
  const chunk = parseChunks(content.subarray(ENROLMENT_CHUNK_OFFSET))[0];
  return {
    downloadCode: Buffer.from(content.subarray(0, 2)),
    chunks: chunk ? [chunk] : [],
  };
}

function parseResponse(subCommand: number, content: Buffer): Partial<B0Structure> {
  if (content.length === 0) return {};
  const body = content.length >= 2 ? content.subarray(1, content.length - 1) : Buffer.alloc(0);
  return {
    page: content[0],
    chunks: parseResponseBody(subCommand, Buffer.from(body)),
    counter: content.length >= 2 ? content[content.length - 1] : undefined,
  };
}

export function parseB0Structure(payload: Buffer): B0Structure {
  if (payload.length < 3) {
    throw new Error(`B0 payload too short (${payload.length} bytes)`);
  }
  const messageType = toMessageType(payload[0]);
  const subCommand = payload[1];
  const length = payload[2];
  const content = Buffer.from(payload.subarray(3, 3 + length));

  let parts: Partial<B0Structure>;
  switch (messageType) {
    case B0MessageType.Request:
      parts = parseRequest(length, content);
      break;
    case B0MessageType.Add:
    case B0MessageType.Remove:
      parts = parseEnrolment(content);
      break;
    default:
      parts = parseResponse(subCommand, content);
  }

  return { messageType, subCommand, length, content, chunks: [], ...parts };
}
