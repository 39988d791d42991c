import { EventEmitter } from 'node:events';
import { Command, extractFrame, type Frame } from './protocol/framing.js';
import { decodeStandardMessage, type StandardMessage } from './protocol/standard-message.js';
import { decodeB0Body, decodeB0Structure, toMessageList, type B0DecodeResult } from './b0/decoder.js';
import { PagingReassembler, type PagingAnomaly } from './b0/paging.js';
import { FINAL_PAGE, parseB0Structure, responseBody } from './b0/structure.js';
import { B0MessageType, type B0Structure, type B0SubMessage } from './b0/types.js';

export type DecodedMessage = B0SubMessage | StandardMessage;

/** Which side sent the bytes a dispatcher is reading. */
export type Direction = 'panel' | 'server';

export interface PageEvent {
  subCommand: number;
  pageIndex: number;
  pageCount?: number;
  size: number;
}

/**
 * Turns one direction of a connection's byte stream into decoded messages.
 *
 * Emits, in order for each frame:
 *   'frame'       (Frame)           valid frame, before decoding
 *   'page'        (PageEvent)       a fragment went into the reassembler
 *   'decoded'     (DecodedMessage)  one per decoded message
 *   'decodeError' (Error, Frame)    payload could not be decoded
 *   'invalid'     (reason, bytes)   bytes dropped by the framer
 *   'anomaly'     (PagingAnomaly)   paging inconsistency
 */
export class FrameDispatcher extends EventEmitter {
  private buffer: Buffer = Buffer.alloc(0);

  constructor(
    readonly sessionKey: string,
    private readonly reassembler: PagingReassembler = new PagingReassembler(),
    readonly direction: Direction = 'panel',
  ) {
    super();
  }

  /** Bytes held while waiting for the rest of a frame. */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  push(data: Buffer): DecodedMessage[] {
    this.buffer = Buffer.concat([this.buffer, data]);
    const decoded: DecodedMessage[] = [];

    for (;;) {
      const result = extractFrame(this.buffer);
      if (result.kind === 'incomplete') break;

      const consumed = Buffer.from(this.buffer.subarray(0, result.consumed));
      this.buffer = Buffer.from(this.buffer.subarray(result.consumed));

      if (result.kind === 'invalid') {
        this.emit('invalid', result.reason, consumed);
        continue;
      }

      this.emit('frame', result.frame);
      for (const message of this.dispatch(result.frame)) {
        decoded.push(message);
        this.emit('decoded', message);
      }
    }

    return decoded;
  }

  /** Drop buffered bytes and this session's unfinished paged exchanges. */
  reset(): void {
    this.clearBuffer();
    this.reassembler.discardSession(this.sessionKey);
  }

  /** Drop buffered bytes only; unfinished pages are kept. Returns the count dropped. */
  clearBuffer(): number {
    const dropped = this.buffer.length;
    this.buffer = Buffer.alloc(0);
    return dropped;
  }

  private dispatch(frame: Frame): DecodedMessage[] {
    if (frame.command !== Command.B0) {
      return [decodeStandardMessage(frame)];
    }
    try {
      const structure = parseB0Structure(frame.payload);
      const result = this.decodeB0(structure);
      return result ? toMessageList(result) : [];
    } catch (err) {
      this.emit('decodeError', err instanceof Error ? err : new Error(String(err)), frame);
      return [];
    }
  }

  private decodeB0(structure: B0Structure): B0DecodeResult | undefined {
    const { messageType, subCommand } = structure;
    const key = this.sessionKey;

    if (messageType === B0MessageType.PagedResponse) {
      const page = structure.page ?? FINAL_PAGE;
      const pageIndex =
        page === FINAL_PAGE || page === 0 ? this.reassembler.nextIndex(key, subCommand) : page - 1;
      const body = responseBody(structure);
      this.emitPage({ subCommand, pageIndex, size: body.length });
      this.feed(subCommand, pageIndex, undefined, body);
      return undefined;
    }

    if (messageType === B0MessageType.Response && this.reassembler.has(key, subCommand)) {
      const pageIndex = this.reassembler.nextIndex(key, subCommand);
      const pageCount = pageIndex + 1;
      const body = responseBody(structure);
      this.emitPage({ subCommand, pageIndex, pageCount, size: body.length });
      const assembled = this.feed(subCommand, pageIndex, pageCount, body);
      if (!assembled) {
        const anomaly: PagingAnomaly = {
          sessionKey: key,
          subCommand,
          pageIndex,
          reason: 'last page arrived with earlier pages missing',
        };
        this.emit('anomaly', anomaly);
        return undefined;
      }
      return decodeB0Body(subCommand, assembled, {
        messageType,
        pages: pageCount,
        counter: structure.counter,
      });
    }

    return decodeB0Structure(structure);
  }

  /** Feed the shared reassembler, forwarding only the anomalies this call raises. */
  private feed(
    subCommand: number,
    pageIndex: number,
    pageCount: number | undefined,
    body: Buffer,
  ): Buffer | undefined {
    const forward = (anomaly: PagingAnomaly): void => {
      this.emit('anomaly', anomaly);
    };
    this.reassembler.on('anomaly', forward);
    try {
      return this.reassembler.feed(this.sessionKey, subCommand, pageIndex, pageCount, body);
    } finally {
      this.reassembler.off('anomaly', forward);
    }
  }

  private emitPage(page: PageEvent): void {
    this.emit('page', page);
  }
}
