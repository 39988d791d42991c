import { decodeB0, toMessageList } from './b0/decoder.js';
import { PagingReassembler } from './b0/paging.js';
import { FrameDispatcher, type DecodedMessage } from './dispatcher.js';
import { Command, normalizeFrameHex, type Frame } from './protocol/framing.js';

/**
 * Decodes pasted hex through the same dispatcher the live path uses.
 * Paging state is kept between calls so the pages of one response can be
 * pasted one after another. Framing state is not: each call is one whole
 * frame.
 */
export class OfflineDecoder {
  private readonly reassembler = new PagingReassembler();
  private readonly dispatcher = new FrameDispatcher('offline', this.reassembler);
  private lastFrame?: Frame;

  constructor() {
    this.dispatcher.on('frame', (frame: Frame) => {
      this.lastFrame = frame;
    });
  }

  /** Frame seen by the most recent decode call. */
  get frame(): Frame | undefined {
    return this.lastFrame;
  }

  /** Paged responses still waiting for pages. */
  get pending(): number {
    return this.reassembler.pending;
  }

  decode(hex: string): DecodedMessage[] {
    const bytes = normalizeFrameHex(hex);
    this.lastFrame = undefined;
    let failure: Error | undefined;
    const onError = (err: Error): void => {
      failure = err;
    };
    this.dispatcher.on('decodeError', onError);
    try {
      const messages = this.dispatcher.push(bytes);
      if (this.dispatcher.clearBuffer() > 0) {
        throw new Error(incompleteReason(bytes));
      }
      if (failure) throw failure;
      return messages;
    } finally {
      this.dispatcher.off('decodeError', onError);
    }
  }

  reset(): void {
    this.dispatcher.reset();
    this.reassembler.clear();
  }
}

function incompleteReason(frame: Buffer): string {
  if (frame[1] === Command.B0 && frame.length >= 5) {
    const present = Math.max(0, frame.length - 8);
    return `Frame is incomplete (length byte says ${frame[4]}, got ${present} content bytes)`;
  }
  return 'Frame is incomplete';
}

/**
 * Decode one frame given as hex (`[0D] command ... 43 [cs [0A]]`).
 * A lone page of a paged response is decoded by itself.
 */
export function decodeHexMessage(hex: string): DecodedMessage[] {
  const decoder = new OfflineDecoder();
  const messages = decoder.decode(hex);
  const frame = decoder.frame;
  if (messages.length === 0 && frame && frame.command === Command.B0) {
    return toMessageList(decodeB0(frame));
  }
  return messages;
}
