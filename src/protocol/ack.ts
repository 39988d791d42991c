import { EventEmitter } from 'node:events';
import { Command, encodeFrame, type Frame } from './framing.js';

/** 0D 02 43 BA 0A */
export const ACK_FRAME = encodeFrame(Command.Ack, Buffer.alloc(0));

export function shouldAcknowledge(frame: Frame): boolean {
  return frame.command !== Command.Ack;
}

/**
 * Answers every valid inbound frame with one ACK on the same connection.
 * The panel abandons an exchange it does not see acknowledged in time, so
 * the ACK is written from the `frame` event, before the frame is decoded.
 */
export class AckManager extends EventEmitter {
  private sent = 0;

  constructor(private write: (data: Buffer) => void) {
    super();
  }

  get count(): number {
    return this.sent;
  }

  /** Listen for `frame` events on a dispatcher. Returns a detach function. */
  attach(source: EventEmitter): () => void {
    const handler = (frame: Frame): void => {
      this.acknowledge(frame);
    };
    source.on('frame', handler);
    return () => {
      source.off('frame', handler);
    };
  }

  acknowledge(frame: Frame): boolean {
    if (!shouldAcknowledge(frame)) return false;
    this.write(ACK_FRAME);
    this.sent++;
    this.emit('ack', ACK_FRAME, frame);
    return true;
  }
}
