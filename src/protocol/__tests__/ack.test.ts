import { describe, it, expect, vi } from 'vitest';
import { ACK_FRAME, AckManager, shouldAcknowledge } from '../ack.js';
import { Command, encodeFrame } from '../framing.js';
import { FrameDispatcher } from '../../dispatcher.js';

describe('ACK_FRAME', () => {
  it('is 0D 02 43 BA 0A', () => {
    expect(ACK_FRAME).toEqual(Buffer.from([0x0d, 0x02, 0x43, 0xba, 0x0a]));
  });
});

describe('AckManager', () => {
  function setup() {
    const written: Buffer[] = [];
    const acks = new AckManager((data) => written.push(data));
    const dispatcher = new FrameDispatcher('test');
    acks.attach(dispatcher);
    return { acks, dispatcher, written };
  }

  it('sends one ACK per valid frame', () => {
    const { acks, dispatcher, written } = setup();
    dispatcher.push(
      Buffer.concat([
        encodeFrame(0xa5, Buffer.from([0x00, 0x01])),
        encodeFrame(Command.B0, Buffer.from([0x03, 0x24, 0x01, 0xff])),
      ]),
    );
    expect(written).toEqual([ACK_FRAME, ACK_FRAME]);
    expect(acks.count).toBe(2);
  });

  it('sends nothing for invalid or incomplete input', () => {
    const { dispatcher, written } = setup();
    dispatcher.push(Buffer.from([0x0d, 0xa5, 0x00, 0x43, 0x00, 0x0a])); // bad checksum
    dispatcher.push(Buffer.from([0xff, 0xfe]));
    dispatcher.push(encodeFrame(0xa5, Buffer.from([0x00])).subarray(0, 4));
    expect(written).toEqual([]);
  });

  it('does not acknowledge ACK frames', () => {
    const { dispatcher, written } = setup();
    dispatcher.push(ACK_FRAME);
    expect(written).toEqual([]);
    expect(shouldAcknowledge({ command: Command.Ack, payload: Buffer.alloc(0), checksum: 0xba, raw: ACK_FRAME })).toBe(false);
  });

  it('writes the ACK before the frame is decoded', () => {
    const order: string[] = [];
    const acks = new AckManager(() => order.push('ack'));
    const dispatcher = new FrameDispatcher('test');
    acks.attach(dispatcher);
    dispatcher.on('decoded', () => order.push('decoded'));
    dispatcher.push(encodeFrame(0xa5, Buffer.from([0x00])));
    expect(order).toEqual(['ack', 'decoded']);
  });

  it('emits ack with the frame it answered', () => {
    const { acks, dispatcher } = setup();
    const listener = vi.fn();
    acks.on('ack', listener);
    const frame = encodeFrame(0xa5, Buffer.from([0x07]));
    dispatcher.push(frame);
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0]).toEqual(ACK_FRAME);
    expect(listener.mock.calls[0][1].raw).toEqual(frame);
  });

  it('stops after detach', () => {
    const written: Buffer[] = [];
    const acks = new AckManager((data) => written.push(data));
    const dispatcher = new FrameDispatcher('test');
    const detach = acks.attach(dispatcher);
    detach();
    dispatcher.push(encodeFrame(0xa5, Buffer.from([0x00])));
    expect(written).toEqual([]);
  });
});
