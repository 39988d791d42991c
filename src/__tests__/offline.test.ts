import { describe, it, expect } from 'vitest';
import { OfflineDecoder, decodeHexMessage } from '../offline.js';
import { B0MessageType } from '../b0/types.js';

describe('decodeHexMessage', () => {
  it('decodes a B0 request without start marker or checksum', () => {
    const [message] = decodeHexMessage('b0 01 24 01 01 43');
    expect(message.kind).toBe('b0');
    if (message.kind !== 'b0') return;
    expect(message.subCommand).toBe(0x24);
    expect(message.messageType).toBe(B0MessageType.Request);
    expect(message.data.length).toBe(0);
  });

  it('decodes a standard frame and ignores the supplied checksum', () => {
    const messages = decodeHexMessage('0d a6 00 00 00 00 00 00 00 00 00 00 43 99 0a');
    expect(messages.map((m) => m.name)).toEqual(['ZoneType']);
  });

  it('decodes a lone page by itself', () => {
    const [message] = decodeHexMessage('b0 02 3d 07 01 08 03 02 79 ff 01 43');
    if (message.kind !== 'b0') throw new Error('expected a B0 message');
    expect(message.messageType).toBe(B0MessageType.PagedResponse);
    expect(message.page).toBe(1);
    expect(message.decoded).toEqual({ Zones: { '1': 20 } });
  });

  it('rejects input that is not hex', () => {
    expect(() => decodeHexMessage('hello')).toThrow('Invalid hex: hello');
  });
});

describe('OfflineDecoder', () => {
  it('joins pages pasted one after another', () => {
    const decoder = new OfflineDecoder();
    expect(decoder.decode('b0 02 3d 07 01 08 03 02 79 ff 01 43')).toEqual([]);
    expect(decoder.pending).toBe(1);

    const messages = decoder.decode('b0 03 3d 06 ff 08 03 01 51 02 43');
    expect(messages.length).toBe(1);
    expect(messages[0].kind === 'b0' && messages[0].decoded).toEqual({ Zones: { '1': 20, '3': 0 } });
    expect(decoder.pending).toBe(0);
  });

  it('rejects a frame shorter than its length byte and starts clean next time', () => {
    const decoder = new OfflineDecoder();
    expect(() => decoder.decode('b0 03 24 10 ff 43')).toThrow(
      'Frame is incomplete (length byte says 16, got 1 content bytes)',
    );
    expect(decoder.decode('0d a2 00 00 00 43').map((m) => m.kind === 'standard' && m.command)).toEqual([0xa2]);
  });

  it('keeps buffered pages when a frame is incomplete', () => {
    const decoder = new OfflineDecoder();
    decoder.decode('b0 02 3d 07 01 08 03 02 79 ff 01 43');
    expect(() => decoder.decode('b0 03 3d 09 ff 43')).toThrow('Frame is incomplete');
    expect(decoder.pending).toBe(1);
  });

  it('forgets pages on reset', () => {
    const decoder = new OfflineDecoder();
    decoder.decode('b0 02 3d 07 01 08 03 02 79 ff 01 43');
    decoder.reset();
    expect(decoder.pending).toBe(0);
  });
});
