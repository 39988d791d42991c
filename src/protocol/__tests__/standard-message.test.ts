import { describe, it, expect } from 'vitest';
import { encodeFrame, extractFrame } from '../framing.js';
import { StandardCommand, decodeStandardMessage, standardCommandName } from '../standard-message.js';

describe('standard messages', () => {
  it('names known commands', () => {
    expect(standardCommandName(StandardCommand.StatusUpdate)).toBe('StatusUpdate');
    expect(standardCommandName(0x3c)).toBe('EpromInfo');
  });

  it('reports unlisted commands as UNKNOWN', () => {
    expect(standardCommandName(0x77)).toBe('UNKNOWN');
  });

  it('keeps the payload as raw bytes and hex', () => {
    const result = extractFrame(encodeFrame(0xa6, Buffer.from([0x01, 0x02, 0xff])));
    if (result.kind !== 'frame') throw new Error('expected a frame');
    expect(decodeStandardMessage(result.frame)).toEqual({
      kind: 'standard',
      command: 0xa6,
      name: 'ZoneType',
      data: Buffer.from([0x01, 0x02, 0xff]),
      hex: '01 02 ff',
    });
  });
});
