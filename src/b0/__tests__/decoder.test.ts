import { describe, it, expect } from 'vitest';
import { decodeB0, toMessageList } from '../decoder.js';
import { B0MessageType } from '../types.js';
import { Command, encodeFrame, extractFrame, type Frame } from '../../protocol/framing.js';
import { buildB0Request } from '../../injector/commands.js';

function b0Frame(payload: number[] | Buffer): Frame {
  const result = extractFrame(encodeFrame(Command.B0, Buffer.from(payload)));
  if (result.kind !== 'frame') throw new Error(`not a frame: ${result.kind}`);
  return result.frame;
}

/** Response payload: type | sub | length | page | chunk bytes | counter */
function response(subCommand: number, chunkBytes: number[], counter = 0x01): number[] {
  const content = [0xff, ...chunkBytes, counter];
  return [B0MessageType.Response, subCommand, content.length, ...content];
}

describe('decodeB0 requests', () => {
  it('splits a batched 0x35 request into one message per settings ID', () => {
    const payload = buildB0Request(0x35, { paramSize: 2, data: [0x0f, 0x00, 0x15, 0x01] }, 5);
    const messages = toMessageList(decodeB0(b0Frame(payload)));

    expect(messages.length).toBe(2);
    expect(messages.map((m) => m.settingsId)).toEqual([0x000f, 0x0115]);
    expect(messages.map((m) => m.setting?.label)).toEqual(['DOWNLOAD_CODE', 'POWERLINK_SW_VERSION']);
    expect(messages[0].decoded).toEqual({ id: '0f 00', setting: 'DOWNLOAD_CODE' });
    expect(messages[0].setting?.variant).toBe('value');
    expect(messages[1].data).toEqual(Buffer.from([0x15, 0x01]));
    expect(messages[1].counter).toBe(5);
  });

  it('marks 0x42 request IDs as table lookups', () => {
    const payload = buildB0Request(0x42, { paramSize: 2, data: [0xa4, 0x00] }, 1);
    const message = decodeB0(b0Frame(payload));
    expect(Array.isArray(message)).toBe(false);
    expect(toMessageList(message)[0].setting).toEqual({
      id: 0x00a4,
      label: 'EMAIL_ADDRESSES',
      known: true,
      variant: 'table',
    });
  });

  it('decodes a parameterless request', () => {
    const message = decodeB0(b0Frame([0x01, 0x24, 0x01, 0x01]));
    expect(message).toEqual({
      kind: 'b0',
      messageType: B0MessageType.Request,
      subCommand: 0x24,
      name: 'PanelStatus',
      known: true,
      counter: 1,
      data: Buffer.alloc(0),
      decoded: null,
    });
  });

  it('names the sub-commands in a request list', () => {
    const payload = buildB0Request(0x17, { paramSize: 1, data: [0x24, 0x58] }, 3);
    const [message] = toMessageList(decodeB0(b0Frame(payload)));
    expect(message.decoded).toEqual([
      { command: '24', name: 'PanelStatus' },
      { command: '58', name: 'UNKNOWN' },
    ]);
  });
});

describe('decodeB0 responses', () => {
  it('decodes a single 0x35 setting', () => {
    // chunk: type 01, index ff, length 7, id 15 01, data type 6 (string), "PL12"
    const chunk = [0x01, 0xff, 0x07, 0x15, 0x01, 0x06, 0x50, 0x4c, 0x31, 0x32];
    const message = decodeB0(b0Frame(response(0x35, chunk, 0x2a)));
    expect(Array.isArray(message)).toBe(false);
    const [setting] = toMessageList(message);
    expect(setting.settingsId).toBe(0x0115);
    expect(setting.setting?.label).toBe('POWERLINK_SW_VERSION');
    expect(setting.decoded).toBe('PL12');
    expect(setting.page).toBe(0xff);
    expect(setting.counter).toBe(0x2a);
  });

  it('decodes a 0x42 table through its formatter', () => {
    const header = [
      0xa4, 0x00, // id
      0x02, 0x00, // max entries
      0x40, 0x00, // 64-bit entries
      0x00, 0x00,
      0x00, // data type
      0x00,
      0x00, 0x00, // start entry
      0x02, 0x00, // entries
    ];
    const values = [...Buffer.from('a@b.c\0\0\0x@y.z\0\0\0', 'ascii')];
    const data = [...header, ...values];
    const chunk = [0x01, 0xff, data.length, ...data];
    const [message] = toMessageList(decodeB0(b0Frame(response(0x42, chunk))));
    expect(message.setting?.variant).toBe('table');
    expect(message.decoded).toEqual(['a@b.c', 'x@y.z']);
    expect(message.data).toEqual(Buffer.from(values));
  });

  it('decodes panel status', () => {
    const data = [
      0, 0, 0, 0, 0, 0, 0, 0,
      30, 15, 10, 20, 6, 24, // ss mm hh DD MM YY
      0, 0,
      1, // partitions
      0x05, 0x01, 0x00, 0x00, // Armed, Ready
    ];
    const message = decodeB0(b0Frame(response(0x24, [0x08, 0xff, data.length, ...data])));
    expect(toMessageList(message)[0].decoded).toEqual({
      datetime: '2024-06-20 10:15:30',
      partitions: 1,
      states: {
        '1': {
          State: 'Armed',
          Ready: true,
          'Alarm in Memory': false,
          Trouble: false,
          Bypass: false,
          'Last 10 Secs': false,
          'Zone Event': false,
          'Status Changed': false,
          'Alarm Event': false,
        },
      },
    });
  });

  it('reports short panel status data as invalid', () => {
    const message = decodeB0(b0Frame(response(0x24, [0x08, 0xff, 0x02, 0x00, 0x00])));
    expect(toMessageList(message)[0].decoded).toBe('Invalid Data');
  });

  it('decodes zone temperatures, skipping absent sensors', () => {
    const message = decodeB0(b0Frame(response(0x3d, [0x08, 0x03, 0x03, 0x79, 0xff, 0x51])));
    expect(toMessageList(message)[0].decoded).toEqual({ Zones: { '1': 20, '3': 0 } });
  });

  it('decodes event log entries', () => {
    // 86400 s after the epoch, zone device (3) index 4, event 1
    const entry = [0x80, 0x51, 0x01, 0x00, 0x03, 0x04, 0x00, 0x01, 0x00, 0x07];
    const message = decodeB0(b0Frame(response(0x2a, [0x50, 0x11, 0x0a, ...entry])));
    expect(toMessageList(message)[0].decoded).toEqual([
      { dt: '1970-01-02 00:00:00', device: 'Zones', zone: 5, event: 'Interior Alarm' },
    ]);
  });

  it('reads the headerless 0x0F chunk', () => {
    const message = decodeB0(b0Frame(response(0x0f, [0x08, 0x00, 0xaa, 0xbb])));
    expect(toMessageList(message)[0].decoded).toEqual(['aa', 'bb']);
  });

  it('decodes unknown sub-commands generically', () => {
    const message = decodeB0(b0Frame(response(0x7e, [0x08, 0x03, 0x02, 0xaa, 0xbb])));
    const [decoded] = toMessageList(message);
    expect(decoded.known).toBe(false);
    expect(decoded.name).toBe('UNKNOWN');
    expect(decoded.decoded).toEqual([
      { type: 'Bytes', idx: 3, idxName: 'Zones', len: 2, data: ['aa', 'bb'] },
    ]);
    expect(decoded.data).toEqual(Buffer.from([0x08, 0x03, 0x02, 0xaa, 0xbb]));
  });
});

describe('decodeB0 errors', () => {
  it('refuses frames that are not B0', () => {
    const result = extractFrame(encodeFrame(0xa5, Buffer.from([0x00])));
    if (result.kind !== 'frame') throw new Error('expected a frame');
    expect(() => decodeB0(result.frame)).toThrow('Not a B0 frame (command a5)');
  });

  it('refuses a truncated payload', () => {
    const frame: Frame = {
      command: Command.B0,
      payload: Buffer.from([0x03]),
      checksum: 0,
      raw: Buffer.alloc(0),
    };
    expect(() => decodeB0(frame)).toThrow('B0 payload too short (1 bytes)');
  });
});
