import { hexByte, toHex } from '../protocol/framing.js';
import { decodeTimestamp, formatDateTime, readUInt16LE, splitBuffer } from '../util/bytes.js';
import { chunkItems } from './structure.js';
import { eventName, subCommandName, systemStatusName } from './tables.js';
import {
  B0SubCommand,
  ChunkDataType,
  IndexName,
  ZoneBrightness,
  ZoneStatus,
  lookupName,
  type B0DataChunk,
  type B0Structure,
  type DecodedValue,
} from './types.js';

export type B0DataDecoder = (chunks: B0DataChunk[], structure: B0Structure) => DecodedValue;

const INVALID_DATA = 'Invalid Data';

export function genericDecoder(chunks: B0DataChunk[]): DecodedValue {
  return chunks.map((chunk) => ({
    type: lookupName(ChunkDataType, chunk.dataType),
    idx: chunk.index,
    idxName: lookupName(IndexName, chunk.index),
    len: chunk.length,
    data: chunkItems(chunk).map((item) => toHex(item)),
  }));
}

function itemList(chunks: B0DataChunk[]): DecodedValue {
  const [chunk] = chunks;
  if (!chunk) return INVALID_DATA;
  return chunkItems(chunk).map((item) => toHex(item));
}

/** Sub-commands named in a request-list response. */
function requestList(chunks: B0DataChunk[]): DecodedValue {
  const [chunk] = chunks;
  if (!chunk) return [];
  return [...chunk.data].map((code) => ({ command: hexByte(code), name: subCommandName(code) }));
}

function capabilities(chunks: B0DataChunk[]): DecodedValue {
  const [chunk] = chunks;
  if (!chunk) return INVALID_DATA;
  const result: Record<string, DecodedValue> = {};
  chunkItems(chunk).forEach((item, i) => {
    result[lookupName(IndexName, i)] = readUInt16LE(item);
  });
  return result;
}

const STATUS_FLAGS = [
  'Ready',
  'Alarm in Memory',
  'Trouble',
  'Bypass',
  'Last 10 Secs',
  'Zone Event',
  'Status Changed',
  'Alarm Event',
];

/**
 * Panel status.
 * Bytes 8-13 are the panel clock (ss mm hh DD MM YY), byte 16 the
 * partition count, then 4 bytes per partition: state, status flags, 2 unknown.
 */
function panelStatus(chunks: B0DataChunk[]): DecodedValue {
  const [chunk] = chunks;
  if (!chunk || chunk.data.length < 17) return INVALID_DATA;
  const d = chunk.data;

  const states: Record<string, DecodedValue> = {};
  splitBuffer(d.subarray(17), 4).forEach((partition, i) => {
    if (partition.length < 2) return;
    const status: Record<string, DecodedValue> = { State: systemStatusName(partition[0]) };
    STATUS_FLAGS.forEach((flag, bit) => {
      status[flag] = (partition[1] & (1 << bit)) !== 0;
    });
    states[String(i + 1)] = status;
  });

  return {
    datetime: formatDateTime(d[13] + 2000, d[12], d[11], d[10], d[9], d[8]),
    partitions: d[16],
    states,
  };
}

/**
 * Event log entries, 10 bytes each: timestamp(4), device type, zone, 0,
 * event code, 0, sequence.
 */
function eventLog(chunks: B0DataChunk[]): DecodedValue {
  const [chunk] = chunks;
  if (!chunk) return INVALID_DATA;
  return chunkItems(chunk)
    .filter((entry) => entry.length >= 8)
    .map((entry) => {
      const deviceType = entry[4];
      const zone = deviceType === IndexName.Zones ? entry[5] + 1 : entry[5];
      return {
        dt: decodeTimestamp(entry.subarray(0, 4)),
        device: lookupName(IndexName, deviceType),
        zone,
        event: eventName(entry[7]),
      };
    });
}

/** One byte per zone: temp = value / 2 - 40.5, FF means no sensor. */
function zoneTemperatures(chunks: B0DataChunk[]): DecodedValue {
  const [chunk] = chunks;
  if (!chunk) return INVALID_DATA;
  const temps: Record<string, DecodedValue> = {};
  chunk.data.forEach((value, zone) => {
    if (value !== 0xff) temps[String(zone + 1)] = value / 2 - 40.5;
  });
  return { [lookupName(IndexName, chunk.index)]: temps };
}

/** 5 bytes per zone: timestamp(4) + zone status code. */
function zoneLastEvent(chunks: B0DataChunk[]): DecodedValue {
  const events: Record<string, DecodedValue> = {};
  for (const chunk of chunks) {
    chunkItems(chunk).forEach((entry, i) => {
      events[String(i + 1)] = {
        datetime: decodeTimestamp(entry.subarray(0, 4)),
        code: lookupName(ZoneStatus, entry[4] ?? 0),
      };
    });
  }
  return events;
}

function deviceCounts(chunks: B0DataChunk[]): DecodedValue {
  const [chunk] = chunks;
  if (!chunk || chunk.data.length < 6) return INVALID_DATA;
  const d = chunk.data;
  return {
    Unknown: d[0],
    Sensors: d[1],
    Keypads: d[2],
    Keyfobs: d[3],
    Sirens: d[4],
    PGMs: d[5],
  };
}

function softwareVersion(chunks: B0DataChunk[]): DecodedValue {
  const [chunk] = chunks;
  if (!chunk) return INVALID_DATA;
  return chunk.data.toString('ascii');
}

function log75(chunks: B0DataChunk[]): DecodedValue {
  return chunks.flatMap((chunk) =>
    chunkItems(chunk).map((entry) => ({
      dt: decodeTimestamp(entry.subarray(0, 4)),
      rest: toHex(entry.subarray(4)),
    })),
  );
}

/** One byte per zone: 0 = 2 lux, 1 = 7 lux, 2 = 15 lux, FF = none. */
function zoneBrightness(chunks: B0DataChunk[]): DecodedValue {
  const [chunk] = chunks;
  if (!chunk) return INVALID_DATA;
  const zones: Record<string, DecodedValue> = {};
  chunk.data.forEach((value, zone) => {
    if (value !== 0xff) zones[String(zone + 1)] = lookupName(ZoneBrightness, value);
  });
  return { [lookupName(IndexName, chunk.index)]: zones };
}

/**
 * Response decoders by sub-command. Settings (0x35, 0x42) are decoded per
 * settings ID in decoder.ts and have no entry here; codes missing from both
 * are reported as raw bytes.
 */
export const DATA_DECODERS = new Map<number, B0DataDecoder>([
  [B0SubCommand.Zone01, genericDecoder],
  [B0SubCommand.Unknown0F, itemList],
  [B0SubCommand.Zones11, genericDecoder],
  [B0SubCommand.RequestList, requestList],
  [B0SubCommand.SensorDetection, genericDecoder],
  [B0SubCommand.Bypasses, genericDecoder],
  [B0SubCommand.Enrolled, genericDecoder],
  [B0SubCommand.DeviceTypes, genericDecoder],
  [B0SubCommand.SystemCapabilities, capabilities],
  [B0SubCommand.PanelStatus, panelStatus],
  [B0SubCommand.StandardEventLog, eventLog],
  [B0SubCommand.AssignedZoneTypes, genericDecoder],
  [B0SubCommand.LegacyEventLog, eventLog],
  [B0SubCommand.ZoneTemperatures, zoneTemperatures],
  [B0SubCommand.ZoneLastEvent, zoneLastEvent],
  [B0SubCommand.AskMe, itemList],
  [B0SubCommand.DeviceCounts, deviceCounts],
  [B0SubCommand.PanelSoftwareVersion, softwareVersion],
  [B0SubCommand.Log75, log75],
  [B0SubCommand.ZoneBrightness, zoneBrightness],
]);
