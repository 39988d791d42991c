import { asciiString, readUInt16LE, splitBuffer } from '../util/bytes.js';
import { ZONE_TYPES } from './tables.js';
import { SettingDataType, type DecodedValue } from './types.js';

/**
 * Value decoders for 0x35 (single setting) and 0x42 (setting table)
 * responses.
 */

export type SettingFormatter = (data: Buffer, items: Buffer[]) => DecodedValue;

/** Collapse empty results to null and single-element lists to their element. */
export function collapse(values: DecodedValue[]): DecodedValue {
  if (values.length === 0) return null;
  if (values.length === 1) return values[0];
  return values;
}

export function decodeSettingValue(
  dataType: number,
  data: Buffer,
  stringSize = 16,
): DecodedValue {
  switch (dataType) {
    case SettingDataType.ZeroPaddedString:
      return asciiString(data).replace(/\0+$/, '');
    case SettingDataType.DirectMapString:
      return data.toString('hex');
    case SettingDataType.FfPaddedString:
      return Buffer.from(data.filter((byte) => byte !== 0xff)).toString('hex');
    case SettingDataType.DoubleLeInt:
      if (data.length > 2) {
        return splitBuffer(data, 2).map((word) => readUInt16LE(word));
      }
      return readUInt16LE(data);
    case SettingDataType.Integer:
      if (data.length === 0) return null;
      return data.length === 1 ? data[0] : [...data];
    case SettingDataType.String:
      return asciiString(data);
    case SettingDataType.SpacePaddedString:
      return asciiString(data).replace(/ +$/, '');
    case SettingDataType.SpacePaddedStringList: {
      const names = splitBuffer(data, stringSize)
        .map((entry) => asciiString(entry).replace(/\0/g, '').replace(/ +$/, ''))
        .filter((name) => name !== '');
      return names.length === 1 ? names[0] : names;
    }
    default:
      return data.toString('hex').replace(/(..)(?!$)/g, '$1 ');
  }
}

// --- 0x35 formatters ---

const CAPABILITY_NAMES = [
  'REPEATERS',
  'X10',
  'SIRENS',
  'ZONES',
  'KEYPADS',
  'KEYFOBS',
  'USERCODES',
  'CAMERASA',
  'UNK8',
  'POWERLINK',
  'TAGS',
  'CAMERASB',
  'PANEL',
  'UNK13',
  'EVENTS',
  'PARTITIONS',
  'UNK16',
  'UNK17',
  'UKN18',
  'UNK19',
];

function capabilities(data: Buffer): DecodedValue {
  const result: Record<string, DecodedValue> = {};
  splitBuffer(data, 2).forEach((word, i) => {
    if (word.length < 2) return;
    result[CAPABILITY_NAMES[i] ?? `UNKNOWN-${i}`] = readUInt16LE(word);
  });
  return result;
}

function userCodes(data: Buffer): DecodedValue {
  const codes: Record<string, DecodedValue> = {};
  splitBuffer(data, 2).forEach((code, i) => {
    const hex = code.toString('hex');
    if (hex.length === 4 && hex !== '0000') codes[String(i + 1)] = hex;
  });
  return codes;
}

function zoneTypes(data: Buffer): DecodedValue {
  return [...data].map((type) => ZONE_TYPES[type] ?? 'UNKNOWN');
}

function zoneNameIndexes(data: Buffer): DecodedValue {
  return [...data];
}

function newlineList(data: Buffer): DecodedValue {
  return asciiString(data)
    .split('\n')
    .filter((name) => name !== '')
    .map((name) => name.replace(/ +$/, ''));
}

/** IP, subnet and gateway as decimal digits packed into hex nibbles. */
function dhcp(data: Buffer): DecodedValue {
  const hex = data.toString('hex');
  const address = (part: string): string => (part.match(/.{1,3}/g) ?? []).join('.');
  return {
    IP: address(hex.slice(0, 12)),
    Subnet: address(hex.slice(12, 24)),
    Gateway: address(hex.slice(24, 36)),
  };
}

export const SETTING_FORMATTERS = new Map<number, SettingFormatter>([
  [0x0007, capabilities],
  [0x0008, userCodes],
  [0x0031, zoneTypes],
  [0x0032, zoneNameIndexes],
  [0x0045, newlineList],
  [0x0046, newlineList],
  [0x0154, dhcp],
]);

// --- 0x42 formatters (entries typed as integers that are really strings) ---

function zeroPaddedStrings(_data: Buffer, items: Buffer[]): DecodedValue {
  return collapse(items.map((entry) => asciiString(entry).replace(/\0+$/, '')));
}

function ffTerminatedStrings(_data: Buffer, items: Buffer[]): DecodedValue {
  return collapse(
    items.map((entry) => Buffer.from(entry.filter((byte) => byte !== 0xff)).toString('hex')),
  );
}

export const TABLE_FORMATTERS = new Map<number, SettingFormatter>([
  [0x0080, zeroPaddedStrings],
  [0x0081, zeroPaddedStrings],
  [0x0082, zeroPaddedStrings],
  [0x00a4, zeroPaddedStrings],
  [0x00a5, ffTerminatedStrings],
]);
