export enum B0MessageType {
  Add = 0,
  Request = 1,
  PagedResponse = 2,
  Response = 3,
  Remove = 4,
  Unknown = 5,
}

export enum B0SubCommand {
  Zone01 = 0x01,
  Zone02 = 0x02,
  Zone04 = 0x04,
  Zone05 = 0x05,
  InvalidCommand = 0x06,
  Zone07 = 0x07,
  Unknown0F = 0x0f,
  Zones11 = 0x11,
  Zones12 = 0x12,
  Zones13 = 0x13,
  Zones14 = 0x14,
  Zones15 = 0x15,
  Zones16 = 0x16,
  RequestList = 0x17,
  SensorDetection = 0x18,
  Bypasses = 0x19,
  Enrolled = 0x1d,
  DeviceTypes = 0x1f,
  AssignedNames = 0x21,
  SystemCapabilities = 0x22,
  PanelStatus = 0x24,
  Camera27 = 0x27,
  StandardEventLog = 0x2a,
  Unknown2B = 0x2b,
  AssignedZoneTypes = 0x2d,
  Settings = 0x35,
  LegacyEventLog = 0x36,
  Event37 = 0x37,
  Zone3A = 0x3a,
  ZoneTemperatures = 0x3d,
  Zone40 = 0x40,
  SettingsList = 0x42,
  Zone43 = 0x43,
  Zone49 = 0x49,
  ZoneLastEvent = 0x4b,
  Zone4E = 0x4e,
  Zone4F = 0x4f,
  Zone50 = 0x50,
  AskMe = 0x51,
  DeviceCounts = 0x52,
  Camera53 = 0x53,
  GsmStatus = 0x59,
  PanelSoftwareVersion = 0x64,
  PanelEpromAndSoftwareVersion = 0x69,
  KeepAlive = 0x6a,
  Log75 = 0x75,
  ZoneBrightness = 0x77,
}

/** Chunk item width in bits. */
export enum ChunkDataType {
  Unknown = 0,
  Bits = 1,
  Nibble = 4,
  Bytes = 8,
  Word16 = 16,
  Word24 = 24,
  Word32 = 32,
  Word40 = 40,
  Word48 = 48,
  Word56 = 56,
  Word64 = 64,
  Word72 = 72,
  Word80 = 80,
  Word88 = 88,
  Word96 = 96,
  Word104 = 104,
  Word112 = 112,
}

/** Value encoding of a settings (0x35/0x42) entry. */
export enum SettingDataType {
  ZeroPaddedString = 0,
  DirectMapString = 1,
  FfPaddedString = 2,
  DoubleLeInt = 3,
  Integer = 4,
  String = 6,
  SpacePaddedString = 8,
  SpacePaddedStringList = 10,
}

export enum IndexName {
  Repeaters = 0,
  X10 = 1,
  Sirens = 2,
  Zones = 3,
  Keypads = 4,
  Keyfobs = 5,
  UserCodes = 6,
  CamerasA = 7,
  Unk8 = 8,
  Powerlink = 9,
  Tags = 10,
  CamerasB = 11,
  Panel = 12,
  Unk13 = 13,
  Partitions = 14,
  Unk15 = 15,
  Unk16 = 16,
  Events = 17,
  Unk18 = 18,
  Unk19 = 19,
  Unk20 = 20,
  NotApplicable = 255,
}

export enum ZoneStatus {
  NotAZone = 0,
  Open = 1,
  Closed = 2,
  Motion = 3,
  CheckIn = 4,
}

export enum ZoneBrightness {
  Darkness = 0,
  PartialLight = 1,
  Daylight = 2,
}

export type DecodedValue =
  | string
  | number
  | boolean
  | null
  | DecodedValue[]
  | { [key: string]: DecodedValue };

export interface B0DataChunk {
  dataType: number;
  index: number;
  /** Declared length; data may be shorter when the frame was truncated. */
  length: number;
  data: Buffer;
}

export interface B0RequestParams {
  paramSize: number;
  dataType: number;
  data: Buffer;
}

export interface B0Structure {
  messageType: B0MessageType;
  subCommand: number;
  length: number;
  /** Content bytes declared by the length byte. */
  content: Buffer;
  page?: number;
  chunks: B0DataChunk[];
  params?: B0RequestParams;
  downloadCode?: Buffer;
  counter?: number;
}

export interface SettingInfo {
  id: number;
  label: string;
  known: boolean;
  /** 0x35 reads a single value, 0x42 reads an entry table for the same ID. */
  variant: 'value' | 'table';
}

export interface B0SubMessage {
  kind: 'b0';
  messageType: B0MessageType;
  subCommand: number;
  name: string;
  known: boolean;
  settingsId?: number;
  setting?: SettingInfo;
  page?: number;
  pages?: number;
  data: Buffer;
  decoded: DecodedValue;
  counter?: number;
}

export function lookupName(names: Record<number, string>, value: number): string {
  return names[value] ?? `UNKNOWN-${value}`;
}
