import { toHex, type Frame } from './framing.js';

export enum StandardCommand {
  Ack = 0x02,
  Hello = 0x06,
  AccessDenied = 0x08,
  EpromReadWriteMode = 0x09,
  ExitReadWriteMode = 0x0f,
  EpromInfo = 0x3c,
  WriteConfig = 0x3d,
  ReadConfig = 0x3e,
  ConfigValue = 0x3f,
  ArmAlarm = 0xa1,
  RequestStatus = 0xa2,
  StatusUpdate = 0xa5,
  ZoneType = 0xa6,
  SetDateTime = 0xab,
}

export interface StandardMessage {
  kind: 'standard';
  command: number;
  name: string;
  data: Buffer;
  hex: string;
}

export function standardCommandName(command: number): string {
  return StandardCommand[command] ?? 'UNKNOWN';
}

export function decodeStandardMessage(frame: Frame): StandardMessage {
  return {
    kind: 'standard',
    command: frame.command,
    name: standardCommandName(frame.command),
    data: frame.payload,
    hex: toHex(frame.payload),
  };
}
