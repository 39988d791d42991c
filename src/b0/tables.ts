import { readFileSync } from 'node:fs';
import { hexByte } from '../protocol/framing.js';
import { B0SubCommand, type SettingInfo } from './types.js';

// Tables are read once at load and never mutated afterwards.

function readData<T>(file: string, guard: (value: unknown) => value is T): T {
  const url = new URL(`../../data/${file}`, import.meta.url);
  const value: unknown = JSON.parse(readFileSync(url, 'utf-8'));
  if (!guard(value)) {
    throw new Error(`Malformed lookup table: ${file}`);
  }
  return value;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((item) => typeof item === 'string')
  );
}

const SETTINGS = new Map<number, string>(
  Object.entries(readData('settings.json', isStringRecord)).map(
    ([id, label]) => [Number.parseInt(id, 16), label] as const,
  ),
);

export const EVENTS: readonly string[] = Object.freeze(readData('events.json', isStringList));
export const SYSTEM_STATUS: readonly string[] = Object.freeze(
  readData('system-status.json', isStringList),
);

export const ZONE_TYPES: readonly string[] = [
  'Non-Alarm',
  'Emergency',
  'Flood',
  'Gas',
  'Delay 1',
  'Delay 2',
  'Interior-Follow',
  'Perimeter',
  'Perimeter-Follow',
  '24 Hours Silent',
  '24 Hours Audible',
  'Fire',
  'Interior',
  'Home Delay',
  'Temperature',
  'Outdoor',
  '16',
];

/** Settings IDs travel as (low, high) byte pairs. */
export function settingsIdFromBytes(low: number, high: number): number {
  return low | (high << 8);
}

export function settingsIdToBytes(id: number): [number, number] {
  return [id & 0xff, (id >> 8) & 0xff];
}

export function formatSettingsId(id: number): string {
  const [low, high] = settingsIdToBytes(id);
  return `${hexByte(low)} ${hexByte(high)}`;
}

/**
 * Resolve a settings ID for 0x35 or 0x42. Both sub-commands share one ID
 * space; the variant records which of the two asked.
 */
export function lookupSetting(id: number, subCommand: number): SettingInfo {
  const label = SETTINGS.get(id);
  return {
    id,
    label: label ?? 'UNKNOWN',
    known: label !== undefined,
    variant: subCommand === B0SubCommand.SettingsList ? 'table' : 'value',
  };
}

export function isSettingsCommand(subCommand: number): boolean {
  return subCommand === B0SubCommand.Settings || subCommand === B0SubCommand.SettingsList;
}

export function subCommandName(subCommand: number): string {
  return B0SubCommand[subCommand] ?? 'UNKNOWN';
}

export function eventName(code: number): string {
  return EVENTS[code] ?? `UNKNOWN-${code}`;
}

export function systemStatusName(code: number): string {
  return SYSTEM_STATUS[code] ?? `UNKNOWN-${code}`;
}
