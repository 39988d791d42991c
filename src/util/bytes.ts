/** Split a buffer into fixed-size items; the last item may be short. */
export function splitBuffer(data: Buffer, size: number): Buffer[] {
  const items: Buffer[] = [];
  const step = Math.max(1, size);
  for (let offset = 0; offset < data.length; offset += step) {
    items.push(Buffer.from(data.subarray(offset, offset + step)));
  }
  return items;
}

/** ASCII text with non-ASCII bytes dropped. */
export function asciiString(data: Buffer): string {
  return Buffer.from(data.filter((byte) => byte < 0x80)).toString('ascii');
}

export function readUInt16LE(data: Buffer, offset = 0): number {
  return (data[offset] ?? 0) | ((data[offset + 1] ?? 0) << 8);
}

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatDateTime(
  year: number,
  month: number,
  day: number,
  hours: number,
  minutes: number,
  seconds: number,
): string {
  return `${year}-${pad2(month)}-${pad2(day)} ${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}

/** 4-byte little-endian unix timestamp, rendered in UTC. */
export function decodeTimestamp(data: Buffer): string {
  const seconds = data.length >= 4 ? data.readUInt32LE(0) : 0;
  const date = new Date(seconds * 1000);
  return formatDateTime(
    date.getUTCFullYear(),
    date.getUTCMonth() + 1,
    date.getUTCDate(),
    date.getUTCHours(),
    date.getUTCMinutes(),
    date.getUTCSeconds(),
  );
}
