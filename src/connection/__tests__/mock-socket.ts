import { EventEmitter } from 'node:events';

/** In-process stand-in for a connected net.Socket. */
export class MockSocket extends EventEmitter {
  public writes: Buffer[] = [];
  public destroyed = false;

  constructor(
    readonly remotePort?: number,
    readonly remoteAddress = '192.0.2.10',
  ) {
    super();
  }

  public write(data: Buffer): boolean {
    this.writes.push(Buffer.from(data));
    return true;
  }

  public destroy(error?: Error): void {
    if (this.destroyed) return;
    this.destroyed = true;
    if (error) this.emit('error', error);
    this.emit('close', !!error);
  }

  /** Simulate bytes arriving from the peer. */
  public receive(data: Buffer | string): void {
    this.emit('data', Buffer.from(data));
  }

  public written(): Buffer {
    return Buffer.concat(this.writes);
  }
}
