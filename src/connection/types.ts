import type { EventEmitter } from 'node:events';

/** The part of `net.Socket` a session uses. */
export interface SocketLike extends EventEmitter {
  readonly remoteAddress?: string;
  readonly remotePort?: number;
  write(data: Buffer): boolean;
  destroy(error?: Error): void;
}

export enum ConnectionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Connected = 'connected',
  Relaying = 'relaying',
  Closing = 'closing',
}

export type RunMode = 'standalone' | 'proxy';
