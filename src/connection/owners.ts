import { createConnection } from 'node:net';
import { AckManager } from '../protocol/ack.js';
import type { Frame } from '../protocol/framing.js';
import type { PanelSession } from './session.js';
import { ConnectionState, type RunMode, type SocketLike } from './types.js';

/** Decides what a session does with the panel's bytes. */
export interface SessionOwner {
  readonly mode: RunMode;
  open(session: PanelSession): void;
  panelData(session: PanelSession, data: Buffer): void;
}

/**
 * This process is the server: every valid panel frame is acknowledged
 * locally and decoded. There is no upstream leg.
 *
 * Sessions emit 'ack' (ackBytes, frame) for each ACK written.
 */
export class StandaloneOwner implements SessionOwner {
  readonly mode = 'standalone';

  open(session: PanelSession): void {
    const acks = new AckManager((data) => {
      session.write(data);
    });
    acks.on('ack', (ack: Buffer, frame: Frame) => session.emit('ack', ack, frame));
    acks.attach(session.fromPanel);
    session.setState(ConnectionState.Connected);
  }

  panelData(session: PanelSession, data: Buffer): void {
    session.fromPanel.push(data);
  }
}

export type UpstreamConnector = (port: number, host: string) => SocketLike;

/**
 * Transparent relay to the real monitoring server. Bytes are forwarded
 * before a copy is decoded; the real server sends the ACKs.
 */
export class ProxyOwner implements SessionOwner {
  readonly mode = 'proxy';

  constructor(
    private readonly host: string,
    private readonly port: number,
    private readonly connect: UpstreamConnector = (port, host) => createConnection(port, host),
  ) {}

  open(session: PanelSession): void {
    const upstream = this.connect(this.port, this.host);
    session.attachUpstream(upstream);
    upstream.on('data', (data: Buffer) => {
      const copy = Buffer.from(data);
      session.write(data);
      session.toPanel.push(copy);
    });
  }

  panelData(session: PanelSession, data: Buffer): void {
    const copy = Buffer.from(data);
    session.writeUpstream(data);
    session.fromPanel.push(copy);
  }
}
