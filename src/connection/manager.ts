import { EventEmitter } from 'node:events';
import { createServer, type AddressInfo, type Server } from 'node:net';
import type { AppConfig } from '../config.js';
import type { Direction } from '../dispatcher.js';
import { ProxyOwner, StandaloneOwner, type SessionOwner, type UpstreamConnector } from './owners.js';
import { DEFAULT_WATCHDOG_MS, PanelSession } from './session.js';
import type { Frame } from '../protocol/framing.js';
import type { ConnectionState, RunMode, SocketLike } from './types.js';

export interface ConnectionManagerOptions {
  host?: string;
  port: number;
  owner: SessionOwner;
  watchdogMs?: number;
}

const DISPATCHER_EVENTS = ['frame', 'decoded', 'invalid', 'page', 'anomaly', 'decodeError'] as const;

/** Pick the session owner for the configured mode. */
export function createSessionOwner(config: AppConfig, connect?: UpstreamConnector): SessionOwner {
  if (config.mode === 'proxy') {
    if (!config.upstream) {
      throw new Error('Proxy mode needs an upstream server');
    }
    return new ProxyOwner(config.upstream.host, config.upstream.port, connect);
  }
  return new StandaloneOwner();
}

/**
 * Accepts panel connections and runs one PanelSession per socket.
 *
 * Emits (session first on every event):
 *   'session'     (session)
 *   'state'       (session, state, previous)
 *   'closed'      (session, reason)
 *   'ack'         (session, ackBytes, frame)
 *   'frame' | 'decoded' | 'invalid' | 'page' | 'anomaly' | 'decodeError'
 *                 (session, direction, ...dispatcher args)
 *   'listening'   (AddressInfo)
 *   'listenerError' (Error)
 */
export class ConnectionManager extends EventEmitter {
  private server?: Server;
  private readonly active = new Map<string, PanelSession>();
  private nextAnonymous = 1;

  constructor(private readonly options: ConnectionManagerOptions) {
    super();
  }

  static fromConfig(config: AppConfig, connect?: UpstreamConnector): ConnectionManager {
    return new ConnectionManager({
      host: config.listen.host,
      port: config.listen.port,
      owner: createSessionOwner(config, connect),
      watchdogMs: config.watchdogSeconds * 1000,
    });
  }

  get mode(): RunMode {
    return this.options.owner.mode;
  }

  get sessions(): PanelSession[] {
    return [...this.active.values()];
  }

  getSession(id: string): PanelSession | undefined {
    return this.active.get(id);
  }

  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => {
        this.handleConnection(socket);
      });
      server.once('error', reject);
      server.listen(this.options.port, this.options.host, () => {
        server.off('error', reject);
        server.on('error', (err) => this.emit('listenerError', err));
        this.server = server;
        const address = server.address();
        if (!address || typeof address === 'string') {
          reject(new Error('Listener has no TCP address'));
          return;
        }
        this.emit('listening', address);
        resolve(address);
      });
    });
  }

  handleConnection(socket: SocketLike): PanelSession {
    const session = new PanelSession(
      this.sessionId(socket),
      socket,
      this.options.watchdogMs ?? DEFAULT_WATCHDOG_MS,
    );
    this.active.set(session.id, session);

    session.on('state', (state: ConnectionState, previous: ConnectionState) =>
      this.emit('state', session, state, previous),
    );
    session.on('ack', (ack: Buffer, frame: Frame) => this.emit('ack', session, ack, frame));
    session.on('panelData', (data: Buffer) => this.options.owner.panelData(session, data));
    session.once('closed', (reason: string) => {
      this.active.delete(session.id);
      this.emit('closed', session, reason);
    });
    this.forward(session, session.fromPanel.direction, session.fromPanel);
    this.forward(session, session.toPanel.direction, session.toPanel);

    this.emit('session', session);
    this.options.owner.open(session);
    return session;
  }

  /**
   * Write bytes to a panel: the named session, or the oldest open one.
   * Returns the id written to, or undefined when no panel is connected.
   */
  send(data: Buffer, sessionId?: string): string | undefined {
    const session = sessionId ? this.active.get(sessionId) : this.sessions[0];
    if (!session || !session.write(data)) return undefined;
    return session.id;
  }

  async close(): Promise<void> {
    for (const session of this.sessions) {
      session.close('shutting down');
    }
    const server = this.server;
    this.server = undefined;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private forward(session: PanelSession, direction: Direction, source: EventEmitter): void {
    for (const event of DISPATCHER_EVENTS) {
      source.on(event, (...args: unknown[]) => this.emit(event, session, direction, ...args));
    }
  }

  private sessionId(socket: SocketLike): string {
    const base = socket.remotePort !== undefined ? `P${socket.remotePort}` : `P-${this.nextAnonymous++}`;
    if (!this.active.has(base)) return base;
    let suffix = 2;
    while (this.active.has(`${base}-${suffix}`)) suffix++;
    return `${base}-${suffix}`;
  }
}
