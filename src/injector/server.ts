import { EventEmitter } from 'node:events';
import { createServer, type AddressInfo, type Server } from 'node:net';
import { toHex } from '../protocol/framing.js';
import type { SocketLike } from '../connection/types.js';
import { INJECTOR_HELP, MessageCounter, parseInjectorLine } from './commands.js';

export const DEFAULT_INJECTOR_PORT = 5002;

/** Where injected frames go; ConnectionManager satisfies this. */
export interface InjectionTarget {
  send(data: Buffer, sessionId?: string): string | undefined;
  readonly sessions: readonly { id: string; remote: string; state: string }[];
}

export interface InjectorOptions {
  host?: string;
  port?: number;
}

export interface Injection {
  line: string;
  frame: Buffer;
  sessionId: string;
  source: 'shortcode' | 'hex';
}

/**
 * Plain-text command port. One command per line; each line gets one
 * `OK <hex>` or `ERR <reason>` reply. Bad lines never close the client.
 *
 * Injected frames are written straight to the panel socket with no
 * ordering against live traffic.
 *
 * Emits:
 *   'injected' (Injection)
 *   'rejected' (line, reason)
 *   'client'   (remote)
 *   'clientError' (Error)
 */
export class InjectorServer extends EventEmitter {
  private server?: Server;
  private readonly counter = new MessageCounter();
  private readonly clients = new Set<SocketLike>();

  constructor(
    private readonly target: InjectionTarget,
    private readonly options: InjectorOptions = {},
  ) {
    super();
  }

  get clientCount(): number {
    return this.clients.size;
  }

  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = createServer((socket) => {
        this.handleClient(socket);
      });
      server.once('error', reject);
      server.listen(this.options.port ?? DEFAULT_INJECTOR_PORT, this.options.host ?? '127.0.0.1', () => {
        server.off('error', reject);
        this.server = server;
        const address = server.address();
        if (!address || typeof address === 'string') {
          reject(new Error('Injector has no TCP address'));
          return;
        }
        resolve(address);
      });
    });
  }

  handleClient(socket: SocketLike): void {
    this.clients.add(socket);
    this.emit('client', `${socket.remoteAddress ?? 'unknown'}:${socket.remotePort ?? '?'}`);

    let pending = '';
    socket.on('data', (data: Buffer) => {
      pending += data.toString('utf-8');
      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        const line = pending.slice(0, newline).replace(/\r$/, '');
        pending = pending.slice(newline + 1);
        if (line.trim() !== '') {
          socket.write(Buffer.from(`${this.handleLine(line)}\n`));
        }
        newline = pending.indexOf('\n');
      }
    });
    socket.on('close', () => {
      this.clients.delete(socket);
    });
    socket.on('error', (err: Error) => {
      this.clients.delete(socket);
      this.emit('clientError', err);
    });
  }

  /** Run one command line and return the reply text. */
  handleLine(line: string): string {
    try {
      const command = parseInjectorLine(line, this.counter);
      switch (command.kind) {
        case 'help':
          return INJECTOR_HELP.join('\n');
        case 'show': {
          const sessions = this.target.sessions;
          if (sessions.length === 0) return 'no panel connected';
          return sessions.map((s) => `${s.id} ${s.remote} ${s.state}`).join('\n');
        }
        case 'frame': {
          const sessionId = this.target.send(command.frame);
          if (sessionId === undefined) {
            return this.reject(line, 'no panel connected');
          }
          const injection: Injection = { line, frame: command.frame, sessionId, source: command.source };
          this.emit('injected', injection);
          return `OK ${toHex(command.frame)}`;
        }
      }
    } catch (err) {
      return this.reject(line, err instanceof Error ? err.message : String(err));
    }
  }

  async close(): Promise<void> {
    for (const client of this.clients) client.destroy();
    this.clients.clear();
    const server = this.server;
    this.server = undefined;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private reject(line: string, reason: string): string {
    this.emit('rejected', line, reason);
    return `ERR ${reason}`;
  }
}
