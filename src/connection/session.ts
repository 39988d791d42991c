import { EventEmitter } from 'node:events';
import { PagingReassembler } from '../b0/paging.js';
import { FrameDispatcher } from '../dispatcher.js';
import { ConnectionState, type SocketLike } from './types.js';

export const DEFAULT_WATCHDOG_MS = 120_000;

/**
 * One panel connection, plus the upstream leg in proxy mode.
 *
 * Owns the paging state and one dispatcher per direction. Either leg
 * closing, a socket error or the inactivity watchdog closes the whole
 * session; nothing it holds outlives it.
 *
 * Emits:
 *   'state'     (state, previous)
 *   'panelData' (Buffer)  bytes received from the panel
 *   'closed'    (reason)
 */
export class PanelSession extends EventEmitter {
  readonly reassembler = new PagingReassembler();
  /** Frames sent by the panel. */
  readonly fromPanel: FrameDispatcher;
  /** Frames sent to the panel (upstream server or injector). */
  readonly toPanel: FrameDispatcher;
  readonly openedAt = new Date();

  private upstream?: SocketLike;
  private current = ConnectionState.Connecting;
  private watchdog?: ReturnType<typeof setTimeout>;
  private bytesIn = 0;
  private bytesOut = 0;

  constructor(
    readonly id: string,
    readonly panel: SocketLike,
    private readonly watchdogMs = DEFAULT_WATCHDOG_MS,
  ) {
    super();
    this.fromPanel = new FrameDispatcher(id, this.reassembler, 'panel');
    this.toPanel = new FrameDispatcher(id, this.reassembler, 'server');

    panel.on('data', (data: Buffer) => {
      this.bytesIn += data.length;
      this.armWatchdog();
      this.emit('panelData', Buffer.from(data));
    });
    panel.on('close', () => this.close('panel closed'));
    panel.on('error', (err: Error) => this.close(`panel error: ${err.message}`));
    this.armWatchdog();
  }

  get state(): ConnectionState {
    return this.current;
  }

  get remote(): string {
    return `${this.panel.remoteAddress ?? 'unknown'}:${this.panel.remotePort ?? '?'}`;
  }

  get hasUpstream(): boolean {
    return this.upstream !== undefined;
  }

  get stats(): { bytesIn: number; bytesOut: number } {
    return { bytesIn: this.bytesIn, bytesOut: this.bytesOut };
  }

  get isOpen(): boolean {
    return this.current !== ConnectionState.Closing && this.current !== ConnectionState.Disconnected;
  }

  setState(state: ConnectionState): void {
    if (state === this.current) return;
    const previous = this.current;
    this.current = state;
    this.emit('state', state, previous);
  }

  /** Write to the panel. Returns false once the session is closed. */
  write(data: Buffer): boolean {
    if (!this.isOpen) return false;
    this.bytesOut += data.length;
    this.panel.write(data);
    return true;
  }

  writeUpstream(data: Buffer): boolean {
    if (!this.isOpen || !this.upstream) return false;
    this.upstream.write(data);
    return true;
  }

  /** Pair the session with its upstream socket; state follows the socket. */
  attachUpstream(socket: SocketLike): void {
    this.upstream = socket;
    socket.once('connect', () => {
      if (!this.isOpen) return;
      this.setState(ConnectionState.Connected);
      this.setState(ConnectionState.Relaying);
    });
    socket.on('close', () => this.close('upstream closed'));
    socket.on('error', (err: Error) => this.close(`upstream error: ${err.message}`));
  }

  close(reason: string): void {
    if (!this.isOpen) return;
    this.setState(ConnectionState.Closing);
    this.clearWatchdog();
    this.fromPanel.reset();
    this.toPanel.reset();
    this.reassembler.clear();
    this.panel.destroy();
    this.upstream?.destroy();
    this.setState(ConnectionState.Disconnected);
    this.emit('closed', reason);
  }

  private armWatchdog(): void {
    this.clearWatchdog();
    if (this.watchdogMs <= 0) return;
    this.watchdog = setTimeout(() => {
      this.close(`no data from panel for ${Math.round(this.watchdogMs / 1000)}s`);
    }, this.watchdogMs);
    this.watchdog.unref();
  }

  private clearWatchdog(): void {
    if (this.watchdog) {
      clearTimeout(this.watchdog);
      this.watchdog = undefined;
    }
  }
}
