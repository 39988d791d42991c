import type { EventEmitter } from 'node:events';
import type { AddressInfo } from 'node:net';
import { formatSettingsId } from '../b0/tables.js';
import { B0MessageType } from '../b0/types.js';
import type { PagingAnomaly } from '../b0/paging.js';
import type { MessageLog } from '../config.js';
import type { PanelSession } from '../connection/session.js';
import type { ConnectionState } from '../connection/types.js';
import type { DecodedMessage, Direction, PageEvent } from '../dispatcher.js';
import type { Injection } from '../injector/server.js';
import { hexByte, toHex, type Frame } from '../protocol/framing.js';

export type LineWriter = (line: string) => void;

/** One-line rendering of a decoded message. */
export function formatMessage(message: DecodedMessage): string {
  if (message.kind === 'standard') {
    const data = message.hex ? ` ${message.hex}` : '';
    return `${hexByte(message.command)} ${message.name}${data}`;
  }

  const parts = [
    `B0 ${hexByte(message.subCommand)} ${message.name}`,
    B0MessageType[message.messageType] ?? String(message.messageType),
  ];
  if (message.setting) {
    parts.push(`${formatSettingsId(message.setting.id)} ${message.setting.label}`);
  }
  if (message.pages !== undefined) parts.push(`${message.pages} pages`);
  return `${parts.join(' | ')}: ${JSON.stringify(message.decoded)}`;
}

function arrow(direction: Direction): string {
  return direction === 'panel' ? '<-' : '->';
}

/**
 * Prints manager and injector events to the console. `summary` shows
 * decoded messages and session changes; `verbose` adds raw frames, ACKs,
 * dropped bytes, pages and state transitions.
 */
export class ConsoleReporter {
  constructor(
    private readonly level: MessageLog,
    private readonly write: LineWriter = (line) => console.log(line),
    private readonly writeError: LineWriter = (line) => console.error(line),
  ) {}

  get verbose(): boolean {
    return this.level === 'verbose';
  }

  attachManager(manager: EventEmitter): void {
    manager.on('listening', (address: AddressInfo) => {
      this.write(`Listening for panels on ${address.address}:${address.port}`);
    });
    manager.on('listenerError', (err: Error) => {
      this.writeError(`Listener error: ${err.message}`);
    });
    manager.on('session', (session: PanelSession) => {
      this.write(`[${session.id}] panel connected from ${session.remote}`);
    });
    manager.on('closed', (session: PanelSession, reason: string) => {
      this.write(`[${session.id}] closed: ${reason}`);
    });
    manager.on('decoded', (session: PanelSession, direction: Direction, message: DecodedMessage) => {
      this.write(`[${session.id}] ${arrow(direction)} ${formatMessage(message)}`);
    });
    manager.on(
      'decodeError',
      (session: PanelSession, direction: Direction, err: Error, frame: Frame) => {
        this.writeError(
          `[${session.id}] ${arrow(direction)} decode failed (${err.message}): ${toHex(frame.raw)}`,
        );
      },
    );
    manager.on('anomaly', (session: PanelSession, direction: Direction, anomaly: PagingAnomaly) => {
      this.writeError(
        `[${session.id}] ${arrow(direction)} paging B0 ${hexByte(anomaly.subCommand)}: ${anomaly.reason}`,
      );
    });

    if (!this.verbose) return;

    manager.on('state', (session: PanelSession, state: ConnectionState, previous: ConnectionState) => {
      this.write(`[${session.id}] state ${previous} -> ${state}`);
    });
    manager.on('frame', (session: PanelSession, direction: Direction, frame: Frame) => {
      this.write(`[${session.id}] ${arrow(direction)} frame ${toHex(frame.raw)}`);
    });
    manager.on('ack', (session: PanelSession, ack: Buffer) => {
      this.write(`[${session.id}] -> ack ${toHex(ack)}`);
    });
    manager.on(
      'invalid',
      (session: PanelSession, direction: Direction, reason: string, bytes: Buffer) => {
        this.write(`[${session.id}] ${arrow(direction)} dropped ${bytes.length} bytes (${reason}): ${toHex(bytes)}`);
      },
    );
    manager.on('page', (session: PanelSession, direction: Direction, page: PageEvent) => {
      const of = page.pageCount !== undefined ? `/${page.pageCount}` : '';
      this.write(
        `[${session.id}] ${arrow(direction)} B0 ${hexByte(page.subCommand)} page ${page.pageIndex + 1}${of} (${page.size} bytes)`,
      );
    });
  }

  attachInjector(injector: EventEmitter): void {
    injector.on('injected', (injection: Injection) => {
      this.write(`[${injection.sessionId}] -> injected ${toHex(injection.frame)}`);
    });
    injector.on('rejected', (line: string, reason: string) => {
      this.writeError(`Injector rejected "${line}": ${reason}`);
    });
    injector.on('clientError', (err: Error) => {
      this.writeError(`Injector client error: ${err.message}`);
    });
    if (this.verbose) {
      injector.on('client', (remote: string) => {
        this.write(`Injector client connected from ${remote}`);
      });
    }
  }
}
