import { EventEmitter } from 'node:events';

/**
 * Reassembles B0 responses split across several frames.
 *
 * One accumulator per (session, sub-command). Fragments are stored by index
 * and joined in index order once 0..pageCount-1 are all present. The page
 * count may arrive with the last fragment only.
 *
 * Emits:
 *   'anomaly' (PagingAnomaly) for restarts, out-of-range and duplicate pages
 */

export interface PagingAnomaly {
  sessionKey: string;
  subCommand: number;
  pageIndex: number;
  reason: string;
}

interface Accumulator {
  sessionKey: string;
  subCommand: number;
  pageCount?: number;
  fragments: Map<number, Buffer>;
}

function accumulatorKey(sessionKey: string, subCommand: number): string {
  return `${sessionKey}:${subCommand}`;
}

export class PagingReassembler extends EventEmitter {
  private accumulators = new Map<string, Accumulator>();

  /** Number of exchanges still waiting for pages. */
  get pending(): number {
    return this.accumulators.size;
  }

  feed(
    sessionKey: string,
    subCommand: number,
    pageIndex: number,
    pageCount: number | undefined,
    data: Buffer,
  ): Buffer | undefined {
    const key = accumulatorKey(sessionKey, subCommand);
    let acc = this.accumulators.get(key);

    if (pageCount === 1 && pageIndex === 0) {
      if (acc) {
        this.accumulators.delete(key);
        this.anomaly(sessionKey, subCommand, pageIndex, 'single page replaced an unfinished exchange');
      }
      return Buffer.from(data);
    }

    if (acc && pageIndex === 0 && acc.fragments.has(0)) {
      this.anomaly(sessionKey, subCommand, pageIndex, 'first page restarted an unfinished exchange');
      acc = undefined;
    }
    if (!acc) {
      acc = { sessionKey, subCommand, fragments: new Map() };
      this.accumulators.set(key, acc);
    }

    if (pageCount !== undefined) {
      if (acc.pageCount !== undefined && acc.pageCount !== pageCount) {
        this.anomaly(
          sessionKey,
          subCommand,
          pageIndex,
          `page count changed from ${acc.pageCount} to ${pageCount}`,
        );
      }
      acc.pageCount = pageCount;
      for (const index of [...acc.fragments.keys()]) {
        if (index >= pageCount) {
          acc.fragments.delete(index);
          this.anomaly(sessionKey, subCommand, index, `page ${index} dropped, beyond count ${pageCount}`);
        }
      }
    }

    if (acc.pageCount !== undefined && pageIndex >= acc.pageCount) {
      this.anomaly(
        sessionKey,
        subCommand,
        pageIndex,
        `page ${pageIndex} dropped, beyond count ${acc.pageCount}`,
      );
      return undefined;
    }

    if (acc.fragments.has(pageIndex)) {
      this.anomaly(sessionKey, subCommand, pageIndex, `duplicate page ${pageIndex} overwritten`);
    }
    acc.fragments.set(pageIndex, Buffer.from(data));

    return this.complete(key, acc);
  }

  /** Index following the highest fragment held, 0 when nothing is held. */
  nextIndex(sessionKey: string, subCommand: number): number {
    const acc = this.accumulators.get(accumulatorKey(sessionKey, subCommand));
    if (!acc || acc.fragments.size === 0) return 0;
    return Math.max(...acc.fragments.keys()) + 1;
  }

  has(sessionKey: string, subCommand: number): boolean {
    return this.accumulators.has(accumulatorKey(sessionKey, subCommand));
  }

  /** Drop every accumulator owned by a session; returns how many were dropped. */
  discardSession(sessionKey: string): number {
    let dropped = 0;
    for (const [key, acc] of this.accumulators) {
      if (acc.sessionKey === sessionKey) {
        this.accumulators.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  clear(): void {
    this.accumulators.clear();
  }

  private complete(key: string, acc: Accumulator): Buffer | undefined {
    if (acc.pageCount === undefined) return undefined;
    const parts: Buffer[] = [];
    for (let i = 0; i < acc.pageCount; i++) {
      const fragment = acc.fragments.get(i);
      if (!fragment) return undefined;
      parts.push(fragment);
    }
    this.accumulators.delete(key);
    return Buffer.concat(parts);
  }

  private anomaly(sessionKey: string, subCommand: number, pageIndex: number, reason: string): void {
    const anomaly: PagingAnomaly = { sessionKey, subCommand, pageIndex, reason };
    this.emit('anomaly', anomaly);
  }
}
