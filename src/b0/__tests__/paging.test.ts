import { describe, it, expect, vi } from 'vitest';
import { PagingReassembler } from '../paging.js';

const page = (...bytes: number[]) => Buffer.from(bytes);

describe('PagingReassembler', () => {
  it('returns a single page at once', () => {
    const reassembler = new PagingReassembler();
    expect(reassembler.feed('P1', 0x24, 0, 1, page(1, 2))).toEqual(page(1, 2));
    expect(reassembler.pending).toBe(0);
  });

  it('joins pages in index order whatever the arrival order', () => {
    const reassembler = new PagingReassembler();
    expect(reassembler.feed('P1', 0x35, 2, 3, page(0xcc))).toBeUndefined();
    expect(reassembler.feed('P1', 0x35, 0, 3, page(0xaa))).toBeUndefined();
    expect(reassembler.feed('P1', 0x35, 1, 3, page(0xbb))).toEqual(page(0xaa, 0xbb, 0xcc));
    expect(reassembler.has('P1', 0x35)).toBe(false);
  });

  it('holds pages while an index is missing', () => {
    const reassembler = new PagingReassembler();
    reassembler.feed('P1', 0x35, 0, 3, page(0xaa));
    expect(reassembler.feed('P1', 0x35, 2, 3, page(0xcc))).toBeUndefined();
    expect(reassembler.has('P1', 0x35)).toBe(true);
  });

  it('completes once the count arrives with the last page', () => {
    const reassembler = new PagingReassembler();
    reassembler.feed('P1', 0x42, 0, undefined, page(1));
    reassembler.feed('P1', 0x42, 1, undefined, page(2));
    expect(reassembler.nextIndex('P1', 0x42)).toBe(2);
    expect(reassembler.feed('P1', 0x42, 2, 3, page(3))).toEqual(page(1, 2, 3));
  });

  it('keeps sub-commands and sessions apart', () => {
    const reassembler = new PagingReassembler();
    reassembler.feed('P1', 0x35, 0, 2, page(1));
    reassembler.feed('P2', 0x35, 0, 2, page(9));
    reassembler.feed('P1', 0x42, 0, 2, page(5));
    expect(reassembler.feed('P2', 0x35, 1, 2, page(8))).toEqual(page(9, 8));
    expect(reassembler.feed('P1', 0x35, 1, 2, page(2))).toEqual(page(1, 2));
    expect(reassembler.has('P1', 0x42)).toBe(true);
  });

  it('restarts when a second first page arrives', () => {
    const reassembler = new PagingReassembler();
    const anomaly = vi.fn();
    reassembler.on('anomaly', anomaly);
    reassembler.feed('P1', 0x35, 0, 2, page(1));
    reassembler.feed('P1', 0x35, 0, 2, page(7));
    expect(reassembler.feed('P1', 0x35, 1, 2, page(8))).toEqual(page(7, 8));
    expect(anomaly).toHaveBeenCalledWith({
      sessionKey: 'P1',
      subCommand: 0x35,
      pageIndex: 0,
      reason: 'first page restarted an unfinished exchange',
    });
  });

  it('drops an index beyond the count and reports it', () => {
    const reassembler = new PagingReassembler();
    const anomaly = vi.fn();
    reassembler.on('anomaly', anomaly);
    reassembler.feed('P1', 0x35, 0, 2, page(1));
    expect(reassembler.feed('P1', 0x35, 5, 2, page(6))).toBeUndefined();
    expect(anomaly.mock.calls[0][0].reason).toBe('page 5 dropped, beyond count 2');
    expect(reassembler.feed('P1', 0x35, 1, 2, page(2))).toEqual(page(1, 2));
  });

  it('overwrites a duplicate index and reports it', () => {
    const reassembler = new PagingReassembler();
    const anomaly = vi.fn();
    reassembler.on('anomaly', anomaly);
    reassembler.feed('P1', 0x35, 1, 3, page(0xb0));
    reassembler.feed('P1', 0x35, 1, 3, page(0xb1));
    reassembler.feed('P1', 0x35, 2, 3, page(0xc0));
    expect(reassembler.feed('P1', 0x35, 0, 3, page(0xa0))).toEqual(page(0xa0, 0xb1, 0xc0));
    expect(anomaly.mock.calls[0][0].reason).toBe('duplicate page 1 overwritten');
  });

  it('discards only the named session', () => {
    const reassembler = new PagingReassembler();
    reassembler.feed('P1', 0x35, 0, 2, page(1));
    reassembler.feed('P1', 0x42, 0, 2, page(1));
    reassembler.feed('P2', 0x35, 0, 2, page(1));
    expect(reassembler.discardSession('P1')).toBe(2);
    expect(reassembler.pending).toBe(1);
    expect(reassembler.nextIndex('P1', 0x35)).toBe(0);
    reassembler.clear();
    expect(reassembler.pending).toBe(0);
  });
});
