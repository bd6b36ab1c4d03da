/**
 * ReportReader over a fixed list of reads, for offline decoding and tests.
 */

import type { ReadResult, ReportReader } from "./types.js";

export class ReplayReader implements ReportReader {
  private readonly queue: ReadResult[];

  constructor(reads: Iterable<ReadResult | Uint8Array> = []) {
    this.queue = [];
    for (const r of reads) this.push(r);
  }

  /** Queue a report, or a raw read outcome such as `{ ok: false }`. */
  push(read: ReadResult | Uint8Array): void {
    this.queue.push(read instanceof Uint8Array ? { ok: true, report: read } : read);
  }

  get pending(): number {
    return this.queue.length;
  }

  /** Next queued read; an empty successful read once drained. */
  read(): ReadResult {
    return this.queue.shift() ?? { ok: true, report: new Uint8Array(0) };
  }
}
