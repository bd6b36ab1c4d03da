/**
 * Seams between the decoder and its collaborators: the transport it reads
 * reports from, and the host it reports events to.
 */

import type { ButtonId } from "../devices/types.js";

/**
 * Outcome of one transport read. `ok: true` with an empty report means the
 * read worked but nothing was pending.
 */
export type ReadResult = { ok: true; report: Uint8Array } | { ok: false };

export interface ReportReader {
  read(): ReadResult;
}

/** Receives decoded events synchronously, in emission order. */
export interface DeviceEventSink {
  onButtonChanged(id: ButtonId, pressed: boolean, shiftHeld: boolean): void;
  onEncoderChanged(index: number, increased: boolean, shiftHeld: boolean): void;
  /** `value` is magnitude / 1024 and is not clamped to 1. */
  onPadChanged(index: number, value: number, aftertouch: boolean): void;
}

/** Diagnostic line sink. */
export type TraceFn = (line: string) => void;
