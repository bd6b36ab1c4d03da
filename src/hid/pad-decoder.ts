/**
 * Pads report decoder.
 *
 * Layout: [tag][L0][H0][L1][H1]..., one (low, high) pair per pad reading:
 *   rawPad = H >> 4, magnitude = ((H & 0x0F) << 8) | L
 * A trailing unpaired byte is ignored.
 */

import {
  NUM_PADS,
  PAD_FULL_SCALE,
  PAD_THRESHOLD,
  RAW_PAD_TO_LOGICAL,
} from "../devices/mikro-mk1.js";
import type { DeviceState } from "./state.js";
import type { DeviceEventSink } from "./types.js";

/**
 * Decode one pads report into state.
 *
 * `padValues` is updated for every pair. Events fire only on threshold
 * crossings: pressed with magnitude / 1024 (unclamped), released with 0.
 */
export function decodePadReport(
  state: DeviceState,
  report: Uint8Array,
  sink: DeviceEventSink,
): void {
  for (let i = 1; i + 1 < report.length; i += 2) {
    const low = report[i];
    const high = report[i + 1];
    const rawPad = (high & 0xf0) >> 4;
    if (rawPad >= NUM_PADS) continue;

    const pad = RAW_PAD_TO_LOGICAL[rawPad];
    const magnitude = ((high & 0x0f) << 8) | low;
    state.padValues[pad] = magnitude;

    if (magnitude > PAD_THRESHOLD) {
      if (!state.padDown[pad]) {
        state.padDown[pad] = true;
        sink.onPadChanged(pad, magnitude / PAD_FULL_SCALE, false);
      }
    } else if (state.padDown[pad]) {
      state.padDown[pad] = false;
      sink.onPadChanged(pad, 0, false);
    }
  }
}
