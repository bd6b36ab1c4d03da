/**
 * Decide which decoder handles an incoming report, by length and tag byte.
 */

import {
  BUTTONS_REPORT_LENGTH,
  BUTTONS_REPORT_TAG,
  PADS_REPORT_TAG,
} from "../devices/mikro-mk1.js";

export type ReportKind = "empty" | "buttons" | "pads" | "unknown";

/** Untagged pad reports from some firmware revisions are at least this long. */
const MIN_UNTAGGED_PADS_LENGTH = 33;

/**
 * Classify a raw report. First match wins:
 *   1. no bytes                          → "empty"
 *   2. 6 bytes, tag 0x01                 → "buttons"
 *   3. ≥ 2 bytes, tag 0x20               → "pads"
 *   4. ≥ 33 bytes, odd length (no tag)   → "pads"
 *   5. anything else                     → "unknown"
 */
export function classifyReport(report: Uint8Array): ReportKind {
  if (report.length === 0) return "empty";

  if (report.length === BUTTONS_REPORT_LENGTH && report[0] === BUTTONS_REPORT_TAG) {
    return "buttons";
  }

  if (report.length >= 2 && report[0] === PADS_REPORT_TAG) {
    return "pads";
  }

  // Pair decoding still starts at offset 1; byte 0 is skipped whatever it holds.
  if (report.length >= MIN_UNTAGGED_PADS_LENGTH && report.length % 2 === 1) {
    return "pads";
  }

  return "unknown";
}
