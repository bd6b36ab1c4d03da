/**
 * Native Instruments Maschine Mikro MK1 device profile.
 *
 * Buttons report (tag 0x01, 6 bytes): four bitfield bytes mapped as
 * bank 4..1, then one byte whose low nibble is the encoder position.
 * Pads report (tag 0x20): (low, high) byte pairs, pad index in the high nibble.
 *
 * Both tables were worked out by pressing every control and watching the
 * reports, not from vendor documentation.
 */

import type { ButtonId, ButtonMapping, DeviceProfile } from "./types.js";

export const NUM_PADS = 16;
export const NUM_BUTTON_BITS = 32;

/** Pad magnitudes above this count as pressed (exclusive). */
export const PAD_THRESHOLD = 200;
/** Divisor that turns a 12-bit pad magnitude into the emitted value. */
export const PAD_FULL_SCALE = 1024;

export const BUTTONS_REPORT_TAG = 0x01;
export const BUTTONS_REPORT_LENGTH = 6;
export const PADS_REPORT_TAG = 0x20;

const b = (id: ButtonId, label: string): ButtonMapping => ({ id, label });
const UNKNOWN = b("unknown", "Unknown");

export const BUTTON_BY_BANK_BIT: readonly (readonly ButtonMapping[])[] = [
  // bank 0: not present on this hardware
  [UNKNOWN, UNKNOWN, UNKNOWN, UNKNOWN, UNKNOWN, UNKNOWN, UNKNOWN, UNKNOWN],
  // bank 1: payload byte 3
  [
    b("mute", "Mute"),
    b("solo", "Solo"),
    b("select", "Select"),
    b("duplicate", "Duplicate"),
    b("view", "View"),
    b("padMode", "Pad Mode"),
    b("pattern", "Pattern"),
    b("scene", "Scene"),
  ],
  // bank 2: payload byte 2
  [
    b("enter", "Enter"),
    b("navigateRight", "Right Nav"),
    b("navigateLeft", "Left Nav"),
    b("nav", "Nav"),
    b("main", "Main"),
    b("f3", "F3"),
    b("f2", "F2"),
    b("f1", "F1"),
  ],
  // bank 3: payload byte 1
  [
    UNKNOWN,
    UNKNOWN,
    UNKNOWN,
    b("mainEncoder", "Encoder Press"),
    b("noteRepeat", "Note Repeat"),
    b("group", "Group"),
    b("sampling", "Sampling"),
    b("browse", "Browse"),
  ],
  // bank 4: payload byte 0
  [
    b("shift", "Shift"),
    b("erase", "Erase"),
    b("rec", "Record"),
    b("play", "Play"),
    b("grid", "Grid"),
    b("transportRight", "Right Transport"),
    b("transportLeft", "Left Transport"),
    b("restart", "Restart"),
  ],
];

/**
 * Raw pad index → logical pad index (0..15, physical order 1..16).
 * Playing pads 1..16 in order reports 12,13,14,15,8,9,10,11,4,5,6,7,0,1,2,3.
 */
export const RAW_PAD_TO_LOGICAL: readonly number[] = [
  12, 13, 14, 15, 8, 9, 10, 11, 4, 5, 6, 7, 0, 1, 2, 3,
];

/** Resolve a bank/bit coordinate. Out-of-range coordinates resolve to unknown. */
export function lookupButton(bank: number, bit: number): ButtonMapping {
  return BUTTON_BY_BANK_BIT[bank]?.[bit] ?? UNKNOWN;
}

export const mikroMk1Profile: DeviceProfile = {
  name: "maschine-mikro-mk1",
  label: "Maschine Mikro MK1",
  transport: "hid",
  vendorId: 0x17cc,
  productId: 0x1110,
  capabilities: {
    graphicDisplays: 0,
    textDisplays: 0,
    ledMatrices: 0,
    ledArrays: 0,
  },
  buttons: BUTTON_BY_BANK_BIT,
  rawPadToLogical: RAW_PAD_TO_LOGICAL,
};
