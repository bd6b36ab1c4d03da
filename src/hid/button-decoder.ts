/**
 * Buttons + encoder report decoder.
 *
 * Layout: [0x01][byte0][byte1][byte2][byte3][encoder]
 *   - byte0..byte3: 32 button bits, byte-major, LSB first (byte0 = bank 4)
 *   - encoder: low nibble is the rotary position 0x0..0xF
 */

import { lookupButton, NUM_BUTTON_BITS } from "../devices/mikro-mk1.js";
import { formatHexBytes } from "./hex.js";
import type { ButtonPolarity, DeviceState } from "./state.js";
import type { DeviceEventSink, TraceFn } from "./types.js";

export interface ButtonDecodeOptions {
  /** Receives one line per changed bit, unmapped bits included. */
  trace?: TraceFn;
}

const MIN_PAYLOAD_BYTES = 5;
const ENCODER_INDEX = 0;
/** Shift is bank 4, bit 0: the first bit of the frame. */
const SHIFT_BIT = 0;

/**
 * Decode one buttons report into state, emitting encoder and button events.
 * Reports with fewer than 5 payload bytes are ignored.
 */
export function decodeButtonReport(
  state: DeviceState,
  report: Uint8Array,
  sink: DeviceEventSink,
  options: ButtonDecodeOptions = {},
): void {
  const payloadBytes = report.length - 1;
  if (payloadBytes < MIN_PAYLOAD_BYTES) return;

  if (state.buttonPolarity === "unknown") {
    state.buttonPolarity = detectPolarity(report.subarray(1, payloadBytes));
  }

  const activeLow = state.buttonPolarity === "active-low";
  const newDown: boolean[] = [];
  for (let bitPos = 0; bitPos < NUM_BUTTON_BITS; bitPos++) {
    const byte = report[1 + Math.floor(bitPos / 8)];
    const bitIsOne = ((byte >> (bitPos % 8)) & 0x01) !== 0;
    newDown.push(activeLow ? !bitIsOne : bitIsOne);
  }

  const shiftHeld = newDown[SHIFT_BIT];

  const current = report[payloadBytes] & 0x0f;
  if (!state.encoderCalibrated) {
    state.encoderCalibrated = true;
    state.encoderValue = current;
  } else if (current !== state.encoderValue) {
    sink.onEncoderChanged(
      ENCODER_INDEX,
      encoderIncreased(state.encoderValue, current),
      shiftHeld,
    );
    state.encoderValue = current;
  }

  for (let bitPos = 0; bitPos < NUM_BUTTON_BITS; bitPos++) {
    const pressed = newDown[bitPos];
    if (pressed === state.buttonDown[bitPos]) continue;

    const bank = 4 - Math.floor(bitPos / 8);
    const bit = bitPos % 8;
    const mapping = lookupButton(bank, bit);

    options.trace?.(
      `button: bank=${bank} bit=${bit} pressed=${pressed ? 1 : 0} ` +
        `name=${mapping.label} bytes=${formatHexBytes(report)}`,
    );

    if (mapping.id !== "unknown") {
      sink.onButtonChanged(mapping.id, pressed, shiftHeld);
    }
  }

  state.buttonDown = newDown;
}

/**
 * Guess polarity from the first report, assuming most buttons are released:
 * all 0xFF → active-low, all 0x00 → active-high, otherwise whichever
 * reading has the majority of bits set means "released".
 *
 * @param bytes - payload bytes, encoder byte excluded
 */
export function detectPolarity(bytes: Uint8Array): Exclude<ButtonPolarity, "unknown"> {
  let allZero = true;
  let allFF = true;
  let ones = 0;
  for (const byte of bytes) {
    allZero = allZero && byte === 0x00;
    allFF = allFF && byte === 0xff;
    ones += popcount(byte);
  }

  if (allFF) return "active-low";
  if (allZero) return "active-high";
  const totalBits = bytes.length * 8;
  return ones > Math.floor(totalBits / 2) ? "active-low" : "active-high";
}

/**
 * Direction of an encoder step on the 4-bit wheel.
 *
 * 15 → 0 counts as an increase; 0 → 15 never does. Any other move is
 * judged by plain numeric comparison, however far it jumps.
 */
export function encoderIncreased(previous: number, current: number): boolean {
  const forward = previous < current || (previous === 0x0f && current === 0x00);
  const reverseWrap = previous === 0x00 && current === 0x0f;
  return forward && !reverseWrap;
}

function popcount(byte: number): number {
  let n = 0;
  for (let v = byte; v !== 0; v >>= 1) n += v & 1;
  return n;
}
