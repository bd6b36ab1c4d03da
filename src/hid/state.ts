/**
 * Per-session decoder state, shared by the button and pad decoders.
 */

import { NUM_BUTTON_BITS, NUM_PADS } from "../devices/mikro-mk1.js";

/**
 * Whether a set bit in the buttons report means pressed ("active-high")
 * or released ("active-low"). Resolved once from the first buttons report.
 */
export type ButtonPolarity = "unknown" | "active-high" | "active-low";

export interface DeviceState {
  /** Last magnitude per logical pad (0..4095) */
  padValues: number[];
  /** Pads currently past the threshold */
  padDown: boolean[];
  /** Buttons currently pressed, indexed by bit position 0..31 */
  buttonDown: boolean[];
  buttonPolarity: ButtonPolarity;
  encoderCalibrated: boolean;
  /** Last encoder position (0..15) */
  encoderValue: number;
}

export function createDeviceState(): DeviceState {
  return {
    padValues: new Array<number>(NUM_PADS).fill(0),
    padDown: new Array<boolean>(NUM_PADS).fill(false),
    buttonDown: new Array<boolean>(NUM_BUTTON_BITS).fill(false),
    buttonPolarity: "unknown",
    encoderCalibrated: false,
    encoderValue: 0,
  };
}

/** Reset every field in place. Holders of the same object see the reset. */
export function resetDeviceState(state: DeviceState): void {
  const fresh = createDeviceState();
  state.padValues = fresh.padValues;
  state.padDown = fresh.padDown;
  state.buttonDown = fresh.buttonDown;
  state.buttonPolarity = fresh.buttonPolarity;
  state.encoderCalibrated = fresh.encoderCalibrated;
  state.encoderValue = fresh.encoderValue;
}
