/**
 * Device profile types for HID controller integration.
 */

/** Logical button identities. `"unknown"` marks unassigned bank/bit slots. */
export type ButtonId =
  | "mute"
  | "solo"
  | "select"
  | "duplicate"
  | "view"
  | "padMode"
  | "pattern"
  | "scene"
  | "enter"
  | "navigateRight"
  | "navigateLeft"
  | "nav"
  | "main"
  | "f1"
  | "f2"
  | "f3"
  | "mainEncoder"
  | "noteRepeat"
  | "group"
  | "sampling"
  | "browse"
  | "shift"
  | "erase"
  | "rec"
  | "play"
  | "grid"
  | "transportRight"
  | "transportLeft"
  | "restart"
  | "unknown";

export interface ButtonMapping {
  id: ButtonId;
  /** Human-readable name: "Pad Mode", "Right Transport" */
  label: string;
}

/** Output surfaces the device exposes. All zero for input-only hardware. */
export interface DeviceCapabilities {
  graphicDisplays: number;
  textDisplays: number;
  ledMatrices: number;
  ledArrays: number;
}

export interface DeviceProfile {
  /** Device identifier: "maschine-mikro-mk1" */
  name: string;
  /** Human-readable name: "Maschine Mikro MK1" */
  label: string;
  transport: "hid";
  vendorId: number;
  productId: number;
  capabilities: DeviceCapabilities;
  /** Button table indexed [bank][bit] */
  buttons: readonly (readonly ButtonMapping[])[];
  /** Raw pad index (as reported) → logical pad index */
  rawPadToLogical: readonly number[];
}
