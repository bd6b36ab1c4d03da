/**
 * Device profile registry.
 */

import type { DeviceProfile } from "./types.js";
import { mikroMk1Profile } from "./mikro-mk1.js";

const devices = new Map<string, DeviceProfile>([
  [mikroMk1Profile.name, mikroMk1Profile],
  ["mikro-mk1", mikroMk1Profile], // alias
  ["mikro", mikroMk1Profile], // alias
]);

/**
 * Look up a device profile by name.
 * Throws if the device name is not recognized.
 */
export function getDevice(name: string): DeviceProfile {
  const profile = devices.get(name.toLowerCase());
  if (!profile) {
    const available = listDevices().map((d) => d.name);
    throw new Error(
      `Unknown device "${name}". Available devices: ${available.join(", ")}`,
    );
  }
  return profile;
}

/** Find the profile registered for a USB vendor/product pair. */
export function findDeviceByUsbId(
  vendorId: number,
  productId: number,
): DeviceProfile | undefined {
  return listDevices().find(
    (d) => d.vendorId === vendorId && d.productId === productId,
  );
}

/** Unique registered profiles, aliases collapsed. */
export function listDevices(): DeviceProfile[] {
  return [...new Set(devices.values())];
}
