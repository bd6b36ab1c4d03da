/**
 * describe_device MCP tool: button map, pad layout and USB identity.
 */

import { getDevice } from "../devices/index.js";
import type { DeviceProfile } from "../devices/types.js";

/**
 * Execute the describe_device tool.
 *
 * @returns Human-readable device description.
 */
export function executeDescribeDevice(name: string): string {
  return formatProfile(getDevice(name));
}

function usbId(n: number): string {
  return "0x" + n.toString(16).toUpperCase().padStart(4, "0");
}

export function formatProfile(profile: DeviceProfile): string {
  const { capabilities: caps } = profile;
  const lines: string[] = [
    `# ${profile.label} (${profile.name})`,
    `Transport: ${profile.transport.toUpperCase()}, vendor ${usbId(profile.vendorId)}, product ${usbId(profile.productId)}`,
    `Displays: ${caps.graphicDisplays} graphic, ${caps.textDisplays} text; ` +
      `LEDs: ${caps.ledMatrices} matrices, ${caps.ledArrays} arrays`,
    "",
    "## Buttons (bank/bit)",
  ];

  profile.buttons.forEach((bits, bank) => {
    const mapped = bits
      .map((m, bit) => ({ ...m, bit }))
      .filter((m) => m.id !== "unknown");
    if (mapped.length === 0) return;
    lines.push(`Bank ${bank}:`);
    for (const m of mapped) {
      lines.push(`  bit ${m.bit}: ${m.label} (${m.id})`);
    }
  });

  lines.push("", "## Pads (raw → logical)");
  lines.push(profile.rawPadToLogical.map((logical, raw) => `${raw}→${logical}`).join(" "));

  return lines.join("\n");
}
