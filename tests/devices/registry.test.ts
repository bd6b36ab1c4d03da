import { describe, it, expect } from "vitest";
import { findDeviceByUsbId, getDevice, listDevices } from "../../src/devices/index.js";
import {
  BUTTON_BY_BANK_BIT,
  lookupButton,
  mikroMk1Profile,
  RAW_PAD_TO_LOGICAL,
} from "../../src/devices/mikro-mk1.js";

describe("device registry", () => {
  it("resolves the canonical name and aliases, case-insensitively", () => {
    expect(getDevice("maschine-mikro-mk1")).toBe(mikroMk1Profile);
    expect(getDevice("mikro-mk1")).toBe(mikroMk1Profile);
    expect(getDevice("MIKRO")).toBe(mikroMk1Profile);
  });

  it("throws listing available devices for an unknown name", () => {
    expect(() => getDevice("launchpad")).toThrow(
      'Unknown device "launchpad". Available devices: maschine-mikro-mk1',
    );
  });

  it("finds profiles by USB vendor/product id", () => {
    expect(findDeviceByUsbId(0x17cc, 0x1110)).toBe(mikroMk1Profile);
    expect(findDeviceByUsbId(0x17cc, 0x1200)).toBeUndefined();
  });

  it("lists each profile once", () => {
    expect(listDevices()).toEqual([mikroMk1Profile]);
  });
});

describe("Mikro MK1 tables", () => {
  it("has five banks of eight bits", () => {
    expect(BUTTON_BY_BANK_BIT).toHaveLength(5);
    expect(BUTTON_BY_BANK_BIT.every((bank) => bank.length === 8)).toBe(true);
  });

  it("maps the known bank/bit coordinates", () => {
    expect(lookupButton(4, 0)).toEqual({ id: "shift", label: "Shift" });
    expect(lookupButton(4, 5)).toEqual({ id: "transportRight", label: "Right Transport" });
    expect(lookupButton(3, 3)).toEqual({ id: "mainEncoder", label: "Encoder Press" });
    expect(lookupButton(2, 7).id).toBe("f1");
    expect(lookupButton(1, 5).id).toBe("padMode");
  });

  it("resolves unassigned and out-of-range coordinates to unknown", () => {
    expect(lookupButton(0, 3).id).toBe("unknown");
    expect(lookupButton(3, 2).id).toBe("unknown");
    expect(lookupButton(5, 0).id).toBe("unknown");
    expect(lookupButton(1, 8).id).toBe("unknown");
  });

  it("uses each mapped id once", () => {
    const ids = BUTTON_BY_BANK_BIT.flat().map((m) => m.id).filter((id) => id !== "unknown");
    expect(ids).toHaveLength(29);
    expect(new Set(ids).size).toBe(29);
  });

  it("pad table is a permutation of 0..15", () => {
    expect([...RAW_PAD_TO_LOGICAL].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 16 }, (_, i) => i),
    );
    expect(RAW_PAD_TO_LOGICAL[0]).toBe(12);
    expect(RAW_PAD_TO_LOGICAL[15]).toBe(3);
  });
});
