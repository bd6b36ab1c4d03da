import { describe, it, expect } from "vitest";
import { MaschineMikroMk1 } from "../../src/hid/mikro-mk1.js";
import { EventRecorder } from "../../src/hid/event-recorder.js";
import { parseHexReport } from "../../src/hid/hex.js";
import { ReplayReader } from "../../src/hid/replay-reader.js";
import { createDeviceState } from "../../src/hid/state.js";

function session(...reports: string[]) {
  const reader = new ReplayReader(reports.map(parseHexReport));
  const sink = new EventRecorder();
  const trace: string[] = [];
  const device = new MaschineMikroMk1(reader, sink, { trace: (l) => trace.push(l) });
  return { device, reader, sink, trace };
}

describe("MaschineMikroMk1", () => {
  it("decodes the calibrate-then-press sequence end to end", () => {
    const { device, sink } = session("01 FF FF FF FF 05", "01 FF FF FE FF 06");

    expect(device.tick()).toBe(true);
    expect(sink.take()).toEqual([]);
    expect(device.state.buttonPolarity).toBe("active-low");
    expect(device.state.encoderValue).toBe(5);

    expect(device.tick()).toBe(true);
    expect(sink.take()).toEqual([
      { type: "encoder", index: 0, increased: true, shiftHeld: false },
      { type: "button", id: "enter", pressed: true, shiftHeld: false },
    ]);
    expect(device.state.encoderValue).toBe(6);
  });

  it("returns false on a transport failure and emits nothing", () => {
    const reader = new ReplayReader([{ ok: false }]);
    const sink = new EventRecorder();
    const device = new MaschineMikroMk1(reader, sink);
    expect(device.tick()).toBe(false);
    expect(sink.take()).toEqual([]);
    expect(device.state).toEqual(createDeviceState());
  });

  it("treats an empty read as a quiet tick", () => {
    const { device, sink, trace } = session("");
    expect(device.tick()).toBe(true);
    expect(sink.take()).toEqual([]);
    expect(trace).toEqual([]);
  });

  it("keeps ticking once the reader is drained", () => {
    const { device, reader } = session();
    expect(reader.pending).toBe(0);
    expect(device.tick()).toBe(true);
  });

  it("drops unknown reports without events or state changes", () => {
    const { device, sink, trace } = session("99 01 02");
    expect(device.tick()).toBe(true);
    expect(sink.take()).toEqual([]);
    expect(device.state).toEqual(createDeviceState());
    expect(trace).toEqual(["discarded report: length=3 bytes=99 1 2"]);
  });

  it("decodes untagged 33-byte pad reports from offset 1", () => {
    const report = new Uint8Array(33);
    // raw pad 1, magnitude 300
    report[1] = 0x2c;
    report[2] = 0x11;
    const { device, sink } = session();
    expect(device.processReport(report)).toBe("pads");
    expect(sink.take()).toEqual([
      { type: "pad", index: 13, value: 300 / 1024, aftertouch: false },
    ]);
  });

  it("routes tagged pad reports to the pad decoder", () => {
    const { device, sink } = session("20 2C 01");
    device.tick();
    expect(sink.take()).toEqual([
      { type: "pad", index: 12, value: 300 / 1024, aftertouch: false },
    ]);
    expect(device.state.padValues[12]).toBe(300);
  });

  it("init() resets every field and recalibrates", () => {
    const { device, reader, sink } = session("01 FF FF FF FF 05", "20 2C 01", "01 FF FF FE FF 06");
    device.tick();
    device.tick();
    device.tick();
    sink.take();

    device.init();
    expect(device.state).toEqual(createDeviceState());

    // Polarity is learned again: all-zero now means active-high
    reader.push(parseHexReport("01 00 00 00 00 0A"));
    device.tick();
    expect(device.state.buttonPolarity).toBe("active-high");
    expect(device.state.encoderValue).toBe(10);
    expect(sink.take()).toEqual([]);
  });
});
