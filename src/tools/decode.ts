/**
 * decode_reports MCP tool.
 *
 * Replays hex-encoded HID reports through a fresh decoder session and
 * returns the events each one produced, optionally forwarding them as OSC.
 */

import { DEFAULT_OSC_PREFIX, eventToOsc } from "../bridge/osc-events.js";
import { DEFAULT_OSC_HOST, DEFAULT_OSC_PORT } from "../config.js";
import { getDevice } from "../devices/index.js";
import { lookupButton } from "../devices/mikro-mk1.js";
import { EventRecorder, formatEvent, type DeviceEvent } from "../hid/event-recorder.js";
import { parseHexReport } from "../hid/hex.js";
import { MaschineMikroMk1 } from "../hid/mikro-mk1.js";
import { ReplayReader } from "../hid/replay-reader.js";
import { classifyReport, type ReportKind } from "../hid/report-classifier.js";
import type { DeviceState } from "../hid/state.js";
import type { TraceFn } from "../hid/types.js";
import { encodeOscMessage } from "../network/osc-encoder.js";
import { sendUdpBatch } from "../network/udp-sender.js";

export interface DecodeReportsInput {
  device?: string;
  reports: string[];
  forward?: boolean;
  host?: string;
  port?: number;
  prefix?: string;
}

/** Server-level defaults, from configuration. */
export interface DecodeDefaults {
  trace?: TraceFn;
  oscHost?: string;
  oscPort?: number;
  oscPrefix?: string;
}

export interface DecodedReport {
  index: number;
  bytes: Uint8Array;
  kind: ReportKind;
  events: DeviceEvent[];
}

export interface DecodeResult {
  deviceLabel: string;
  reports: DecodedReport[];
  state: Readonly<DeviceState>;
  forwarded?: { host: string; port: number; count: number };
}

/**
 * Execute the decode_reports tool.
 *
 * @throws If the device is unknown or a report is not valid hex
 */
export async function executeDecodeReports(
  input: DecodeReportsInput,
  defaults: DecodeDefaults = {},
): Promise<DecodeResult> {
  const profile = getDevice(input.device ?? "mikro-mk1");
  // Parse everything up front so a bad report fails before any decoding.
  const parsed = input.reports.map((text, i) => {
    try {
      return parseHexReport(text);
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      throw new Error(`Report ${i}: ${msg}`);
    }
  });

  const recorder = new EventRecorder();
  const reader = new ReplayReader(parsed);
  const session = new MaschineMikroMk1(reader, recorder, { trace: defaults.trace });

  const reports: DecodedReport[] = [];
  for (let index = 0; index < parsed.length; index++) {
    const bytes = parsed[index];
    session.tick();
    reports.push({ index, bytes, kind: classifyReport(bytes), events: recorder.take() });
  }

  const result: DecodeResult = {
    deviceLabel: profile.label,
    reports,
    state: session.state,
  };

  if (input.forward) {
    const host = input.host ?? defaults.oscHost ?? DEFAULT_OSC_HOST;
    const port = input.port ?? defaults.oscPort ?? DEFAULT_OSC_PORT;
    const prefix = input.prefix ?? defaults.oscPrefix ?? DEFAULT_OSC_PREFIX;
    const buffers = reports
      .flatMap((r) => r.events)
      .map((e) => encodeOscMessage(eventToOsc(e, prefix)));
    await sendUdpBatch(buffers, { host, port });
    result.forwarded = { host, port, count: buffers.length };
  }

  return result;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function hex(bytes: Uint8Array): string {
  return Array.from(bytes, (v) => v.toString(16).padStart(2, "0")).join(" ");
}

/** Ids of pressed buttons, in bit order. Unmapped bits are left out. */
export function pressedButtons(state: Readonly<DeviceState>): string[] {
  const ids: string[] = [];
  state.buttonDown.forEach((down, bitPos) => {
    if (!down) return;
    const { id } = lookupButton(4 - Math.floor(bitPos / 8), bitPos % 8);
    if (id !== "unknown") ids.push(id);
  });
  return ids;
}

export function formatDecodeResult(result: DecodeResult): string {
  const n = result.reports.length;
  const lines: string[] = [
    `# Decoded ${n} report${n === 1 ? "" : "s"} (${result.deviceLabel})`,
    "",
  ];

  let total = 0;
  for (const r of result.reports) {
    const bytes = r.bytes.length > 0 ? `: ${hex(r.bytes)}` : "";
    lines.push(`[${r.index}] ${r.kind}${bytes}`);
    if (r.events.length === 0) {
      lines.push("  (no events)");
    }
    for (const e of r.events) lines.push(`  ${formatEvent(e)}`);
    total += r.events.length;
  }

  const { state } = result;
  const padsDown = state.padDown.flatMap((down, i) => (down ? [i] : []));
  const buttonsDown = pressedButtons(state);
  lines.push(
    "",
    "## State",
    `Polarity: ${state.buttonPolarity}`,
    `Encoder: ${state.encoderCalibrated ? state.encoderValue : "uncalibrated"}`,
    `Pads down: ${padsDown.length > 0 ? padsDown.join(", ") : "none"}`,
    `Buttons down: ${buttonsDown.length > 0 ? buttonsDown.join(", ") : "none"}`,
    `Events: ${total}`,
  );

  if (result.forwarded) {
    const { host, port, count } = result.forwarded;
    lines.push(`Forwarded ${count} OSC message${count === 1 ? "" : "s"} to ${host}:${port}`);
  }

  return lines.join("\n");
}
