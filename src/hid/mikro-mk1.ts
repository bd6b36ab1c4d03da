/**
 * Maschine Mikro MK1 input session.
 *
 * One `tick()` reads at most one report and decodes it in line, calling the
 * event sink before returning. Nothing here throws: transport failures
 * surface as `tick() === false`, and reports of unknown shape are dropped.
 */

import { decodeButtonReport } from "./button-decoder.js";
import { formatHexBytes } from "./hex.js";
import { decodePadReport } from "./pad-decoder.js";
import { classifyReport, type ReportKind } from "./report-classifier.js";
import { createDeviceState, resetDeviceState, type DeviceState } from "./state.js";
import type { DeviceEventSink, ReportReader, TraceFn } from "./types.js";

export interface SessionOptions {
  /** Diagnostic lines: per-bit button changes and discarded reports. */
  trace?: TraceFn;
}

export class MaschineMikroMk1 {
  private readonly deviceState: DeviceState = createDeviceState();

  constructor(
    private readonly reader: ReportReader,
    private readonly sink: DeviceEventSink,
    private readonly options: SessionOptions = {},
  ) {}

  /** Current decoder state. Mutated by every tick; do not write to it. */
  get state(): Readonly<DeviceState> {
    return this.deviceState;
  }

  /** Return to the power-on state; polarity and encoder are recalibrated. */
  init(): void {
    resetDeviceState(this.deviceState);
  }

  /**
   * Read and decode one report.
   * @returns false when the transport read failed, true otherwise
   */
  tick(): boolean {
    const result = this.reader.read();
    if (!result.ok) return false;
    this.processReport(result.report);
    return true;
  }

  /** Classify a report and hand it to the matching decoder. */
  processReport(report: Uint8Array): ReportKind {
    const kind = classifyReport(report);
    switch (kind) {
      case "buttons":
        decodeButtonReport(this.deviceState, report, this.sink, {
          trace: this.options.trace,
        });
        break;
      case "pads":
        decodePadReport(this.deviceState, report, this.sink);
        break;
      case "unknown":
        this.options.trace?.(
          `discarded report: length=${report.length} bytes=${formatHexBytes(report)}`,
        );
        break;
      case "empty":
        break;
    }
    return kind;
  }
}
