/**
 * Event sink that keeps decoded events as plain values.
 */

import type { ButtonId } from "../devices/types.js";
import type { DeviceEventSink } from "./types.js";

export interface ButtonEvent {
  type: "button";
  id: ButtonId;
  pressed: boolean;
  shiftHeld: boolean;
}

export interface EncoderEvent {
  type: "encoder";
  index: number;
  increased: boolean;
  shiftHeld: boolean;
}

export interface PadEvent {
  type: "pad";
  index: number;
  value: number;
  aftertouch: boolean;
}

export type DeviceEvent = ButtonEvent | EncoderEvent | PadEvent;

export class EventRecorder implements DeviceEventSink {
  private events: DeviceEvent[] = [];

  onButtonChanged(id: ButtonId, pressed: boolean, shiftHeld: boolean): void {
    this.events.push({ type: "button", id, pressed, shiftHeld });
  }

  onEncoderChanged(index: number, increased: boolean, shiftHeld: boolean): void {
    this.events.push({ type: "encoder", index, increased, shiftHeld });
  }

  onPadChanged(index: number, value: number, aftertouch: boolean): void {
    this.events.push({ type: "pad", index, value, aftertouch });
  }

  /** Events recorded since the last call, oldest first. */
  take(): DeviceEvent[] {
    const taken = this.events;
    this.events = [];
    return taken;
  }
}

/**
 * One-line description of an event.
 *
 *   button shift pressed
 *   encoder 0 increased (shift)
 *   pad 12 value=1.0000
 */
export function formatEvent(event: DeviceEvent): string {
  const shift = (held: boolean) => (held ? " (shift)" : "");
  switch (event.type) {
    case "button":
      return `button ${event.id} ${event.pressed ? "pressed" : "released"}${shift(event.shiftHeld)}`;
    case "encoder":
      return `encoder ${event.index} ${event.increased ? "increased" : "decreased"}${shift(event.shiftHeld)}`;
    case "pad":
      return `pad ${event.index} value=${event.value.toFixed(4)}${event.aftertouch ? " (aftertouch)" : ""}`;
  }
}
