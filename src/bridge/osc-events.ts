/**
 * Decoded device events → OSC messages for a host application (Pd, a DAW).
 *
 *   <prefix>/button/<id>      ,ii  pressed(0|1) shift(0|1)
 *   <prefix>/encoder/<index>  ,ii  step(+1|-1)  shift(0|1)
 *   <prefix>/pad/<index>      ,fi  value        aftertouch(0|1)
 */

import type { DeviceEvent } from "../hid/event-recorder.js";
import type { OscArg, OscMessage } from "../network/osc-encoder.js";

export const DEFAULT_OSC_PREFIX = "/mikro";

const flag = (v: boolean): OscArg => ({ type: "i", value: v ? 1 : 0 });

export function eventToOsc(
  event: DeviceEvent,
  prefix: string = DEFAULT_OSC_PREFIX,
): OscMessage {
  const base = prefix.replace(/\/+$/, "");
  switch (event.type) {
    case "button":
      return {
        address: `${base}/button/${event.id}`,
        args: [flag(event.pressed), flag(event.shiftHeld)],
      };
    case "encoder":
      return {
        address: `${base}/encoder/${event.index}`,
        args: [{ type: "i", value: event.increased ? 1 : -1 }, flag(event.shiftHeld)],
      };
    case "pad":
      return {
        address: `${base}/pad/${event.index}`,
        args: [{ type: "f", value: event.value }, flag(event.aftertouch)],
      };
  }
}
