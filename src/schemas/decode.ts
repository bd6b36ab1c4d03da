/**
 * Zod schemas for decode_reports and describe_device tool parameters.
 */

import { z } from "zod";

const deviceField = z
  .string()
  .default("mikro-mk1")
  .describe('Device name. Default: "mikro-mk1" (Maschine Mikro MK1).');

export const decodeReportsSchema = {
  device: deviceField,
  reports: z
    .array(z.string())
    .min(1)
    .describe(
      "Raw HID input reports in hex, one per device read, oldest first. " +
        'E.g. "01 FF FF FF FF 05" (buttons) or "20 FA 10" (pads). ' +
        "An empty string models a read with no pending report.",
    ),
  forward: z
    .boolean()
    .default(false)
    .describe("Also send each decoded event as an OSC message over UDP."),
  host: z
    .string()
    .optional()
    .describe("OSC target host. Default: server configuration (127.0.0.1)."),
  port: z
    .number()
    .int()
    .min(1)
    .max(65535)
    .optional()
    .describe("OSC target port. Default: server configuration (9000)."),
  prefix: z
    .string()
    .startsWith("/")
    .optional()
    .describe('OSC address prefix. Default: server configuration ("/mikro").'),
};

export const describeDeviceSchema = {
  device: deviceField,
};
