#!/usr/bin/env node

/**
 * mikro-hid-mcp-server: MCP entry point.
 *
 * Registers tools and starts the stdio transport. stdout belongs to the
 * protocol, so diagnostics go to stderr.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { loadConfig } from "./config.js";
import { decodeReportsSchema, describeDeviceSchema } from "./schemas/decode.js";
import { executeDecodeReports, formatDecodeResult } from "./tools/decode.js";
import { executeDescribeDevice } from "./tools/describe.js";

const config = loadConfig();

const server = new McpServer({
  name: "mikro-hid-mcp-server",
  version: "0.1.0",
});

// ---------------------------------------------------------------------------
// Tool: decode_reports
// ---------------------------------------------------------------------------

server.tool(
  "decode_reports",
  "Decode raw USB HID input reports from a Maschine Mikro MK1 into button, encoder and pad events. " +
    "Reports are replayed in order through one decoder session, so button polarity and the encoder " +
    "baseline calibrate from the first buttons report, exactly as on the device. " +
    "Set forward=true to also send every event as OSC over UDP (e.g. to Pure Data).",
  decodeReportsSchema,
  async ({ device, reports, forward, host, port, prefix }) => {
    try {
      const result = await executeDecodeReports(
        { device, reports, forward, host, port, prefix },
        {
          trace: config.trace ? (line) => console.error(`[mikro] ${line}`) : undefined,
          oscHost: config.oscHost,
          oscPort: config.oscPort,
          oscPrefix: config.oscPrefix,
        },
      );
      return { content: [{ type: "text", text: formatDecodeResult(result) }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error decoding reports: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Tool: describe_device
// ---------------------------------------------------------------------------

server.tool(
  "describe_device",
  "Describe a supported HID controller: button bank/bit map, raw-to-logical pad layout, " +
    "USB vendor/product ids and output capabilities.",
  describeDeviceSchema,
  async ({ device }) => {
    try {
      return { content: [{ type: "text", text: executeDescribeDevice(device) }] };
    } catch (error) {
      const msg = error instanceof Error ? error.message : String(error);
      return {
        content: [{ type: "text", text: `Error describing device: ${msg}` }],
        isError: true,
      };
    }
  },
);

// ---------------------------------------------------------------------------
// Start server
// ---------------------------------------------------------------------------

async function main() {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  console.error("Fatal error starting MCP server:", error);
  process.exit(1);
});
