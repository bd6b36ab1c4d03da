/**
 * Hex text ↔ report bytes.
 */

/**
 * Parse a report written as hex.
 *
 * Accepts space/comma/colon separated bytes ("01 FF FE", "0x01,0xfe")
 * or one unbroken run of digit pairs ("01fffe"). An empty string is an
 * empty report.
 *
 * @throws If a token is not a 1–2 digit hex byte, or a run has odd length
 */
export function parseHexReport(text: string): Uint8Array {
  const tokens = text
    .trim()
    .split(/[\s,:]+/)
    .filter((t) => t.length > 0)
    .map((t) => t.replace(/^0x/i, ""));

  if (tokens.length === 1 && tokens[0].length > 2) {
    const run = tokens[0];
    if (run.length % 2 !== 0) {
      throw new Error(`Hex run "${run}" has an odd number of digits`);
    }
    const pairs: string[] = [];
    for (let i = 0; i < run.length; i += 2) pairs.push(run.slice(i, i + 2));
    return Uint8Array.from(pairs.map(parseByte));
  }

  return Uint8Array.from(tokens.map(parseByte));
}

function parseByte(token: string): number {
  if (!/^[0-9a-f]{1,2}$/i.test(token)) {
    throw new Error(`Invalid hex byte "${token}"`);
  }
  return Number.parseInt(token, 16);
}

/** Lowercase, unpadded, space separated: [0x01, 0xfe] → "1 fe". */
export function formatHexBytes(bytes: Uint8Array): string {
  return Array.from(bytes, (v) => v.toString(16)).join(" ");
}
