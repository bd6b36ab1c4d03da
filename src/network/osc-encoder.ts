/**
 * OSC (Open Sound Control) 1.0 binary message encoder.
 *
 *   - Address: null-terminated, padded to 4-byte boundary
 *   - Type tag string: "," + one char per arg (i/f/s), padded to 4-byte
 *   - Arguments: int32 big-endian, float32 big-endian, string null-padded
 *
 * Reference: opensoundcontrol.org/spec-1_0
 */

export interface OscArgInt { type: "i"; value: number }
export interface OscArgFloat { type: "f"; value: number }
export interface OscArgString { type: "s"; value: string }

export type OscArg = OscArgInt | OscArgFloat | OscArgString;

export interface OscMessage {
  address: string;
  args: OscArg[];
}

/** Pad a buffer with null bytes to the next 4-byte boundary. */
function padToFour(buf: Buffer): Buffer {
  const remainder = buf.length % 4;
  if (remainder === 0) return buf;
  return Buffer.concat([buf, Buffer.alloc(4 - remainder, 0)]);
}

/** At least one terminating null, then padding. */
function encodeString(s: string): Buffer {
  return padToFour(Buffer.from(s + "\0", "utf-8"));
}

function encodeArg(arg: OscArg): Buffer {
  switch (arg.type) {
    case "i": {
      const buf = Buffer.alloc(4);
      buf.writeInt32BE(arg.value, 0);
      return buf;
    }
    case "f": {
      const buf = Buffer.alloc(4);
      buf.writeFloatBE(arg.value, 0);
      return buf;
    }
    case "s":
      return encodeString(arg.value);
  }
}

/**
 * Encode an OSC message into a binary Buffer.
 *
 * @throws If the address doesn't start with `/`
 */
export function encodeOscMessage(message: OscMessage): Buffer {
  const { address, args } = message;
  if (!address.startsWith("/")) {
    throw new Error(`OSC address must start with "/", got: "${address}"`);
  }

  const typeTags = "," + args.map((a) => a.type).join("");
  return Buffer.concat([
    encodeString(address),
    encodeString(typeTags),
    ...args.map(encodeArg),
  ]);
}
