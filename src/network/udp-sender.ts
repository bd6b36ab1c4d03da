/**
 * UDP sender for OSC datagrams.
 *
 * Opens one socket per batch, sends every buffer in order, then closes.
 * Uses Node.js built-in `dgram`.
 */

import dgram from "node:dgram";

export interface UdpSendOptions {
  host: string;
  port: number;
}

/**
 * Send buffers as individual datagrams, in order.
 * Resolves after the last send callback. Rejects on the first socket error.
 */
export function sendUdpBatch(
  buffers: Buffer[],
  options: UdpSendOptions,
): Promise<void> {
  if (buffers.length === 0) return Promise.resolve();

  return new Promise((resolve, reject) => {
    const socket = dgram.createSocket("udp4");
    let settled = false;
    const finish = (err?: Error) => {
      if (settled) return;
      settled = true;
      socket.close();
      if (err) reject(err);
      else resolve();
    };

    socket.on("error", finish);

    const sendAt = (i: number) => {
      if (i >= buffers.length) {
        finish();
        return;
      }
      const buf = buffers[i];
      socket.send(buf, 0, buf.length, options.port, options.host, (err) => {
        if (err) finish(err);
        else sendAt(i + 1);
      });
    };
    sendAt(0);
  });
}
