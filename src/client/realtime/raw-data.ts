import type WebSocket from "ws";
import { Buffer } from "node:buffer";

/**
 * Decode any ws RawData variant (Buffer, Buffer[], ArrayBuffer) as text.
 */
export function rawDataToString(data: WebSocket.RawData, encoding: BufferEncoding = "utf8"): string {
  if (Buffer.isBuffer(data)) return data.toString(encoding);
  if (Array.isArray(data)) return Buffer.concat(data).toString(encoding);
  return Buffer.from(data).toString(encoding);
}
