import type { RawData } from "ws";
import { DEFAULT_TERMINAL_SIZE, MAX_TERMINAL_DIMENSION } from "../rooms.js";
import { isRecord, parseBoundedInt } from "../server/utils.js";
import type { TerminalInput } from "../types.js";

// RFC 6455 caps a close frame's reason at 123 bytes.
const MAX_CLOSE_REASON_BYTES = 123;

export function rawDataToBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(new Uint8Array(data));
}

function parseResize(text: string): TerminalInput | null {
  if (!text.trimStart().startsWith("{")) return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || parsed.type !== "resize") return null;

  const rows = parsed.rows === undefined
    ? DEFAULT_TERMINAL_SIZE.rows
    : parseBoundedInt(parsed.rows, 1, MAX_TERMINAL_DIMENSION);
  const cols = parsed.cols === undefined
    ? DEFAULT_TERMINAL_SIZE.cols
    : parseBoundedInt(parsed.cols, 1, MAX_TERMINAL_DIMENSION);
  if (rows == null || cols == null) return { kind: "ignored" };
  return { kind: "resize", size: { rows, cols } };
}

/**
 * Binary frames are always keystrokes. Text frames are keystrokes too, unless
 * they carry a `{"type":"resize"}` control envelope.
 */
export function decodeTerminalInput(data: RawData, isBinary: boolean): TerminalInput {
  const bytes = rawDataToBuffer(data);
  if (isBinary) return { kind: "data", data: bytes };
  return parseResize(bytes.toString("utf8")) ?? { kind: "data", data: bytes };
}

export function closeReason(text: string): string {
  if (Buffer.byteLength(text, "utf8") <= MAX_CLOSE_REASON_BYTES) return text;
  let out = "";
  for (const ch of text) {
    if (Buffer.byteLength(out + ch + "…", "utf8") > MAX_CLOSE_REASON_BYTES) break;
    out += ch;
  }
  return `${out}…`;
}

export function targetNotFoundReason(room: string): string {
  return closeReason(`Room '${room}' window not found`);
}
