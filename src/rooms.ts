import { parseBoundedInt } from "./server/utils.js";
import type { RoomAddress, TerminalSize } from "./types.js";

export const DEFAULT_TERMINAL_SIZE: Readonly<TerminalSize> = { rows: 40, cols: 120 };
export const MAX_TERMINAL_DIMENSION = 1000;
export const TERMINAL_PATH_PREFIX = "terminal";
export const INVALID_PATH_REASON = "Invalid path. Use /terminal/{project}/{room}";

const MAX_SEGMENT_LENGTH = 128;
// tmux reads ':' and '.' as target separators; the rest cannot appear in a window name we create.
const FORBIDDEN_SEGMENT_CHARS = /[\s:./\\\u0000-\u001f\u007f]/;

export class InvalidRoomAddressError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRoomAddressError";
  }
}

export function isValidRoomSegment(value: string): boolean {
  return value.length > 0 && value.length <= MAX_SEGMENT_LENGTH && !FORBIDDEN_SEGMENT_CHARS.test(value);
}

/** `@main` and `main` name the same room. */
export function roomBaseName(room: string): string {
  return room.replace(/^@+/, "");
}

/** tmux window name for a room: `{project}-{room without leading @}`. */
export function windowName(project: string, room: string): string {
  return `${project}-${roomBaseName(room)}`;
}

export function assertRoomAddress(project: string, room: string): RoomAddress {
  if (!isValidRoomSegment(project)) {
    throw new InvalidRoomAddressError(`invalid project name: ${JSON.stringify(project)}`);
  }
  if (!isValidRoomSegment(room) || roomBaseName(room).length === 0) {
    throw new InvalidRoomAddressError(`invalid room name: ${JSON.stringify(room)}`);
  }
  return { project, room };
}

function decodeSegment(raw: string): string | null {
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
}

export type TerminalRequest = {
  address: RoomAddress;
  size: TerminalSize;
};

/**
 * Parse `/terminal/{project}/{room}[?rows=&cols=]`. Returns null when the
 * path does not address a room. Missing or unusable size hints fall back to
 * the default size, one dimension at a time.
 */
export function parseTerminalRequest(rawUrl: string | undefined): TerminalRequest | null {
  let url: URL;
  try {
    url = new URL(rawUrl ?? "", "http://localhost");
  } catch {
    return null;
  }
  const parts = url.pathname.replace(/^\/+|\/+$/g, "").split("/");
  if (parts.length !== 3 || parts[0] !== TERMINAL_PATH_PREFIX) return null;
  const project = decodeSegment(parts[1] ?? "");
  const room = decodeSegment(parts[2] ?? "");
  if (project == null || room == null) return null;

  let address: RoomAddress;
  try {
    address = assertRoomAddress(project, room);
  } catch (err) {
    if (err instanceof InvalidRoomAddressError) return null;
    throw err;
  }

  const rows = parseBoundedInt(url.searchParams.get("rows"), 1, MAX_TERMINAL_DIMENSION);
  const cols = parseBoundedInt(url.searchParams.get("cols"), 1, MAX_TERMINAL_DIMENSION);
  return {
    address,
    size: {
      rows: rows ?? DEFAULT_TERMINAL_SIZE.rows,
      cols: cols ?? DEFAULT_TERMINAL_SIZE.cols,
    },
  };
}
