import type { IPtyForkOptions } from "node-pty";
import type { TerminalSize } from "../types.js";

export type PtyDisposable = { dispose(): void };

export type PtyExit = {
  exitCode: number;
  signal: number | null;
};

/**
 * A child process whose stdio is the follower side of a pseudo-terminal. The
 * controller side stays in this process and is released when the child exits.
 */
export interface PtyProcess {
  readonly pid: number;
  onData(listener: (chunk: Buffer) => void): PtyDisposable;
  onExit(listener: (exit: PtyExit) => void): PtyDisposable;
  write(data: Buffer | string): void;
  resize(size: TerminalSize): void;
  kill(signal?: NodeJS.Signals): void;
}

export type PtySpawnRequest = {
  command: string;
  args: string[];
  size: TerminalSize;
  cwd?: string;
  env?: Record<string, string>;
};

/** Capability: start a program as session leader on a fresh PTY. */
export interface PtySpawner {
  spawn(req: PtySpawnRequest): PtyProcess;
}

export class UnsupportedPlatformError extends Error {
  constructor(readonly platform: string) {
    super(`pseudo-terminal bridging is not supported on ${platform}`);
    this.name = "UnsupportedPlatformError";
  }
}

const SUPPORTED_PLATFORMS: ReadonlySet<string> = new Set(["linux", "darwin", "freebsd", "openbsd"]);

function toBuffer(data: string | Buffer): Buffer {
  return typeof data === "string" ? Buffer.from(data, "utf8") : data;
}

function childEnv(extra: Record<string, string> | undefined): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (typeof value === "string") env[key] = value;
  }
  // A server started from inside tmux would otherwise make the attach refuse to nest.
  delete env.TMUX;
  return { ...env, ...(extra ?? {}) };
}

/**
 * The slice of node-pty's IPty the bridge drives. On Unix node-pty's `write`
 * hands its argument straight to the controller socket, so a Buffer reaches
 * the PTY byte for byte; its published typings only name string.
 */
export interface NativePty {
  readonly pid: number;
  onData(listener: (data: string | Buffer) => void): PtyDisposable;
  onExit(listener: (exit: { exitCode: number; signal?: number }) => void): PtyDisposable;
  write(data: string | Buffer): void;
  resize(cols: number, rows: number): void;
  kill(signal?: string): void;
}

export type NativePtySpawn = (file: string, args: string[], options: IPtyForkOptions) => NativePty;

class NodePtyProcess implements PtyProcess {
  constructor(private readonly pty: NativePty) {}

  get pid(): number {
    return this.pty.pid;
  }

  onData(listener: (chunk: Buffer) => void): PtyDisposable {
    // With `encoding: null` node-pty hands out Buffers even though its typings say string.
    return this.pty.onData((data: string | Buffer) => listener(toBuffer(data)));
  }

  onExit(listener: (exit: PtyExit) => void): PtyDisposable {
    return this.pty.onExit(({ exitCode, signal }) => {
      listener({ exitCode, signal: signal ?? null });
    });
  }

  write(data: Buffer | string): void {
    this.pty.write(data);
  }

  resize(size: TerminalSize): void {
    this.pty.resize(size.cols, size.rows);
  }

  kill(signal?: NodeJS.Signals): void {
    this.pty.kill(signal);
  }
}

/** node-pty backed spawner: forkpty, setsid, TIOCSCTTY and exec happen natively. */
export class NodePtySpawner implements PtySpawner {
  constructor(private readonly spawnPty: NativePtySpawn) {}

  spawn(req: PtySpawnRequest): PtyProcess {
    const child = this.spawnPty(req.command, req.args, {
      name: "xterm-256color",
      cols: req.size.cols,
      rows: req.size.rows,
      cwd: req.cwd ?? process.cwd(),
      env: childEnv(req.env),
      encoding: null,
    });
    return new NodePtyProcess(child);
  }
}

/**
 * Load the native PTY binding for this platform. Platforms without PTYs (or
 * without tmux) are refused up front rather than failing per connection.
 */
export async function loadPtySpawner(platform: string = process.platform): Promise<PtySpawner> {
  if (!SUPPORTED_PLATFORMS.has(platform)) {
    throw new UnsupportedPlatformError(platform);
  }
  const pty = await import("node-pty");
  return new NodePtySpawner(pty.spawn);
}
