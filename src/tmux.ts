import { execFile } from "node:child_process";
import { promisify } from "node:util";
import { isRecord } from "./server/utils.js";

const execFileAsync = promisify(execFile);

const DEFAULT_TIMEOUT_MS = 5000;
const VIEW_MARKER = "_view_";

export type TmuxExecResult = { stdout: string; stderr: string };

/** Runs `tmux` with the full argument vector (socket args included). */
export type TmuxRunner = (args: string[]) => Promise<TmuxExecResult>;

export type TmuxOptions = {
  // Dedicated server socket (`-L <name>`); null keeps the user's default server.
  socketName?: string | null;
  runner?: TmuxRunner;
  timeoutMs?: number;
};

export class TmuxCommandError extends Error {
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(args: string[], exitCode: number | null, stderr: string, cause?: unknown) {
    const detail = stderr.trim() || (exitCode == null ? "failed to run" : `exit code ${exitCode}`);
    super(`tmux ${args[0] ?? ""}: ${detail}`, cause === undefined ? undefined : { cause });
    this.name = "TmuxCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }

  static from(args: string[], err: unknown): TmuxCommandError {
    if (err instanceof TmuxCommandError) return err;
    if (!isRecord(err)) return new TmuxCommandError(args, null, String(err), err);
    const exitCode = typeof err.code === "number" ? err.code : null;
    const stderr = typeof err.stderr === "string" ? err.stderr : "";
    return new TmuxCommandError(args, exitCode, stderr, err);
  }
}

function execRunner(timeoutMs: number): TmuxRunner {
  return async (args) => {
    const { stdout, stderr } = await execFileAsync("tmux", args, { encoding: "utf8", timeout: timeoutMs });
    return { stdout, stderr };
  };
}

/** Exact-match target for a session: `=name`. */
export function tmuxSessionTarget(session: string): string {
  return `=${session}`;
}

/** Exact-match target for a window inside a session: `=session:=window`. */
export function tmuxWindowTarget(session: string, window: string): string {
  return `=${session}:=${window}`;
}

export function tmuxIsLinkedViewSession(name: string, baseSession?: string): boolean {
  const markerIndex = name.lastIndexOf(VIEW_MARKER);
  if (markerIndex <= 0) return false;
  if (baseSession && !name.startsWith(`${baseSession}${VIEW_MARKER}`)) return false;
  const suffix = name.slice(markerIndex + VIEW_MARKER.length);
  return /^[0-9a-z]+$/.test(suffix);
}

/**
 * Handle on the one tmux server the process drives. Every tmux invocation in
 * the project goes through here so the socket selection stays in one place.
 */
export class Tmux {
  readonly baseArgs: readonly string[];
  private readonly runner: TmuxRunner;

  constructor(opts: TmuxOptions = {}) {
    // `-f /dev/null` keeps user config out of a dedicated server.
    this.baseArgs = opts.socketName ? ["-L", opts.socketName, "-f", "/dev/null"] : [];
    this.runner = opts.runner ?? execRunner(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  }

  /** Run a tmux command and return its stdout. Throws TmuxCommandError. */
  async run(args: string[]): Promise<string> {
    try {
      const { stdout } = await this.runner([...this.baseArgs, ...args]);
      return stdout;
    } catch (err) {
      throw TmuxCommandError.from(args, err);
    }
  }

  /** Argument vector (without the `tmux` program) that attaches a client to `target`. */
  attachArgs(target: string): string[] {
    return [...this.baseArgs, "attach-session", "-t", target];
  }

  async hasSession(session: string): Promise<boolean> {
    try {
      await this.run(["has-session", "-t", tmuxSessionTarget(session)]);
      return true;
    } catch {
      return false;
    }
  }

  async listWindowNames(session: string): Promise<string[]> {
    const out = await this.run(["list-windows", "-t", tmuxSessionTarget(session), "-F", "#{window_name}"]);
    return out
      .split("\n")
      .map((l) => l.replace(/\r$/, ""))
      .filter((l) => l.length > 0);
  }

  /** Create a detached session whose first window is `window`. */
  async newSession(session: string, window: string, cwd: string): Promise<void> {
    await this.run(["new-session", "-d", "-s", session, "-n", window, "-c", cwd]);
  }

  async newWindow(session: string, window: string, cwd: string): Promise<void> {
    await this.run(["new-window", "-d", "-t", `${tmuxSessionTarget(session)}:`, "-n", window, "-c", cwd]);
  }

  /** Send text with no key-name lookup (`send-keys -l`). */
  async sendLiteral(target: string, text: string): Promise<void> {
    await this.run(["send-keys", "-t", target, "-l", "--", text]);
  }

  /** Send one named key, e.g. "Enter". */
  async sendKey(target: string, key: string): Promise<void> {
    await this.run(["send-keys", "-t", target, key]);
  }

  async killWindow(target: string): Promise<void> {
    await this.run(["kill-window", "-t", target]);
  }

  async killSession(session: string): Promise<void> {
    await this.run(["kill-session", "-t", tmuxSessionTarget(session)]);
  }

  async capturePane(target: string, scrollbackLines: number): Promise<string> {
    const start = `-${Math.max(0, Math.floor(scrollbackLines))}`;
    return this.run(["capture-pane", "-p", "-J", "-t", target, "-S", start]);
  }

  /**
   * Create a session grouped with `baseSession` so a client attached to it
   * has its own current-window pointer, then select `window` in it.
   * Returns the linked session name.
   */
  async createLinkedView(baseSession: string, window: string, suffix: string): Promise<string> {
    const linked = `${baseSession}${VIEW_MARKER}${suffix}`;
    await this.run(["new-session", "-d", "-s", linked, "-t", tmuxSessionTarget(baseSession)]);
    try {
      await this.run(["select-window", "-t", tmuxWindowTarget(linked, window)]);
      await this.run(["set-option", "-t", tmuxSessionTarget(linked), "status", "off"]);
    } catch (err) {
      try {
        await this.killSession(linked);
      } catch {
        // Rethrow the select-window/set-option failure below.
      }
      throw err;
    }
    return linked;
  }

  /** Kill view sessions of `baseSession` that no client is attached to. */
  async pruneDetachedViews(baseSession: string): Promise<string[]> {
    let out: string;
    try {
      out = await this.run(["list-sessions", "-F", "#{session_name}\t#{session_attached}"]);
    } catch {
      return [];
    }
    const killed: string[] = [];
    for (const line of out.split("\n")) {
      const [nameRaw, attachedRaw] = line.trim().split("\t", 2);
      const name = (nameRaw ?? "").trim();
      if (!name || !tmuxIsLinkedViewSession(name, baseSession)) continue;
      const attached = Number(attachedRaw);
      if (Number.isFinite(attached) && attached > 0) continue;
      try {
        await this.killSession(name);
        killed.push(name);
      } catch {
        // Session may have disappeared concurrently.
      }
    }
    return killed;
  }
}
