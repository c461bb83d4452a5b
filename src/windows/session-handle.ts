import { tmuxWindowTarget, type Tmux } from "../tmux.js";
import { windowName } from "../rooms.js";
import type { RoomAddress, RoomCapture } from "../types.js";
import type { WindowDirectory } from "./directory.js";

export const DEFAULT_CAPTURE_SCROLLBACK = 500;

/**
 * One room's window in the shared session. Holds nothing but the name; all
 * state lives in tmux.
 */
export class SessionHandle {
  constructor(
    private readonly tmux: Tmux,
    private readonly directory: WindowDirectory,
    readonly window: string,
  ) {}

  get session(): string {
    return this.directory.session;
  }

  get target(): string {
    return tmuxWindowTarget(this.session, this.window);
  }

  isAlive(): Promise<boolean> {
    return this.directory.exists(this.window);
  }

  /**
   * Open the window in `cwd`. Starts the shared session first when it is not
   * running. Not idempotent: check isAlive() before calling.
   */
  async create(cwd: string): Promise<void> {
    if (await this.directory.sessionExists()) {
      await this.tmux.newWindow(this.session, this.window, cwd);
      return;
    }
    await this.tmux.newSession(this.session, this.window, cwd);
  }

  /**
   * Type `text` literally, then press Enter as a separate event. Full-screen
   * programs treat a bulk paste differently from a keypress, so the two are
   * never combined.
   */
  async sendKeys(text: string): Promise<void> {
    await this.tmux.sendLiteral(this.target, text);
    await this.tmux.sendKey(this.target, "Enter");
  }

  /** Raw input with no Enter appended. */
  async sendInput(data: string): Promise<void> {
    if (data.length === 0) return;
    await this.tmux.sendLiteral(this.target, data);
  }

  async kill(): Promise<void> {
    if (!(await this.isAlive())) return;
    try {
      await this.tmux.killWindow(this.target);
    } catch (err) {
      // The window may have exited between the check and the kill.
      if (await this.isAlive()) throw err;
    }
  }

  /** Start a long-running command in the window's shell. */
  async launchAgent(command: string): Promise<void> {
    await this.sendKeys(command);
  }

  async capture(scrollbackLines = DEFAULT_CAPTURE_SCROLLBACK): Promise<RoomCapture> {
    if (!(await this.isAlive())) return { text: "", alive: false };
    try {
      return { text: await this.tmux.capturePane(this.target, scrollbackLines), alive: true };
    } catch {
      // Capture failures leave the snapshot empty.
      return { text: "", alive: true };
    }
  }
}

export function roomSessionHandle(tmux: Tmux, directory: WindowDirectory, address: RoomAddress): SessionHandle {
  return new SessionHandle(tmux, directory, windowName(address.project, address.room));
}
