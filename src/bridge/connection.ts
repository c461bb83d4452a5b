import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import WebSocket, { type RawData } from "ws";
import type { PtyDisposable, PtyExit, PtyProcess, PtySpawner } from "../pty/spawner.js";
import { windowName, type TerminalRequest } from "../rooms.js";
import { errorMessage } from "../server/utils.js";
import { tmuxSessionTarget, tmuxWindowTarget, type Tmux } from "../tmux.js";
import { CloseCode, type TerminalInput, type TerminalSize } from "../types.js";
import type { WindowProbe } from "../windows/directory.js";
import { closeReason, decodeTerminalInput, targetNotFoundReason } from "./protocol.js";

/** The slice of a `ws` socket the bridge relies on. */
export interface TerminalSocket {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: Buffer, options: { binary: boolean }): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData, isBinary: boolean) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

export type BridgeState = "pending" | "attaching" | "open" | "closing" | "closed";

export type TeardownReason =
  | "client-close"
  | "socket-error"
  | "child-exit"
  | "pty-write-error"
  | "slow-client"
  | "target-not-found"
  | "attach-failed"
  | "server-stop";

export type BridgeConnectionOptions = {
  // How long to wait for the child after each signal before escalating.
  killTimeoutMs?: number;
  maxBufferedAmount?: number;
  // Attach through a per-connection grouped session so viewers of different
  // windows do not switch each other's current window.
  linkedViews?: boolean;
  cwd?: string;
};

export type BridgeConnectionDeps = {
  socket: TerminalSocket;
  request: TerminalRequest;
  session: string;
  directory: WindowProbe;
  spawner: PtySpawner;
  tmux: Tmux;
  logger: FastifyBaseLogger;
  options?: BridgeConnectionOptions;
};

type CloseFrame = { code: number; reason: string };

const DEFAULT_KILL_TIMEOUT_MS = 2000;
const DEFAULT_MAX_BUFFERED_AMOUNT = 8 * 1024 * 1024;
const MAX_PENDING_INPUTS = 1024;

const ATTACH_FAILED: CloseFrame = { code: CloseCode.InternalError, reason: "Failed to attach terminal" };
const SESSION_ENDED: CloseFrame = { code: CloseCode.Normal, reason: "Terminal session ended" };

/**
 * One client attached to one room window through its own PTY and tmux client
 * process. Output flows from the PTY's data events to binary frames; input
 * frames flow to the PTY. Every exit path funnels into teardown(), which runs
 * at most once.
 */
export class BridgeConnection {
  readonly id: string;
  readonly window: string;
  /** Settles after teardown has finished. */
  readonly closed: Promise<void>;
  private readonly markClosed: () => void;
  private readonly socket: TerminalSocket;
  private readonly request: TerminalRequest;
  private readonly session: string;
  private readonly directory: WindowProbe;
  private readonly spawner: PtySpawner;
  private readonly tmux: Tmux;
  private readonly log: FastifyBaseLogger;
  private readonly killTimeoutMs: number;
  private readonly maxBufferedAmount: number;
  private readonly linkedViews: boolean;
  private readonly cwd: string | undefined;

  private stateValue: BridgeState = "pending";
  private sizeValue: TerminalSize;
  private child: PtyProcess | null = null;
  private childExit: Promise<PtyExit> | null = null;
  private childExited = false;
  private linkedView: string | null = null;
  private readonly pumps: PtyDisposable[] = [];
  private readonly pendingInput: TerminalInput[] = [];
  private teardownPromise: Promise<void> | null = null;

  constructor(deps: BridgeConnectionDeps) {
    this.id = randomUUID().replaceAll("-", "").slice(0, 12);
    this.socket = deps.socket;
    this.request = deps.request;
    this.session = deps.session;
    this.directory = deps.directory;
    this.spawner = deps.spawner;
    this.tmux = deps.tmux;
    this.window = windowName(deps.request.address.project, deps.request.address.room);
    this.sizeValue = { ...deps.request.size };
    this.killTimeoutMs = deps.options?.killTimeoutMs ?? DEFAULT_KILL_TIMEOUT_MS;
    this.maxBufferedAmount = deps.options?.maxBufferedAmount ?? DEFAULT_MAX_BUFFERED_AMOUNT;
    this.linkedViews = deps.options?.linkedViews ?? false;
    this.cwd = deps.options?.cwd;
    this.log = deps.logger.child({ connectionId: this.id, window: this.window });
    let markClosed: () => void = () => {};
    this.closed = new Promise<void>((resolve) => {
      markClosed = resolve;
    });
    this.markClosed = markClosed;

    this.socket.on("message", (data, isBinary) => this.handleMessage(data, isBinary));
    this.socket.on("close", () => void this.teardown("client-close"));
    this.socket.on("error", (err) => {
      this.log.debug({ err: errorMessage(err) }, "terminal socket error");
      void this.teardown("socket-error");
    });
  }

  get state(): BridgeState {
    return this.stateValue;
  }

  get size(): TerminalSize {
    return { ...this.sizeValue };
  }

  get pid(): number | null {
    return this.child?.pid ?? null;
  }

  /** Resolves once the connection is streaming or has been rejected. */
  async start(): Promise<void> {
    if (this.stateValue !== "pending") return;
    this.stateValue = "attaching";
    try {
      await this.attach();
    } catch (err) {
      this.log.error({ err: errorMessage(err) }, "terminal attach failed");
      await this.teardown("attach-failed", ATTACH_FAILED);
    }
  }

  /** Stop streaming and release the child. Safe to call any number of times. */
  teardown(reason: TeardownReason, close: CloseFrame = SESSION_ENDED): Promise<void> {
    if (!this.teardownPromise) {
      this.teardownPromise = this.runTeardown(reason, close);
    }
    return this.teardownPromise;
  }

  private async attach(): Promise<void> {
    const { room } = this.request.address;
    const exists = await this.directory.exists(this.window);
    if (this.teardownPromise) return;
    if (!exists) {
      this.log.info({ room }, "terminal target not found");
      await this.teardown("target-not-found", {
        code: CloseCode.TargetNotFound,
        reason: targetNotFoundReason(room),
      });
      return;
    }

    let target = tmuxWindowTarget(this.session, this.window);
    if (this.linkedViews) {
      this.linkedView = await this.tmux.createLinkedView(this.session, this.window, this.id);
      target = tmuxSessionTarget(this.linkedView);
      if (this.teardownPromise) {
        await this.releaseLinkedView();
        return;
      }
    }

    const child = this.spawner.spawn({
      command: "tmux",
      args: this.tmux.attachArgs(target),
      size: this.sizeValue,
      cwd: this.cwd,
    });
    this.child = child;
    this.childExit = new Promise<PtyExit>((resolve) => {
      child.onExit((exit) => {
        this.childExited = true;
        resolve(exit);
      });
    });
    void this.childExit.then((exit) => {
      this.log.debug({ pid: child.pid, exitCode: exit.exitCode, signal: exit.signal }, "tmux client exited");
      void this.teardown("child-exit");
    });

    this.stateValue = "open";
    this.pumps.push(child.onData((chunk) => this.forwardOutput(chunk)));
    this.log.info({ pid: child.pid, rows: this.sizeValue.rows, cols: this.sizeValue.cols }, "terminal attached");

    for (const input of this.pendingInput.splice(0)) {
      this.applyInput(input);
    }
  }

  private forwardOutput(chunk: Buffer): void {
    if (this.stateValue !== "open" || this.socket.readyState !== WebSocket.OPEN) return;
    if (this.socket.bufferedAmount > this.maxBufferedAmount) {
      this.log.warn({ bufferedAmount: this.socket.bufferedAmount }, "terminal client too slow");
      void this.teardown("slow-client", { code: CloseCode.InternalError, reason: "Client too slow" });
      return;
    }
    try {
      this.socket.send(chunk, { binary: true });
    } catch (err) {
      this.log.debug({ err: errorMessage(err) }, "terminal send failed");
      void this.teardown("socket-error");
    }
  }

  private handleMessage(data: RawData, isBinary: boolean): void {
    if (this.stateValue === "closing" || this.stateValue === "closed") return;
    const input = decodeTerminalInput(data, isBinary);
    if (this.stateValue !== "open") {
      if (this.pendingInput.length < MAX_PENDING_INPUTS) this.pendingInput.push(input);
      return;
    }
    this.applyInput(input);
  }

  private applyInput(input: TerminalInput): void {
    const child = this.child;
    if (!child || this.stateValue !== "open") return;
    if (input.kind === "data") {
      if (input.data.length === 0) return;
      try {
        child.write(input.data);
      } catch (err) {
        this.log.debug({ err: errorMessage(err) }, "pty write failed");
        void this.teardown("pty-write-error");
      }
      return;
    }
    if (input.kind === "resize") {
      try {
        child.resize(input.size);
        this.sizeValue = { ...input.size };
        child.kill("SIGWINCH");
      } catch (err) {
        // The exit event tears down a child that is already gone.
        this.log.debug({ err: errorMessage(err) }, "pty resize failed");
      }
    }
  }

  private async runTeardown(reason: TeardownReason, close: CloseFrame): Promise<void> {
    this.stateValue = "closing";
    for (const pump of this.pumps.splice(0)) {
      pump.dispose();
    }
    this.pendingInput.length = 0;

    if (this.child) {
      await this.stopChild(this.child);
    }
    await this.releaseLinkedView();

    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      try {
        this.socket.close(close.code, closeReason(close.reason));
      } catch (err) {
        this.log.debug({ err: errorMessage(err) }, "terminal socket close failed");
      }
    }
    this.stateValue = "closed";
    this.log.info({ reason }, "terminal connection closed");
    this.markClosed();
  }

  private async stopChild(child: PtyProcess): Promise<void> {
    if (this.childExited) return;
    this.signalChild(child, "SIGTERM");
    if (await this.waitForExit()) return;
    this.log.warn({ pid: child.pid }, "tmux client ignored SIGTERM; sending SIGKILL");
    this.signalChild(child, "SIGKILL");
    if (!(await this.waitForExit())) {
      this.log.error({ pid: child.pid }, "tmux client did not exit after SIGKILL");
    }
  }

  private signalChild(child: PtyProcess, signal: NodeJS.Signals): void {
    try {
      child.kill(signal);
    } catch (err) {
      // ESRCH: already exited and reaped.
      this.log.debug({ pid: child.pid, signal, err: errorMessage(err) }, "signal not delivered");
    }
  }

  private waitForExit(): Promise<boolean> {
    const exit = this.childExit;
    if (this.childExited || !exit) return Promise.resolve(true);
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), this.killTimeoutMs);
      void exit.then(() => {
        clearTimeout(timer);
        resolve(true);
      });
    });
  }

  private async releaseLinkedView(): Promise<void> {
    const view = this.linkedView;
    if (!view) return;
    this.linkedView = null;
    try {
      await this.tmux.killSession(view);
    } catch (err) {
      this.log.debug({ view, err: errorMessage(err) }, "linked view already gone");
    }
  }
}
