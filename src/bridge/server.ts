import type { IncomingMessage, Server } from "node:http";
import type { Duplex } from "node:stream";
import type { FastifyBaseLogger } from "fastify";
import WebSocket, { WebSocketServer } from "ws";
import type { PtySpawner } from "../pty/spawner.js";
import { INVALID_PATH_REASON, parseTerminalRequest } from "../rooms.js";
import { errorMessage } from "../server/utils.js";
import type { Tmux } from "../tmux.js";
import { CloseCode } from "../types.js";
import type { WindowProbe } from "../windows/directory.js";
import { BridgeConnection, type BridgeConnectionOptions } from "./connection.js";

export type BridgeServerDeps = {
  server: Server;
  tmux: Tmux;
  session: string;
  directory: WindowProbe;
  spawner: PtySpawner;
  logger: FastifyBaseLogger;
  authorize?: (req: IncomingMessage) => boolean;
  // 0 disables pings.
  heartbeatIntervalMs?: number;
  maxPayload?: number;
  connection?: BridgeConnectionOptions;
};

const DEFAULT_HEARTBEAT_MS = 30_000;
const DEFAULT_MAX_PAYLOAD = 1024 * 1024;

/**
 * Accepts terminal upgrades on an existing HTTP server. Each socket gets its
 * own BridgeConnection; a failing connection only ever closes itself.
 */
export class BridgeServer {
  private readonly wss: WebSocketServer;
  private readonly connections = new Set<BridgeConnection>();
  private readonly alive = new WeakMap<WebSocket, boolean>();
  private heartbeat: NodeJS.Timeout | null = null;
  private listening = false;
  private stopping = false;

  constructor(private readonly deps: BridgeServerDeps) {
    this.wss = new WebSocketServer({ noServer: true, maxPayload: deps.maxPayload ?? DEFAULT_MAX_PAYLOAD });
    this.wss.on("connection", (ws: WebSocket, req: IncomingMessage) => this.accept(ws, req));
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  listen(): void {
    if (this.listening) return;
    this.listening = true;
    this.deps.server.on("upgrade", this.onUpgrade);
    const interval = this.deps.heartbeatIntervalMs ?? DEFAULT_HEARTBEAT_MS;
    if (interval > 0) {
      this.heartbeat = setInterval(() => this.sweep(), interval);
      this.heartbeat.unref();
    }
  }

  /** Tear down every live connection, then stop accepting. */
  async stop(): Promise<void> {
    this.stopping = true;
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    this.deps.server.off("upgrade", this.onUpgrade);
    await Promise.all(
      [...this.connections].map((c) =>
        c.teardown("server-stop", { code: CloseCode.GoingAway, reason: "Server shutting down" }),
      ),
    );
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
  }

  private readonly onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    try {
      if (this.stopping) {
        socket.destroy();
        return;
      }
      if (this.deps.authorize && !this.deps.authorize(req)) {
        socket.end("HTTP/1.1 401 Unauthorized\r\nConnection: close\r\n\r\n");
        return;
      }
      this.wss.handleUpgrade(req, socket, head, (ws) => this.wss.emit("connection", ws, req));
    } catch (err) {
      this.deps.logger.warn({ err: errorMessage(err) }, "terminal upgrade failed");
      socket.destroy();
    }
  };

  private accept(ws: WebSocket, req: IncomingMessage): void {
    // Protocol errors can arrive while a rejected socket is still closing.
    ws.on("error", (err) => {
      this.deps.logger.debug({ url: req.url, err: errorMessage(err) }, "terminal socket error");
    });
    const request = parseTerminalRequest(req.url);
    if (!request) {
      this.deps.logger.info({ url: req.url }, "terminal path rejected");
      ws.close(CloseCode.InvalidTarget, INVALID_PATH_REASON);
      return;
    }

    let connection: BridgeConnection;
    try {
      connection = new BridgeConnection({
        socket: ws,
        request,
        session: this.deps.session,
        directory: this.deps.directory,
        spawner: this.deps.spawner,
        tmux: this.deps.tmux,
        logger: this.deps.logger,
        options: this.deps.connection,
      });
    } catch (err) {
      this.deps.logger.error({ err: errorMessage(err) }, "terminal connection setup failed");
      ws.close(CloseCode.InternalError, "Failed to attach terminal");
      return;
    }

    this.connections.add(connection);
    this.alive.set(ws, true);
    ws.on("pong", () => this.alive.set(ws, true));
    void connection.closed.then(() => this.connections.delete(connection));

    void connection.start().catch((err: unknown) => {
      this.deps.logger.error({ connectionId: connection.id, err: errorMessage(err) }, "terminal connection failed");
      return connection.teardown("attach-failed", { code: CloseCode.InternalError, reason: "Failed to attach terminal" });
    });
  }

  private sweep(): void {
    for (const ws of this.wss.clients) {
      if (this.alive.get(ws) === false) {
        this.deps.logger.debug("terminating unresponsive terminal client");
        ws.terminate();
        continue;
      }
      this.alive.set(ws, false);
      try {
        ws.ping();
      } catch (err) {
        this.deps.logger.debug({ err: errorMessage(err) }, "terminal ping failed");
      }
    }
  }
}
