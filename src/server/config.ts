import { randomBytes } from "node:crypto";
import process from "node:process";

export type AppConfig = {
  host: string;
  port: number;
  allowNonLoopbackBind: boolean;
  logLevel: string;
  tmuxSession: string;
  // null: drive the user's default tmux server.
  tmuxSocket: string | null;
  authEnabled: boolean;
  authToken: string;
  authTokenSource: "disabled" | "configured" | "generated";
  allowedOrigins: Set<string>;
  killTimeoutMs: number;
  heartbeatIntervalMs: number;
  linkedViews: boolean;
  captureScrollback: number;
  workingDirectory: string;
};

export const DEFAULT_PORT = 7777;
export const DEFAULT_SESSION = "roomgate";

const LOG_LEVELS = new Set(["fatal", "error", "warn", "info", "debug", "trace", "silent"]);

function flag(value: string | undefined): boolean {
  return /^(1|true|yes|on)$/i.test((value ?? "").trim());
}

function intAtLeast(value: string | undefined, min: number, fallback: number): number {
  const n = Number((value ?? "").trim());
  if (!value || !Number.isInteger(n)) return fallback;
  return Math.max(min, n);
}

export function resolveConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const host = env.HOST?.trim() || "127.0.0.1";
  const requestedPort = Number(env.PORT ?? String(DEFAULT_PORT));
  const port = Number.isInteger(requestedPort) && requestedPort > 0 && requestedPort < 65536
    ? requestedPort
    : DEFAULT_PORT;
  const logLevelRaw = (env.ROOMGATE_LOG_LEVEL?.trim() || "warn").toLowerCase();
  const authEnabled = flag(env.ROOMGATE_TOKEN_ENABLED);
  const configuredToken = env.ROOMGATE_TOKEN?.trim() ?? "";

  return {
    host,
    port,
    allowNonLoopbackBind: env.ROOMGATE_ALLOW_NON_LOOPBACK === "1",
    logLevel: LOG_LEVELS.has(logLevelRaw) ? logLevelRaw : "warn",
    tmuxSession: env.ROOMGATE_TMUX_SESSION?.trim() || DEFAULT_SESSION,
    tmuxSocket: env.ROOMGATE_TMUX_SOCKET?.trim() || null,
    authEnabled,
    authToken: !authEnabled ? "" : configuredToken || randomBytes(32).toString("hex"),
    authTokenSource: !authEnabled ? "disabled" : configuredToken ? "configured" : "generated",
    allowedOrigins: new Set(
      [
        `http://127.0.0.1:${port}`,
        `http://localhost:${port}`,
        `http://[::1]:${port}`,
        ...(env.ROOMGATE_ALLOWED_ORIGINS ?? "")
          .split(",")
          .map((v) => v.trim())
          .filter((v) => v.length > 0),
      ].map((v) => v.toLowerCase()),
    ),
    killTimeoutMs: intAtLeast(env.ROOMGATE_KILL_TIMEOUT_MS, 100, 2000),
    heartbeatIntervalMs: intAtLeast(env.ROOMGATE_HEARTBEAT_MS, 0, 30_000),
    linkedViews: flag(env.ROOMGATE_LINKED_VIEWS),
    captureScrollback: intAtLeast(env.ROOMGATE_CAPTURE_SCROLLBACK, 0, 500),
    workingDirectory: env.ROOMGATE_WORKDIR?.trim() || process.cwd(),
  };
}

export function isLoopbackHost(host: string): boolean {
  const normalized = host.trim().toLowerCase();
  return normalized === "127.0.0.1" || normalized === "localhost" || normalized === "::1";
}

export function assertLoopbackHostAllowed(config: AppConfig): void {
  if (!config.allowNonLoopbackBind && !isLoopbackHost(config.host)) {
    throw new Error(
      `Refusing to bind to non-loopback host "${config.host}". Set ROOMGATE_ALLOW_NON_LOOPBACK=1 to allow.`,
    );
  }
}
