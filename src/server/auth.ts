import type { IncomingHttpHeaders, IncomingMessage } from "node:http";
import type { FastifyInstance } from "fastify";
import type { AppConfig } from "./config.js";
import { isRecord } from "./utils.js";

export type AuthSettings = Pick<AppConfig, "authEnabled" | "authToken" | "allowedOrigins">;

function parseTokenFromAuthHeader(value: unknown): string | null {
  if (typeof value !== "string") return null;
  const m = /^Bearer\s+(.+)$/i.exec(value.trim());
  if (!m) return null;
  const token = (m[1] ?? "").trim();
  return token.length > 0 ? token : null;
}

export function parseTokenFromHeaders(headers: IncomingHttpHeaders): string | null {
  const direct = headers["x-roomgate-token"];
  if (typeof direct === "string" && direct.length > 0) return direct;
  if (Array.isArray(direct)) {
    for (const v of direct) {
      if (v.length > 0) return v;
    }
  }
  return parseTokenFromAuthHeader(headers.authorization);
}

export function parseTokenFromUrl(rawUrl: string | undefined): string | null {
  if (!rawUrl) return null;
  try {
    const url = new URL(rawUrl, "http://localhost");
    const token = url.searchParams.get("token");
    return token && token.length > 0 ? token : null;
  } catch {
    return null;
  }
}

export function isTokenValid(auth: AuthSettings, headerToken: string | null, urlToken: string | null): boolean {
  if (!auth.authEnabled) return true;
  const token = headerToken ?? urlToken;
  return token != null && token === auth.authToken;
}

export function requestNeedsToken(auth: AuthSettings, method: string, rawUrl: string | undefined): boolean {
  if (!auth.authEnabled) return false;
  if (method.toUpperCase() === "OPTIONS") return false;
  return (rawUrl ?? "").startsWith("/api/");
}

export function isWsOriginAllowed(auth: AuthSettings, origin: string | undefined): boolean {
  if (!origin || origin.length === 0) return true;
  return auth.allowedOrigins.has(origin.toLowerCase());
}

/** Gate for WebSocket upgrades: origin allow-list, then token. */
export function isUpgradeAuthorized(auth: AuthSettings, req: IncomingMessage): boolean {
  if (!isWsOriginAllowed(auth, req.headers.origin)) return false;
  return isTokenValid(auth, parseTokenFromHeaders(req.headers), parseTokenFromUrl(req.url));
}

export function registerAuthHook(fastify: FastifyInstance, auth: AuthSettings): void {
  fastify.addHook("onRequest", async (req, reply) => {
    if (!requestNeedsToken(auth, req.raw.method ?? "GET", req.raw.url)) return;
    const headerToken = parseTokenFromHeaders(req.headers);
    const urlToken = parseTokenFromUrl(req.raw.url);
    if (isTokenValid(auth, headerToken, urlToken)) return;
    return reply.code(401).send({ error: "missing or invalid auth token" });
  });
}

export function parseJsonBody(raw: unknown): Record<string, unknown> {
  return isRecord(raw) ? raw : {};
}
