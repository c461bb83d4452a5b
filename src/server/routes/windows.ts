import type { FastifyInstance } from "fastify";
import type { WindowDirectory } from "../../windows/directory.js";

type WindowRoutesDeps = {
  fastify: FastifyInstance;
  directory: WindowDirectory;
};

export function registerWindowRoutes(deps: WindowRoutesDeps): void {
  const { fastify, directory } = deps;

  fastify.get("/api/health", async () => {
    return { ok: true, session: directory.session, sessionAlive: await directory.sessionExists() };
  });

  fastify.get("/api/windows", async (_req, reply) => {
    reply.header("Cache-Control", "no-store");
    return { session: directory.session, windows: await directory.list() };
  });
}
