import Fastify, { type FastifyInstance } from "fastify";
import { BridgeServer } from "../bridge/server.js";
import type { PtySpawner } from "../pty/spawner.js";
import { InvalidRoomAddressError } from "../rooms.js";
import { Tmux, TmuxCommandError, type TmuxRunner } from "../tmux.js";
import { WindowDirectory } from "../windows/directory.js";
import { isUpgradeAuthorized, registerAuthHook } from "./auth.js";
import type { AppConfig } from "./config.js";
import { registerRoomRoutes } from "./routes/rooms.js";
import { registerWindowRoutes } from "./routes/windows.js";

export type AppDeps = {
  spawner: PtySpawner;
  tmuxRunner?: TmuxRunner;
  // false silences Fastify's logger.
  logger?: boolean;
};

export type App = {
  fastify: FastifyInstance;
  bridge: BridgeServer;
  tmux: Tmux;
  directory: WindowDirectory;
};

export function createApp(config: AppConfig, deps: AppDeps): App {
  const fastify = Fastify({
    logger: deps.logger === false ? false : { level: config.logLevel },
    disableRequestLogging: true,
  });

  const tmux = new Tmux({ socketName: config.tmuxSocket, runner: deps.tmuxRunner });
  const directory = new WindowDirectory(tmux, config.tmuxSession, fastify.log);

  fastify.setErrorHandler((err, req, reply) => {
    if (err instanceof InvalidRoomAddressError) {
      return reply.code(400).send({ error: err.message });
    }
    if (err instanceof TmuxCommandError) {
      req.log.error({ args: err.args, exitCode: err.exitCode, stderr: err.stderr }, "tmux command failed");
      return reply.code(500).send({ error: err.message });
    }
    const statusCode = typeof err.statusCode === "number" && err.statusCode >= 400 ? err.statusCode : 500;
    if (statusCode >= 500) req.log.error({ err }, "request failed");
    return reply.code(statusCode).send({ error: err.message });
  });

  registerAuthHook(fastify, config);
  registerWindowRoutes({ fastify, directory });
  registerRoomRoutes({
    fastify,
    tmux,
    directory,
    captureScrollback: config.captureScrollback,
    workingDirectory: config.workingDirectory,
  });

  const bridge = new BridgeServer({
    server: fastify.server,
    tmux,
    session: config.tmuxSession,
    directory,
    spawner: deps.spawner,
    logger: fastify.log,
    authorize: (req) => isUpgradeAuthorized(config, req),
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    connection: {
      killTimeoutMs: config.killTimeoutMs,
      linkedViews: config.linkedViews,
      cwd: config.workingDirectory,
    },
  });
  bridge.listen();

  fastify.addHook("preClose", async () => {
    await bridge.stop();
  });

  return { fastify, bridge, tmux, directory };
}
