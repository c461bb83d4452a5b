#!/usr/bin/env node
import process from "node:process";
import { loadPtySpawner } from "./pty/spawner.js";
import { createApp } from "./server/app.js";
import { assertLoopbackHostAllowed, resolveConfig } from "./server/config.js";
import { errorMessage } from "./server/utils.js";

const config = resolveConfig();
assertLoopbackHostAllowed(config);

const spawner = await loadPtySpawner();
const { fastify, tmux, directory } = createApp(config, { spawner });

const pruned = await tmux.pruneDetachedViews(config.tmuxSession);
if (pruned.length > 0) {
  fastify.log.info({ pruned }, "removed stale linked view sessions");
}
if (!(await directory.sessionExists())) {
  fastify.log.warn({ session: config.tmuxSession }, "tmux session is not running; terminals will report not found");
}

await fastify.listen({ host: config.host, port: config.port });

const appUrl = `http://${config.host === "0.0.0.0" || config.host === "::" ? "127.0.0.1" : config.host}:${config.port}`;
fastify.log.info(`roomgate ready at ${appUrl}`);
if (config.authTokenSource === "generated") {
  // Printed once so the operator can hand it to the dashboard.
  process.stdout.write(`roomgate token: ${config.authToken}\n`);
}

let shuttingDown = false;
async function shutdown(signal: NodeJS.Signals): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  fastify.log.info({ signal }, "shutting down");
  try {
    await fastify.close();
    process.exit(0);
  } catch (err) {
    fastify.log.error({ err: errorMessage(err) }, "shutdown failed");
    process.exit(1);
  }
}

process.on("SIGINT", (signal) => void shutdown(signal));
process.on("SIGTERM", (signal) => void shutdown(signal));
