import path from "node:path";
import type { FastifyInstance } from "fastify";
import { assertRoomAddress } from "../../rooms.js";
import type { Tmux } from "../../tmux.js";
import type { RoomAddress } from "../../types.js";
import type { WindowDirectory } from "../../windows/directory.js";
import { roomSessionHandle, type SessionHandle } from "../../windows/session-handle.js";
import { parseJsonBody } from "../auth.js";
import { pathExistsAndIsDirectory } from "../utils.js";

type RoomRoutesDeps = {
  fastify: FastifyInstance;
  tmux: Tmux;
  directory: WindowDirectory;
  captureScrollback: number;
  workingDirectory: string;
};

const MAX_INPUT_BYTES = 64 * 1024;

function roomParams(raw: unknown): RoomAddress {
  const params = parseJsonBody(raw);
  const project = typeof params.project === "string" ? params.project : "";
  const room = typeof params.room === "string" ? params.room : "";
  return assertRoomAddress(project, room);
}

export function registerRoomRoutes(deps: RoomRoutesDeps): void {
  const { fastify, tmux, directory, captureScrollback, workingDirectory } = deps;

  const handleFor = (rawParams: unknown): SessionHandle => roomSessionHandle(tmux, directory, roomParams(rawParams));

  // Snapshot for the first paint; the terminal socket streams from there on.
  fastify.get("/api/projects/:project/rooms/:room/terminal", async (req, reply) => {
    const handle = handleFor(req.params);
    const { text, alive } = await handle.capture(captureScrollback);
    reply.header("Cache-Control", "no-store");
    return { content: text, alive };
  });

  fastify.post("/api/projects/:project/rooms/:room/terminal/input", async (req, reply) => {
    const handle = handleFor(req.params);
    const body = parseJsonBody(req.body);
    if (typeof body.data !== "string") {
      reply.code(400);
      return { error: "data must be a string" };
    }
    if (Buffer.byteLength(body.data, "utf8") > MAX_INPUT_BYTES) {
      reply.code(413);
      return { error: "data is too large" };
    }
    if (!(await handle.isAlive())) {
      reply.code(404);
      return { error: `window ${handle.window} not found` };
    }
    await handle.sendInput(body.data);
    return { ok: true };
  });

  fastify.post("/api/projects/:project/rooms/:room/launch", async (req, reply) => {
    const handle = handleFor(req.params);
    const body = parseJsonBody(req.body);
    const command = typeof body.command === "string" ? body.command.trim() : "";
    if (!command) {
      reply.code(400);
      return { error: "command is required" };
    }
    if (body.cwd != null && typeof body.cwd !== "string") {
      reply.code(400);
      return { error: "cwd must be a string" };
    }
    const cwd = typeof body.cwd === "string" && body.cwd.trim()
      ? path.resolve(workingDirectory, body.cwd.trim())
      : workingDirectory;

    let created = false;
    if (!(await handle.isAlive())) {
      if (!(await pathExistsAndIsDirectory(cwd))) {
        reply.code(400);
        return { error: `cwd is not a directory: ${cwd}` };
      }
      await handle.create(cwd);
      created = true;
      fastify.log.info({ window: handle.window, cwd }, "room window created");
    }
    await handle.launchAgent(command);
    fastify.log.info({ window: handle.window, command }, "agent launched");
    return { ok: true, window: handle.window, created };
  });

  fastify.post("/api/projects/:project/rooms/:room/kill", async (req) => {
    const handle = handleFor(req.params);
    await handle.kill();
    fastify.log.info({ window: handle.window }, "room window killed");
    return { ok: true };
  });
}
