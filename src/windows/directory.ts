import type { FastifyBaseLogger } from "fastify";
import type { Tmux } from "../tmux.js";
import { errorMessage } from "../server/utils.js";

/** Minimal read-only view used by the bridge to decide whether to attach. */
export interface WindowProbe {
  exists(window: string): Promise<boolean>;
}

/**
 * Read-only view over the windows of the shared session. Every call asks tmux
 * again: agents and users create and kill windows behind our back.
 */
export class WindowDirectory implements WindowProbe {
  constructor(
    private readonly tmux: Tmux,
    readonly session: string,
    private readonly logger?: FastifyBaseLogger,
  ) {}

  /** Window names in the session; empty when tmux or the session is not running. */
  async list(): Promise<string[]> {
    try {
      return await this.tmux.listWindowNames(this.session);
    } catch (err) {
      this.logger?.debug({ session: this.session, err: errorMessage(err) }, "window list unavailable");
      return [];
    }
  }

  async exists(window: string): Promise<boolean> {
    const names = await this.list();
    return names.includes(window);
  }

  async sessionExists(): Promise<boolean> {
    return this.tmux.hasSession(this.session);
  }
}
