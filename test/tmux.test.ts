import { describe, expect, it } from "vitest";
import {
  Tmux,
  TmuxCommandError,
  tmuxIsLinkedViewSession,
  tmuxSessionTarget,
  tmuxWindowTarget,
} from "../src/tmux.js";
import { FakeTmuxServer, tmuxFailure } from "./support/fakes.js";

describe("tmux targets", () => {
  it("uses exact-match targets", () => {
    expect(tmuxSessionTarget("roomgate")).toBe("=roomgate");
    expect(tmuxWindowTarget("roomgate", "demo-main")).toBe("=roomgate:=demo-main");
  });

  it("recognizes linked view session names", () => {
    expect(tmuxIsLinkedViewSession("roomgate_view_3f9a01bc22de", "roomgate")).toBe(true);
    expect(tmuxIsLinkedViewSession("roomgate_view_3f9a01bc22de", "other")).toBe(false);
    expect(tmuxIsLinkedViewSession("roomgate", "roomgate")).toBe(false);
    expect(tmuxIsLinkedViewSession("roomgate_view_", "roomgate")).toBe(false);
    expect(tmuxIsLinkedViewSession("roomgate_view_ABC", "roomgate")).toBe(false);
  });
});

describe("Tmux", () => {
  it("prefixes a dedicated socket and an empty config", async () => {
    const server = new FakeTmuxServer();
    server.sessions.set("roomgate", ["demo-main"]);
    const tmux = new Tmux({ socketName: "rg-test", runner: server.runner });

    await tmux.listWindowNames("roomgate");

    expect(server.calls).toEqual([
      ["-L", "rg-test", "-f", "/dev/null", "list-windows", "-t", "=roomgate", "-F", "#{window_name}"],
    ]);
    expect(tmux.attachArgs("=roomgate:=demo-main")).toEqual([
      "-L",
      "rg-test",
      "-f",
      "/dev/null",
      "attach-session",
      "-t",
      "=roomgate:=demo-main",
    ]);
  });

  it("lists window names without blank lines", async () => {
    const tmux = new Tmux({ runner: async () => ({ stdout: "demo-main\r\n\nweb-api\n", stderr: "" }) });
    await expect(tmux.listWindowNames("roomgate")).resolves.toEqual(["demo-main", "web-api"]);
  });

  it("sends literal text after an option terminator", async () => {
    const server = new FakeTmuxServer();
    server.sessions.set("roomgate", ["demo-main"]);
    const tmux = new Tmux({ runner: server.runner });

    await tmux.sendLiteral("=roomgate:=demo-main", "-n Enter");

    expect(server.calls).toEqual([["send-keys", "-t", "=roomgate:=demo-main", "-l", "--", "-n Enter"]]);
  });

  it("captures scrollback from a negative start line", async () => {
    const server = new FakeTmuxServer();
    server.sessions.set("roomgate", ["demo-main"]);
    server.panes.set("demo-main", "$ ls\nREADME.md\n");
    const tmux = new Tmux({ runner: server.runner });

    await expect(tmux.capturePane("=roomgate:=demo-main", 200)).resolves.toBe("$ ls\nREADME.md\n");
    expect(server.calls[0]).toEqual(["capture-pane", "-p", "-J", "-t", "=roomgate:=demo-main", "-S", "-200"]);
  });

  it("wraps failures in TmuxCommandError with tmux's stderr", async () => {
    const server = new FakeTmuxServer();
    const tmux = new Tmux({ runner: server.runner });

    const err = await tmux.killSession("missing").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TmuxCommandError);
    if (!(err instanceof TmuxCommandError)) return;
    expect(err.message).toBe("tmux kill-session: can't find session: missing");
    expect(err.args).toEqual(["kill-session", "-t", "=missing"]);
    expect(err.exitCode).toBe(1);
  });

  it("reports a failure to run tmux at all", () => {
    const err = TmuxCommandError.from(["has-session"], Object.assign(new Error("spawn tmux ENOENT"), { code: "ENOENT" }));
    expect(err.message).toBe("tmux has-session: failed to run");
    expect(err.exitCode).toBeNull();
  });

  it("hasSession answers false instead of throwing", async () => {
    const server = new FakeTmuxServer();
    server.sessions.set("roomgate", []);
    const tmux = new Tmux({ runner: server.runner });

    await expect(tmux.hasSession("roomgate")).resolves.toBe(true);
    await expect(tmux.hasSession("other")).resolves.toBe(false);
  });

  it("removes a half-built linked view when selecting the window fails", async () => {
    const server = new FakeTmuxServer();
    server.sessions.set("roomgate", ["demo-main"]);
    const tmux = new Tmux({ runner: server.runner });
    const realRunner = server.runner;
    let calls = 0;
    const flaky = new Tmux({
      runner: async (args) => {
        calls += 1;
        if (calls === 2) throw tmuxFailure("can't find window: demo-main\n");
        return realRunner(args);
      },
    });

    await expect(flaky.createLinkedView("roomgate", "demo-main", "abc123")).rejects.toThrow(
      "tmux select-window: can't find window: demo-main",
    );
    expect(server.sessions.has("roomgate_view_abc123")).toBe(false);
    await expect(tmux.hasSession("roomgate")).resolves.toBe(true);
  });

  it("prunes only detached view sessions of the base session", async () => {
    const server = new FakeTmuxServer();
    server.sessions.set("roomgate", ["demo-main"]);
    server.sessions.set("roomgate_view_aaa111", ["demo-main"]);
    server.sessions.set("roomgate_view_bbb222", ["demo-main"]);
    server.sessions.set("other_view_ccc333", ["x"]);
    server.attached.add("roomgate_view_bbb222");
    const tmux = new Tmux({ runner: server.runner });

    await expect(tmux.pruneDetachedViews("roomgate")).resolves.toEqual(["roomgate_view_aaa111"]);
    expect([...server.sessions.keys()]).toEqual(["roomgate", "roomgate_view_bbb222", "other_view_ccc333"]);
  });
});
