import { describe, expect, it } from "vitest";
import { assertLoopbackHostAllowed, isLoopbackHost, resolveConfig } from "../src/server/config.js";

describe("resolveConfig", () => {
  it("uses loopback defaults with auth off", () => {
    const config = resolveConfig({ ROOMGATE_WORKDIR: "/srv/rooms" });

    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBe(7777);
    expect(config.tmuxSession).toBe("roomgate");
    expect(config.tmuxSocket).toBeNull();
    expect(config.logLevel).toBe("warn");
    expect(config.authEnabled).toBe(false);
    expect(config.authToken).toBe("");
    expect(config.authTokenSource).toBe("disabled");
    expect(config.killTimeoutMs).toBe(2000);
    expect(config.heartbeatIntervalMs).toBe(30_000);
    expect(config.captureScrollback).toBe(500);
    expect(config.linkedViews).toBe(false);
    expect(config.workingDirectory).toBe("/srv/rooms");
    expect([...config.allowedOrigins]).toEqual([
      "http://127.0.0.1:7777",
      "http://localhost:7777",
      "http://[::1]:7777",
    ]);
  });

  it("reads overrides from the environment", () => {
    const config = resolveConfig({
      PORT: "9001",
      ROOMGATE_TMUX_SESSION: "orchestra",
      ROOMGATE_TMUX_SOCKET: "rg",
      ROOMGATE_LOG_LEVEL: "DEBUG",
      ROOMGATE_KILL_TIMEOUT_MS: "5",
      ROOMGATE_HEARTBEAT_MS: "0",
      ROOMGATE_LINKED_VIEWS: "yes",
      ROOMGATE_ALLOWED_ORIGINS: " https://Dash.example.test ,",
    });

    expect(config.port).toBe(9001);
    expect(config.tmuxSession).toBe("orchestra");
    expect(config.tmuxSocket).toBe("rg");
    expect(config.logLevel).toBe("debug");
    expect(config.killTimeoutMs).toBe(100);
    expect(config.heartbeatIntervalMs).toBe(0);
    expect(config.linkedViews).toBe(true);
    expect(config.allowedOrigins.has("https://dash.example.test")).toBe(true);
    expect(config.allowedOrigins.has("http://localhost:9001")).toBe(true);
  });

  it("falls back on unusable values", () => {
    const config = resolveConfig({ PORT: "70000", ROOMGATE_LOG_LEVEL: "chatty", ROOMGATE_KILL_TIMEOUT_MS: "soon" });

    expect(config.port).toBe(7777);
    expect(config.logLevel).toBe("warn");
    expect(config.killTimeoutMs).toBe(2000);
  });

  it("uses a configured token or generates one", () => {
    const configured = resolveConfig({ ROOMGATE_TOKEN_ENABLED: "1", ROOMGATE_TOKEN: "test-secret" });
    expect(configured.authToken).toBe("test-secret");
    expect(configured.authTokenSource).toBe("configured");

    const generated = resolveConfig({ ROOMGATE_TOKEN_ENABLED: "true" });
    expect(generated.authTokenSource).toBe("generated");
    expect(generated.authToken).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("loopback guard", () => {
  it("recognizes loopback hosts", () => {
    expect(isLoopbackHost("127.0.0.1")).toBe(true);
    expect(isLoopbackHost(" LOCALHOST ")).toBe(true);
    expect(isLoopbackHost("::1")).toBe(true);
    expect(isLoopbackHost("0.0.0.0")).toBe(false);
  });

  it("refuses a public bind unless allowed", () => {
    expect(() => assertLoopbackHostAllowed(resolveConfig({ HOST: "0.0.0.0" }))).toThrow(
      'Refusing to bind to non-loopback host "0.0.0.0". Set ROOMGATE_ALLOW_NON_LOOPBACK=1 to allow.',
    );
    expect(() =>
      assertLoopbackHostAllowed(resolveConfig({ HOST: "0.0.0.0", ROOMGATE_ALLOW_NON_LOOPBACK: "1" })),
    ).not.toThrow();
  });
});
