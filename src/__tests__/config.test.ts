import { describe, it, expect } from "vitest";

import { loadConfig } from "../config.js";
import { ConfigError } from "../errors.js";

const baseEnv = {
  HOST: "db.test",
  PORT: "5432",
  USER: "alice",
  DATABASE: "app",
  PASSWORD: "test-secret",
};

function issuesOf(env: Record<string, string | undefined>): readonly string[] {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  throw new Error("expected loadConfig() to throw");
}

describe("loadConfig()", () => {
  it("reads the connection settings", () => {
    const { config } = loadConfig(baseEnv);

    expect(config).toEqual({
      host: "db.test",
      port: 5432,
      user: "alice",
      database: "app",
      password: "test-secret",
    });
  });

  it("verifies certificates with no timeout by default", () => {
    const { transport } = loadConfig(baseEnv);

    expect(transport.rejectUnauthorized).toBe(true);
    expect(transport.caFile).toBeUndefined();
    expect(transport.timeoutMs).toBeUndefined();
  });

  it("ignores unrelated variables", () => {
    expect(() => loadConfig({ ...baseEnv, PATH: "/usr/bin", LANG: "C" })).not.toThrow();
  });

  it("reports every missing variable at once", () => {
    expect(issuesOf({})).toEqual([
      "HOST is required",
      "PORT is required",
      "USER is required",
      "DATABASE is required",
      "PASSWORD is required",
    ]);
  });

  it("throws a ConfigError", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
  });

  it("rejects a non-numeric port", () => {
    expect(issuesOf({ ...baseEnv, PORT: "abc" })).toEqual(["PORT must be an integer"]);
  });

  it.each(["0", "65536", "70000"])("rejects port %s as out of range", (port) => {
    expect(issuesOf({ ...baseEnv, PORT: port })).toEqual(["PORT must be between 1 and 65535"]);
  });

  it("rejects an empty host", () => {
    expect(issuesOf({ ...baseEnv, HOST: "" })).toEqual(["HOST must not be empty"]);
  });

  it("accepts an empty password", () => {
    expect(loadConfig({ ...baseEnv, PASSWORD: "" }).config.password).toBe("");
  });

  it.each([
    ["1", false],
    ["true", false],
    ["0", true],
    ["false", true],
  ])("maps PGPROBE_TLS_INSECURE=%s to rejectUnauthorized=%s", (value, rejectUnauthorized) => {
    const { transport } = loadConfig({ ...baseEnv, PGPROBE_TLS_INSECURE: value });

    expect(transport.rejectUnauthorized).toBe(rejectUnauthorized);
  });

  it("rejects an unrecognized PGPROBE_TLS_INSECURE value", () => {
    expect(issuesOf({ ...baseEnv, PGPROBE_TLS_INSECURE: "yes" })).toEqual([
      "PGPROBE_TLS_INSECURE must be 0, 1, false or true",
    ]);
  });

  it("reads the CA file path and timeout", () => {
    const { transport } = loadConfig({
      ...baseEnv,
      PGPROBE_CA_FILE: "/etc/ssl/pg-ca.pem",
      PGPROBE_TIMEOUT_MS: "2500",
    });

    expect(transport).toEqual({
      rejectUnauthorized: true,
      caFile: "/etc/ssl/pg-ca.pem",
      timeoutMs: 2500,
    });
  });

  it("rejects a non-numeric timeout", () => {
    expect(issuesOf({ ...baseEnv, PGPROBE_TIMEOUT_MS: "soon" })).toEqual([
      "PGPROBE_TIMEOUT_MS must be a whole number of milliseconds",
    ]);
  });
});
