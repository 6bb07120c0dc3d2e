import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, resolveConfig } from "../src/config";
import { PreconditionError } from "../src/errors";
import { makeLogger } from "../src/logging";

describe("config", () => {
  it("falls back to defaults", () => {
    expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
  });

  it("reads the environment", () => {
    const cfg = resolveConfig(
      {},
      {
        TICKWIRE_HOST: "node.test",
        TICKWIRE_PORT: "31841",
        TICKWIRE_READ_TIMEOUT_MS: "500",
        LOG_LEVEL: "debug",
        TICKWIRE_PRETTY_LOGS: "1",
      },
    );
    expect(cfg).toEqual({
      host: "node.test",
      port: 31841,
      connectTimeoutMs: 30_000,
      readTimeoutMs: 500,
      logLevel: "debug",
      prettyLogs: true,
    });
  });

  it("lets explicit overrides win over the environment", () => {
    const cfg = resolveConfig({ port: 1, host: undefined }, { TICKWIRE_PORT: "2", TICKWIRE_HOST: "env.test" });
    expect(cfg.port).toBe(1);
    expect(cfg.host).toBe("env.test");
  });

  it("ignores blank numeric variables", () => {
    expect(resolveConfig({}, { TICKWIRE_PORT: "  " }).port).toBe(21841);
  });

  it("lists every invalid field", () => {
    try {
      resolveConfig({ port: 0 }, { LOG_LEVEL: "loud" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(PreconditionError);
      expect(String(err)).toContain("port:");
      expect(String(err)).toContain("logLevel:");
    }
  });

  it("rejects a non-numeric port", () => {
    expect(() => resolveConfig({}, { TICKWIRE_PORT: "abc" })).toThrow(PreconditionError);
  });

  it("builds a pino logger at the requested level", () => {
    expect(makeLogger("warn").level).toBe("warn");
  });
});
