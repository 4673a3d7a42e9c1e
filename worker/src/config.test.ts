import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ConfigError } from "./errors";

describe("loadConfig", () => {
  it("applies defaults around the queue name", () => {
    expect(loadConfig({ RAIL_QUEUE_NAME: "D3test-queue" })).toEqual({
      queueName: "D3test-queue",
      host: "datafeeds.nationalrail.co.uk",
      port: 61613,
      username: "d3user",
      password: "d3password",
      runSeconds: 10,
      logRaw: false,
    });
  });

  it("reads overrides", () => {
    const config = loadConfig({
      RAIL_QUEUE_NAME: "test-queue",
      RAIL_HOST: "localhost",
      RAIL_PORT: "61614",
      RAIL_USERNAME: "test-user",
      RAIL_PASSWORD: "test-secret",
      RAIL_RUN_SECONDS: "2.5",
      RAIL_LOG_RAW: "1",
    });

    expect(config.host).toBe("localhost");
    expect(config.port).toBe(61614);
    expect(config.username).toBe("test-user");
    expect(config.password).toBe("test-secret");
    expect(config.runSeconds).toBe(2.5);
    expect(config.logRaw).toBe(true);
  });

  it("requires a queue name", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
  });

  it("rejects a blank queue name", () => {
    expect(() => loadConfig({ RAIL_QUEUE_NAME: "   " })).toThrow(
      "RAIL_QUEUE_NAME: queue name must not be empty",
    );
  });

  it("lists every invalid variable", () => {
    let caught: unknown;
    try {
      loadConfig({ RAIL_QUEUE_NAME: "test-queue", RAIL_PORT: "70000", RAIL_RUN_SECONDS: "0" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues.map((issue) => issue.split(":")[0])).toEqual(["RAIL_PORT", "RAIL_RUN_SECONDS"]);
    }
  });
});
