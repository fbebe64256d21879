import path from "node:path";
import { describe, expect, it } from "vitest";
import { ConfigError, loadConfig } from "../config.js";

describe("loadConfig", () => {
  it("falls back to defaults when env is empty", () => {
    const config = loadConfig({}, "/srv/shelf");

    expect(config).toEqual({
      nodeEnv: "development",
      port: 3000,
      databasePath: path.join("/srv/shelf", "data", "media.db"),
      logLevel: "debug"
    });
  });

  it("loads port and database path from env", () => {
    const config = loadConfig({ PORT: "8080", DATABASE_PATH: "/var/lib/shelf/media.db" });

    expect(config.port).toBe(8080);
    expect(config.databasePath).toBe("/var/lib/shelf/media.db");
  });

  it("derives the log level from NODE_ENV unless LOG_LEVEL is set", () => {
    expect(loadConfig({ NODE_ENV: "production" }).logLevel).toBe("info");
    expect(loadConfig({ NODE_ENV: "test" }).logLevel).toBe("silent");
    expect(loadConfig({ NODE_ENV: "production", LOG_LEVEL: "warn" }).logLevel).toBe("warn");
  });

  it("treats empty strings as unset", () => {
    expect(loadConfig({ PORT: "", DATABASE_PATH: "" }, "/srv/shelf")).toMatchObject({
      port: 3000,
      databasePath: path.join("/srv/shelf", "data", "media.db")
    });
  });

  it("rejects invalid values with every offending variable", () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: "70000", LOG_LEVEL: "loud" });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    const issues = caught instanceof ConfigError ? caught.issues : [];
    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^PORT: /);
    expect(issues[1]).toMatch(/^LOG_LEVEL: /);
  });

  it("rejects a non-numeric port", () => {
    expect(() => loadConfig({ PORT: "http" })).toThrow(ConfigError);
  });
});
