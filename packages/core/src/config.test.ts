import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { ConfigError, loadConfig, parseConfig } from "./config.js";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "switchboard-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", () => {
    const config = loadConfig(path.join(dir, "missing.yaml"), {});

    expect(config.server).toEqual({ bind: "127.0.0.1", port: 8000 });
    expect(config.runtime.defaultTopic).toBe("triage");
    expect(config.runtime.exitCommand).toBe("exit");
    expect(config.runtime.maxHandoffsPerTurn).toBe(5);
    expect(config.runtime.idleTimeoutMs).toBe(1_800_000);
    expect(config.provider.kind).toBe("openai");
    expect(config.persistence.dbPath).toBeUndefined();
    expect(config.workspace).toEqual({ documentsDir: "./workspace/documents", knowledgeDir: "./workspace/knowledge" });
    expect(config.logging.level).toBe("info");
  });

  it("reads YAML and fills in the rest", () => {
    const file = path.join(dir, "switchboard.config.yaml");
    fs.writeFileSync(
      file,
      ["server:", "  port: 9100", "provider:", "  kind: ollama", "  model: llama3.1", "runtime:", "  greeting: Hi there"].join("\n"),
    );

    const config = loadConfig(file, {});

    expect(config.server.port).toBe(9100);
    expect(config.server.bind).toBe("127.0.0.1");
    expect(config.provider).toEqual({ kind: "ollama", model: "llama3.1", timeoutMs: 60000 });
    expect(config.runtime.greeting).toBe("Hi there");
    expect(config.runtime.farewell).toBe("Goodbye! Your session has ended.");
  });

  it("applies environment overrides", () => {
    const config = loadConfig(path.join(dir, "missing.yaml"), {
      PORT: "7000",
      LOG_LEVEL: "debug",
      SWITCHBOARD_DB_PATH: "/tmp/sessions.db",
    });

    expect(config.server.port).toBe(7000);
    expect(config.logging.level).toBe("debug");
    expect(config.persistence.dbPath).toBe("/tmp/sessions.db");
  });

  it("reports invalid values with their path", () => {
    expect(() => parseConfig({ server: { port: "high" } })).toThrow(ConfigError);
    expect(() => parseConfig({ runtime: { maxHandoffsPerTurn: 0 } })).toThrow(/runtime\.maxHandoffsPerTurn/);
    expect(() => loadConfig(path.join(dir, "missing.yaml"), { LOG_LEVEL: "loud" })).toThrow("Invalid LOG_LEVEL: loud");
  });

  it("reports unparsable YAML", () => {
    const file = path.join(dir, "broken.yaml");
    fs.writeFileSync(file, "server: [unclosed");

    expect(() => loadConfig(file, {})).toThrow(/Could not parse/);
  });
});
