/**
 * Configuration loading tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import * as os from "node:os";

import { configFromEnv, loadConfig, parseConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("parseConfig", () => {
  it("should apply defaults", () => {
    const config = parseConfig({ dataDir: "/tmp/storyweave" });

    expect(config.storage).toBe("memory");
    expect(config.coordinator.lockPolicy).toBe("queue");
    expect(config.coordinator.prepareDeadlineMs).toBe(10_000);
    expect(config.coordinator.retry.maxAttempts).toBe(3);
    expect(config.reconciliation.maxAttempts).toBe(5);
    expect(config.postgres).toBeUndefined();
  });

  it("should list every invalid field", () => {
    try {
      parseConfig({ storage: "disk", coordinator: { prepareDeadlineMs: -1 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(String(error)).toContain("storage");
      expect(String(error)).toContain("coordinator.prepareDeadlineMs");
    }
  });
});

describe("configFromEnv", () => {
  it("should map STORYWEAVE_ variables", () => {
    expect(
      configFromEnv({
        STORYWEAVE_STORAGE: "file",
        STORYWEAVE_LOCK_POLICY: "fail-fast",
        STORYWEAVE_PREPARE_DEADLINE_MS: "250",
        STORYWEAVE_PG_URL: "postgres://localhost/test",
      })
    ).toEqual({
      storage: "file",
      coordinator: { lockPolicy: "fail-fast", prepareDeadlineMs: 250 },
      postgres: { connectionString: "postgres://localhost/test" },
    });
  });

  it("should reject a non-integer deadline", () => {
    expect(() => configFromEnv({ STORYWEAVE_COMMIT_DEADLINE_MS: "soon" })).toThrow(ConfigurationError);
  });
});

describe("loadConfig", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), "config-test-"));
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("should layer file, environment and overrides", async () => {
    const configPath = path.join(tempDir, "config.json");
    await fs.writeFile(
      configPath,
      JSON.stringify({ storage: "file", coordinator: { lockPolicy: "fail-fast", commitDeadlineMs: 500 } }),
      "utf-8"
    );

    const config = await loadConfig({
      configPath,
      env: { STORYWEAVE_COMMIT_DEADLINE_MS: "700" },
      overrides: { dataDir: tempDir, coordinator: { prepareDeadlineMs: 300 } },
    });

    expect(config.dataDir).toBe(tempDir);
    expect(config.storage).toBe("file");
    expect(config.coordinator.lockPolicy).toBe("fail-fast");
    expect(config.coordinator.commitDeadlineMs).toBe(700);
    expect(config.coordinator.prepareDeadlineMs).toBe(300);
  });

  it("should fall back to defaults when no file exists", async () => {
    const config = await loadConfig({ configPath: path.join(tempDir, "missing.json"), env: {} });
    expect(config.coordinator.lockPolicy).toBe("queue");
  });

  it("should reject a file that is not a JSON object", async () => {
    const configPath = path.join(tempDir, "config.json");
    await fs.writeFile(configPath, "[1, 2]", "utf-8");

    await expect(loadConfig({ configPath, env: {} })).rejects.toBeInstanceOf(ConfigurationError);
  });
});
