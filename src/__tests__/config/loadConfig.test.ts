import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "../../config";

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "postgrab-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, JSON.stringify(content), "utf-8");
    return file;
  }

  it("returns the defaults without a file or environment", () => {
    expect(loadConfig(undefined, {})).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.maxAttempts).toBe(5);
    expect(DEFAULT_CONFIG.apiBaseUrl).toBe("https://kemono.su/api/v1");
  });

  it("applies file values under environment values", () => {
    const file = writeConfig({ downloadsDir: "from-file", downloadConcurrency: 2, userAgent: "file-agent" });

    const config = loadConfig(file, { DOWNLOADS_DIR: "from-env", MAX_ATTEMPTS: "3", IGNORE_HTTPS_ERRORS: "yes" });

    expect(config.downloadsDir).toBe("from-env");
    expect(config.downloadConcurrency).toBe(2);
    expect(config.userAgent).toBe("file-agent");
    expect(config.maxAttempts).toBe(3);
    expect(config.ignoreHttpsErrors).toBe(true);
  });

  it("falls back when a numeric variable does not parse", () => {
    expect(loadConfig(undefined, { DOWNLOAD_CONCURRENCY: "many" }).downloadConcurrency).toBe(5);
  });

  it("disables the log file with an empty LOG_FILE", () => {
    expect(loadConfig(undefined, { LOG_FILE: "" }).logFile).toBeUndefined();
    expect(loadConfig(undefined, { LOG_FILE: "custom.log" }).logFile).toBe("custom.log");
  });

  it("rejects a missing file", () => {
    const missing = path.join(dir, "nope.json");

    expect(() => loadConfig(missing, {})).toThrow(`Config file not found: ${missing}`);
  });

  it("rejects a value of the wrong type", () => {
    const file = writeConfig({ maxAttempts: "five" });

    expect(() => loadConfig(file, {})).toThrow(
      `Invalid config file ${file}: maxAttempts: Expected number, received string`,
    );
  });

  it.each(["downloadConcurrency", "resolveConcurrency", "maxAttempts"])("rejects a fractional %s", (key) => {
    const file = writeConfig({ [key]: 2.5 });

    expect(() => loadConfig(file, {})).toThrow(`Invalid config file ${file}: ${key}: Expected integer, received float`);
  });

  it("rejects a concurrency of zero", () => {
    const file = writeConfig({ downloadConcurrency: 0 });

    expect(() => loadConfig(file, {})).toThrow(`Invalid config file ${file}: downloadConcurrency:`);
  });

  it("ignores environment values below the allowed minimum", () => {
    const config = loadConfig(undefined, { RESOLVE_CONCURRENCY: "0", RETRY_DELAY_MS: "0", MAX_ATTEMPTS: "-2" });

    expect(config.resolveConcurrency).toBe(5);
    expect(config.retryDelayMs).toBe(0);
    expect(config.maxAttempts).toBe(5);
  });

  it("rejects a file that is not an object", () => {
    const file = writeConfig([1, 2]);

    expect(() => loadConfig(file, {})).toThrow(`Config file must contain a JSON object: ${file}`);
  });
});
