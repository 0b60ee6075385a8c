import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ConfigError, loadConfig } from "../src/config.ts";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "folio-config-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true });
});

describe("loadConfig", () => {
  it("reads the vault and defaults from the environment", () => {
    expect(loadConfig({ FOLIO_VAULT: dir })).toEqual({
      vaultPath: dir,
      dailyNotesPath: undefined,
      templatesPath: "templates",
      logLevel: "info",
      port: 3001,
    });
  });

  it("prefers an explicit vault argument", () => {
    const other = join(dir, "..");
    expect(loadConfig({ FOLIO_VAULT: other }, dir).vaultPath).toBe(dir);
  });

  it("reads optional settings", () => {
    const config = loadConfig({
      FOLIO_VAULT: dir,
      FOLIO_DAILY_NOTES: "journal",
      FOLIO_TEMPLATES: "_templates",
      FOLIO_LOG_LEVEL: "debug",
      PORT: "8080",
    });

    expect(config.dailyNotesPath).toBe("journal");
    expect(config.templatesPath).toBe("_templates");
    expect(config.logLevel).toBe("debug");
    expect(config.port).toBe(8080);
  });

  it("requires a vault", () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
  });

  it("requires the vault to exist", () => {
    const missing = join(dir, "missing");
    expect(() => loadConfig({ FOLIO_VAULT: missing })).toThrow(`Vault location does not exist: ${missing}`);
  });

  it("requires the vault to be a directory", async () => {
    const file = join(dir, "file.md");
    await writeFile(file, "x");
    expect(() => loadConfig({ FOLIO_VAULT: file })).toThrow(`Vault location is not a directory: ${file}`);
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ FOLIO_VAULT: dir, FOLIO_LOG_LEVEL: "loud" })).toThrow(/^Invalid environment: FOLIO_LOG_LEVEL/);
  });
});
