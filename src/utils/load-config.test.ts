import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";
import type { ConversionConfig } from "../types";

describe("loadDefaultConfig", () => {
  it("loads the shipped defaults", async () => {
    const config = await loadDefaultConfig();
    expect(config.markers.header).toEqual({
      start: "; HEADER_BLOCK_START",
      end: "; HEADER_BLOCK_END",
    });
    expect(config.triggers.filamentStart).toBe("; filament start gcode");
    expect(config.subroutines.enabled).toBe(true);
    expect(config.backup).toEqual({ enabled: true, suffix: ".backup" });
  });
});

describe("mergeConfig", () => {
  let base: ConversionConfig;

  beforeAll(async () => {
    base = await loadDefaultConfig();
  });

  it("replaces a single marker pair", () => {
    const merged = mergeConfig(base, {
      markers: { config: { start: "; CFG_START", end: "; CFG_END" } },
    });
    expect(merged.markers.config).toEqual({
      start: "; CFG_START",
      end: "; CFG_END",
    });
    expect(merged.markers.header).toEqual(base.markers.header);
  });

  it("merges nested settings", () => {
    const merged = mergeConfig(base, {
      subroutines: { enabled: false },
      logging: { level: "debug" },
    });
    expect(merged.subroutines).toEqual({ ...base.subroutines, enabled: false });
    expect(merged.logging.level).toBe("debug");
    expect(merged.backup).toEqual(base.backup);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), "ff-gcode-post-config-"));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const path = join(dir, "custom.json");
    await writeFile(path, JSON.stringify({ backup: { suffix: ".orig" } }));
    const { config, errors } = await loadConfig(path);
    expect(config.backup.suffix).toBe(".orig");
    expect(errors.filter((e) => e.path === path)).toEqual([]);
  });

  it("reports an invalid custom config and keeps going", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json");
    const { errors } = await loadConfig(path);
    expect(errors.map((e) => e.path)).toContain(path);
  });
});
