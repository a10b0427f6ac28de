import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();
    expect(config.templates).toEqual({
      directory: "_templates",
      assetDirectory: "_template",
      defaultTemplate: "default",
    });
    expect(config.breadcrumbs).toEqual({ rootLabel: "root", separator: " / " });
    expect(config.watch.debounce).toBe(100);
  });
});

describe("mergeConfig", () => {
  it("merges nested sections key by key", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      output: "public",
      templates: { assetDirectory: "assets" },
      tokens: { datePrefix: "Written " },
    });

    expect(merged.output).toBe("public");
    expect(merged.input).toBe(base.input);
    expect(merged.templates).toEqual({
      directory: "_templates",
      assetDirectory: "assets",
      defaultTemplate: "default",
    });
    expect(merged.tokens.datePrefix).toBe("Written ");
    expect(merged.markdown).toEqual(base.markdown);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "mdsite-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const configPath = join(dir, "site.json");
    await writeFile(
      configPath,
      JSON.stringify({ breadcrumbs: { separator: " › " } }),
    );

    const { config, errors } = await loadConfig(configPath);
    expect(config.breadcrumbs.separator).toBe(" › ");
    expect(errors.filter((e) => e.path === configPath)).toEqual([]);
  });

  it("reports an invalid custom config and keeps going", async () => {
    const configPath = join(dir, "broken.json");
    await writeFile(configPath, JSON.stringify({ watch: { debounce: -5 } }));

    const { config, errors } = await loadConfig(configPath);
    expect(errors.filter((e) => e.path === configPath)).toHaveLength(1);
    expect(config.watch.debounce).toBeGreaterThanOrEqual(0);
  });
});
