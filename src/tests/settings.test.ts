import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { defaultSettings, loadSettings } from "../settings.ts";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "menu-builder-settings-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("loadSettings", () => {
  it("falls back to the defaults when there is no file", async () => {
    const loaded = await loadSettings({ cwd: dir, env: {} });
    expect(loaded).toEqual({
      settings: defaultSettings(dir),
      source: path.join(dir, "settings.json"),
      warnings: [],
    });
    expect(loaded.settings.defaultDocument).toBe("TempBar");
    expect(loaded.settings.languages).toEqual(["zh_tw", "en_us", "ja_jp"]);
    expect(loaded.settings.documentsDir).toBe(path.join(dir, "menuitems"));
  });

  it("lays user values over the defaults", async () => {
    await writeFile(
      path.join(dir, "settings.json"),
      JSON.stringify({
        defaultDocument: "Studio",
        logLevel: "info",
        documentsDir: "menus",
        interpreters: { python: ["py"] },
      })
    );

    const { settings, warnings } = await loadSettings({ cwd: dir, env: {} });
    expect(warnings).toEqual([]);
    expect(settings).toMatchObject({
      defaultDocument: "Studio",
      logLevel: "info",
      language: "en_us",
      documentsDir: path.join(dir, "menus"),
    });
    expect(settings.interpreters.python).toEqual(["py"]);
    expect(settings.interpreters.mel).toEqual(
      defaultSettings(dir).interpreters.mel
    );
  });

  it("warns and keeps the defaults for an invalid file", async () => {
    const source = path.join(dir, "settings.json");
    await writeFile(source, JSON.stringify({ logLevel: "loud" }));

    const { settings, warnings } = await loadSettings({ cwd: dir, env: {} });
    expect(settings).toEqual(defaultSettings(dir));
    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(`Ignoring ${source}: `)).toBe(true);
  });

  it("warns about a file that is not JSON", async () => {
    await writeFile(path.join(dir, "settings.json"), "{ nope");
    const { warnings } = await loadSettings({ cwd: dir, env: {} });
    expect(warnings).toHaveLength(1);
  });

  it("honours the environment overrides", async () => {
    await mkdir(path.join(dir, "conf"));
    await writeFile(
      path.join(dir, "conf", "alt.json"),
      JSON.stringify({ language: "ja_jp" })
    );

    const loaded = await loadSettings({
      cwd: dir,
      env: {
        MENU_BUILDER_SETTINGS: "conf/alt.json",
        MENU_BUILDER_DOCUMENTS_DIR: "shared",
      },
    });
    expect(loaded.source).toBe(path.join(dir, "conf", "alt.json"));
    expect(loaded.settings.language).toBe("ja_jp");
    expect(loaded.settings.documentsDir).toBe(path.join(dir, "shared"));
  });
});
