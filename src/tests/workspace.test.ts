import { mkdtemp, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { StructureEngine } from "../model/engine.ts";
import { ROOT_ID } from "../model/types.ts";
import { saveDocument } from "../persistence.ts";
import { defaultSettings, type Settings } from "../settings.ts";
import { Workspace } from "../workspace.ts";
import { command, folder, optionBox, sequentialIds } from "./helpers/tree.ts";

let dir: string;
let settings: Settings;
let workspace: Workspace;

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "menu-builder-ws-"));
  settings = { ...defaultSettings(dir), documentsDir: path.join(dir, "menus") };
  const engine = new StructureEngine({ generateId: sequentialIds() });
  workspace = new Workspace(settings, { engine });
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("Workspace", () => {
  it("starts an empty default document when none exists", async () => {
    expect(await workspace.listDocuments()).toEqual({ ok: true, value: [] });
    expect(await workspace.openDefault()).toEqual({
      ok: true,
      value: { nodes: [] },
    });
    expect(workspace.documentName).toBe("TempBar");
    expect(workspace.isDirty).toBe(false);
  });

  it("tracks unsaved changes until saved", async () => {
    await workspace.openDefault();
    const added = workspace.engine.addNode({ kind: "folder", label: "Tools" });
    expect(added.ok).toBe(true);
    expect(workspace.isDirty).toBe(true);

    expect(await workspace.save()).toEqual({
      ok: true,
      value: path.join(dir, "menus", "TempBar.json"),
    });
    expect(workspace.isDirty).toBe(false);
    expect(await workspace.listDocuments()).toEqual({
      ok: true,
      value: ["TempBar"],
    });
  });

  it("stays clean after an edit that changes nothing", async () => {
    await workspace.openDefault();
    const added = workspace.engine.addNode({ kind: "folder", label: "Tools" });
    if (!added.ok) throw new Error("could not add folder");
    expect((await workspace.save()).ok).toBe(true);

    expect(workspace.engine.beginEdit(added.value).ok).toBe(true);
    expect(workspace.engine.commitEdit({ label: "Tools" }).ok).toBe(true);
    expect(workspace.isDirty).toBe(false);
  });

  it("saves under a new name", async () => {
    await workspace.openDefault();
    expect((await workspace.saveAs("Studio")).ok).toBe(true);
    expect(workspace.documentName).toBe("Studio");
    expect(await workspace.listDocuments()).toEqual({
      ok: true,
      value: ["Studio"],
    });
  });

  it("keeps the open document when another fails to load", async () => {
    const tree = {
      nodes: [folder("tools", "Tools", [command("sphere", "Sphere")])],
    };
    await saveDocument(workspace.pathOf("Studio"), tree);
    await writeFile(workspace.pathOf("Broken"), "{");

    expect(await workspace.open("Studio")).toEqual({ ok: true, value: tree });
    expect(workspace.documentName).toBe("Studio");

    const broken = await workspace.open("Broken");
    expect(broken.ok).toBe(false);
    if (!broken.ok) {
      expect(broken.error).toMatchObject({
        type: "FormatError",
        rule: "InvalidJson",
      });
    }
    expect(workspace.documentName).toBe("Studio");
    expect(workspace.engine.snapshot()).toEqual(tree);
  });

  it("merges another document into the open one", async () => {
    await saveDocument(workspace.pathOf("Base"), {
      nodes: [folder("tools", "Tools", [command("a", "A")])],
    });
    await saveDocument(workspace.pathOf("Extra"), {
      nodes: [
        folder("t2", "Tools", [
          command("b", "B"),
          optionBox("a", "B Options"),
        ]),
      ],
    });
    await workspace.open("Base");

    const merged = await workspace.merge("Extra");
    expect(merged.ok).toBe(true);
    if (merged.ok) {
      expect(merged.value.reassignedIds).toEqual(
        new Map([
          ["t2", "tools"],
          ["a", "n1"],
        ])
      );
    }
    expect(workspace.engine.getChildIds("tools")).toEqual(["a", "b", "n1"]);
    expect(workspace.isDirty).toBe(true);
  });

  it("imports shelf buttons at the end of a folder", async () => {
    const shelf = path.join(dir, "shelf_Custom.mel");
    await writeFile(
      shelf,
      [
        'shelfButton -label "One" -command "one;";',
        'shelfButton -label "Two" -command "two;";',
        "",
      ].join("\n")
    );
    await workspace.openDefault();
    const parent = workspace.engine.addNode({ kind: "folder", label: "Shelf" });
    if (!parent.ok) throw new Error("could not add folder");

    expect(await workspace.importShelf(shelf, parent.value)).toEqual({
      ok: true,
      value: ["n2", "n3"],
    });
    expect(workspace.engine.getNode("n3")).toMatchObject({
      label: "Two",
      commandLanguage: "mel",
      commandText: "two;",
    });
  });

  it("refuses a shelf import into an unknown folder", async () => {
    const shelf = path.join(dir, "none.mel");
    expect(await workspace.importShelf(shelf, "missing")).toEqual({
      ok: false,
      error: { type: "NotFound", nodeId: "missing" },
    });
    expect(workspace.engine.getChildIds(ROOT_ID)).toEqual([]);
  });
});
