import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  EXIT_OK,
  EXIT_REJECTED,
  EXIT_USAGE,
  USAGE,
  runCli,
} from "../main.ts";
import { parseDocument, stringifyDocument } from "../model/document.ts";
import type { MenuTree } from "../model/types.ts";
import { command, folder, optionBox, separator } from "./helpers/tree.ts";

const tree: MenuTree = {
  nodes: [
    folder("tools", "Tools", [
      command("sphere", "Sphere"),
      optionBox("opts", "Sphere Options"),
    ]),
    separator("sep"),
    command("about", "About", { language: "mel", text: "about;" }),
  ],
};

let dir: string;
let stdout: string;
let stderr: string;

function inDir(name: string): string {
  return path.join(dir, name);
}

async function run(...argv: string[]): Promise<number> {
  return runCli(argv, {
    cwd: dir,
    env: {},
    io: {
      stdout: (text) => {
        stdout += text;
      },
      stderr: (text) => {
        stderr += text;
      },
    },
  });
}

beforeEach(async () => {
  dir = await mkdtemp(path.join(os.tmpdir(), "menu-builder-cli-"));
  stdout = "";
  stderr = "";
  await writeFile(path.join(dir, "menu.json"), stringifyDocument(tree));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("menu-builder", () => {
  it("shows the tree", async () => {
    expect(await run("show", "menu.json")).toBe(EXIT_OK);
    expect(stdout).toBe(
      [
        "Tools/",
        "  Sphere (python)",
        "  Sphere Options (python) [option box]",
        "----",
        "About (mel)",
        "",
      ].join("\n")
    );
  });

  it("validates a document", async () => {
    expect(await run("validate", "menu.json")).toBe(EXIT_OK);
    expect(stdout).toBe(`${inDir("menu.json")}: valid, 5 node(s)\n`);
  });

  it("rejects an invalid document with its rule and path", async () => {
    await writeFile(
      inDir("bad.json"),
      stringifyDocument({ nodes: [optionBox("o", "Opts")] })
    );
    expect(await run("validate", "bad.json")).toBe(EXIT_REJECTED);
    expect(stderr).toBe(
      "InvalidOptionBoxPosition at Opts: " +
        "an option box cannot be first among its siblings\n"
    );
  });

  it("merges two documents into an output file", async () => {
    await writeFile(
      inDir("extra.json"),
      stringifyDocument({
        nodes: [folder("t2", "Tools", [command("x", "X")])],
      })
    );
    const argv = ["menu.json", "extra.json", "--out", "merged.json"];
    expect(await run("merge", ...argv)).toBe(EXIT_OK);

    const merged = parseDocument(
      await readFile(inDir("merged.json"), "utf8")
    );
    expect(merged.ok).toBe(true);
    if (merged.ok) {
      const tools = merged.value.nodes[0];
      const childIds =
        tools.kind === "folder" ? tools.children.map((child) => child.id) : [];
      expect(childIds).toEqual(["sphere", "opts", "x"]);
    }
  });

  it("converts a legacy config to stdout", async () => {
    await writeFile(
      inDir("TempBar.json"),
      JSON.stringify([
        {
          sub_menu_path: "Tools",
          order: 10,
          menu_label: "Sphere",
          function_str: "mel:polySphere;",
        },
      ])
    );
    expect(await run("import-legacy", "TempBar.json")).toBe(EXIT_OK);

    const converted = parseDocument(stdout);
    expect(converted.ok).toBe(true);
    if (converted.ok) {
      expect(converted.value.nodes).toMatchObject([
        {
          kind: "folder",
          label: "Tools",
          children: [
            { kind: "command", label: "Sphere", commandLanguage: "mel" },
          ],
        },
      ]);
    }
  });

  it("imports shelf buttons into a folder of a document", async () => {
    await writeFile(
      inDir("shelf.mel"),
      'shelfButton -label "Ls" -command "ls;";'
    );
    const argv = ["shelf.mel", "--into", "menu.json", "--folder", "Shelf"];
    expect(await run("import-shelf", ...argv)).toBe(EXIT_OK);
    expect(stderr).toBe("Imported 1 command(s)\n");

    const updated = parseDocument(await readFile(inDir("menu.json"), "utf8"));
    expect(updated.ok).toBe(true);
    if (updated.ok) {
      const ids = updated.value.nodes.map((node) => node.id);
      expect(ids.slice(0, 3)).toEqual(["tools", "sep", "about"]);
      expect(updated.value.nodes[3]).toMatchObject({
        kind: "folder",
        label: "Shelf",
        children: [
          {
            kind: "command",
            label: "Ls",
            commandLanguage: "mel",
            commandText: "ls;",
          },
        ],
      });
    }
  });

  it("lists the callables of a script", async () => {
    await writeFile(
      inDir("rig_tools.py"),
      "def build_rig(name):\n    pass\n"
    );
    expect(await run("callables", "rig_tools.py")).toBe(EXIT_OK);
    expect(stdout).toBe("1\tbuild_rig(name)\tBuild Rig\n");
  });

  it("test-runs one command with the configured interpreter", async () => {
    await writeFile(
      inDir("settings.json"),
      JSON.stringify({ interpreters: { python: [process.execPath, "-"] } })
    );
    await writeFile(
      inDir("hello.json"),
      stringifyDocument({
        nodes: [
          command("hello", "Hello", { text: 'process.stdout.write("hi")' }),
        ],
      })
    );

    expect(await run("run", "hello.json", "hello")).toBe(EXIT_OK);
    expect(stdout).toBe("hi");
    expect(await run("run", "hello.json", "missing")).toBe(EXIT_REJECTED);
  });

  it("lists documents in the documents directory", async () => {
    await writeFile(
      inDir("settings.json"),
      JSON.stringify({ documentsDir: "." })
    );
    expect(await run("list")).toBe(EXIT_OK);
    expect(stdout).toBe("menu\nsettings\n");
  });

  it("prints usage for missing or unknown commands", async () => {
    expect(await run()).toBe(EXIT_USAGE);
    expect(stdout).toBe(USAGE);

    expect(await run("nope")).toBe(EXIT_USAGE);
    expect(stderr.startsWith('Unknown command "nope"')).toBe(true);
  });

  it("treats unknown options and missing arguments as misuse", async () => {
    expect(await run("show", "--bogus")).toBe(EXIT_USAGE);
    expect(await run("validate")).toBe(EXIT_USAGE);
    expect(stderr).toContain("Missing <file>");
  });

  it("prints help", async () => {
    expect(await run("--help")).toBe(EXIT_OK);
    expect(stdout).toBe(USAGE);
  });
});
