import { describe, expect, it } from "vitest";
import {
  commandFromCallable,
  generateLabel,
  listCallables,
  type CallableSignature,
} from "../../importers/script-parser.ts";

const pythonSource = [
  "import maya.cmds as cmds",
  "",
  "def build_rig(name, count=3, *args, **kwargs):",
  "    pass",
  "",
  "async def fetchAssets():",
  '    print "old syntax is tolerated"',
  "",
  "class Tool:",
  "    def method(self):",
  "        pass",
  "",
  "def spread(",
  "    a: int,",
  "    b=(1, 2),",
  "):",
  "    pass",
].join("\n");

const melSource = [
  "global proc string[] listJoints(string $root, int $depth)",
  "{",
  "}",
  "proc helper() {}",
  "global proc openTool()",
  "{",
  "}",
].join("\n");

describe("listCallables", () => {
  it("finds top-level Python functions with their lines and parameters", () => {
    expect(listCallables(pythonSource)).toEqual([
      {
        name: "build_rig",
        language: "python",
        line: 3,
        params: ["name", "count", "*args", "**kwargs"],
      },
      { name: "fetchAssets", language: "python", line: 6, params: [] },
      { name: "spread", language: "python", line: 13, params: ["a", "b"] },
    ]);
  });

  it("finds global MEL procedures", () => {
    expect(listCallables(melSource, { language: "mel" })).toEqual([
      {
        name: "listJoints",
        language: "mel",
        line: 1,
        params: ["$root", "$depth"],
        returnType: "string[]",
      },
      { name: "openTool", language: "mel", line: 5, params: [] },
    ]);
  });

  it("stops when aborted", () => {
    const controller = new AbortController();
    controller.abort();
    const { signal } = controller;
    expect(() => listCallables(pythonSource, { signal })).toThrow();
  });
});

describe("generateLabel", () => {
  it.each([
    ["my_awesome_tool", "My Awesome Tool"],
    ["cmds.polySphere", "Poly Sphere"],
    ["import rigTools; rigTools.main()", "Rig Tools"],
    ["tool.run()", "Tool"],
    ["exportFBX", "Export Fbx"],
  ])("%s → %s", (input, expected) => {
    expect(generateLabel(input)).toBe(expected);
  });
});

describe("commandFromCallable", () => {
  it("reloads the module before calling a Python function", () => {
    const callable: CallableSignature = {
      name: "build_rig",
      language: "python",
      line: 1,
      params: [],
    };
    expect(commandFromCallable("rig_tools", callable)).toEqual({
      kind: "command",
      label: "Build Rig",
      commandLanguage: "python",
      commandText: [
        "import rig_tools",
        "from importlib import reload",
        "reload(rig_tools)",
        "rig_tools.build_rig()",
      ].join("\n"),
    });
  });

  it("calls a MEL procedure directly", () => {
    const callable: CallableSignature = {
      name: "openTool",
      language: "mel",
      line: 5,
      params: [],
    };
    expect(commandFromCallable("ignored", callable)).toEqual({
      kind: "command",
      label: "Open Tool",
      commandLanguage: "mel",
      commandText: "openTool();",
    });
  });
});
