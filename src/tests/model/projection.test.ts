import { describe, expect, it } from "vitest";
import { StructureEngine } from "../../model/engine.ts";
import { flattenMenu, projectMenu } from "../../model/projection.ts";
import type { MenuTree } from "../../model/types.ts";
import { command, folder, optionBox, separator } from "../helpers/tree.ts";

const tree: MenuTree = {
  nodes: [
    folder("f", "Tools", [
      command("s", "Sphere", { iconRef: "sphere.png" }),
      optionBox("o", "Opts"),
    ]),
    separator("sep"),
    command("about", "About", { language: "mel", text: "about;" }),
  ],
};

describe("projectMenu", () => {
  it("maps folders, commands and separators, attaching option boxes", () => {
    expect(projectMenu(tree)).toEqual({
      ok: true,
      value: [
        {
          type: "submenu",
          id: "f",
          label: "Tools",
          entries: [
            {
              type: "action",
              id: "s",
              label: "Sphere",
              iconRef: "sphere.png",
              language: "python",
              commandText: 'print("Sphere")',
              optionBox: {
                id: "o",
                label: "Opts",
                language: "python",
                commandText: 'print("Opts")',
              },
            },
          ],
        },
        { type: "divider", id: "sep" },
        {
          type: "action",
          id: "about",
          label: "About",
          language: "mel",
          commandText: "about;",
        },
      ],
    });
  });

  it("refuses an invalid tree", () => {
    const result = projectMenu({
      nodes: [separator("s"), optionBox("o", "Opts")],
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({
        rule: "InvalidOptionBoxPosition",
        path: "Opts",
      });
    }
  });

  it("is what the engine hands the renderer", () => {
    const engine = new StructureEngine();
    expect(engine.open(tree).ok).toBe(true);
    expect(engine.renderPlan()).toEqual(projectMenu(tree));
  });
});

describe("flattenMenu", () => {
  it("lists nodes in render order with depth and path", () => {
    const rows = Array.from(flattenMenu(tree), ({ node, depth, path }) => [
      node.id,
      depth,
      path,
    ]);
    expect(rows).toEqual([
      ["f", 0, ""],
      ["s", 1, "Tools"],
      ["o", 1, "Tools"],
      ["sep", 0, ""],
      ["about", 0, ""],
    ]);
  });
});
