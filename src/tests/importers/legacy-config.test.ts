import { describe, expect, it } from "vitest";
import { importLegacyMenuConfig } from "../../importers/legacy-config.ts";
import {
  command,
  folder,
  optionBox,
  separator,
  sequentialIds,
} from "../helpers/tree.ts";

const legacy = JSON.stringify([
  {
    sub_menu_path: "Tools/Rig",
    order: 30,
    menu_label: "Build",
    function_str: "import rig; rig.build()",
    icon_path: "rig.png",
    is_option_box: false,
  },
  {
    sub_menu_path: "Tools",
    order: 10,
    menu_label: "Sphere",
    function_str: "mel: polySphere;",
    icon_path: "",
  },
  {
    sub_menu_path: "Tools",
    order: 20,
    menu_label: "",
    function_str: "cmds.polySphere",
    is_option_box: true,
  },
  { sub_menu_path: "", order: 40, menu_label: "---", function_str: "" },
  {
    order: 50,
    menu_label: "About",
    function_str: "about",
    command_type: "mel",
  },
]);

describe("importLegacyMenuConfig", () => {
  it("builds folders from paths and orders items by their sort key", () => {
    const result = importLegacyMenuConfig(legacy, {
      generateId: sequentialIds(),
    });
    expect(result).toEqual({
      ok: true,
      value: {
        nodes: [
          folder("n1", "Tools", [
            command("n2", "Sphere", { language: "mel", text: "polySphere;" }),
            {
              ...optionBox("n3", "Poly Sphere"),
              commandText: "cmds.polySphere",
            },
            folder("n4", "Rig", [
              command("n5", "Build", {
                text: "import rig; rig.build()",
                iconRef: "rig.png",
              }),
            ]),
          ]),
          separator("n6"),
          command("n7", "About", { language: "mel", text: "about" }),
        ],
      },
    });
  });

  it("reports malformed items with their location", () => {
    const result = importLegacyMenuConfig(JSON.stringify([{ order: "first" }]));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({
        rule: "InvalidShape",
        path: "[0].order",
      });
    }
  });

  it("reports text that is not JSON", () => {
    const result = importLegacyMenuConfig("[");
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.rule).toBe("InvalidJson");
  });

  it("refuses a list whose first item is an option box", () => {
    const result = importLegacyMenuConfig(
      JSON.stringify([
        { menu_label: "Options", function_str: "opts()", is_option_box: true },
      ])
    );
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toMatchObject({
        rule: "InvalidOptionBoxPosition",
        path: "Options",
      });
    }
  });
});
