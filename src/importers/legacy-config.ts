/**
 * Legacy Menu Config Importer
 *
 * Converts the flat item list written by earlier versions of the tool
 * into a menu tree. Each legacy item carries its folder path as a string
 * and its position as a sort key:
 *
 *   [{ "sub_menu_path": "Tools/Rigging", "order": 20,
 *      "menu_label": "Build Rig", "function_str": "import rig; rig.build()",
 *      "icon_path": "", "is_option_box": false }, ...]
 *
 * Mapping:
 *   order                        → sibling order (stable sort)
 *   sub_menu_path "A/B"          → nested folders A, B (created on first use)
 *   function_str "mel:..."       → MEL command, prefix dropped
 *   command_type "mel"           → MEL command
 *   is_divider, label "-" / "---" / "separator" → separator
 *   empty menu_label             → label generated from function_str
 */

import { type } from "arktype";
import { formatJsonPath } from "../model/document.ts";
import { findInvariantViolation } from "../model/invariants.ts";
import {
  err,
  formatError,
  ok,
  type FormatError,
  type Result,
} from "../model/result.ts";
import { generateId } from "../model/schema.ts";
import type {
  CommandLanguage,
  CommandNode,
  FolderNode,
  MenuNode,
  MenuTree,
  NodeId,
} from "../model/types.ts";
import { generateLabel } from "./script-parser.ts";

const LegacyMenuItem = type({
  "sub_menu_path?": "string",
  "order?": "number",
  "function_str?": "string",
  "menu_label?": "string",
  "module_path?": "string",
  "icon_path?": "string",
  "is_option_box?": "boolean",
  "is_divider?": "boolean",
  "command_type?": "string",
});

export const LegacyMenuConfig = LegacyMenuItem.array();
export type LegacyMenuItem = typeof LegacyMenuItem.infer;

export interface ImportLegacyConfigOptions {
  generateId?: () => NodeId;
}

const DEFAULT_ORDER = 10;
const SEPARATOR_LABELS = new Set(["-", "---", "separator"]);
const MEL_PREFIX = /^mel:/i;

function isSeparator(item: LegacyMenuItem): boolean {
  return (
    item.is_divider === true ||
    SEPARATOR_LABELS.has((item.menu_label ?? "").trim())
  );
}

function readCommand(item: LegacyMenuItem): {
  language: CommandLanguage;
  text: string;
} {
  const raw = item.function_str ?? "";
  if (MEL_PREFIX.test(raw)) {
    return { language: "mel", text: raw.replace(MEL_PREFIX, "").trim() };
  }
  const language: CommandLanguage =
    item.command_type?.toLowerCase() === "mel" ? "mel" : "python";
  return { language, text: raw };
}

export function importLegacyMenuConfig(
  text: string,
  options: ImportLegacyConfigOptions = {}
): Result<MenuTree, FormatError> {
  const nextId = options.generateId ?? generateId;

  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(formatError("InvalidJson", "", message));
  }

  const items = LegacyMenuConfig(value);
  if (items instanceof type.errors) {
    return err(
      formatError(
        "InvalidShape",
        formatJsonPath(items[0]?.path ?? []),
        items.summary
      )
    );
  }

  const sorted = [...items].sort(
    (a, b) => (a.order ?? DEFAULT_ORDER) - (b.order ?? DEFAULT_ORDER)
  );
  const nodes: MenuNode[] = [];

  function folderFor(path: string | undefined): MenuNode[] {
    let level = nodes;
    const segments = (path ?? "").split("/").map((segment) => segment.trim());
    for (const label of segments.filter((segment) => segment !== "")) {
      let folder = level.find(
        (node): node is FolderNode =>
          node.kind === "folder" && node.label === label
      );
      if (!folder) {
        folder = { kind: "folder", id: nextId(), label, children: [] };
        level.push(folder);
      }
      level = folder.children;
    }
    return level;
  }

  for (const item of sorted) {
    const siblings = folderFor(item.sub_menu_path);

    if (isSeparator(item)) {
      siblings.push({ kind: "separator", id: nextId() });
      continue;
    }

    const { language, text: commandText } = readCommand(item);
    const label = (item.menu_label ?? "").trim() || generateLabel(commandText);
    const command: CommandNode = {
      kind: "command",
      id: nextId(),
      label,
      commandLanguage: language,
      commandText,
      isOptionBox: item.is_option_box === true,
    };
    if (item.icon_path) command.iconRef = item.icon_path;
    siblings.push(command);
  }

  const tree: MenuTree = { nodes };
  const problem = findInvariantViolation(tree.nodes);
  if (problem) return err(problem);

  return ok(tree);
}
