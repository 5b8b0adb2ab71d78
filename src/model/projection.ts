/**
 * Projects a validated tree into the ordered entry list the Menu Renderer
 * consumes. Option-boxes are folded into the action they follow.
 */

import { findInvariantViolation } from "./invariants.ts";
import { err, ok, type FormatError, type Result } from "./result.ts";
import { walkTree } from "./traversal.ts";
import type {
  CommandLanguage,
  CommandNode,
  MenuNode,
  MenuTree,
  NodeId,
} from "./types.ts";

export interface OptionBoxEntry {
  id: NodeId;
  label: string;
  iconRef?: string;
  language: CommandLanguage;
  commandText: string;
}

export interface SubmenuEntry {
  type: "submenu";
  id: NodeId;
  label: string;
  iconRef?: string;
  entries: MenuEntry[];
}

export interface ActionEntry {
  type: "action";
  id: NodeId;
  label: string;
  iconRef?: string;
  language: CommandLanguage;
  commandText: string;
  optionBox?: OptionBoxEntry;
}

export interface DividerEntry {
  type: "divider";
  id: NodeId;
}

export type MenuEntry = SubmenuEntry | ActionEntry | DividerEntry;

function toOptionBox(node: CommandNode): OptionBoxEntry {
  const entry: OptionBoxEntry = {
    id: node.id,
    label: node.label,
    language: node.commandLanguage,
    commandText: node.commandText,
  };
  if (node.iconRef !== undefined) entry.iconRef = node.iconRef;
  return entry;
}

function toAction(node: CommandNode): ActionEntry {
  return { type: "action", ...toOptionBox(node) };
}

function projectNodes(nodes: readonly MenuNode[]): MenuEntry[] {
  const entries: MenuEntry[] = [];

  for (const node of nodes) {
    switch (node.kind) {
      case "folder": {
        const submenu: SubmenuEntry = {
          type: "submenu",
          id: node.id,
          label: node.label,
          entries: projectNodes(node.children),
        };
        if (node.iconRef !== undefined) submenu.iconRef = node.iconRef;
        entries.push(submenu);
        break;
      }
      case "separator":
        entries.push({ type: "divider", id: node.id });
        break;
      case "command": {
        const anchor = entries[entries.length - 1];
        if (node.isOptionBox && anchor?.type === "action") {
          anchor.optionBox = toOptionBox(node);
        } else {
          entries.push(toAction(node));
        }
        break;
      }
    }
  }

  return entries;
}

/**
 * Re-validates the tree, then maps it to renderer entries in order.
 * The renderer clears whatever it drew before and draws these.
 */
export function projectMenu(tree: MenuTree): Result<MenuEntry[], FormatError> {
  const problem = findInvariantViolation(tree.nodes);
  if (problem) return err(problem);
  return ok(projectNodes(tree.nodes));
}

export interface FlatEntry {
  node: MenuNode;
  depth: number;
  path: string;
}

/** Every node in render order, with its depth and derived path. */
export function* flattenMenu(tree: MenuTree): Generator<FlatEntry> {
  for (const { node, depth, path } of walkTree(tree.nodes)) {
    yield { node, depth, path };
  }
}
