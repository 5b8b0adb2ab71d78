/**
 * Document format
 *
 * One menu document is a JSON object:
 *
 *   { "version": 1, "nodes": [ <node>, ... ] }
 *
 * where a node is one of
 *
 *   { "id", "kind": "folder", "label", "iconRef"?, "children": [...] }
 *   { "id", "kind": "command", "label", "commandLanguage", "commandText",
 *     "iconRef"?, "isOptionBox" }
 *   { "id", "kind": "separator" }
 *
 * Paths are never stored; they are derived from nesting. Keys a kind does
 * not declare are rejected, so a separator with a label or an option-box
 * with children fails the shape check.
 */

import { scope, type } from "arktype";
import { findInvariantViolation } from "./invariants.ts";
import {
  err,
  formatError,
  ok,
  type FormatError,
  type Result,
} from "./result.ts";
import type { CommandNode, FolderNode, MenuNode, MenuTree } from "./types.ts";

export const DOCUMENT_VERSION = 1;

const documentTypes = scope({
  folder: {
    "+": "reject",
    id: "string",
    kind: "'folder'",
    label: "string",
    "iconRef?": "string",
    children: "node[]",
  },
  command: {
    "+": "reject",
    id: "string",
    kind: "'command'",
    label: "string",
    commandLanguage: "'python' | 'mel'",
    commandText: "string",
    "iconRef?": "string",
    "isOptionBox?": "boolean",
  },
  separator: {
    "+": "reject",
    id: "string",
    kind: "'separator'",
  },
  node: "folder | command | separator",
  document: {
    "+": "reject",
    version: "1",
    nodes: "node[]",
  },
}).export();

export const MenuDocument = documentTypes.document;
export type MenuDocument = typeof MenuDocument.infer;
type DocumentNode = typeof documentTypes.node.infer;

// ── Serialize ──────────────────────────────────────────────────────────

function serializeNode(node: MenuNode): DocumentNode {
  switch (node.kind) {
    case "folder": {
      return {
        id: node.id,
        kind: "folder",
        label: node.label,
        ...(node.iconRef !== undefined ? { iconRef: node.iconRef } : {}),
        children: node.children.map(serializeNode),
      };
    }
    case "command":
      return {
        id: node.id,
        kind: "command",
        label: node.label,
        commandLanguage: node.commandLanguage,
        commandText: node.commandText,
        ...(node.iconRef !== undefined ? { iconRef: node.iconRef } : {}),
        isOptionBox: node.isOptionBox,
      };
    case "separator":
      return { id: node.id, kind: "separator" };
  }
}

export function serialize(tree: MenuTree): MenuDocument {
  return { version: DOCUMENT_VERSION, nodes: tree.nodes.map(serializeNode) };
}

export function stringifyDocument(tree: MenuTree): string {
  return `${JSON.stringify(serialize(tree), null, 2)}\n`;
}

// ── Deserialize ────────────────────────────────────────────────────────

function toMenuNode(node: DocumentNode): MenuNode {
  switch (node.kind) {
    case "folder": {
      const folder: FolderNode = {
        kind: "folder",
        id: node.id,
        label: node.label,
        children: node.children.map(toMenuNode),
      };
      if (node.iconRef !== undefined) folder.iconRef = node.iconRef;
      return folder;
    }
    case "command": {
      const command: CommandNode = {
        kind: "command",
        id: node.id,
        label: node.label,
        commandLanguage: node.commandLanguage,
        commandText: node.commandText,
        isOptionBox: node.isOptionBox ?? false,
      };
      if (node.iconRef !== undefined) command.iconRef = node.iconRef;
      return command;
    }
    case "separator":
      return { kind: "separator", id: node.id };
  }
}

/** Render a validation path as `nodes[0].children[2].label`. */
export function formatJsonPath(path: readonly PropertyKey[]): string {
  let result = "";
  for (const key of path) {
    if (typeof key === "number") {
      result += `[${key}]`;
    } else {
      const name = String(key);
      result += result === "" ? name : `.${name}`;
    }
  }
  return result;
}

/** Validate an already-parsed value and turn it into a tree. */
export function deserialize(value: unknown): Result<MenuTree, FormatError> {
  const out = MenuDocument(value);
  if (out instanceof type.errors) {
    const first = out[0];
    return err(
      formatError(
        "InvalidShape",
        formatJsonPath(first?.path ?? []),
        out.summary
      )
    );
  }

  const tree: MenuTree = { nodes: out.nodes.map(toMenuNode) };
  const problem = findInvariantViolation(tree.nodes);
  if (problem) return err(problem);

  return ok(tree);
}

export function parseDocument(text: string): Result<MenuTree, FormatError> {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return err(formatError("InvalidJson", "", message));
  }
  return deserialize(value);
}
