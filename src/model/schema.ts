/**
 * Arena Schema Module
 *
 * Manages the Yjs document that holds the single authoritative menu tree.
 * Nodes live in one id-keyed map; ordering lives in id arrays owned by
 * the parent folder (or by the virtual root).
 *
 * Yjs structure:
 *   doc.getMap("menu")
 *     "nodes": Y.Map<Y.Map>        (NodeId → node map)
 *       node.get("id"): string
 *       node.get("kind"): "folder" | "command" | "separator"
 *       node.get("parentId"): string  (ROOT_ID for top level)
 *       node.get("label"): string              folder, command
 *       node.get("iconRef"): string | undefined folder, command
 *       node.get("children"): Y.Array<string>  folder
 *       node.get("commandLanguage"): "python" | "mel"
 *       node.get("commandText"): string
 *       node.get("isOptionBox"): boolean
 *     "rootChildren": Y.Array<string>
 */

import * as Y from "yjs";
import {
  COMMAND_LANGUAGES,
  ROOT_ID,
  type CommandLanguage,
  type CommandNode,
  type FolderRecord,
  type MenuNode,
  type MenuTree,
  type NodeDraft,
  type NodeId,
  type NodeRecord,
} from "./types.ts";

export type YNode = Y.Map<unknown>;

// ── ID generation ──────────────────────────────────────────────────────

let idCounter = 0;

/** Generate a stable unique ID. Uses crypto.randomUUID when available. */
export function generateId(): NodeId {
  if (
    typeof crypto !== "undefined" &&
    typeof crypto.randomUUID === "function"
  ) {
    return crypto.randomUUID();
  }
  return `id_${Date.now()}_${idCounter++}`;
}

// ── Plain object helpers ───────────────────────────────────────────────

/** Strip the subtree from a node. */
export function toRecord(node: MenuNode): NodeRecord {
  if (node.kind !== "folder") return { ...node };
  const { children: _children, ...record } = node;
  return record;
}

/** Give a draft its id, filling defaults. */
export function recordFromDraft(draft: NodeDraft, id: NodeId): NodeRecord {
  switch (draft.kind) {
    case "folder": {
      const record: FolderRecord = { kind: "folder", id, label: draft.label };
      if (draft.iconRef !== undefined) record.iconRef = draft.iconRef;
      return record;
    }
    case "command": {
      const record: CommandNode = {
        kind: "command",
        id,
        label: draft.label,
        commandLanguage: draft.commandLanguage,
        commandText: draft.commandText,
        isOptionBox: draft.isOptionBox ?? false,
      };
      if (draft.iconRef !== undefined) record.iconRef = draft.iconRef;
      return record;
    }
    case "separator":
      return { kind: "separator", id };
  }
}

// ── Yjs ↔ Plain object helpers ─────────────────────────────────────────

/** Create the Y.Map for one arena entry. Folders get an empty children list. */
export function createYNode(record: NodeRecord, parentId: NodeId): YNode {
  const yNode = new Y.Map<unknown>();
  yNode.set("id", record.id);
  yNode.set("kind", record.kind);
  yNode.set("parentId", parentId);

  if (record.kind === "folder") {
    yNode.set("label", record.label);
    if (record.iconRef !== undefined) yNode.set("iconRef", record.iconRef);
    yNode.set("children", new Y.Array<string>());
  } else if (record.kind === "command") {
    yNode.set("label", record.label);
    yNode.set("commandLanguage", record.commandLanguage);
    yNode.set("commandText", record.commandText);
    if (record.iconRef !== undefined) yNode.set("iconRef", record.iconRef);
    yNode.set("isOptionBox", record.isOptionBox);
  }

  return yNode;
}

/** Overwrite the attribute fields of an existing entry with `record`'s. */
export function writeYAttributes(yNode: YNode, record: NodeRecord): void {
  if (record.kind === "separator") return;

  yNode.set("label", record.label);
  if (record.iconRef !== undefined) {
    yNode.set("iconRef", record.iconRef);
  } else {
    yNode.delete("iconRef");
  }

  if (record.kind === "command") {
    yNode.set("commandLanguage", record.commandLanguage);
    yNode.set("commandText", record.commandText);
    yNode.set("isOptionBox", record.isOptionBox);
  }
}

function readString(yNode: YNode, key: string): string | undefined {
  const value = yNode.get(key);
  return typeof value === "string" ? value : undefined;
}

function readLanguage(yNode: YNode): CommandLanguage {
  const value = yNode.get("commandLanguage");
  return COMMAND_LANGUAGES.find((language) => language === value) ?? "python";
}

/** Read a Y.Map arena entry back into a plain record */
export function readYNode(yNode: YNode): NodeRecord {
  const id = readString(yNode, "id") ?? "";
  const iconRef = readString(yNode, "iconRef");

  switch (yNode.get("kind")) {
    case "folder": {
      const record: FolderRecord = {
        kind: "folder",
        id,
        label: readString(yNode, "label") ?? "",
      };
      if (iconRef !== undefined) record.iconRef = iconRef;
      return record;
    }
    case "command": {
      const record: CommandNode = {
        kind: "command",
        id,
        label: readString(yNode, "label") ?? "",
        commandLanguage: readLanguage(yNode),
        commandText: readString(yNode, "commandText") ?? "",
        isOptionBox: yNode.get("isOptionBox") === true,
      };
      if (iconRef !== undefined) record.iconRef = iconRef;
      return record;
    }
    default:
      return { kind: "separator", id };
  }
}

export function readParentId(yNode: YNode): NodeId | undefined {
  return readString(yNode, "parentId");
}

/** The children array of a folder entry, or undefined for leaves. */
export function getYChildren(yNode: YNode): Y.Array<string> | undefined {
  const children = yNode.get("children");
  return children instanceof Y.Array ? children : undefined;
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

export function readChildIds(children: Y.Array<string> | undefined): NodeId[] {
  return children ? children.toArray().filter(isString) : [];
}

// ── Document initialization ────────────────────────────────────────────

/** Get the top-level menu map from a Y.Doc */
export function getMenuMap(doc: Y.Doc): Y.Map<unknown> {
  return doc.getMap("menu");
}

/** Get the id-keyed arena of nodes */
export function getNodesMap(doc: Y.Doc): Y.Map<YNode> {
  const nodes = getMenuMap(doc).get("nodes");
  if (!(nodes instanceof Y.Map)) {
    throw new Error("Menu document has not been initialized");
  }
  return nodes;
}

/** Get the ordered ids of the top-level nodes */
export function getRootChildren(doc: Y.Doc): Y.Array<string> {
  const rootChildren = getMenuMap(doc).get("rootChildren");
  if (!(rootChildren instanceof Y.Array)) {
    throw new Error("Menu document has not been initialized");
  }
  return rootChildren;
}

/**
 * Initialize a Y.Doc with the menu structure.
 * If the doc already contains data, this is a no-op.
 */
export function initializeDoc(doc: Y.Doc): void {
  const menu = getMenuMap(doc);
  if (menu.get("nodes")) {
    return;
  }

  doc.transact(() => {
    menu.set("nodes", new Y.Map<YNode>());
    menu.set("rootChildren", new Y.Array<string>());
  });
}

/** Children array of a container: the root array, or a folder's array. */
export function getContainerChildren(
  doc: Y.Doc,
  parentId: NodeId
): Y.Array<string> | undefined {
  if (parentId === ROOT_ID) return getRootChildren(doc);
  const yParent = getNodesMap(doc).get(parentId);
  return yParent ? getYChildren(yParent) : undefined;
}

function readSubtree(nodes: Y.Map<YNode>, id: NodeId): MenuNode | undefined {
  const yNode = nodes.get(id);
  if (!yNode) return undefined;

  const record = readYNode(yNode);
  if (record.kind !== "folder") return record;

  const children: MenuNode[] = [];
  for (const childId of readChildIds(getYChildren(yNode))) {
    const child = readSubtree(nodes, childId);
    if (child) children.push(child);
  }
  return { ...record, children };
}

/** Read the full tree as a plain object snapshot */
export function readTree(doc: Y.Doc): MenuTree {
  const nodes = getNodesMap(doc);
  const result: MenuNode[] = [];
  for (const id of readChildIds(getRootChildren(doc))) {
    const node = readSubtree(nodes, id);
    if (node) result.push(node);
  }
  return { nodes: result };
}

function writeSubtree(
  nodes: Y.Map<YNode>,
  node: MenuNode,
  parentId: NodeId
): void {
  nodes.set(node.id, createYNode(toRecord(node), parentId));
  if (node.kind !== "folder") return;

  const yNode = nodes.get(node.id);
  const children = yNode ? getYChildren(yNode) : undefined;
  children?.push(node.children.map((child) => child.id));
  for (const child of node.children) {
    writeSubtree(nodes, child, node.id);
  }
}

/** Replace the whole arena with the given tree in one transaction. */
export function writeTree(doc: Y.Doc, tree: MenuTree): void {
  initializeDoc(doc);
  const nodes = getNodesMap(doc);
  const rootChildren = getRootChildren(doc);

  doc.transact(() => {
    for (const key of Array.from(nodes.keys())) {
      nodes.delete(key);
    }
    rootChildren.delete(0, rootChildren.length);

    rootChildren.push(tree.nodes.map((node) => node.id));
    for (const node of tree.nodes) {
      writeSubtree(nodes, node, ROOT_ID);
    }
  });
}
