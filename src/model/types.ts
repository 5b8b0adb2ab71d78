/**
 * Core domain types for the menu structure model.
 * These are the plain TypeScript types that describe a menu tree.
 * The engine stores data matching these shapes in Yjs structured types.
 */

export type NodeId = string;

/** Id of the virtual folder that owns the top-level nodes. */
export const ROOT_ID: NodeId = "root";

/** Delimiter between folder labels in a derived path. */
export const PATH_DELIMITER = "/";

export type CommandLanguage = "python" | "mel";

export const COMMAND_LANGUAGES: readonly CommandLanguage[] = ["python", "mel"];

export interface FolderAttributes {
  label: string;
  iconRef?: string;
}

export interface CommandAttributes {
  label: string;
  commandLanguage: CommandLanguage;
  commandText: string;
  iconRef?: string;
  isOptionBox: boolean;
}

export interface FolderNode extends FolderAttributes {
  kind: "folder";
  id: NodeId;
  children: MenuNode[];
}

export interface CommandNode extends CommandAttributes {
  kind: "command";
  id: NodeId;
}

export interface SeparatorNode {
  kind: "separator";
  id: NodeId;
}

export type MenuNode = FolderNode | CommandNode | SeparatorNode;

export type NodeKind = MenuNode["kind"];

/** The ordered top-level nodes of one open document. */
export interface MenuTree {
  nodes: MenuNode[];
}

export type FolderRecord = Omit<FolderNode, "children">;

/** A node without its subtree, as held in the arena. */
export type NodeRecord = FolderRecord | CommandNode | SeparatorNode;

/** A copy of a node's attributes handed to an editor. */
export type NodeSnapshot = NodeRecord & { path: string };

export type FolderDraft = { kind: "folder" } & FolderAttributes;

export type CommandDraft = { kind: "command" } & Omit<
  CommandAttributes,
  "isOptionBox"
> & {
  isOptionBox?: boolean;
};

export interface SeparatorDraft {
  kind: "separator";
}

/** A node that has not been given an id yet. */
export type NodeDraft = FolderDraft | CommandDraft | SeparatorDraft;

/**
 * Attribute changes applied by `commitEdit`. `iconRef: null` clears the icon.
 * Command-only fields are rejected on folders.
 */
export interface EditPatch {
  label?: string;
  iconRef?: string | null;
  commandLanguage?: CommandLanguage;
  commandText?: string;
  isOptionBox?: boolean;
}

export type EditState =
  | { status: "idle" }
  | { status: "editing"; nodeId: NodeId };

/** What happens to an option-box whose anchoring command is deleted. */
export type CascadePolicy = "demote" | "delete";

export interface DeletedSet {
  deletedIds: NodeId[];
  demotedIds: NodeId[];
}

/**
 * Read-only access to a tree, shared by the engine and the validator.
 * `getChildIds(ROOT_ID)` lists the top level.
 */
export interface TreeView {
  getNode(id: NodeId): NodeRecord | undefined;
  getParentId(id: NodeId): NodeId | undefined;
  getChildIds(parentId: NodeId): readonly NodeId[];
}

export function canHaveChildren(kind: NodeKind): boolean {
  return kind === "folder";
}

export function isOptionBoxNode(
  node: NodeRecord | NodeDraft | undefined
): boolean {
  return node?.kind === "command" && node.isOptionBox === true;
}
