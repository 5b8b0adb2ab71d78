/**
 * Legality Validator
 *
 * Pure structural queries over a TreeView. Nothing here mutates; the
 * engine calls these before every change, and the Presentation Layer can
 * call the boolean forms for live drag feedback.
 *
 * Each rule has a `check*` form returning the violation (or null) and a
 * `can*` form returning a boolean.
 */

import { describeOptionBoxAnchor } from "./invariants.ts";
import { violation, type RuleViolation } from "./result.ts";
import {
  ROOT_ID,
  canHaveChildren,
  isOptionBoxNode,
  type NodeDraft,
  type NodeId,
  type NodeRecord,
  type TreeView,
} from "./types.ts";

type Placeable = NodeRecord | NodeDraft;

/** Whether `id` names something that can own children. */
export function isContainer(view: TreeView, id: NodeId): boolean {
  if (id === ROOT_ID) return true;
  const node = view.getNode(id);
  return node !== undefined && canHaveChildren(node.kind);
}

/** Walks from `nodeId` up to the root looking for `ancestorId`. */
export function isDescendantOrSelf(
  view: TreeView,
  ancestorId: NodeId,
  nodeId: NodeId
): boolean {
  const visited = new Set<NodeId>();
  let current: NodeId | undefined = nodeId;
  while (current !== undefined && !visited.has(current)) {
    if (current === ancestorId) return true;
    visited.add(current);
    current = view.getParentId(current);
  }
  return false;
}

/**
 * The option-box that depends on `nodeId`: its next sibling, when
 * `nodeId` is a plain command followed by an option-box.
 */
export function findDependentOptionBox(
  view: TreeView,
  nodeId: NodeId
): NodeId | undefined {
  const node = view.getNode(nodeId);
  if (node?.kind !== "command" || node.isOptionBox) return undefined;

  const parentId = view.getParentId(nodeId);
  if (parentId === undefined) return undefined;

  const siblings = view.getChildIds(parentId);
  const nextIndex = siblings.indexOf(nodeId) + 1;
  if (nextIndex === 0 || nextIndex >= siblings.length) return undefined;

  const nextId = siblings[nextIndex];
  return isOptionBoxNode(view.getNode(nextId)) ? nextId : undefined;
}

// ── Move ───────────────────────────────────────────────────────────────

export function checkMoveInto(
  view: TreeView,
  sourceId: NodeId,
  destinationId: NodeId
): RuleViolation | null {
  if (isDescendantOrSelf(view, sourceId, destinationId)) {
    return violation(
      "CyclicMove",
      "a node cannot be moved into itself or its own descendants",
      sourceId
    );
  }
  if (!isContainer(view, destinationId)) {
    return violation(
      "ParentMustBeFolder",
      "only folders can contain other nodes",
      destinationId
    );
  }
  return null;
}

export function canMoveInto(
  view: TreeView,
  sourceId: NodeId,
  destinationId: NodeId
): boolean {
  return checkMoveInto(view, sourceId, destinationId) === null;
}

// ── Insert ─────────────────────────────────────────────────────────────

/**
 * Checks placing `node` at `targetIndex` among the children of
 * `targetParentId`. Ids in `moving` are treated as already taken out, and
 * `targetIndex` counts only the remaining siblings.
 *
 * A slot directly in front of an option-box is never legal: it would
 * separate the option-box from the command it belongs to.
 */
export function checkInsertAt(
  view: TreeView,
  node: Placeable,
  targetParentId: NodeId,
  targetIndex: number,
  moving: readonly NodeId[] = []
): RuleViolation | null {
  if (!isContainer(view, targetParentId)) {
    return violation(
      "ParentMustBeFolder",
      "only folders can contain other nodes",
      targetParentId
    );
  }

  const siblings = view
    .getChildIds(targetParentId)
    .filter((id) => !moving.includes(id));
  if (
    !Number.isInteger(targetIndex) ||
    targetIndex < 0 ||
    targetIndex > siblings.length
  ) {
    return violation(
      "IndexOutOfRange",
      `index ${targetIndex} is outside 0..${siblings.length}`,
      targetParentId
    );
  }

  const following =
    targetIndex < siblings.length
      ? view.getNode(siblings[targetIndex])
      : undefined;
  if (following && isOptionBoxNode(following)) {
    return violation(
      "InvalidOptionBoxPosition",
      "nothing can be inserted between a command and its option box",
      following.id
    );
  }

  if (isOptionBoxNode(node)) {
    const preceding =
      targetIndex > 0 ? view.getNode(siblings[targetIndex - 1]) : undefined;
    const reason = describeOptionBoxAnchor(preceding);
    if (reason) return violation("InvalidOptionBoxPosition", reason);
  }

  return null;
}

export function canInsertAt(
  view: TreeView,
  node: Placeable,
  targetParentId: NodeId,
  targetIndex: number
): boolean {
  return checkInsertAt(view, node, targetParentId, targetIndex) === null;
}

// ── Option-box toggle ──────────────────────────────────────────────────

/** Checks turning the node at its current position into an option-box. */
export function checkOptionBoxAt(
  view: TreeView,
  nodeId: NodeId,
  currentParentId: NodeId,
  currentIndex: number
): RuleViolation | null {
  const node = view.getNode(nodeId);
  if (node?.kind !== "command") {
    return violation(
      "OptionBoxRequiresCommand",
      "only commands can be option boxes",
      nodeId
    );
  }

  const siblings = view.getChildIds(currentParentId);
  const preceding =
    currentIndex > 0 ? view.getNode(siblings[currentIndex - 1]) : undefined;
  const reason = describeOptionBoxAnchor(preceding);
  if (reason) return violation("InvalidOptionBoxPosition", reason, nodeId);

  const following =
    currentIndex + 1 < siblings.length
      ? view.getNode(siblings[currentIndex + 1])
      : undefined;
  if (following && isOptionBoxNode(following)) {
    return violation(
      "InvalidOptionBoxPosition",
      "a command that already has an option box cannot become one",
      nodeId
    );
  }

  return null;
}

export function canBecomeOptionBox(
  view: TreeView,
  nodeId: NodeId,
  currentParentId: NodeId,
  currentIndex: number
): boolean {
  return (
    checkOptionBoxAt(view, nodeId, currentParentId, currentIndex) === null
  );
}

// ── Delete ─────────────────────────────────────────────────────────────

/**
 * Deletion is always structurally allowed for a node in the tree; a
 * dependent option-box is handled by the engine's cascade policy.
 */
export function canDelete(view: TreeView, nodeId: NodeId): boolean {
  return view.getNode(nodeId) !== undefined;
}

// ── Labels ─────────────────────────────────────────────────────────────

export function checkLabel(
  label: string,
  nodeId?: NodeId
): RuleViolation | null {
  return label.trim() === ""
    ? violation("LabelRequired", "folders and commands need a label", nodeId)
    : null;
}

/** Sibling folders are told apart by label, so labels must not repeat. */
export function checkFolderLabel(
  view: TreeView,
  label: string,
  parentId: NodeId,
  ignoreId?: NodeId
): RuleViolation | null {
  for (const siblingId of view.getChildIds(parentId)) {
    if (siblingId === ignoreId) continue;
    const sibling = view.getNode(siblingId);
    if (sibling?.kind === "folder" && sibling.label === label) {
      return violation(
        "DuplicateFolderLabel",
        `a folder named "${label}" already exists here`,
        siblingId
      );
    }
  }
  return null;
}

// ── Drop targets ───────────────────────────────────────────────────────

export type DropBias = "above" | "below";

/**
 * Moves a slot that falls between a command and its option-box to just
 * above the command or just below the option-box. The engine never calls
 * this; a caller uses it to pick an explicit target before asking.
 */
export function resolveDropIndex(
  view: TreeView,
  parentId: NodeId,
  index: number,
  bias: DropBias
): number {
  const siblings = view.getChildIds(parentId);
  if (index <= 0 || index >= siblings.length) return index;
  if (!isOptionBoxNode(view.getNode(siblings[index]))) return index;
  return bias === "above" ? index - 1 : index + 1;
}
