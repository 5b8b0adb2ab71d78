/**
 * Tree invariants: the rules that make a tree renderable.
 *
 * Checked against plain snapshots, so the same code guards documents
 * read from disk, merge results and trees built by callers.
 */

import { formatError, type FormatError } from "./result.ts";
import { locate, walkTree } from "./traversal.ts";
import {
  ROOT_ID,
  isOptionBoxNode,
  type MenuNode,
  type NodeDraft,
  type NodeId,
  type NodeRecord,
} from "./types.ts";

type Placeable = NodeRecord | NodeDraft;

/**
 * Whether `node` may sit directly after `precedingSibling`.
 * Only option-boxes are constrained: they need a plain command in front.
 */
export function isValidOptionBoxPlacement(
  node: Placeable,
  precedingSibling: NodeRecord | undefined
): boolean {
  if (!isOptionBoxNode(node)) return true;
  return precedingSibling?.kind === "command" && !precedingSibling.isOptionBox;
}

/** Reason an option-box cannot follow `precedingSibling`, or null. */
export function describeOptionBoxAnchor(
  precedingSibling: NodeRecord | undefined
): string | null {
  if (!precedingSibling) {
    return "an option box cannot be first among its siblings";
  }
  switch (precedingSibling.kind) {
    case "separator":
      return "an option box cannot follow a separator";
    case "folder":
      return "an option box cannot follow a folder";
    case "command":
      return precedingSibling.isOptionBox
        ? "an option box cannot follow another option box"
        : null;
  }
}

/** First broken invariant in depth-first order, or null for a valid tree. */
export function findInvariantViolation(
  nodes: readonly MenuNode[]
): FormatError | null {
  const seen = new Set<string>();
  const folderLabels = new Map<NodeId, Set<string>>();

  for (const visited of walkTree(nodes)) {
    const { node, parentId, index, siblings } = visited;
    const where = locate(visited);

    if (node.id === ROOT_ID) {
      return formatError(
        "ReservedId",
        where,
        `id "${ROOT_ID}" is reserved for the menu root`
      );
    }
    if (seen.has(node.id)) {
      return formatError(
        "DuplicateId",
        where,
        `id "${node.id}" is used more than once`
      );
    }
    seen.add(node.id);

    if (node.kind !== "separator" && node.label.trim() === "") {
      return formatError(
        "LabelRequired",
        where,
        `${node.kind} "${node.id}" has an empty label`
      );
    }

    if (node.kind === "folder") {
      const labels = folderLabels.get(parentId) ?? new Set<string>();
      if (labels.has(node.label)) {
        return formatError(
          "DuplicateFolderLabel",
          where,
          `a folder named "${node.label}" already exists here`
        );
      }
      labels.add(node.label);
      folderLabels.set(parentId, labels);
    }

    if (isOptionBoxNode(node)) {
      const reason = describeOptionBoxAnchor(
        index > 0 ? siblings[index - 1] : undefined
      );
      if (reason) return formatError("InvalidOptionBoxPosition", where, reason);
    }
  }

  return null;
}
