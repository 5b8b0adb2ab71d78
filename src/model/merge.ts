/**
 * Tree merge
 *
 * Appends an incoming tree to a base tree. A folder whose label matches a
 * base folder at the same level is merged into it, recursively; anything
 * else is appended. Base nodes keep their order and ids; incoming ids
 * that collide are reassigned. The merged tree is validated as a whole,
 * and an invalid result is rejected without touching the base.
 */

import { findInvariantViolation } from "./invariants.ts";
import { err, ok, type FormatError, type Result } from "./result.ts";
import { generateId } from "./schema.ts";
import { collectIds } from "./traversal.ts";
import { ROOT_ID, type MenuNode, type MenuTree, type NodeId } from "./types.ts";

export interface MergeOptions {
  generateId?: () => NodeId;
}

export interface MergeResult {
  tree: MenuTree;
  /**
   * Incoming id → id it has in the merged tree, for every incoming node
   * whose id changed. A folder folded into a base folder maps to that
   * folder's id.
   */
  reassignedIds: Map<NodeId, NodeId>;
}

export function merge(
  base: MenuTree,
  incoming: MenuTree,
  options: MergeOptions = {}
): Result<MergeResult, FormatError> {
  const nextId = options.generateId ?? generateId;
  const usedIds = new Set<NodeId>(collectIds(base.nodes));
  usedIds.add(ROOT_ID);
  const reassignedIds = new Map<NodeId, NodeId>();

  function claim(id: NodeId): NodeId {
    if (!usedIds.has(id)) {
      usedIds.add(id);
      return id;
    }
    let fresh = nextId();
    while (usedIds.has(fresh)) fresh = nextId();
    usedIds.add(fresh);
    reassignedIds.set(id, fresh);
    return fresh;
  }

  function copy(node: MenuNode): MenuNode {
    const id = claim(node.id);
    if (node.kind !== "folder") return { ...node, id };
    return { ...node, id, children: node.children.map(copy) };
  }

  function mergeInto(
    target: readonly MenuNode[],
    additions: readonly MenuNode[]
  ): MenuNode[] {
    const result = [...target];
    for (const node of additions) {
      if (node.kind === "folder") {
        const index = result.findIndex(
          (c) => c.kind === "folder" && c.label === node.label
        );
        const existing = index === -1 ? undefined : result[index];
        if (existing?.kind === "folder") {
          if (existing.id !== node.id) reassignedIds.set(node.id, existing.id);
          result[index] = {
            ...existing,
            children: mergeInto(existing.children, node.children),
          };
          continue;
        }
      }
      result.push(copy(node));
    }
    return result;
  }

  const tree: MenuTree = { nodes: mergeInto(base.nodes, incoming.nodes) };
  const problem = findInvariantViolation(tree.nodes);
  if (problem) return err(problem);

  return ok({ tree, reassignedIds });
}
