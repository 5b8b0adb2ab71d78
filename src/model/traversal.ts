/**
 * Depth-first traversal of plain tree snapshots, in render order.
 */

import {
  PATH_DELIMITER,
  ROOT_ID,
  type MenuNode,
  type NodeId,
} from "./types.ts";

export interface VisitedNode {
  node: MenuNode;
  parentId: NodeId;
  /** Position among its siblings. */
  index: number;
  siblings: readonly MenuNode[];
  depth: number;
  /** Labels of the ancestor folders, joined. Empty at the top level. */
  path: string;
}

export function joinPath(path: string, label: string): string {
  return path ? `${path}${PATH_DELIMITER}${label}` : label;
}

export function* walkTree(
  nodes: readonly MenuNode[],
  parentId: NodeId = ROOT_ID,
  path = "",
  depth = 0
): Generator<VisitedNode> {
  for (let index = 0; index < nodes.length; index++) {
    const node = nodes[index];
    yield { node, parentId, index, siblings: nodes, depth, path };
    if (node.kind === "folder") {
      yield* walkTree(
        node.children,
        node.id,
        joinPath(path, node.label),
        depth + 1
      );
    }
  }
}

/**
 * Human-readable location of a node: its own label appended to its path.
 * Separators have no label, so they are named by position.
 */
export function locate(
  visited: Pick<VisitedNode, "node" | "path" | "index">
): string {
  const { node, path, index } = visited;
  const name =
    node.kind === "separator" || !node.label ? `#${index}` : node.label;
  return joinPath(path, name);
}

export function collectIds(nodes: readonly MenuNode[]): NodeId[] {
  return Array.from(walkTree(nodes), ({ node }) => node.id);
}
