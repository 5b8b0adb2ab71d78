/**
 * Structure Engine
 *
 * Owns the authoritative menu tree of one open document and is the only
 * thing that mutates it. Every operation asks the validator first; a
 * refused operation returns a violation and leaves the tree as it was.
 * Accepted changes run inside a single Yjs transaction, so subscribers
 * see each operation as one update.
 *
 * The engine is also the Idle/Editing state machine: while one node is
 * being edited, every other change is refused with EditInProgress.
 */

import * as Y from "yjs";
import { findInvariantViolation } from "./invariants.ts";
import { merge, type MergeResult } from "./merge.ts";
import { projectMenu, type MenuEntry } from "./projection.ts";
import {
  err,
  notFound,
  ok,
  violation,
  type FormatError,
  type NotFound,
  type Result,
  type RuleViolation,
} from "./result.ts";
import {
  createYNode,
  generateId,
  getContainerChildren,
  getNodesMap,
  initializeDoc,
  readChildIds,
  readParentId,
  readTree,
  readYNode,
  recordFromDraft,
  writeTree,
  writeYAttributes,
} from "./schema.ts";
import {
  checkFolderLabel,
  checkInsertAt,
  checkLabel,
  checkMoveInto,
  checkOptionBoxAt,
  findDependentOptionBox,
} from "./validator.ts";
import {
  PATH_DELIMITER,
  ROOT_ID,
  type CascadePolicy,
  type CommandNode,
  type DeletedSet,
  type EditPatch,
  type EditState,
  type FolderRecord,
  type MenuTree,
  type NodeDraft,
  type NodeId,
  type NodeRecord,
  type NodeSnapshot,
  type TreeView,
} from "./types.ts";

export interface StructureEngineOptions {
  /** Document to keep the tree in. A fresh one is created when omitted. */
  doc?: Y.Doc;
  generateId?: () => NodeId;
}

export type ChangeListener = () => void;

const IDLE: EditState = { status: "idle" };

function applyPatch(
  record: FolderRecord | CommandNode,
  patch: EditPatch
): Result<FolderRecord | CommandNode, RuleViolation> {
  const iconRef =
    patch.iconRef === undefined ? record.iconRef : (patch.iconRef ?? undefined);
  const label = patch.label ?? record.label;

  if (record.kind === "folder") {
    if (
      patch.commandLanguage !== undefined ||
      patch.commandText !== undefined ||
      patch.isOptionBox !== undefined
    ) {
      return err(
        violation("KindMismatch", "folders have no command fields", record.id)
      );
    }
    const labelProblem = checkLabel(label, record.id);
    if (labelProblem) return err(labelProblem);

    const next: FolderRecord = { kind: "folder", id: record.id, label };
    if (iconRef !== undefined) next.iconRef = iconRef;
    return ok(next);
  }

  const labelProblem = checkLabel(label, record.id);
  if (labelProblem) return err(labelProblem);

  const next: CommandNode = {
    kind: "command",
    id: record.id,
    label,
    commandLanguage: patch.commandLanguage ?? record.commandLanguage,
    commandText: patch.commandText ?? record.commandText,
    isOptionBox: patch.isOptionBox ?? record.isOptionBox,
  };
  if (iconRef !== undefined) next.iconRef = iconRef;
  return ok(next);
}

function sameAttributes(
  a: FolderRecord | CommandNode,
  b: FolderRecord | CommandNode
): boolean {
  if (a.label !== b.label || a.iconRef !== b.iconRef) return false;
  if (a.kind === "command" && b.kind === "command") {
    return (
      a.commandLanguage === b.commandLanguage &&
      a.commandText === b.commandText &&
      a.isOptionBox === b.isOptionBox
    );
  }
  return a.kind === b.kind;
}

export class StructureEngine implements TreeView {
  readonly doc: Y.Doc;
  private readonly nextId: () => NodeId;
  private state: EditState = IDLE;

  constructor(options: StructureEngineOptions = {}) {
    this.doc = options.doc ?? new Y.Doc();
    this.nextId = options.generateId ?? generateId;
    initializeDoc(this.doc);
  }

  get editState(): EditState {
    return this.state;
  }

  // ── Reads ────────────────────────────────────────────────────────────

  has(id: NodeId): boolean {
    return id !== ROOT_ID && getNodesMap(this.doc).has(id);
  }

  getNode(id: NodeId): NodeRecord | undefined {
    if (id === ROOT_ID) return undefined;
    const yNode = getNodesMap(this.doc).get(id);
    return yNode ? readYNode(yNode) : undefined;
  }

  getParentId(id: NodeId): NodeId | undefined {
    if (id === ROOT_ID) return undefined;
    const yNode = getNodesMap(this.doc).get(id);
    return yNode ? readParentId(yNode) : undefined;
  }

  getChildIds(parentId: NodeId): readonly NodeId[] {
    return readChildIds(getContainerChildren(this.doc, parentId));
  }

  /** Labels of the enclosing folders, outermost first. */
  getPath(id: NodeId): string | undefined {
    if (!this.has(id)) return undefined;

    const labels: string[] = [];
    let parentId = this.getParentId(id);
    while (parentId !== undefined && parentId !== ROOT_ID) {
      const parent = this.getNode(parentId);
      if (parent?.kind === "folder") labels.unshift(parent.label);
      parentId = this.getParentId(parentId);
    }
    return labels.join(PATH_DELIMITER);
  }

  /** Plain copy of the whole tree. */
  snapshot(): MenuTree {
    return readTree(this.doc);
  }

  renderPlan(): Result<MenuEntry[], FormatError> {
    return projectMenu(this.snapshot());
  }

  /** Called after every accepted change. Returns an unsubscribe function. */
  subscribe(listener: ChangeListener): () => void {
    const handler = (): void => listener();
    this.doc.on("afterTransaction", handler);
    return () => this.doc.off("afterTransaction", handler);
  }

  // ── Structural edits ─────────────────────────────────────────────────

  /** Insert a new node, appending when `targetIndex` is omitted. */
  addNode(
    draft: NodeDraft,
    targetParentId: NodeId = ROOT_ID,
    targetIndex?: number
  ): Result<NodeId, RuleViolation | NotFound> {
    const busy = this.guardIdle();
    if (busy) return err(busy);
    if (targetParentId !== ROOT_ID && !this.has(targetParentId)) {
      return err(notFound(targetParentId));
    }

    if (draft.kind !== "separator") {
      const labelProblem = checkLabel(draft.label);
      if (labelProblem) return err(labelProblem);
    }

    const index = targetIndex ?? this.getChildIds(targetParentId).length;
    const placement = checkInsertAt(this, draft, targetParentId, index);
    if (placement) return err(placement);

    if (draft.kind === "folder") {
      const duplicate = checkFolderLabel(this, draft.label, targetParentId);
      if (duplicate) return err(duplicate);
    }

    const children = getContainerChildren(this.doc, targetParentId);
    if (!children) {
      return err(
        violation(
          "ParentMustBeFolder",
          "only folders can contain other nodes",
          targetParentId
        )
      );
    }

    const nodes = getNodesMap(this.doc);
    let id = this.nextId();
    while (id === ROOT_ID || nodes.has(id)) id = this.nextId();
    const record = recordFromDraft(draft, id);

    this.doc.transact(() => {
      nodes.set(id, createYNode(record, targetParentId));
      children.insert(index, [id]);
    });

    return ok(id);
  }

  /**
   * Move a node, with its subtree, to `newIndex` among the children of
   * `newParentId`. The index is a slot in the destination's current child
   * list, counted before the node is taken out. A command's option-box
   * travels with it.
   */
  moveNode(
    nodeId: NodeId,
    newParentId: NodeId,
    newIndex: number
  ): Result<void, RuleViolation | NotFound> {
    const busy = this.guardIdle();
    if (busy) return err(busy);

    const record = this.getNode(nodeId);
    if (!record) return err(notFound(nodeId));
    if (newParentId !== ROOT_ID && !this.has(newParentId)) {
      return err(notFound(newParentId));
    }

    const containment = checkMoveInto(this, nodeId, newParentId);
    if (containment) return err(containment);

    const oldParentId = this.getParentId(nodeId) ?? ROOT_ID;
    const oldIndex = this.getChildIds(oldParentId).indexOf(nodeId);
    const dependent = findDependentOptionBox(this, nodeId);
    const unit = dependent ? [nodeId, dependent] : [nodeId];

    const destination = this.getChildIds(newParentId);
    if (
      !Number.isInteger(newIndex) ||
      newIndex < 0 ||
      newIndex > destination.length
    ) {
      return err(
        violation(
          "IndexOutOfRange",
          `index ${newIndex} is outside 0..${destination.length}`,
          newParentId
        )
      );
    }
    const index = destination
      .slice(0, newIndex)
      .filter((id) => !unit.includes(id)).length;

    const placement = checkInsertAt(this, record, newParentId, index, unit);
    if (placement) return err(placement);

    if (record.kind === "folder" && newParentId !== oldParentId) {
      const duplicate = checkFolderLabel(
        this,
        record.label,
        newParentId,
        nodeId
      );
      if (duplicate) return err(duplicate);
    }

    if (newParentId === oldParentId && index === oldIndex) return ok(undefined);

    const from = getContainerChildren(this.doc, oldParentId);
    const to = getContainerChildren(this.doc, newParentId);
    if (!from || !to) {
      return err(
        violation(
          "ParentMustBeFolder",
          "only folders can contain other nodes",
          newParentId
        )
      );
    }

    const nodes = getNodesMap(this.doc);
    this.doc.transact(() => {
      from.delete(oldIndex, unit.length);
      to.insert(index, unit);
      for (const id of unit) {
        nodes.get(id)?.set("parentId", newParentId);
      }
    });

    return ok(undefined);
  }

  /**
   * Remove a node and its whole subtree. An option-box anchored to the
   * removed command is either demoted to a plain command or removed too.
   */
  deleteNode(
    nodeId: NodeId,
    cascadePolicy: CascadePolicy = "demote"
  ): Result<DeletedSet, RuleViolation | NotFound> {
    const busy = this.guardIdle();
    if (busy) return err(busy);
    if (!this.has(nodeId)) return err(notFound(nodeId));

    const parentId = this.getParentId(nodeId) ?? ROOT_ID;
    const children = getContainerChildren(this.doc, parentId);
    if (!children) return err(notFound(parentId));
    const index = readChildIds(children).indexOf(nodeId);

    const dependent = findDependentOptionBox(this, nodeId);
    const deletedIds = this.collectSubtree(nodeId);
    const demotedIds: NodeId[] = [];
    if (dependent) {
      if (cascadePolicy === "delete") {
        deletedIds.push(dependent);
      } else {
        demotedIds.push(dependent);
      }
    }

    const nodes = getNodesMap(this.doc);
    this.doc.transact(() => {
      children.delete(index, dependent && cascadePolicy === "delete" ? 2 : 1);
      for (const id of deletedIds) {
        nodes.delete(id);
      }
      for (const id of demotedIds) {
        nodes.get(id)?.set("isOptionBox", false);
      }
    });

    return ok({ deletedIds, demotedIds });
  }

  toggleOptionBox(
    nodeId: NodeId,
    enable: boolean
  ): Result<void, RuleViolation | NotFound> {
    const busy = this.guardIdle();
    if (busy) return err(busy);

    const record = this.getNode(nodeId);
    if (!record) return err(notFound(nodeId));
    if (record.kind !== "command") {
      return err(
        violation(
          "OptionBoxRequiresCommand",
          "only commands can be option boxes",
          nodeId
        )
      );
    }
    if (record.isOptionBox === enable) return ok(undefined);

    if (enable) {
      const parentId = this.getParentId(nodeId) ?? ROOT_ID;
      const index = this.getChildIds(parentId).indexOf(nodeId);
      const problem = checkOptionBoxAt(this, nodeId, parentId, index);
      if (problem) return err(problem);
    }

    const yNode = getNodesMap(this.doc).get(nodeId);
    this.doc.transact(() => {
      yNode?.set("isOptionBox", enable);
    });
    return ok(undefined);
  }

  // ── Edit mode ────────────────────────────────────────────────────────

  /**
   * Enter Editing for one node and hand back a copy of its attributes.
   * Asking again for the node already being edited returns a fresh copy.
   */
  beginEdit(nodeId: NodeId): Result<NodeSnapshot, RuleViolation | NotFound> {
    if (this.state.status === "editing" && this.state.nodeId !== nodeId) {
      return err(
        violation(
          "EditInProgress",
          "another node is being edited",
          this.state.nodeId
        )
      );
    }

    const record = this.getNode(nodeId);
    if (!record) return err(notFound(nodeId));
    if (record.kind === "separator") {
      return err(
        violation(
          "NotEditable",
          "separators have no attributes to edit",
          nodeId
        )
      );
    }

    this.state = { status: "editing", nodeId };
    return ok({ ...record, path: this.getPath(nodeId) ?? "" });
  }

  /**
   * Apply `patch` to the node being edited and return to Idle. A refused
   * patch leaves the engine in Editing so the caller can correct it. A
   * patch that changes nothing writes nothing.
   */
  commitEdit(patch: EditPatch): Result<NodeSnapshot, RuleViolation> {
    if (this.state.status !== "editing") {
      return err(violation("NotEditing", "no node is being edited"));
    }

    const { nodeId } = this.state;
    const record = this.getNode(nodeId);
    if (!record) {
      this.state = IDLE;
      return err(
        violation("NotEditing", "the node being edited is gone", nodeId)
      );
    }
    if (record.kind === "separator") {
      return err(
        violation(
          "NotEditable",
          "separators have no attributes to edit",
          nodeId
        )
      );
    }

    const patched = applyPatch(record, patch);
    if (!patched.ok) return patched;
    const next = patched.value;
    if (sameAttributes(record, next)) {
      this.state = IDLE;
      return ok({ ...record, path: this.getPath(nodeId) ?? "" });
    }

    const parentId = this.getParentId(nodeId) ?? ROOT_ID;
    if (next.kind === "folder" && next.label !== record.label) {
      const duplicate = checkFolderLabel(this, next.label, parentId, nodeId);
      if (duplicate) return err(duplicate);
    }
    if (
      next.kind === "command" &&
      record.kind === "command" &&
      next.isOptionBox &&
      !record.isOptionBox
    ) {
      const index = this.getChildIds(parentId).indexOf(nodeId);
      const problem = checkOptionBoxAt(this, nodeId, parentId, index);
      if (problem) return err(problem);
    }

    const yNode = getNodesMap(this.doc).get(nodeId);
    this.doc.transact(() => {
      if (yNode) writeYAttributes(yNode, next);
    });
    this.state = IDLE;

    return ok({ ...next, path: this.getPath(nodeId) ?? "" });
  }

  /** Discard the pending edit. Harmless when nothing is being edited. */
  cancelEdit(): void {
    this.state = IDLE;
  }

  // ── Whole-document changes ───────────────────────────────────────────

  /** Replace the tree with a validated one, keeping its ids. */
  open(tree: MenuTree): Result<void, RuleViolation | FormatError> {
    const busy = this.guardIdle();
    if (busy) return err(busy);

    const problem = findInvariantViolation(tree.nodes);
    if (problem) return err(problem);

    writeTree(this.doc, tree);
    return ok(undefined);
  }

  /** Merge another tree into this one. Rejected merges change nothing. */
  mergeTree(
    incoming: MenuTree
  ): Result<MergeResult, RuleViolation | FormatError> {
    const busy = this.guardIdle();
    if (busy) return err(busy);

    const merged = merge(this.snapshot(), incoming, {
      generateId: this.nextId,
    });
    if (!merged.ok) return merged;

    writeTree(this.doc, merged.value.tree);
    return merged;
  }

  // ── Internals ────────────────────────────────────────────────────────

  private guardIdle(): RuleViolation | null {
    return this.state.status === "editing"
      ? violation(
          "EditInProgress",
          "finish or cancel the current edit first",
          this.state.nodeId
        )
      : null;
  }

  private collectSubtree(rootId: NodeId): NodeId[] {
    const ids: NodeId[] = [];
    const pending: NodeId[] = [rootId];
    for (let id = pending.pop(); id !== undefined; id = pending.pop()) {
      ids.push(id);
      pending.push(...[...this.getChildIds(id)].reverse());
    }
    return ids;
  }
}
