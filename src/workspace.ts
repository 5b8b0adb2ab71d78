/**
 * Workspace
 *
 * Ties one StructureEngine to the documents directory named by the
 * settings: which document is open, whether it has unsaved changes, and
 * the file operations the editor offers (open, save, save as, merge,
 * shelf import).
 */

import { readdir } from "node:fs/promises";
import { importLegacyShelf } from "./importers/shelf-importer.ts";
import { createLogger } from "./logger.ts";
import { StructureEngine } from "./model/engine.ts";
import type { MergeResult } from "./model/merge.ts";
import {
  describeError,
  err,
  notFound,
  ok,
  type FormatError,
  type NotFound,
  type Result,
  type RuleViolation,
} from "./model/result.ts";
import { ROOT_ID, type MenuTree, type NodeId } from "./model/types.ts";
import {
  DOCUMENT_EXTENSION,
  documentPath,
  ioFailure,
  loadDocument,
  readText,
  saveDocument,
  type IoFailure,
} from "./persistence.ts";
import type { Settings } from "./settings.ts";

const log = createLogger("Workspace");

export type WorkspaceError =
  | IoFailure
  | FormatError
  | RuleViolation
  | NotFound;

export interface WorkspaceOptions {
  engine?: StructureEngine;
}

export function describeWorkspaceError(error: WorkspaceError): string {
  return error.type === "IoFailure"
    ? `${error.path}: ${error.message}`
    : describeError(error);
}

export class Workspace {
  readonly engine: StructureEngine;
  private currentName: string | undefined;
  private dirty = false;

  constructor(
    readonly settings: Settings,
    options: WorkspaceOptions = {}
  ) {
    this.engine = options.engine ?? new StructureEngine();
    this.engine.subscribe(() => {
      this.dirty = true;
    });
  }

  get documentName(): string | undefined {
    return this.currentName;
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  pathOf(name: string): string {
    return documentPath(this.settings.documentsDir, name);
  }

  /**
   * Open the settings' default document. A document that does not exist
   * yet starts out empty under that name.
   */
  async openDefault(): Promise<Result<MenuTree, WorkspaceError>> {
    const name = this.settings.defaultDocument;
    const opened = await this.open(name);
    if (
      opened.ok ||
      opened.error.type !== "IoFailure" ||
      opened.error.code !== "ENOENT"
    ) {
      return opened;
    }

    log.info(`No document named ${name} yet; starting empty`);
    const empty: MenuTree = { nodes: [] };
    const replaced = this.engine.open(empty);
    if (!replaced.ok) return replaced;
    this.currentName = name;
    this.dirty = false;
    return ok(empty);
  }

  /** Replace the open tree with a stored document, or change nothing. */
  async open(name: string): Promise<Result<MenuTree, WorkspaceError>> {
    const filePath = this.pathOf(name);
    const loaded = await loadDocument(filePath);
    if (!loaded.ok) {
      const reason = describeWorkspaceError(loaded.error);
      log.warn(`Could not open ${filePath}: ${reason}`);
      return loaded;
    }

    const replaced = this.engine.open(loaded.value);
    if (!replaced.ok) return replaced;

    this.currentName = name;
    this.dirty = false;
    log.info(`Opened ${filePath}`);
    return loaded;
  }

  /** Save under the current name, or the default name when none is open. */
  async save(): Promise<Result<string, WorkspaceError>> {
    return this.saveAs(this.currentName ?? this.settings.defaultDocument);
  }

  async saveAs(name: string): Promise<Result<string, WorkspaceError>> {
    const filePath = this.pathOf(name);
    const saved = await saveDocument(filePath, this.engine.snapshot());
    if (!saved.ok) {
      log.error(`Could not save ${filePath}: ${saved.error.message}`);
      return saved;
    }

    this.currentName = name;
    this.dirty = false;
    log.info(`Saved ${filePath}`);
    return ok(filePath);
  }

  /** Merge a stored document into the open tree. */
  async merge(name: string): Promise<Result<MergeResult, WorkspaceError>> {
    const loaded = await loadDocument(this.pathOf(name));
    if (!loaded.ok) return loaded;

    const merged = this.engine.mergeTree(loaded.value);
    if (merged.ok) {
      const { size } = merged.value.reassignedIds;
      log.info(`Merged ${name}; ${size} id(s) reassigned`);
    }
    return merged;
  }

  /**
   * Add the buttons of a shelf script as commands at the end of a folder.
   * Returns the ids of the added commands, in shelf order.
   */
  async importShelf(
    filePath: string,
    parentId: NodeId = ROOT_ID,
    signal?: AbortSignal
  ): Promise<Result<NodeId[], WorkspaceError>> {
    if (parentId !== ROOT_ID && !this.engine.has(parentId)) {
      return err(notFound(parentId));
    }

    const text = await readText(filePath);
    if (!text.ok) return text;

    const added: NodeId[] = [];
    for (const draft of importLegacyShelf(text.value, { signal })) {
      const result = this.engine.addNode(draft, parentId);
      if (!result.ok) return result;
      added.push(result.value);
    }

    log.info(`Imported ${added.length} shelf button(s) from ${filePath}`);
    return ok(added);
  }

  /** Names of the documents in the documents directory, sorted. */
  async listDocuments(): Promise<Result<string[], IoFailure>> {
    let entries: string[];
    try {
      entries = await readdir(this.settings.documentsDir);
    } catch (error) {
      const failure = ioFailure(this.settings.documentsDir, error);
      if (failure.code === "ENOENT") return ok([]);
      return err(failure);
    }

    return ok(
      entries
        .filter((entry) => entry.endsWith(DOCUMENT_EXTENSION))
        .map((entry) => entry.slice(0, -DOCUMENT_EXTENSION.length))
        .sort()
    );
  }
}
