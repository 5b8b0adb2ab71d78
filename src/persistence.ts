/**
 * Document persistence
 *
 * Reads and writes menu documents on disk. A save writes a sibling temp
 * file and renames it over the target, so an interrupted save leaves the
 * previous document intact.
 */

import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import * as path from "node:path";
import { parseDocument, stringifyDocument } from "./model/document.ts";
import { err, ok, type FormatError, type Result } from "./model/result.ts";
import type { MenuTree } from "./model/types.ts";

/** The file system refused a read or write. */
export interface IoFailure {
  type: "IoFailure";
  path: string;
  message: string;
  /** System error code such as ENOENT, when there is one. */
  code?: string;
}

export const DOCUMENT_EXTENSION = ".json";

export function ioFailure(filePath: string, error: unknown): IoFailure {
  const message = error instanceof Error ? error.message : String(error);
  const failure: IoFailure = { type: "IoFailure", path: filePath, message };
  if (
    error instanceof Error &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    failure.code = error.code;
  }
  return failure;
}

export async function readText(
  filePath: string
): Promise<Result<string, IoFailure>> {
  try {
    return ok(await readFile(filePath, "utf8"));
  } catch (error) {
    return err(ioFailure(filePath, error));
  }
}

export async function loadDocument(
  filePath: string
): Promise<Result<MenuTree, IoFailure | FormatError>> {
  const text = await readText(filePath);
  if (!text.ok) return text;
  return parseDocument(text.value);
}

let tempCounter = 0;

export async function writeTextAtomic(
  filePath: string,
  text: string
): Promise<Result<void, IoFailure>> {
  const tempPath = `${filePath}.${process.pid}.${tempCounter++}.tmp`;
  try {
    await mkdir(path.dirname(filePath), { recursive: true });
    await writeFile(tempPath, text, "utf8");
    await rename(tempPath, filePath);
    return ok(undefined);
  } catch (error) {
    await rm(tempPath, { force: true });
    return err(ioFailure(filePath, error));
  }
}

export async function saveDocument(
  filePath: string,
  tree: MenuTree
): Promise<Result<void, IoFailure>> {
  return writeTextAtomic(filePath, stringifyDocument(tree));
}

/** `TempBar` → `<dir>/TempBar.json`. Names ending in .json are kept. */
export function documentPath(documentsDir: string, name: string): string {
  const fileName = name.endsWith(DOCUMENT_EXTENSION)
    ? name
    : `${name}${DOCUMENT_EXTENSION}`;
  return path.resolve(documentsDir, fileName);
}
