/**
 * Structured outcomes returned by the core. Expected rule violations are
 * values, never exceptions.
 */

import type { NodeId } from "./types.ts";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export type Rule =
  | "InvalidOptionBoxPosition"
  | "OptionBoxRequiresCommand"
  | "ParentMustBeFolder"
  | "CyclicMove"
  | "EditInProgress"
  | "NotEditing"
  | "NotEditable"
  | "IndexOutOfRange"
  | "LabelRequired"
  | "KindMismatch"
  | "DuplicateFolderLabel";

/** An expected, user-correctable refusal. The tree is unchanged. */
export interface RuleViolation {
  type: "RuleViolation";
  rule: Rule;
  message: string;
  nodeId?: NodeId;
}

/** The operation referenced an id that is not in the tree. */
export interface NotFound {
  type: "NotFound";
  nodeId: NodeId;
}

export type FormatRule =
  | "InvalidJson"
  | "InvalidShape"
  | "DuplicateId"
  | "ReservedId"
  | "LabelRequired"
  | "DuplicateFolderLabel"
  | "InvalidOptionBoxPosition";

/** A persisted or externally built tree that breaks the model. */
export interface FormatError {
  type: "FormatError";
  rule: FormatRule;
  /** Label path of the offending node, or the JSON location of bad shape. */
  path: string;
  message: string;
}

export function violation(
  rule: Rule,
  message: string,
  nodeId?: NodeId
): RuleViolation {
  return nodeId === undefined
    ? { type: "RuleViolation", rule, message }
    : { type: "RuleViolation", rule, message, nodeId };
}

export function notFound(nodeId: NodeId): NotFound {
  return { type: "NotFound", nodeId };
}

export function formatError(
  rule: FormatRule,
  path: string,
  message: string
): FormatError {
  return { type: "FormatError", rule, path, message };
}

/** One-line description of any core failure, for logs and CLI output. */
export function describeError(
  error: RuleViolation | NotFound | FormatError
): string {
  switch (error.type) {
    case "RuleViolation":
      return `${error.rule}: ${error.message}`;
    case "NotFound":
      return `NotFound: no node with id "${error.nodeId}"`;
    case "FormatError":
      return `${error.rule} at ${error.path || "<document>"}: ${error.message}`;
  }
}
