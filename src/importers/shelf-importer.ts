/**
 * Legacy Shelf Importer
 *
 * Converts the `shelfButton` calls of a saved shelf script into command
 * drafts, in shelf order. The drafts are handed back to the caller, which
 * decides where (and whether) to add them.
 *
 * Mapping:
 *   -label / -imageOverlayLabel / -annotation → label (first non-empty)
 *   -image / -image1                          → iconRef
 *   -sourceType "python" | "mel"              → commandLanguage (default mel)
 *   -command                                  → commandText
 */

import type { CommandDraft, CommandLanguage } from "../model/types.ts";

export interface ImportShelfOptions {
  signal?: AbortSignal;
}

type Token =
  | { kind: "word"; text: string }
  | { kind: "string"; text: string }
  | { kind: "punct"; text: string };

const ESCAPES: Record<string, string> = { n: "\n", t: "\t", r: "\r" };

// ── Tokenizer ──────────────────────────────────────────────────────────

function readString(
  source: string,
  start: number
): { text: string; end: number } {
  let text = "";
  let i = start + 1;
  while (i < source.length && source[i] !== '"') {
    if (source[i] === "\\" && i + 1 < source.length) {
      const next = source[i + 1];
      text += ESCAPES[next] ?? next;
      i += 2;
    } else {
      text += source[i];
      i++;
    }
  }
  return { text, end: i + 1 };
}

function* tokenize(source: string): Generator<Token> {
  let i = 0;
  while (i < source.length) {
    const ch = source[i];

    if (/\s/.test(ch)) {
      i++;
    } else if (source.startsWith("//", i)) {
      const end = source.indexOf("\n", i);
      i = end === -1 ? source.length : end + 1;
    } else if (source.startsWith("/*", i)) {
      const end = source.indexOf("*/", i + 2);
      i = end === -1 ? source.length : end + 2;
    } else if (ch === '"') {
      const { text, end } = readString(source, i);
      yield { kind: "string", text };
      i = end;
    } else if ("(){};,".includes(ch)) {
      yield { kind: "punct", text: ch };
      i++;
    } else {
      let end = i;
      while (end < source.length && !/[\s"(){};,]/.test(source[end])) end++;
      yield { kind: "word", text: source.slice(i, end) };
      i = end;
    }
  }
}

// ── Shelf buttons ──────────────────────────────────────────────────────

function isFlag(token: Token): boolean {
  return token.kind === "word" && /^-[A-Za-z]/.test(token.text);
}

/** Flag → first value, for the tokens of one `shelfButton` call. */
function readFlags(tokens: readonly Token[]): Map<string, string> {
  const flags = new Map<string, string>();
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    if (!isFlag(token)) continue;

    const value = tokens[i + 1];
    const name = token.text.slice(1);
    if (value && !isFlag(value) && value.kind !== "punct" && !flags.has(name)) {
      flags.set(name, value.text);
    }
  }
  return flags;
}

function firstNonEmpty(
  ...values: Array<string | undefined>
): string | undefined {
  return values.find((value) => value !== undefined && value.trim() !== "");
}

function toLanguage(sourceType: string | undefined): CommandLanguage {
  return sourceType?.toLowerCase() === "python" ? "python" : "mel";
}

function toDraft(
  flags: Map<string, string>,
  position: number
): CommandDraft | undefined {
  const commandText = flags.get("command");
  if (commandText === undefined || commandText.trim() === "") return undefined;

  const label = firstNonEmpty(
    flags.get("label"),
    flags.get("imageOverlayLabel"),
    flags.get("annotation")
  );
  const draft: CommandDraft = {
    kind: "command",
    label: label?.trim() ?? `Shelf Button ${position}`,
    commandLanguage: toLanguage(flags.get("sourceType")),
    commandText,
  };

  const iconRef = firstNonEmpty(flags.get("image"), flags.get("image1"));
  if (iconRef !== undefined) draft.iconRef = iconRef;
  return draft;
}

export function importLegacyShelf(
  source: string,
  options: ImportShelfOptions = {}
): CommandDraft[] {
  const { signal } = options;
  signal?.throwIfAborted();

  const drafts: CommandDraft[] = [];
  let button: Token[] | undefined;
  let depth = 0;
  let position = 0;

  for (const token of tokenize(source)) {
    if (!button) {
      if (token.kind === "word" && token.text === "shelfButton") {
        button = [];
        depth = 0;
      }
      continue;
    }

    if (token.kind === "punct") {
      if (token.text === "(") depth++;
      if (token.text === ")") depth--;
      if ((token.text === ";" || token.text === "}") && depth <= 0) {
        signal?.throwIfAborted();
        position++;
        const draft = toDraft(readFlags(button), position);
        if (draft) drafts.push(draft);
        button = undefined;
        continue;
      }
    }
    button.push(token);
  }

  return drafts;
}
