/**
 * Script Parser
 *
 * Lexical scan of a script for the callables a menu command can invoke.
 * Nothing is executed or imported; the scan tolerates scripts that would
 * not parse, which is common for older tool scripts.
 *
 * Python: top-level `def` / `async def` (column 0).
 * MEL:    `global proc [returnType] name(...)`.
 */

import type { CommandDraft, CommandLanguage } from "../model/types.ts";

export interface CallableSignature {
  name: string;
  language: CommandLanguage;
  /** 1-based line of the definition. */
  line: number;
  params: string[];
  /** MEL only, when declared. */
  returnType?: string;
}

export interface ListCallablesOptions {
  language?: CommandLanguage;
  signal?: AbortSignal;
}

const PYTHON_DEF = /^(?:async[ \t]+)?def[ \t]+([A-Za-z_]\w*)[ \t]*\(/gm;
const MEL_PROC = /^[ \t]*global[ \t]+proc[ \t]+(?:([A-Za-z_]\w*(?:\[\])?)[ \t]+)?([A-Za-z_]\w*)[ \t]*\(/gm;

// ── Helpers ────────────────────────────────────────────────────────────

function lineAt(source: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (source.charCodeAt(i) === 10) line++;
  }
  return line;
}

/** Text between the parenthesis that opens at `start - 1` and its match. */
function readParameterList(source: string, start: number): string {
  let depth = 1;
  for (let i = start; i < source.length; i++) {
    const ch = source[i];
    if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") {
      depth--;
      if (depth === 0) return source.slice(start, i);
    }
  }
  return source.slice(start);
}

function splitTopLevel(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let current = "";
  for (const ch of list) {
    if (ch === "(" || ch === "[" || ch === "{") depth++;
    else if (ch === ")" || ch === "]" || ch === "}") depth--;
    if (ch === "," && depth === 0) {
      parts.push(current);
      current = "";
    } else {
      current += ch;
    }
  }
  parts.push(current);
  return parts.map((part) => part.trim()).filter((part) => part !== "");
}

/** `x: int = 3` → `x`; `*args` and `**kwargs` keep their stars. */
function pythonParamName(param: string): string {
  return param.split(/[:=]/)[0].trim();
}

/** `string $name[]` → `$name`. */
function melParamName(param: string): string {
  const match = /\$\w+/.exec(param);
  return match ? match[0] : param;
}

// ── Public API ─────────────────────────────────────────────────────────

export function listCallables(
  source: string,
  options: ListCallablesOptions = {}
): CallableSignature[] {
  const { language = "python", signal } = options;
  signal?.throwIfAborted();

  const found: CallableSignature[] = [];
  const pattern = language === "mel" ? MEL_PROC : PYTHON_DEF;
  pattern.lastIndex = 0;

  for (let match = pattern.exec(source); match; match = pattern.exec(source)) {
    signal?.throwIfAborted();

    const paramsText = readParameterList(source, match.index + match[0].length);
    const line = lineAt(source, match.index);

    if (language === "mel") {
      const signature: CallableSignature = {
        name: match[2],
        language,
        line,
        params: splitTopLevel(paramsText).map(melParamName),
      };
      if (match[1]) signature.returnType = match[1];
      found.push(signature);
    } else {
      found.push({
        name: match[1],
        language,
        line,
        params: splitTopLevel(paramsText).map(pythonParamName),
      });
    }
  }

  return found;
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/**
 * Menu label for a function name or command string.
 *
 *   "my_awesome_tool"        → "My Awesome Tool"
 *   "cmds.polySphere"        → "Poly Sphere"
 *   "import rigTools; rigTools.main()" → "Rig Tools"
 */
export function generateLabel(command: string): string {
  let core = command
    .replace(/^cmds\./, "")
    .replace(/\.(main|run|execute)\s*\(\)\s*$/, "");

  const imported = /import\s+(\w+);\s*\1/.exec(core);
  if (imported) core = imported[1];

  return core
    .replace(/_/g, " ")
    .replace(/([a-z])([A-Z])/g, "$1 $2")
    .split(/\s+/)
    .filter((word) => word !== "")
    .map(capitalize)
    .join(" ");
}

/** Command draft that runs `callable`. Python commands reload the module. */
export function commandFromCallable(
  moduleName: string,
  callable: CallableSignature
): CommandDraft {
  const commandText =
    callable.language === "mel"
      ? `${callable.name}();`
      : [
          `import ${moduleName}`,
          "from importlib import reload",
          `reload(${moduleName})`,
          `${moduleName}.${callable.name}()`,
        ].join("\n");

  return {
    kind: "command",
    label: generateLabel(callable.name),
    commandLanguage: callable.language,
    commandText,
  };
}
