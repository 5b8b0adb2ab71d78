/**
 * menu-builder command line
 *
 *   menu-builder show <file>
 *   menu-builder validate <file>
 *   menu-builder merge <base> <incoming> [--out file]
 *   menu-builder import-shelf <shelf> [--into file] [--folder label]
 *   menu-builder import-legacy <file> [--out file]
 *   menu-builder callables <script> [--language python|mel]
 *   menu-builder run <file> <nodeId>
 *   menu-builder list
 *
 * Exit codes: 0 success, 1 rejected input or failed command, 2 usage error.
 */

import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { parseArgs } from "node:util";
import { ProcessCommandExecutor, testRunCommand } from "./executor.ts";
import { importLegacyMenuConfig } from "./importers/legacy-config.ts";
import { generateLabel, listCallables } from "./importers/script-parser.ts";
import { createLogger, setLogLevel } from "./logger.ts";
import { stringifyDocument } from "./model/document.ts";
import { StructureEngine } from "./model/engine.ts";
import { merge } from "./model/merge.ts";
import { flattenMenu } from "./model/projection.ts";
import {
  ROOT_ID,
  type CommandLanguage,
  type MenuNode,
  type MenuTree,
  type NodeId,
} from "./model/types.ts";
import { loadDocument, readText, writeTextAtomic } from "./persistence.ts";
import { loadSettings, type Settings } from "./settings.ts";
import {
  Workspace,
  describeWorkspaceError,
  type WorkspaceError,
} from "./workspace.ts";

const log = createLogger("cli");

export const EXIT_OK = 0;
export const EXIT_REJECTED = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: menu-builder <command> [options]

Commands:
  show <file>                              print the menu tree
  validate <file>                          check a menu document
  merge <base> <incoming> [--out file]     merge two documents
  import-shelf <shelf> [--into file] [--folder label]
                                           turn shelf buttons into commands
  import-legacy <file> [--out file]        convert an old flat menu config
  callables <script> [--language lang]     list the functions a script defines
  run <file> <nodeId>                      test-run one command
  list                                     list the stored documents
`;

export interface CliIo {
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliOptions {
  io?: CliIo;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

interface Context {
  io: CliIo;
  cwd: string;
  settings: Settings;
  positionals: string[];
  values: { out?: string; into?: string; folder?: string; language?: string };
}

// ── Helpers ────────────────────────────────────────────────────────────

function positional(ctx: Context, index: number, name: string): string {
  const value = ctx.positionals[index];
  if (value === undefined) throw new UsageError(`Missing <${name}>`);
  return value;
}

function reject(ctx: Context, error: WorkspaceError): number {
  ctx.io.stderr(`${describeWorkspaceError(error)}\n`);
  return EXIT_REJECTED;
}

/** Write a document to --out, or to stdout when none is given. */
async function emit(
  ctx: Context,
  tree: MenuTree,
  out: string | undefined
): Promise<number> {
  if (!out) {
    ctx.io.stdout(stringifyDocument(tree));
    return EXIT_OK;
  }
  const target = path.resolve(ctx.cwd, out);
  const written = await writeTextAtomic(target, stringifyDocument(tree));
  if (!written.ok) return reject(ctx, written.error);
  ctx.io.stdout(`Wrote ${target}\n`);
  return EXIT_OK;
}

function describeNode(node: MenuNode): string {
  switch (node.kind) {
    case "folder":
      return `${node.label}/`;
    case "separator":
      return "----";
    case "command": {
      const marker = node.isOptionBox ? " [option box]" : "";
      return `${node.label} (${node.commandLanguage})${marker}`;
    }
  }
}

function languageOf(ctx: Context, script: string): CommandLanguage {
  const language = ctx.values.language;
  if (language === "python" || language === "mel") return language;
  if (language !== undefined) {
    throw new UsageError(`Unknown language "${language}"`);
  }
  return path.extname(script).toLowerCase() === ".mel" ? "mel" : "python";
}

// ── Commands ───────────────────────────────────────────────────────────

async function show(ctx: Context): Promise<number> {
  const file = path.resolve(ctx.cwd, positional(ctx, 1, "file"));
  const loaded = await loadDocument(file);
  if (!loaded.ok) return reject(ctx, loaded.error);

  for (const { node, depth } of flattenMenu(loaded.value)) {
    ctx.io.stdout(`${"  ".repeat(depth)}${describeNode(node)}\n`);
  }
  return EXIT_OK;
}

async function validate(ctx: Context): Promise<number> {
  const file = path.resolve(ctx.cwd, positional(ctx, 1, "file"));
  const loaded = await loadDocument(file);
  if (!loaded.ok) return reject(ctx, loaded.error);

  const count = Array.from(flattenMenu(loaded.value)).length;
  ctx.io.stdout(`${file}: valid, ${count} node(s)\n`);
  return EXIT_OK;
}

async function mergeCommand(ctx: Context): Promise<number> {
  const basePath = path.resolve(ctx.cwd, positional(ctx, 1, "base"));
  const incomingPath = path.resolve(ctx.cwd, positional(ctx, 2, "incoming"));

  const base = await loadDocument(basePath);
  if (!base.ok) return reject(ctx, base.error);
  const incoming = await loadDocument(incomingPath);
  if (!incoming.ok) return reject(ctx, incoming.error);

  const merged = merge(base.value, incoming.value);
  if (!merged.ok) return reject(ctx, merged.error);
  return emit(ctx, merged.value.tree, ctx.values.out);
}

async function importShelf(ctx: Context): Promise<number> {
  const shelf = path.resolve(ctx.cwd, positional(ctx, 1, "shelf"));
  const into = ctx.values.into
    ? path.resolve(ctx.cwd, ctx.values.into)
    : undefined;

  const engine = new StructureEngine();
  if (into) {
    const existing = await loadDocument(into);
    if (existing.ok) {
      const opened = engine.open(existing.value);
      if (!opened.ok) return reject(ctx, opened.error);
    } else if (
      existing.error.type !== "IoFailure" ||
      existing.error.code !== "ENOENT"
    ) {
      return reject(ctx, existing.error);
    }
  }

  let parentId: NodeId = ROOT_ID;
  const folder = ctx.values.folder;
  if (folder) {
    const found = engine.getChildIds(ROOT_ID).find((id) => {
      const node = engine.getNode(id);
      return node?.kind === "folder" && node.label === folder;
    });
    if (found) {
      parentId = found;
    } else {
      const created = engine.addNode({ kind: "folder", label: folder });
      if (!created.ok) return reject(ctx, created.error);
      parentId = created.value;
    }
  }

  const workspace = new Workspace(ctx.settings, { engine });
  const imported = await workspace.importShelf(shelf, parentId);
  if (!imported.ok) return reject(ctx, imported.error);

  ctx.io.stderr(`Imported ${imported.value.length} command(s)\n`);
  return emit(ctx, engine.snapshot(), into);
}

async function importLegacy(ctx: Context): Promise<number> {
  const file = path.resolve(ctx.cwd, positional(ctx, 1, "file"));
  const text = await readText(file);
  if (!text.ok) return reject(ctx, text.error);

  const tree = importLegacyMenuConfig(text.value);
  if (!tree.ok) return reject(ctx, tree.error);
  return emit(ctx, tree.value, ctx.values.out);
}

async function callables(ctx: Context): Promise<number> {
  const script = path.resolve(ctx.cwd, positional(ctx, 1, "script"));
  const language = languageOf(ctx, script);
  const text = await readText(script);
  if (!text.ok) return reject(ctx, text.error);

  for (const callable of listCallables(text.value, { language })) {
    const signature = `${callable.name}(${callable.params.join(", ")})`;
    const label = generateLabel(callable.name);
    ctx.io.stdout(`${callable.line}\t${signature}\t${label}\n`);
  }
  return EXIT_OK;
}

async function run(ctx: Context): Promise<number> {
  const file = path.resolve(ctx.cwd, positional(ctx, 1, "file"));
  const nodeId = positional(ctx, 2, "nodeId");
  const loaded = await loadDocument(file);
  if (!loaded.ok) return reject(ctx, loaded.error);

  const engine = new StructureEngine();
  const opened = engine.open(loaded.value);
  if (!opened.ok) return reject(ctx, opened.error);

  const node = engine.getNode(nodeId);
  if (!node) return reject(ctx, { type: "NotFound", nodeId });

  const executor = new ProcessCommandExecutor(ctx.settings.interpreters);
  const outcome = await testRunCommand(executor, node);
  if (!outcome.ok) {
    ctx.io.stderr(outcome.error);
    return EXIT_REJECTED;
  }
  ctx.io.stdout(outcome.output);
  return EXIT_OK;
}

async function list(ctx: Context): Promise<number> {
  const workspace = new Workspace(ctx.settings);
  const names = await workspace.listDocuments();
  if (!names.ok) return reject(ctx, names.error);
  for (const name of names.value) {
    ctx.io.stdout(`${name}\n`);
  }
  return EXIT_OK;
}

const COMMANDS: Record<string, (ctx: Context) => Promise<number>> = {
  show,
  validate,
  merge: mergeCommand,
  "import-shelf": importShelf,
  "import-legacy": importLegacy,
  callables,
  run,
  list,
};

// ── Entry ──────────────────────────────────────────────────────────────

export async function runCli(
  argv: readonly string[],
  options: CliOptions = {}
): Promise<number> {
  const io = options.io ?? processIo;
  const cwd = options.cwd ?? process.cwd();

  const loaded = await loadSettings({ cwd, env: options.env });
  setLogLevel(loaded.settings.logLevel);
  for (const warning of loaded.warnings) log.warn(warning);

  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        out: { type: "string", short: "o" },
        into: { type: "string" },
        folder: { type: "string" },
        language: { type: "string" },
        help: { type: "boolean", short: "h" },
      },
    });

    const name = positionals[0];
    if (values.help || name === undefined) {
      io.stdout(USAGE);
      return values.help ? EXIT_OK : EXIT_USAGE;
    }

    const command = COMMANDS[name];
    if (!command) throw new UsageError(`Unknown command "${name}"`);

    const settings = loaded.settings;
    return await command({ io, cwd, settings, positionals, values });
  } catch (error) {
    if (
      error instanceof UsageError ||
      (error instanceof TypeError && "code" in error)
    ) {
      io.stderr(`${error.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    throw error;
  }
}

const entry = process.argv[1];
if (entry && path.resolve(entry) === fileURLToPath(import.meta.url)) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      log.error("Unexpected failure", error);
      process.exitCode = EXIT_REJECTED;
    }
  );
}
