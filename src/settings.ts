/**
 * Settings document
 *
 * `settings.json` picks the document to open at start, the log threshold,
 * the UI language and the interpreters used to test-run commands. User
 * values are laid over the defaults, so a file may name only what it
 * changes. A missing file gives the defaults; an unreadable or invalid
 * one gives the defaults plus a warning.
 *
 * Environment:
 *   MENU_BUILDER_SETTINGS       alternative settings file
 *   MENU_BUILDER_DOCUMENTS_DIR  overrides documentsDir
 */

import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { type } from "arktype";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";

const Interpreters = type({
  "+": "reject",
  "python?": "string[]",
  "mel?": "string[]",
});

export const SettingsFile = type({
  "+": "reject",
  "defaultDocument?": "string > 0",
  "logLevel?": type.enumerated(...LOG_LEVELS),
  "language?": "string",
  "languages?": "string[]",
  "documentsDir?": "string > 0",
  "interpreters?": Interpreters,
});

export type SettingsFile = typeof SettingsFile.infer;

export interface Settings {
  defaultDocument: string;
  logLevel: LogLevel;
  language: string;
  languages: string[];
  /** Absolute directory that holds the menu documents. */
  documentsDir: string;
  /** Argument vectors; the command text is written to stdin. */
  interpreters: { python: string[]; mel: string[] };
}

export interface LoadedSettings {
  settings: Settings;
  /** Path that was read, whether or not it existed. */
  source: string;
  warnings: string[];
}

export const SETTINGS_FILE_NAME = "settings.json";

export function defaultSettings(baseDir: string = process.cwd()): Settings {
  return {
    defaultDocument: "TempBar",
    logLevel: "error",
    language: "en_us",
    languages: ["zh_tw", "en_us", "ja_jp"],
    documentsDir: path.resolve(baseDir, "menuitems"),
    interpreters: {
      python: ["python3", "-"],
      mel: [
        "mayapy",
        "-c",
        "import sys, maya.mel; maya.mel.eval(sys.stdin.read())",
      ],
    },
  };
}

/**
 * Lay validated user values over the defaults. Relative dirs resolve
 * against `baseDir`.
 */
export function resolveSettings(file: SettingsFile, baseDir: string): Settings {
  const defaults = defaultSettings(baseDir);
  return {
    defaultDocument: file.defaultDocument ?? defaults.defaultDocument,
    logLevel: file.logLevel ?? defaults.logLevel,
    language: file.language ?? defaults.language,
    languages: file.languages ?? defaults.languages,
    documentsDir: file.documentsDir
      ? path.resolve(baseDir, file.documentsDir)
      : defaults.documentsDir,
    interpreters: {
      python: file.interpreters?.python ?? defaults.interpreters.python,
      mel: file.interpreters?.mel ?? defaults.interpreters.mel,
    },
  };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export interface LoadSettingsOptions {
  /** Defaults to MENU_BUILDER_SETTINGS, then ./settings.json. */
  file?: string;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

export async function loadSettings(
  options: LoadSettingsOptions = {}
): Promise<LoadedSettings> {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const source = path.resolve(
    cwd,
    options.file ?? env.MENU_BUILDER_SETTINGS ?? SETTINGS_FILE_NAME
  );
  const baseDir = path.dirname(source);
  const warnings: string[] = [];

  let settings = defaultSettings(baseDir);
  try {
    const text = await readFile(source, "utf8");
    const parsed = SettingsFile(JSON.parse(text));
    if (parsed instanceof type.errors) {
      warnings.push(`Ignoring ${source}: ${parsed.summary}`);
    } else {
      settings = resolveSettings(parsed, baseDir);
    }
  } catch (error) {
    if (!isMissingFile(error)) {
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`Ignoring ${source}: ${message}`);
    }
  }

  const documentsDir = env.MENU_BUILDER_DOCUMENTS_DIR;
  if (documentsDir) settings.documentsDir = path.resolve(cwd, documentsDir);

  return { settings, source, warnings };
}
