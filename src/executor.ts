/**
 * Command Executor
 *
 * Runs a command's text in an interpreter outside this process and
 * reports what it printed. Results never feed back into the tree; output
 * and error text are passed through exactly as the interpreter wrote them.
 */

import { spawn } from "node:child_process";
import { createLogger } from "./logger.ts";
import type { CommandLanguage, NodeRecord } from "./model/types.ts";

const log = createLogger("Executor");

export type ExecutionOutcome =
  | { ok: true; output: string }
  | { ok: false; error: string };

export interface CommandExecutor {
  execute(
    language: CommandLanguage,
    commandText: string,
    signal?: AbortSignal
  ): Promise<ExecutionOutcome>;
}

/** Argument vector per language; the command text is written to stdin. */
export type InterpreterTable = Record<CommandLanguage, readonly string[]>;

export class ProcessCommandExecutor implements CommandExecutor {
  constructor(private readonly interpreters: InterpreterTable) {}

  execute(
    language: CommandLanguage,
    commandText: string,
    signal?: AbortSignal
  ): Promise<ExecutionOutcome> {
    const [command, ...args] = this.interpreters[language];
    if (!command) {
      return Promise.resolve({
        ok: false,
        error: `No interpreter configured for ${language}`,
      });
    }

    log.debug(`Running ${language} command with ${command}`);

    return new Promise((resolve) => {
      const proc = spawn(command, args, {
        stdio: ["pipe", "pipe", "pipe"],
        signal,
      });
      let stdout = "";
      let stderr = "";

      proc.stdout.setEncoding("utf8");
      proc.stderr.setEncoding("utf8");
      proc.stdout.on("data", (chunk: string) => {
        stdout += chunk;
      });
      proc.stderr.on("data", (chunk: string) => {
        stderr += chunk;
      });

      // A process that exits before reading its input closes the pipe early.
      proc.stdin.on("error", (error) => {
        log.debug(`stdin closed early: ${error.message}`);
      });

      proc.on("error", (error) => {
        resolve({ ok: false, error: error.message });
      });

      proc.on("close", (code, exitSignal) => {
        if (code === 0) {
          resolve({ ok: true, output: stdout });
        } else {
          const reason = code !== null ? `code ${code}` : exitSignal;
          resolve({ ok: false, error: stderr || `Exited with ${reason}` });
        }
      });

      proc.stdin.end(commandText);
    });
  }
}

/** Run one command node. Never throws and never touches the tree. */
export async function testRunCommand(
  executor: CommandExecutor,
  node: NodeRecord,
  signal?: AbortSignal
): Promise<ExecutionOutcome> {
  if (node.kind !== "command") {
    return { ok: false, error: `Only commands can be run, not a ${node.kind}` };
  }
  try {
    return await executor.execute(
      node.commandLanguage,
      node.commandText,
      signal
    );
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: message };
  }
}
