import { describe, expect, it } from "vitest";
import {
  ProcessCommandExecutor,
  testRunCommand,
  type CommandExecutor,
} from "../executor.ts";
import type { NodeRecord } from "../model/types.ts";
import { command } from "./helpers/tree.ts";

// The runner's own node binary stands in for an interpreter reading stdin.
const executor = new ProcessCommandExecutor({
  python: [process.execPath, "-"],
  mel: [],
});

describe("ProcessCommandExecutor", () => {
  it("returns what the interpreter printed", async () => {
    const script = 'process.stdout.write("hello")';
    expect(await executor.execute("python", script)).toEqual({
      ok: true,
      output: "hello",
    });
  });

  it("passes error output through unmodified", async () => {
    const script = 'process.stderr.write("boom\\n"); process.exit(3)';
    const outcome = await executor.execute("python", script);
    expect(outcome).toEqual({ ok: false, error: "boom\n" });
  });

  it("describes a silent failure by its exit code", async () => {
    expect(await executor.execute("python", "process.exit(3)")).toEqual({
      ok: false,
      error: "Exited with code 3",
    });
  });

  it("reports a language without an interpreter", async () => {
    expect(await executor.execute("mel", "ls;")).toEqual({
      ok: false,
      error: "No interpreter configured for mel",
    });
  });

  it("reports an interpreter that cannot be started", async () => {
    const missing = new ProcessCommandExecutor({
      python: [`${process.execPath}-missing`],
      mel: [],
    });
    const outcome = await missing.execute("python", "pass");
    expect(outcome.ok).toBe(false);
  });
});

describe("testRunCommand", () => {
  it("runs a command node", async () => {
    const node = command("c", "Hello", { text: 'console.log("hi")' });
    expect(await testRunCommand(executor, node)).toEqual({
      ok: true,
      output: "hi\n",
    });
  });

  it("refuses anything but commands", async () => {
    const node: NodeRecord = { kind: "folder", id: "f", label: "Tools" };
    expect(await testRunCommand(executor, node)).toEqual({
      ok: false,
      error: "Only commands can be run, not a folder",
    });
  });

  it("turns a throwing executor into a failed outcome", async () => {
    const broken: CommandExecutor = {
      execute: () => Promise.reject(new Error("host unavailable")),
    };
    expect(await testRunCommand(broken, command("c", "C"))).toEqual({
      ok: false,
      error: "host unavailable",
    });
  });
});
