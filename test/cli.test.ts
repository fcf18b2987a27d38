/**
 * Tests for the commander program
 */

import { Readable, Writable } from "node:stream";
import { describe, expect, test, vi } from "vitest";
import { type CliIO, createProgram } from "../src/cli/program.ts";
import { loadConfig } from "../src/config.ts";
import { silentLogger } from "../src/logger.ts";

class Collector extends Writable {
  private chunks: string[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: () => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  text(): string {
    return this.chunks.join("");
  }
}

function setup(stdinLines: string[] = []) {
  const stdout = new Collector();
  const stderr = new Collector();
  const setExitCode = vi.fn();
  const io: CliIO = { stdin: Readable.from(stdinLines), stdout, stderr, setExitCode };
  const program = createProgram(loadConfig({}), silentLogger, io);
  // Subcommands copy settings when created, so override each one
  for (const command of [program, ...program.commands]) command.exitOverride();
  return { program, stdout, stderr, setExitCode };
}

describe("ask", () => {
  test("prints the answer", async () => {
    const { program, stdout, setExitCode } = setup();
    await program.parseAsync(["ask", "What's", "25", "+", "17?"], { from: "user" });

    expect(stdout.text()).toBe("The answer is 42\n");
    expect(setExitCode).not.toHaveBeenCalled();
  });

  test("sets a failing exit code on errors", async () => {
    const { program, stdout, setExitCode } = setup();
    await program.parseAsync(["ask", "divide", "1", "by", "0"], { from: "user" });

    expect(stdout.text()).toBe("Error: Cannot divide by zero\n");
    expect(setExitCode).toHaveBeenCalledWith(1);
  });

  test("requires a question", async () => {
    const { program } = setup();
    await expect(program.parseAsync(["ask"], { from: "user" })).rejects.toMatchObject({
      code: "commander.missingArgument",
    });
  });
});

describe("repl", () => {
  test("is the default command", async () => {
    const { program, stdout } = setup(["5 squared\n", "exit\n"]);
    await program.parseAsync([], { from: "user" });

    expect(stdout.text()).toContain("You: Agent: The answer is 25\n\n");
    expect(stdout.text()).toContain("Goodbye!");
  });
});

describe("options", () => {
  test("--version", async () => {
    const { program, stdout } = setup();
    await expect(program.parseAsync(["--version"], { from: "user" })).rejects.toMatchObject({
      code: "commander.version",
    });
    expect(stdout.text()).toBe("0.1.0\n");
  });

  test("web rejects a bad port before listening", async () => {
    const { program, stderr } = setup();
    await expect(program.parseAsync(["web", "--port", "abc"], { from: "user" })).rejects.toMatchObject({
      code: "commander.invalidArgument",
    });
    expect(stderr.text()).toContain("must be an integer from 0 to 65535");
  });
});
