/**
 * Line-based terminal loop: read a question, print the agent's answer
 */

import { createInterface } from "node:readline";
import type { CalculatorAgent } from "../lib/agent.ts";
import { isExitCommand } from "../lib/input.ts";

export interface ReplOptions {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  prompt?: string;
}

/**
 * Run until an exit command or end of input.
 * Resolves with the number of queries answered.
 */
export async function runRepl(agent: CalculatorAgent, options: ReplOptions): Promise<number> {
  const { input, output } = options;
  const prompt = options.prompt ?? "You: ";
  const rl = createInterface({ input, terminal: false });
  let answered = 0;

  output.write(`${agent.welcome()}\n\n`);
  output.write(prompt);

  try {
    for await (const line of rl) {
      if (isExitCommand(line)) break;

      output.write(`Agent: ${agent.processQuery(line)}\n\n`);
      answered++;
      output.write(prompt);
    }
  } finally {
    rl.close();
  }

  // Exit command and Ctrl+D end the same way
  output.write(`\nAgent: ${agent.goodbye()}\n`);
  return answered;
}
