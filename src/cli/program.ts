import { Command, InvalidArgumentError } from "commander";
import type { AppConfig } from "../config.ts";
import { createAgent } from "../lib/agent.ts";
import type { Logger } from "../logger.ts";
import { runRepl } from "../terminal/repl.ts";
import { createWebApp, startWebServer } from "../web/server.ts";

export interface CliIO {
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  setExitCode: (code: number) => void;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new InvalidArgumentError("must be an integer from 0 to 65535");
  }
  return port;
}

export function createProgram(config: Readonly<AppConfig>, logger: Logger, io: CliIO): Command {
  const program = new Command();
  const agent = createAgent(config, logger);

  program
    .name("calc-agent")
    .description("Answer natural-language math questions")
    .version("0.1.0")
    .configureOutput({
      writeOut: (str) => io.stdout.write(str),
      writeErr: (str) => io.stderr.write(str),
    });

  program
    .command("ask")
    .description("Answer one question and exit")
    .argument("<words...>", "the question, e.g. what's 25 + 17")
    .action((words: string[]) => {
      const outcome = agent.answer(words.join(" "));
      io.stdout.write(`${outcome.text}\n`);
      if (outcome.kind === "error") io.setExitCode(1);
    });

  program
    .command("repl", { isDefault: true })
    .description("Interactive question-and-answer loop")
    .action(async () => {
      await runRepl(agent, { input: io.stdin, output: io.stdout });
    });

  program
    .command("web")
    .description("Serve the JSON API")
    .option("--host <host>", "bind address", config.host)
    .option("--port <port>", "port to listen on", parsePort, config.port)
    .action(async (opts: { host: string; port: number }) => {
      const app = createWebApp(agent, logger, { historyLimit: config.historyDisplayLimit });
      const server = await startWebServer(app, opts.host, opts.port);
      logger.info({ address: server.address() }, "web API listening");
    });

  return program;
}
