/**
 * calc-agent command line
 *
 * Usage:
 *   tsx src/cli.ts ask "What's 25 + 17?"
 *   tsx src/cli.ts repl
 *   tsx src/cli.ts web --port 5000
 */

import { createProgram } from "./cli/program.ts";
import { loadConfigFromEnvironment } from "./config.ts";
import { createLogger } from "./logger.ts";

const config = loadConfigFromEnvironment();
const logger = createLogger({ level: config.logLevel });
const program = createProgram(config, logger, {
  stdin: process.stdin,
  stdout: process.stdout,
  stderr: process.stderr,
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

try {
  await program.parseAsync(process.argv);
} catch (err) {
  logger.fatal({ err }, "command failed");
  process.exitCode = 1;
}
