#!/usr/bin/env node

/**
 * mail-index CLI entry point
 */

import { CommanderError } from "commander";
import { createProgram, defaultIO } from "./cli/program.js";
import { exitCodeFor, formatCliError } from "./cli/errors.js";

const program = createProgram(defaultIO);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  // commander has already printed its own usage errors
  if (!(err instanceof CommanderError)) {
    defaultIO.err(`Error: ${formatCliError(err, process.env.MAIL_INDEX_CLI_DEBUG === "1")}`);
  }
  process.exitCode = exitCodeFor(err);
}
