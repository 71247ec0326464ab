/**
 * CLI exit code mapping
 * - 0: success
 * - 1: usage/input/IO/unknown error
 * - 2: message not found
 */

import { CommanderError } from "commander";
import { MailIndexError, RecordNotFoundError } from "../core/errors.js";

export function exitCodeFor(error: unknown): number {
  if (error instanceof RecordNotFoundError) return 2;
  if (error instanceof CommanderError) return error.exitCode;
  return 1;
}

export function formatCliError(error: unknown, verbose = false): string {
  if (!(error instanceof Error)) return String(error);

  let message = error instanceof MailIndexError ? `${error.code}: ${error.message}` : error.message;
  if (verbose && error.cause !== undefined) {
    message += `\n  Cause: ${error.cause instanceof Error ? error.cause.message : String(error.cause)}`;
  }
  if (verbose && error.stack) {
    message += `\n${error.stack}`;
  }
  return message;
}
