import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import { createInterface } from "node:readline";
import { fileURLToPath } from "node:url";
import createDebug from "debug";

import { MailIndexError, MessageFileError } from "../core/errors.js";
import type { MessageInput } from "../core/types.js";
import type { IndexingEngine } from "../core/impl/indexingEngine.js";

const debug = createDebug("mail-index:loader");

const FIELD_SEPARATOR = ";";

/** Sample messages shipped with the package. */
export const SAMPLE_MESSAGES_FILE = fileURLToPath(new URL("../../data/sample-messages.txt", import.meta.url));

export interface LoadResult {
  loaded: number;
  skipped: number;
}

/**
 * Parses one `sender;subject;body;date` line.
 *
 * Missing trailing fields are empty and anything after the fourth separator is dropped.
 * Returns undefined for lines with an empty sender.
 */
export function parseMessageLine(line: string): MessageInput | undefined {
  const clean = line.endsWith("\r") ? line.slice(0, -1) : line;
  const [sender = "", subject = "", body = "", date = ""] = clean.split(FIELD_SEPARATOR);
  if (sender.length === 0) return undefined;
  return { sender, subject, body, date };
}

/** Ingests every valid line of `text`. */
export function loadMessages(engine: IndexingEngine, text: string): LoadResult {
  const result: LoadResult = { loaded: 0, skipped: 0 };
  for (const line of text.split("\n")) {
    ingestLine(engine, line, result);
  }
  return result;
}

/** Streams a message file into the engine line by line. */
export async function loadMessageFile(engine: IndexingEngine, filePath: string): Promise<LoadResult> {
  try {
    await access(filePath);
  } catch (err) {
    throw new MessageFileError(filePath, { cause: err });
  }

  const result: LoadResult = { loaded: 0, skipped: 0 };
  const lines = createInterface({ input: createReadStream(filePath, { encoding: "utf8" }), crlfDelay: Infinity });

  try {
    for await (const line of lines) {
      ingestLine(engine, line, result);
    }
  } catch (err) {
    if (err instanceof MailIndexError) throw err;
    throw new MessageFileError(filePath, { cause: err });
  }

  debug("loaded %d messages from %s (%d lines skipped)", result.loaded, filePath, result.skipped);
  return result;
}

function ingestLine(engine: IndexingEngine, line: string, result: LoadResult): void {
  const input = parseMessageLine(line);
  if (!input) {
    result.skipped++;
    return;
  }
  engine.ingest(input);
  result.loaded++;
}
