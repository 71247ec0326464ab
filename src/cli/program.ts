import { Command, InvalidArgumentError } from "commander";
import createDebug from "debug";

import { loadConfig, type Env } from "../config.js";
import { createInMemoryEngine } from "../core/impl/createEngine.js";
import type { IndexingEngine } from "../core/impl/indexingEngine.js";
import { SAMPLE_MESSAGES_FILE, loadMessageFile } from "../ingest/messageFile.js";
import { startServer } from "../http/server.js";
import { formatListing, formatMessage, formatSenderListing, formatStats, painter } from "./render.js";

const debug = createDebug("mail-index:cli");

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  /** Whether stdout accepts ANSI colours. */
  isTTY: boolean;
  env: Env;
}

type GlobalOptions = {
  file?: string;
  seed?: boolean;
  color: boolean;
};

export const defaultIO: CliIO = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  isTTY: process.stdout.isTTY ?? false,
  env: process.env,
};

function parseId(value: string): number {
  const id = Number(value);
  if (!/^[0-9]+$/.test(value) || !Number.isSafeInteger(id) || id < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return id;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^[0-9]+$/.test(value) || port > 65535) {
    throw new InvalidArgumentError("must be an integer between 0 and 65535");
  }
  return port;
}

export function createProgram(io: CliIO = defaultIO): Command {
  const program = new Command();

  program
    .name("mail-index")
    .description("Index messages by date, sender and keyword")
    .version("0.1.0")
    .option("--file <path>", "Message file to load (sender;subject;body;date per line)")
    .option("--seed", "Load the bundled sample messages")
    .option("--no-color", "Disable ANSI colours")
    .configureOutput({
      writeOut: (str) => io.out(str.replace(/\n$/, "")),
      writeErr: (str) => io.err(str.replace(/\n$/, "")),
    })
    .exitOverride();

  const paint = () => painter(io.isTTY && program.opts<GlobalOptions>().color);

  async function openEngine(): Promise<IndexingEngine> {
    const opts = program.opts<GlobalOptions>();
    const config = loadConfig(io.env);
    const engine = createInMemoryEngine();

    if (opts.seed || config.seed) await loadMessageFile(engine, SAMPLE_MESSAGES_FILE);
    const file = opts.file ?? config.messageFile;
    if (file) {
      const { loaded, skipped } = await loadMessageFile(engine, file);
      debug("%s: %d loaded, %d skipped", file, loaded, skipped);
    }
    return engine;
  }

  program
    .command("list")
    .description("List messages by ascending date")
    .action(async () => {
      const engine = await openEngine();
      const lines = formatListing(engine.allOrdered(), paint());
      if (lines.length === 0) io.out("No messages.");
      lines.forEach((line) => io.out(line));
    });

  program
    .command("sender <address>")
    .description("List messages from one sender, oldest ingest first")
    .action(async (address: string) => {
      const engine = await openEngine();
      const records = engine.bySender(address);
      if (records.length === 0) {
        io.out(`No messages from ${address}.`);
        return;
      }
      formatSenderListing(records, paint()).forEach((line) => io.out(line));
    });

  program
    .command("search <word>")
    .description("List messages whose subject or body contains the word")
    .action(async (word: string) => {
      const engine = await openEngine();
      const records = Array.from(engine.byKeyword(word)).sort((a, b) => a.id - b.id);
      if (records.length === 0) {
        io.out("No matches.");
        return;
      }
      formatListing(records, paint()).forEach((line) => io.out(line));
    });

  program
    .command("show")
    .description("Print one message")
    .argument("<id>", "message id", parseId)
    .action(async (id: number) => {
      const engine = await openEngine();
      formatMessage(engine.getById(id), paint()).forEach((line) => io.out(line));
    });

  program
    .command("senders")
    .description("List known senders")
    .action(async () => {
      const engine = await openEngine();
      engine.senders().forEach((sender) => io.out(sender));
    });

  program
    .command("stats")
    .description("Print index statistics")
    .action(async () => {
      const engine = await openEngine();
      formatStats(engine.stats()).forEach((line) => io.out(line));
    });

  program
    .command("serve")
    .description("Serve the HTTP API")
    .option("--port <port>", "Port to listen on", parsePort)
    .action(async (options: { port?: number }) => {
      const engine = await openEngine();
      const { port } = await startServer({ port: options.port ?? loadConfig(io.env).port, engine });
      io.out(`listening on :${port}`);
    });

  return program;
}
