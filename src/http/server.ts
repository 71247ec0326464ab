import http from "node:http";
import { randomUUID } from "node:crypto";
import createDebug from "debug";

import { PROBLEM_CONTENT_TYPE, problem, type FieldError, type Problem } from "./problem.js";
import { asString, isRecord, parseId, pushErr } from "./validation.js";
import { InvalidInputError, RecordNotFoundError } from "../core/errors.js";
import { createInMemoryEngine } from "../core/impl/createEngine.js";
import type { IndexingEngine } from "../core/impl/indexingEngine.js";
import type { MessageRecord } from "../core/types.js";

const SERVICE = "mail_index";
const VERSION = "0.1.0";

const debug = createDebug("mail-index:http");

const SENDER_MESSAGES_PATH = /^\/senders\/([^/]+)\/messages$/;
const MESSAGE_PATH = /^\/messages\/([^/]+)$/;

export interface ServerOptions {
  port?: number;
  engine?: IndexingEngine;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createInMemoryEngine();

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const instance = url.pathname;
    debug("%s %s (%s)", req.method, url.pathname, requestId);

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          messages: engine.stats().messages,
        });
      }

      if (req.method === "POST" && url.pathname === "/messages") {
        if (!isJson(req)) {
          return sendProblem(res, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", instance, requestId }));
        }

        let body: unknown;
        try {
          body = await readJson(req);
        } catch (e) {
          if (!(e instanceof SyntaxError)) throw e;
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body is not valid JSON", instance, requestId }));
        }
        if (!isRecord(body)) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", instance, requestId }));
        }

        const errors: FieldError[] = [];
        const sender = asString(body.sender);
        if (sender === undefined) pushErr(errors, "$.sender", "must be a string");
        const subject = optionalString(body, "subject", errors);
        const text = optionalString(body, "body", errors);
        const date = optionalString(body, "date", errors);

        if (errors.length || sender === undefined) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", instance, requestId, errors }));
        }

        try {
          const record = engine.ingest({ sender, subject, body: text, date });
          return sendJson(res, 201, toJson(record));
        } catch (e) {
          if (!(e instanceof InvalidInputError)) throw e;
          return sendProblem(res, problem({
            status: 400,
            code: "INVALID_ARGUMENT",
            detail: e.message,
            instance,
            requestId,
            errors: [{ path: `$.${e.field}`, message: "must be non-empty" }],
          }));
        }
      }

      if (req.method === "GET" && url.pathname === "/messages") {
        return sendJson(res, 200, { messages: Array.from(engine.allOrdered(), toJson) });
      }

      const messageMatch = req.method === "GET" ? MESSAGE_PATH.exec(url.pathname) : null;
      if (messageMatch) {
        const id = parseId(messageMatch[1] ?? "");
        if (id === undefined) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "id must be a positive integer", instance, requestId }));
        }
        try {
          return sendJson(res, 200, toJson(engine.getById(id)));
        } catch (e) {
          if (!(e instanceof RecordNotFoundError)) throw e;
          return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: e.message, instance, requestId }));
        }
      }

      if (req.method === "GET" && url.pathname === "/senders") {
        return sendJson(res, 200, { senders: engine.senders() });
      }

      const senderMatch = req.method === "GET" ? SENDER_MESSAGES_PATH.exec(url.pathname) : null;
      if (senderMatch) {
        let sender: string;
        try {
          sender = decodeURIComponent(senderMatch[1] ?? "");
        } catch {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "sender is not valid percent-encoding", instance, requestId }));
        }
        return sendJson(res, 200, { sender, messages: engine.bySender(sender).map(toJson) });
      }

      if (req.method === "GET" && url.pathname === "/search") {
        const query = url.searchParams.get("q");
        if (!query) {
          return sendProblem(res, problem({
            status: 400,
            code: "INVALID_ARGUMENT",
            detail: "invalid request",
            instance,
            requestId,
            errors: [{ path: "$.q", message: "must be non-empty" }],
          }));
        }
        const hits = Array.from(engine.byKeyword(query)).sort((a, b) => a.id - b.id);
        return sendJson(res, 200, { query, messages: hits.map(toJson) });
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", instance, requestId }));
    } catch (e) {
      console.error(`[mail-index] ${req.method} ${url.pathname} failed (${requestId}):`, e);
      return sendProblem(res, problem({ status: 500, code: "INTERNAL", detail: "internal error", instance, requestId }));
    }
  });
}

export async function startServer(opts: ServerOptions = {}): Promise<{ server: http.Server; port: number }> {
  const server = createServer(opts);
  const port = opts.port ?? 3000;

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, () => resolve());
  });

  const addr = server.address();
  const actualPort = typeof addr === "object" && addr ? addr.port : port;
  return { server, port: actualPort };
}

function toJson(record: MessageRecord): MessageRecord {
  return { id: record.id, sender: record.sender, subject: record.subject, body: record.body, date: record.date };
}

function optionalString(body: Record<string, unknown>, field: string, errors: FieldError[]): string {
  const v = body[field];
  if (v === undefined) return "";
  const s = asString(v);
  if (s === undefined) {
    pushErr(errors, `$.${field}`, "must be a string");
    return "";
  }
  return s;
}

function isJson(req: http.IncomingMessage): boolean {
  const ct = (req.headers["content-type"] ?? "").toString();
  return (ct.split(";")[0] ?? "").trim().toLowerCase() === "application/json";
}

async function readJson(req: http.IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const c of req) chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c));
  const raw = Buffer.concat(chunks).toString("utf8");
  return raw.length ? JSON.parse(raw) : null;
}

function sendJson(res: http.ServerResponse, status: number, body: unknown): void {
  const data = JSON.stringify(body);
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(data);
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  const data = JSON.stringify(body);
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(data);
}
