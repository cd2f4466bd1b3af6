import http from "node:http";
import { randomUUID } from "node:crypto";

import { PROBLEM_CONTENT_TYPE, problem, internalProblem, type FieldError, type Problem } from "./problem.js";
import { asString, isPairArray, isRecord, isStringArray, pushErr } from "./validation.js";
import { createMatcherEngine, type Engine, type MatchMode, type MatchRequest } from "./engine.js";
import { createLogger, type Logger } from "../logger.js";

const SERVICE = "term-matcher";
const VERSION = "0.1.0";

const MAX_TERMS_PER_REQUEST = 10000;
const MAX_TEXT_LENGTH = 1_000_000;
const MAX_TOKENS = 100000;

export interface ServerOptions {
  port?: number;
  metricsEnabled?: boolean;
  engine?: Engine;
  logger?: Logger;
}

export function createServer(opts: ServerOptions = {}): http.Server {
  const start = Date.now();
  const engine = opts.engine ?? createMatcherEngine();
  const metricsEnabled = opts.metricsEnabled ?? false;
  const log = opts.logger ?? createLogger();

  return http.createServer(async (req, res) => {
    const requestId = randomUUID();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const ctx = { instance: url.pathname, requestId };

    try {
      if (req.method === "GET" && url.pathname === "/health") {
        return sendJson(res, 200, {
          status: "ok",
          service: SERVICE,
          version: VERSION,
          uptimeMs: Date.now() - start,
          terms: engine.stats().terms,
        });
      }

      if (req.method === "GET" && url.pathname === "/metrics") {
        if (!metricsEnabled) {
          return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "metrics not enabled", ...ctx }));
        }
        const s = engine.stats();
        res.statusCode = 200;
        res.setHeader("content-type", "text/plain; version=0.0.4");
        res.end(
          [
            `term_matcher_terms_loaded ${s.terms}`,
            `term_matcher_match_requests_total ${s.matchRequests}`,
            `term_matcher_match_hits_total ${s.matchHits}`,
            "",
          ].join("\n"),
        );
        return;
      }

      if (req.method === "POST" && url.pathname === "/terms") {
        if (!isJson(req)) {
          return sendProblem(res, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", ...ctx }));
        }
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", ...ctx }));
        }

        const errors: FieldError[] = [];
        const terms = body.terms;
        if (!isStringArray(terms)) {
          pushErr(errors, "$.terms", "must be an array of strings");
        } else if (terms.length < 1) {
          pushErr(errors, "$.terms", "must contain at least 1 item");
        } else if (terms.length > MAX_TERMS_PER_REQUEST) {
          pushErr(errors, "$.terms", `must contain at most ${MAX_TERMS_PER_REQUEST} items`);
        }

        if (errors.length || !isStringArray(terms)) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", errors, ...ctx }));
        }

        const loaded = engine.loadTerms(terms);
        log.debug(`loaded ${loaded}/${terms.length} terms (${requestId})`);
        return sendJson(res, 200, { loaded, total: engine.stats().terms });
      }

      if (req.method === "POST" && url.pathname === "/match") {
        if (!isJson(req)) {
          return sendProblem(res, problem({ status: 415, code: "UNSUPPORTED_MEDIA_TYPE", detail: "content-type must be application/json", ...ctx }));
        }

        const started = Date.now();
        const body = await readJson(req);
        if (!isRecord(body)) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body must be an object", ...ctx }));
        }

        const errors: FieldError[] = [];
        const matchReq = parseMatchRequest(body, errors);
        if (!matchReq) {
          return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "invalid request", errors, ...ctx }));
        }

        const matches = engine.match(matchReq);
        return sendJson(res, 200, { matches, tookMs: Date.now() - started });
      }

      return sendProblem(res, problem({ status: 404, code: "NOT_FOUND", detail: "not found", ...ctx }));
    } catch (e) {
      if (e instanceof SyntaxError) {
        return sendProblem(res, problem({ status: 400, code: "INVALID_ARGUMENT", detail: "body is not valid JSON", ...ctx }));
      }
      log.error(`${req.method} ${url.pathname} failed (${requestId})`, e);
      return sendProblem(res, internalProblem(ctx));
    }
  });
}

function parseMode(body: Record<string, unknown>, errors: FieldError[]): MatchMode | undefined {
  const mode = asString(body.mode) ?? "index";
  if (mode === "index" || mode === "reconstructed") return mode;
  pushErr(errors, "$.mode", "must be one of: index, reconstructed");
  return undefined;
}

function parseMatchRequest(body: Record<string, unknown>, errors: FieldError[]): MatchRequest | undefined {
  const given = (["text", "tokens", "pairs"] as const).filter((k) => body[k] !== undefined);
  if (given.length !== 1) {
    pushErr(errors, "$", "exactly one of text, tokens, pairs is required");
    return undefined;
  }

  switch (given[0]) {
    case "text": {
      const text = asString(body.text);
      if (text === undefined) pushErr(errors, "$.text", "must be a string");
      else if (text.length > MAX_TEXT_LENGTH) pushErr(errors, "$.text", "too long");
      return text === undefined || errors.length ? undefined : { kind: "text", text };
    }
    case "tokens": {
      const mode = parseMode(body, errors);
      const tokens = body.tokens;
      if (!isStringArray(tokens)) pushErr(errors, "$.tokens", "must be an array of strings");
      else if (tokens.length > MAX_TOKENS) pushErr(errors, "$.tokens", "too many tokens");
      return !mode || !isStringArray(tokens) || errors.length ? undefined : { kind: "tokens", tokens, mode };
    }
    default: {
      const mode = parseMode(body, errors);
      const pairs = body.pairs;
      if (!isPairArray(pairs)) pushErr(errors, "$.pairs", "must be an array of [token, label] string pairs");
      else if (pairs.length > MAX_TOKENS) pushErr(errors, "$.pairs", "too many tokens");
      return !mode || !isPairArray(pairs) || errors.length ? undefined : { kind: "pairs", pairs, mode };
    }
  }
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
  res.statusCode = status;
  res.setHeader("content-type", "application/json");
  res.end(JSON.stringify(body));
}

function sendProblem(res: http.ServerResponse, body: Problem): void {
  res.statusCode = body.status;
  res.setHeader("content-type", PROBLEM_CONTENT_TYPE);
  res.end(JSON.stringify(body));
}
