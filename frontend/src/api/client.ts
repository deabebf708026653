/**
 * client.ts: Typed fetch wrappers for all backend API calls.
 *
 * Each function issues exactly one request (login aside: see RETRY below),
 * validates the body with the zod schema for that endpoint, and either
 * returns the parsed value or throws an ApiError whose message is ready to
 * show to the user.
 *
 * STATUS HANDLING (shared by every call):
 *   200        → parse + validate body
 *   400        → operation-specific message (or the backend's `detail`)
 *   401        → unauthorized
 *   404        → "user not found" for login only
 *   otherwise  → generic unknown error, logged
 *
 * RETRY:
 *   Only login retries, and only when the request never got a response.
 *   Every other call fails fast.
 *
 * AUTH:
 *   Calls that take a token send it as `Authorization: Bearer <token>`.
 *   Every call accepts an AbortSignal so a page can drop its in-flight
 *   requests when the user navigates away.
 */

import { z } from "zod";
import { config } from "../config";
import { isAbortError, sleep } from "../lib/async";
import { createLogger } from "../lib/logger";
import type { ConversationEntry, DocumentSummary } from "../types";
import {
  ApiError,
  CONNECTION_ERROR_MESSAGE,
  isCancelled,
  UNAUTHORIZED_MESSAGE,
  UNKNOWN_ERROR_MESSAGE,
} from "./errors";
import {
  anyBodySchema,
  answerSchema,
  documentListSchema,
  embeddingsSchema,
  errorBodySchema,
  reportSchema,
  researchNotesSchema,
  summarySchema,
  tokenSchema,
} from "./schemas";

const log = createLogger("api");

export const LOGIN_ATTEMPTS = 5;
export const LOGIN_RETRY_DELAY_MS = 5000;

// ------------------------------------------------------------------ //
// Request plumbing
// ------------------------------------------------------------------ //

interface RequestOptions {
  method?: "GET" | "POST";
  token?: string | null;
  json?: unknown;
  form?: Record<string, string>;
  query?: Record<string, string>;
  signal?: AbortSignal;
}

/** How to word the failures an operation can expect */
interface Outcomes {
  badRequest?: string;   // fixed 400 message; otherwise the backend's detail is used
  fallback: string;      // 400 without a usable detail
  notFound?: string;     // only login maps 404
}

/** Send a request; network failures become connection/cancelled ApiErrors */
async function send(path: string, opts: RequestOptions = {}): Promise<Response> {
  const headers: Record<string, string> = {};
  let body: string | undefined;

  if (opts.json !== undefined) {
    headers["Content-Type"] = "application/json";
    body = JSON.stringify(opts.json);
  } else if (opts.form) {
    headers["Content-Type"] = "application/x-www-form-urlencoded";
    body = new URLSearchParams(opts.form).toString();
  }
  if (opts.token) {
    headers.Authorization = `Bearer ${opts.token}`;
  }

  const qs = opts.query ? `?${new URLSearchParams(opts.query).toString()}` : "";
  const method = opts.method ?? "GET";

  try {
    return await fetch(`${config.apiBaseUrl}${path}${qs}`, {
      method,
      headers,
      body,
      signal: opts.signal,
    });
  } catch (err: unknown) {
    if (isAbortError(err) || opts.signal?.aborted) {
      throw new ApiError("cancelled", "Request cancelled.", { cause: err });
    }
    log.warn(`${method} ${path} → connection failed`, err);
    throw new ApiError("connection", CONNECTION_ERROR_MESSAGE, { cause: err });
  }
}

/** Read `detail` from an error body, if the backend sent one */
async function readDetail(res: Response): Promise<string | null> {
  const text = await res.text().catch(() => "");
  if (!text) return null;
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text));
    return parsed.success ? parsed.data.detail : null;
  } catch {
    return null;   // not JSON
  }
}

/** JSON when the body is JSON, the raw text otherwise, null when empty */
function parseBody(text: string): unknown {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Map a response to the parsed body or a typed ApiError */
async function interpret<S extends z.ZodTypeAny>(
  res: Response,
  path: string,
  schema: S,
  outcomes: Outcomes
): Promise<z.output<S>> {
  if (res.status === 200) {
    let text: string;
    try {
      text = await res.text();
    } catch (err: unknown) {
      log.error(`${path} → 200 with an unreadable body`, err);
      throw new ApiError("unexpected", UNKNOWN_ERROR_MESSAGE, { status: 200, cause: err });
    }
    const raw = parseBody(text);
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      log.error(`${path} → 200 with an unexpected body`, parsed.error.issues);
      throw new ApiError("unexpected", UNKNOWN_ERROR_MESSAGE, { status: 200, cause: parsed.error });
    }
    log.debug(`${path} → 200`);
    return parsed.data;
  }

  if (res.status === 400) {
    const message = outcomes.badRequest ?? (await readDetail(res)) ?? outcomes.fallback;
    log.warn(`${path} → 400: ${message}`);
    throw new ApiError("domain", message, { status: 400 });
  }
  if (res.status === 401) {
    log.warn(`${path} → 401`);
    throw new ApiError("unauthorized", UNAUTHORIZED_MESSAGE, { status: 401 });
  }
  if (res.status === 404 && outcomes.notFound) {
    log.warn(`${path} → 404`);
    throw new ApiError("domain", outcomes.notFound, { status: 404 });
  }

  log.error(`${path} → unexpected status ${res.status}`);
  throw new ApiError("unexpected", UNKNOWN_ERROR_MESSAGE, { status: res.status });
}

/** Write-style calls report success as a boolean and never throw, except on cancel */
async function succeeded(call: Promise<unknown>, what: string): Promise<boolean> {
  try {
    await call;
    return true;
  } catch (err: unknown) {
    if (isCancelled(err)) throw err;
    log.warn(`${what} failed`, err);
    return false;
  }
}

// ------------------------------------------------------------------ //
// Auth
// ------------------------------------------------------------------ //

export interface LoginOptions {
  attempts?: number;
  retryDelayMs?: number;
  /** Called before each pause, so the form can say "Retrying…" */
  onRetry?: (attempt: number, attempts: number) => void;
  signal?: AbortSignal;
}

/**
 * Exchange credentials for a bearer token.
 * Calls: POST /token (form-encoded, OAuth2 password flow)
 *
 * Connection failures are retried up to `attempts` times with a fixed pause
 * between tries; any HTTP response ends the loop immediately.
 */
export async function login(
  username: string,
  password: string,
  options: LoginOptions = {}
): Promise<string> {
  const attempts = options.attempts ?? LOGIN_ATTEMPTS;
  const delayMs = options.retryDelayMs ?? LOGIN_RETRY_DELAY_MS;

  for (let attempt = 1; ; attempt++) {
    let res: Response;
    try {
      res = await send("/token", {
        method: "POST",
        form: { username, password },
        signal: options.signal,
      });
    } catch (err: unknown) {
      if (!(err instanceof ApiError) || err.kind !== "connection") throw err;
      if (attempt >= attempts) {
        log.error(`login: no connection after ${attempts} attempts`);
        throw new ApiError(
          "connection",
          `Could not connect to the server after ${attempts} attempts.`,
          { cause: err }
        );
      }
      log.warn(`login: connection failed (attempt ${attempt}/${attempts}), retrying`);
      options.onRetry?.(attempt, attempts);
      await sleep(delayMs, options.signal);
      continue;
    }

    const body = await interpret(res, "/token", tokenSchema, {
      badRequest: "Invalid credentials. Please try again.",
      notFound: "User not found. Please register first.",
      fallback: "Login failed. Please try again.",
    });
    log.info("Login successful.");
    return body.access_token;
  }
}

/**
 * Create a new account. Resolves true once the backend confirms.
 * Calls: POST /register
 */
export async function register(
  username: string,
  password: string,
  signal?: AbortSignal
): Promise<boolean> {
  const res = await send("/register", {
    method: "POST",
    json: { username, password },
    signal,
  });
  await interpret(res, "/register", anyBodySchema, {
    badRequest: "User already exists. Please choose a different username.",
    fallback: "Registration failed. Please try again.",
  });
  log.info("Registration successful.");
  return true;
}

// ------------------------------------------------------------------ //
// Documents
// ------------------------------------------------------------------ //

/**
 * Fetch the document library.
 * Calls: GET /list_documents_info
 * The caller caches the result for the rest of the session.
 */
export async function listDocuments(token: string, signal?: AbortSignal): Promise<DocumentSummary[]> {
  const res = await send("/list_documents_info", { token, signal });
  const docs = await interpret(res, "/list_documents_info", documentListSchema, {
    fallback: "Failed to fetch documents.",
  });
  log.info(`Fetched ${docs.length} documents.`);
  return docs;
}

/**
 * Calls: POST /generate_summary
 */
export async function generateSummary(
  documentId: string,
  token: string,
  signal?: AbortSignal
): Promise<string> {
  log.info(`Generating summary for document ${documentId}`);
  const res = await send("/generate_summary", {
    method: "POST",
    token,
    json: { document_id: documentId },
    signal,
  });
  const body = await interpret(res, "/generate_summary", summarySchema, {
    fallback: "Summary generation failed.",
  });
  return body.summary;
}

/**
 * Ask the backend to prepare a document for Q&A.
 * Calls: POST /initialize_embeddings
 *
 * A 200 means ready unless the body explicitly says otherwise.
 */
export async function initializeEmbeddings(
  documentId: string,
  token: string,
  signal?: AbortSignal
): Promise<boolean> {
  log.info(`Initializing embeddings for document ${documentId}`);
  const res = await send("/initialize_embeddings", {
    method: "POST",
    token,
    json: { document_id: documentId },
    signal,
  });
  return interpret(res, "/initialize_embeddings", embeddingsSchema, {
    fallback: "Failed to initialize embeddings for the document.",
  });
}

// ------------------------------------------------------------------ //
// Q&A
// ------------------------------------------------------------------ //

/**
 * Calls: POST /query
 */
export async function askQuestion(
  question: string,
  documentId: string,
  token: string,
  signal?: AbortSignal
): Promise<string> {
  log.info(`Sending query for document ${documentId}`);
  const res = await send("/query", {
    method: "POST",
    token,
    json: { query: question, document_id: documentId },
    signal,
  });
  const body = await interpret(res, "/query", answerSchema, {
    fallback: "Error with question.",
  });
  return body.response;
}

/**
 * Same as askQuestion but asks for a long-form report.
 * Calls: POST /generate_report
 */
export async function generateReport(
  question: string,
  documentId: string,
  token: string,
  signal?: AbortSignal
): Promise<string> {
  log.info(`Requesting report for document ${documentId}`);
  const res = await send("/generate_report", {
    method: "POST",
    token,
    json: { query: question, document_id: documentId },
    signal,
  });
  const body = await interpret(res, "/generate_report", reportSchema, {
    fallback: "Error generating report.",
  });
  return body.report;
}

// ------------------------------------------------------------------ //
// Persistence (fire-and-forget: false on failure, never retried)
// ------------------------------------------------------------------ //

/** Snake-case wire form of a conversation entry */
export function toWireEntry(entry: ConversationEntry) {
  return {
    role: entry.role,
    content: entry.content,
    ...(entry.satisfied !== undefined ? { satisfied: entry.satisfied } : {}),
    ...(entry.isReport ? { is_report: true } : {}),
  };
}

/**
 * Calls: POST /save_session_history
 */
export async function saveSessionHistory(
  documentId: string,
  history: ConversationEntry[],
  token: string,
  signal?: AbortSignal
): Promise<boolean> {
  log.info(`Saving session history for document ${documentId} (${history.length} entries)`);
  const call = send("/save_session_history", {
    method: "POST",
    token,
    json: { document_id: documentId, session_history: history.map(toWireEntry) },
    signal,
  }).then((res) =>
    interpret(res, "/save_session_history", anyBodySchema, {
      fallback: "Failed to save session history.",
    })
  );
  return succeeded(call, "save_session_history");
}

/**
 * Calls: POST /save_entire_research_note
 */
export async function saveResearchNote(
  documentId: string,
  note: string,
  token: string,
  signal?: AbortSignal
): Promise<boolean> {
  log.info(`Saving research note for document ${documentId}`);
  const call = send("/save_entire_research_note", {
    method: "POST",
    token,
    json: { document_id: documentId, research_note: note },
    signal,
  }).then((res) =>
    interpret(res, "/save_entire_research_note", anyBodySchema, {
      fallback: "Failed to save research note.",
    })
  );
  return succeeded(call, "save_entire_research_note");
}

/**
 * Calls: GET /get_research_notes?document_id=…
 */
export async function fetchResearchNotes(
  documentId: string,
  token: string,
  signal?: AbortSignal
): Promise<string[]> {
  const res = await send("/get_research_notes", {
    token,
    query: { document_id: documentId },
    signal,
  });
  const body = await interpret(res, "/get_research_notes", researchNotesSchema, {
    fallback: "Error fetching research notes.",
  });
  return body.research_notes;
}
