import { describe, expect, it, vi } from "vitest";
import { callsTo, headerOf, jsonResponse, stubBackend } from "../test/backend";
import {
  askQuestion,
  fetchResearchNotes,
  generateReport,
  generateSummary,
  initializeEmbeddings,
  listDocuments,
  login,
  register,
  saveResearchNote,
  saveSessionHistory,
} from "./client";
import { ApiError } from "./errors";

describe("login", () => {
  it("posts form-encoded credentials and returns the access token", async () => {
    const fetchMock = stubBackend({
      "POST /token": () => jsonResponse(200, { access_token: "T1", token_type: "bearer" }),
    });

    await expect(login("alice", "pw1")).resolves.toBe("T1");

    const [[input, init]] = fetchMock.mock.calls;
    expect(String(input)).toBe("http://localhost:8000/token");
    expect(init?.body).toBe("username=alice&password=pw1");
    expect(headerOf(init, "Content-Type")).toBe("application/x-www-form-urlencoded");
    expect(headerOf(init, "Authorization")).toBeUndefined();
  });

  it("reports invalid credentials on 400 without retrying", async () => {
    const fetchMock = stubBackend({ "POST /token": () => jsonResponse(400, { detail: "bad" }) });

    await expect(login("alice", "wrong")).rejects.toMatchObject({
      kind: "domain",
      status: 400,
      message: "Invalid credentials. Please try again.",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("reports an unknown user on 404", async () => {
    stubBackend({ "POST /token": () => jsonResponse(404, { detail: "User not found" }) });

    await expect(login("nobody", "pw")).rejects.toMatchObject({
      kind: "domain",
      status: 404,
      message: "User not found. Please register first.",
    });
  });

  it("treats any other status as an unknown error", async () => {
    stubBackend({ "POST /token": () => jsonResponse(500, {}) });

    await expect(login("alice", "pw1")).rejects.toMatchObject({
      kind: "unexpected",
      message: "An unknown error occurred. Please try again.",
    });
  });

  it("treats a 200 without a token as an unknown error", async () => {
    stubBackend({ "POST /token": () => jsonResponse(200, { token_type: "bearer" }) });

    await expect(login("alice", "pw1")).rejects.toMatchObject({ kind: "unexpected" });
  });

  it("gives up after five connection failures", async () => {
    const fetchMock = stubBackend({});
    const onRetry = vi.fn();

    const result = login("alice", "pw1", { retryDelayMs: 0, onRetry });

    await expect(result).rejects.toMatchObject({
      kind: "connection",
      message: "Could not connect to the server after 5 attempts.",
    });
    expect(fetchMock).toHaveBeenCalledTimes(5);
    expect(onRetry.mock.calls).toEqual([
      [1, 5],
      [2, 5],
      [3, 5],
      [4, 5],
    ]);
  });

  it("succeeds when the server comes up before the attempts run out", async () => {
    let calls = 0;
    const fetchMock = stubBackend({
      "POST /token": () => {
        calls += 1;
        if (calls < 3) throw new TypeError("fetch failed");
        return jsonResponse(200, { access_token: "T2" });
      },
    });

    await expect(login("alice", "pw1", { retryDelayMs: 0 })).resolves.toBe("T2");
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it("stops retrying once the caller aborts", async () => {
    stubBackend({});
    const controller = new AbortController();

    const result = login("alice", "pw1", {
      retryDelayMs: 60_000,
      signal: controller.signal,
      onRetry: () => controller.abort(),
    });

    await expect(result).rejects.toMatchObject({ kind: "cancelled" });
  });
});

describe("register", () => {
  it("posts JSON and resolves true on success", async () => {
    const fetchMock = stubBackend({ "POST /register": () => jsonResponse(200, { message: "User created" }) });

    await expect(register("alice", "pw1")).resolves.toBe(true);

    const [[, init]] = fetchMock.mock.calls;
    expect(init?.body).toBe(JSON.stringify({ username: "alice", password: "pw1" }));
    expect(headerOf(init, "Content-Type")).toBe("application/json");
  });

  it("treats any 200 body as success", async () => {
    stubBackend({ "POST /register": () => jsonResponse(200, { username: "alice" }) });
    await expect(register("alice", "pw1")).resolves.toBe(true);

    stubBackend({ "POST /register": () => jsonResponse(200, {}) });
    await expect(register("alice", "pw1")).resolves.toBe(true);

    stubBackend({ "POST /register": () => new Response("", { status: 200 }) });
    await expect(register("alice", "pw1")).resolves.toBe(true);
  });

  it("reports a duplicate user on 400", async () => {
    stubBackend({ "POST /register": () => jsonResponse(400, { detail: "exists" }) });

    await expect(register("alice", "pw1")).rejects.toMatchObject({
      kind: "domain",
      message: "User already exists. Please choose a different username.",
    });
  });

  it("fails fast on connection failure", async () => {
    const fetchMock = stubBackend({});

    await expect(register("alice", "pw1")).rejects.toMatchObject({
      kind: "connection",
      message: "Unable to connect to the server. Please try again later.",
    });
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe("listDocuments", () => {
  it("sends the bearer token and normalises the document list", async () => {
    const fetchMock = stubBackend({
      "GET /list_documents_info": () =>
        jsonResponse(200, [
          { DOC_ID: 7, TITLE: "Annual Report", IMAGELINK: "http://img.test/7.png", PDFLINK: "#" },
          { DOC_ID: "D8" },
          { DOC_ID: "D9", TITLE: "Field Notes", IMAGELINK: "", PDFLINK: "http://pdf.test/d9.pdf" },
        ]),
    });

    await expect(listDocuments("T1")).resolves.toEqual([
      { id: "7", title: "Annual Report", imageLink: "http://img.test/7.png", pdfLink: null },
      { id: "D8", title: "No Title", imageLink: "", pdfLink: null },
      { id: "D9", title: "Field Notes", imageLink: "", pdfLink: "http://pdf.test/d9.pdf" },
    ]);
    expect(headerOf(fetchMock.mock.calls[0][1], "Authorization")).toBe("Bearer T1");
  });

  it("maps 401 to an unauthorized error", async () => {
    stubBackend({ "GET /list_documents_info": () => jsonResponse(401, { detail: "expired" }) });

    await expect(listDocuments("T1")).rejects.toMatchObject({
      kind: "unauthorized",
      message: "Your session is not authorized. Please log in again.",
    });
  });

  it("does not treat 404 as user-not-found outside login", async () => {
    stubBackend({ "GET /list_documents_info": () => jsonResponse(404, {}) });

    await expect(listDocuments("T1")).rejects.toMatchObject({ kind: "unexpected", status: 404 });
  });
});

describe("document operations", () => {
  it("generateSummary returns the summary text", async () => {
    const fetchMock = stubBackend({
      "POST /generate_summary": () => jsonResponse(200, { summary: "A short summary." }),
    });

    await expect(generateSummary("D7", "T1")).resolves.toBe("A short summary.");
    expect(fetchMock.mock.calls[0][1]?.body).toBe(JSON.stringify({ document_id: "D7" }));
  });

  it("generateSummary rejects a body without a summary", async () => {
    stubBackend({ "POST /generate_summary": () => jsonResponse(200, { text: "wrong field" }) });

    await expect(generateSummary("D7", "T1")).rejects.toBeInstanceOf(ApiError);
  });

  it("generateSummary rejects a body that is not JSON", async () => {
    stubBackend({ "POST /generate_summary": () => new Response("<html>oops</html>", { status: 200 }) });

    await expect(generateSummary("D7", "T1")).rejects.toMatchObject({ kind: "unexpected", status: 200 });
  });

  it("initializeEmbeddings is ready on 200 unless the body says otherwise", async () => {
    stubBackend({ "POST /initialize_embeddings": () => jsonResponse(200, { message: "ok" }) });
    await expect(initializeEmbeddings("D7", "T1")).resolves.toBe(true);

    stubBackend({ "POST /initialize_embeddings": () => jsonResponse(200, { ready: false }) });
    await expect(initializeEmbeddings("D7", "T1")).resolves.toBe(false);
  });

  it("initializeEmbeddings is ready on a 200 whose body is not an object", async () => {
    stubBackend({ "POST /initialize_embeddings": () => jsonResponse(200, "Embeddings initialized") });
    await expect(initializeEmbeddings("D7", "T1")).resolves.toBe(true);

    stubBackend({ "POST /initialize_embeddings": () => jsonResponse(200, null) });
    await expect(initializeEmbeddings("D7", "T1")).resolves.toBe(true);
  });

  it("askQuestion sends the query and surfaces the backend detail on 400", async () => {
    const fetchMock = stubBackend({
      "POST /query": () => jsonResponse(400, { detail: "Embeddings not initialized" }),
    });

    await expect(askQuestion("What is it about?", "D7", "T1")).rejects.toMatchObject({
      kind: "domain",
      message: "Embeddings not initialized",
    });
    expect(fetchMock.mock.calls[0][1]?.body).toBe(
      JSON.stringify({ query: "What is it about?", document_id: "D7" })
    );
  });

  it("askQuestion returns the response text", async () => {
    stubBackend({ "POST /query": () => jsonResponse(200, { response: "It is about bridges." }) });

    await expect(askQuestion("What is it about?", "D7", "T1")).resolves.toBe("It is about bridges.");
  });

  it("generateReport returns the report text", async () => {
    stubBackend({ "POST /generate_report": () => jsonResponse(200, { report: "# Report" }) });

    await expect(generateReport("Summarise", "D7", "T1")).resolves.toBe("# Report");
  });

  it("fetchResearchNotes passes the document id as a query parameter", async () => {
    const fetchMock = stubBackend({
      "GET /get_research_notes": () => jsonResponse(200, { research_notes: ["first", "second"] }),
    });

    await expect(fetchResearchNotes("D7", "T1")).resolves.toEqual(["first", "second"]);
    expect(String(fetchMock.mock.calls[0][0])).toBe("http://localhost:8000/get_research_notes?document_id=D7");
  });

  it("fetchResearchNotes defaults to an empty list", async () => {
    stubBackend({ "GET /get_research_notes": () => jsonResponse(200, {}) });

    await expect(fetchResearchNotes("D7", "T1")).resolves.toEqual([]);
  });
});

describe("write operations", () => {
  const history = [
    { role: "user" as const, content: "Q1" },
    { role: "assistant" as const, content: "A1", satisfied: false },
    { role: "assistant" as const, content: "R1", isReport: true },
  ];

  it("saveSessionHistory sends the snake-case history and resolves true", async () => {
    const fetchMock = stubBackend({ "POST /save_session_history": () => jsonResponse(200, { ok: true }) });

    await expect(saveSessionHistory("D7", history, "T1")).resolves.toBe(true);
    expect(fetchMock.mock.calls[0][1]?.body).toBe(
      JSON.stringify({
        document_id: "D7",
        session_history: [
          { role: "user", content: "Q1" },
          { role: "assistant", content: "A1", satisfied: false },
          { role: "assistant", content: "R1", is_report: true },
        ],
      })
    );
  });

  it("saveSessionHistory resolves false on failure and does not retry", async () => {
    const fetchMock = stubBackend({ "POST /save_session_history": () => jsonResponse(500, {}) });

    await expect(saveSessionHistory("D7", history, "T1")).resolves.toBe(false);
    expect(callsTo(fetchMock, "POST /save_session_history")).toHaveLength(1);
  });

  it("saveResearchNote resolves false when the server is unreachable", async () => {
    const fetchMock = stubBackend({});

    await expect(saveResearchNote("D7", "## Research Notes\n\n", "T1")).resolves.toBe(false);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("saveResearchNote posts the note", async () => {
    const fetchMock = stubBackend({ "POST /save_entire_research_note": () => jsonResponse(200, {}) });

    await expect(saveResearchNote("D7", "note", "T1")).resolves.toBe(true);
    expect(fetchMock.mock.calls[0][1]?.body).toBe(JSON.stringify({ document_id: "D7", research_note: "note" }));
  });
});
