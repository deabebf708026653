/**
 * QnaPage.tsx: Summary sidebar plus the question/answer loop for one document.
 *
 * ON ENTRY:
 *   - No cached summary → generate one (sidebar shows a spinner meanwhile).
 *   - Embeddings not ready → initialise them; the question form stays
 *     disabled until the backend says the document is ready.
 *
 * KEY BEHAVIOURS:
 *   - Each question appends a user entry first, then the answer. A failed
 *     answer keeps the question in the history and shows an error banner.
 *   - While the newest entry is an unjudged answer, a Yes/No prompt asks
 *     whether it was satisfying; the verdict lands on that entry only.
 *   - "Clear Chat" empties the history locally.
 *   - "Back to Document Library" saves the history to the backend first,
 *     then drops every per-document field.
 *   - Requests still running when the page unmounts are aborted.
 */

import { useEffect, useRef, useState, type Dispatch, type FormEvent } from "react";
import ReactMarkdown from "react-markdown";
import remarkGfm from "remark-gfm";
import {
  askQuestion,
  generateReport,
  generateSummary,
  initializeEmbeddings,
  saveSessionHistory,
} from "../api/client";
import { errorMessage, isCancelled } from "../api/errors";
import { usePageSignal } from "../hooks/usePageSignal";
import { createLogger } from "../lib/logger";
import { needsSatisfaction } from "../session/history";
import type { SessionAction } from "../session/state";
import type { ConversationEntry, DocumentSummary } from "../types";
import MessageBubble from "./MessageBubble";
import PageHeader from "./PageHeader";
import ResearchNotesPanel from "./ResearchNotesPanel";
import SatisfactionPrompt from "./SatisfactionPrompt";

const log = createLogger("qna");

const EMPTY_SUMMARY_TEXT = "No summary was returned for this document.";

interface Props {
  token: string;
  document: DocumentSummary;
  summary: string;
  embeddingsReady: boolean;
  history: ConversationEntry[];
  dispatch: Dispatch<SessionAction>;
}

export default function QnaPage({ token, document, summary, embeddingsReady, history, dispatch }: Props) {
  const [summaryError, setSummaryError] = useState<string | null>(null);
  const [embeddingsError, setEmbeddingsError] = useState<string | null>(null);
  const [input, setInput] = useState("");
  const [wantReport, setWantReport] = useState(false);
  const [sending, setSending] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [leaving, setLeaving] = useState(false);
  const pageSignal = usePageSignal();

  const bottomRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    bottomRef.current?.scrollIntoView?.({ behavior: "smooth" });
  }, [history.length]);

  // ---- Summary: generate when none is cached ---------------------- //
  useEffect(() => {
    if (summary || summaryError) return;
    const controller = new AbortController();
    generateSummary(document.id, token, controller.signal)
      .then((text) => dispatch({ type: "summaryGenerated", summary: text.trim() ? text : EMPTY_SUMMARY_TEXT }))
      .catch((err: unknown) => {
        if (isCancelled(err)) return;
        setSummaryError(errorMessage(err));
      });
    return () => controller.abort();
  }, [document.id, token, summary, summaryError, dispatch]);

  // ---- Embeddings: Q&A is gated on readiness ---------------------- //
  useEffect(() => {
    if (embeddingsReady || embeddingsError) return;
    const controller = new AbortController();
    initializeEmbeddings(document.id, token, controller.signal)
      .then((ready) => {
        if (ready) {
          dispatch({ type: "embeddingsReady" });
        } else {
          setEmbeddingsError("Failed to initialize embeddings for the document.");
        }
      })
      .catch((err: unknown) => {
        if (isCancelled(err)) return;
        setEmbeddingsError(`Failed to initialize embeddings for the document. ${errorMessage(err)}`);
      });
    return () => controller.abort();
  }, [document.id, token, embeddingsReady, embeddingsError, dispatch]);

  function handleRegenerate() {
    log.info("Regenerate Summary clicked.");
    setSummaryError(null);
    dispatch({ type: "regenerateSummary" });
  }

  // ---- Ask a question --------------------------------------------- //
  async function handleAsk(e: FormEvent) {
    e.preventDefault();
    const question = input.trim();
    if (!question || sending || !embeddingsReady) return;

    setInput("");
    setError(null);
    setSending(true);
    dispatch({ type: "questionAsked", content: question });
    log.info(`User submitted question (${wantReport ? "report" : "answer"})`);

    try {
      const answer = wantReport
        ? await generateReport(question, document.id, token, pageSignal())
        : await askQuestion(question, document.id, token, pageSignal());
      dispatch({ type: "answerReceived", content: answer, isReport: wantReport });
    } catch (err: unknown) {
      if (isCancelled(err)) return;
      setError(errorMessage(err));
    } finally {
      setSending(false);
    }
  }

  function handleSatisfaction(satisfied: boolean) {
    log.info(`User satisfaction: ${satisfied ? "Yes" : "No"}`);
    dispatch({ type: "satisfactionSubmitted", satisfied });
  }

  function handleClear() {
    log.info("Clear Chat clicked; clearing session history.");
    setError(null);
    dispatch({ type: "clearHistory" });
  }

  // ---- Leave: persist the transcript, then reset ------------------ //
  async function handleBack() {
    setLeaving(true);
    log.info("Back to Document Library clicked; saving session history.");
    const signal = pageSignal();
    const saved = await saveSessionHistory(document.id, history, token);
    // Logged out (or otherwise left) while the save was running.
    if (signal.aborted) return;
    dispatch({
      type: "backToLibrary",
      flash: saved
        ? { variant: "success", text: "Session history saved." }
        : { variant: "error", text: "Failed to save session history." },
    });
  }

  const summaryLoading = !summary && !summaryError;
  const awaitingVerdict = needsSatisfaction(history);

  return (
    <div className="min-h-screen bg-slate-50 flex flex-col">
      <PageHeader
        title="Q/A Session"
        subtitle={document.title}
        onLogout={() => dispatch({ type: "logout" })}
        left={
          <button
            type="button"
            onClick={handleBack}
            disabled={leaving}
            className="text-slate-500 hover:text-indigo-600 transition-colors px-2 py-1 rounded-lg
                       hover:bg-slate-100 text-sm disabled:text-slate-300"
            title="Save this session and return to the library"
          >
            {leaving ? "Saving…" : "Back to Document Library"}
          </button>
        }
      />

      <div className="flex-1 flex gap-6 px-4 py-6 max-w-6xl w-full mx-auto">
        {/* ---- Sidebar: summary + PDF link ---- */}
        <aside className="w-72 shrink-0 space-y-3">
          <div className="bg-white border border-slate-200 rounded-2xl p-4 space-y-3">
            <div className="flex items-center justify-between">
              <h2 className="text-sm font-semibold text-slate-800">Document Summary</h2>
              <button
                type="button"
                onClick={handleRegenerate}
                disabled={summaryLoading}
                className="text-xs text-indigo-600 hover:text-indigo-700 disabled:text-slate-300"
              >
                Regenerate Summary
              </button>
            </div>
            <p className="text-xs text-slate-500">
              <span className="font-medium text-slate-700">Title:</span> {document.title}
            </p>

            {summaryLoading && <p className="text-xs text-slate-400 animate-pulse">Generating summary…</p>}
            {summaryError && (
              <p role="alert" className="text-xs text-red-600">
                {summaryError}
              </p>
            )}
            {summary && (
              <div className="text-sm text-slate-700 leading-relaxed space-y-2">
                <ReactMarkdown remarkPlugins={[remarkGfm]}>{summary}</ReactMarkdown>
              </div>
            )}

            {document.pdfLink ? (
              <a
                href={document.pdfLink}
                target="_blank"
                rel="noopener noreferrer"
                className="block text-xs text-indigo-600 hover:underline"
              >
                View Full Document PDF
              </a>
            ) : (
              <p className="text-xs text-slate-400">PDF link not available.</p>
            )}
          </div>
        </aside>

        {/* ---- Main: conversation ---- */}
        <main className="flex-1 min-w-0 space-y-4">
          <h2 className="text-lg font-semibold text-slate-800">Ask Questions about the Document</h2>

          {!embeddingsReady && !embeddingsError && (
            <p className="text-xs text-slate-400 animate-pulse">Initializing embeddings…</p>
          )}
          {embeddingsError && (
            <div role="alert" className="bg-red-50 border border-red-200 text-red-700 rounded-lg px-4 py-3
                                         text-sm flex items-center justify-between gap-3">
              <span>{embeddingsError}</span>
              <button
                type="button"
                onClick={() => setEmbeddingsError(null)}
                className="text-red-700 underline font-medium"
              >
                Retry
              </button>
            </div>
          )}

          <div>
            {history.map((entry, i) => (
              <MessageBubble key={i} entry={entry} />
            ))}
            <div ref={bottomRef} />
          </div>

          {awaitingVerdict && <SatisfactionPrompt onSubmit={handleSatisfaction} />}

          {error && (
            <div role="alert" className="bg-red-50 border border-red-200 text-red-700 rounded-lg px-4 py-3 text-sm">
              {error}
            </div>
          )}

          <form onSubmit={handleAsk} className="bg-white border border-slate-200 rounded-2xl p-3 space-y-2">
            <label htmlFor="qna-question" className="block text-sm font-medium text-slate-700">
              Enter your question:
            </label>
            <div className="flex gap-2">
              <input
                id="qna-question"
                type="text"
                value={input}
                onChange={(e) => setInput(e.target.value)}
                disabled={!embeddingsReady || sending}
                className="flex-1 border border-slate-200 rounded-xl px-3 py-2 text-sm
                           focus:outline-none focus:ring-2 focus:ring-indigo-500 disabled:bg-slate-50"
              />
              <button
                type="submit"
                disabled={!embeddingsReady || sending || !input.trim()}
                className="bg-indigo-600 hover:bg-indigo-700 disabled:bg-indigo-300 text-white
                           rounded-xl px-4 py-2 text-sm font-medium transition-colors"
              >
                {sending ? "Fetching response…" : "Submit"}
              </button>
            </div>
            <label className="flex items-center gap-2 text-xs text-slate-500">
              <input
                type="checkbox"
                checked={wantReport}
                onChange={(e) => setWantReport(e.target.checked)}
                disabled={sending}
              />
              Generate detailed report
            </label>
          </form>

          <div className="flex gap-2">
            <button
              type="button"
              onClick={handleClear}
              disabled={sending || history.length === 0}
              className="border border-slate-200 hover:bg-slate-100 text-slate-700 rounded-lg px-3 py-1.5
                         text-xs font-medium disabled:text-slate-300"
            >
              Clear Chat
            </button>
          </div>

          <ResearchNotesPanel documentId={document.id} token={token} history={history} />
        </main>
      </div>
    </div>
  );
}
