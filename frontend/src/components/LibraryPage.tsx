/**
 * LibraryPage.tsx: The signed-in home page: a grid of every document.
 *
 * WHAT IT DOES:
 *   1. Fetches the document list once per session; the result is cached in
 *      SessionState, so returning from a Q&A session does not refetch.
 *   2. Renders a 3-column grid of DocumentCards.
 *   3. Selecting a card resets all per-document state and opens Q&A.
 *
 * A failed fetch leaves the cache empty and offers Retry; "Refresh" drops
 * the cache on purpose to pick up new documents.
 */

import { useEffect, useState, type Dispatch } from "react";
import { listDocuments } from "../api/client";
import { errorMessage, isCancelled } from "../api/errors";
import { config } from "../config";
import { createLogger } from "../lib/logger";
import type { SessionAction } from "../session/state";
import type { DocumentSummary, Flash } from "../types";
import DocumentCard from "./DocumentCard";
import FlashBanner from "./FlashBanner";
import PageHeader from "./PageHeader";

const log = createLogger("library");

interface Props {
  token: string;
  documents: DocumentSummary[] | null;
  flash: Flash | null;
  dispatch: Dispatch<SessionAction>;
}

export default function LibraryPage({ token, documents, flash, dispatch }: Props) {
  const [error, setError] = useState<string | null>(null);
  const [attempt, setAttempt] = useState(0);

  // ---- Fetch the list unless it is already cached ------------------ //
  useEffect(() => {
    if (documents !== null) return;
    const controller = new AbortController();
    setError(null);
    listDocuments(token, controller.signal)
      .then((docs) => dispatch({ type: "documentsLoaded", documents: docs }))
      .catch((err: unknown) => {
        if (isCancelled(err)) return;
        setError(`Failed to fetch documents. ${errorMessage(err)}`);
      });
    return () => controller.abort();
  }, [documents, token, attempt, dispatch]);

  function handleSelect(doc: DocumentSummary) {
    log.info(`Document selected: ${doc.title} (ID: ${doc.id})`);
    dispatch({ type: "selectDocument", document: doc });
  }

  const loading = documents === null && error === null;

  return (
    <div className="min-h-screen bg-slate-50 flex flex-col">
      <PageHeader
        title="Document Library"
        subtitle="Pick a document to summarise and question."
        onLogout={() => dispatch({ type: "logout" })}
      />

      <main className="flex-1 px-4 py-6 max-w-5xl w-full mx-auto space-y-4">
        <FlashBanner flash={flash} onDismiss={() => dispatch({ type: "dismissFlash" })} />

        <div className="flex justify-end">
          <button
            type="button"
            onClick={() => dispatch({ type: "clearDocumentCache" })}
            disabled={documents === null}
            className="text-sm text-slate-500 hover:text-indigo-600 disabled:text-slate-300"
          >
            Refresh
          </button>
        </div>

        {loading && (
          <div className="grid grid-cols-3 gap-4">
            {[0, 1, 2].map((i) => (
              <div key={i} className="h-56 bg-slate-100 rounded-2xl animate-pulse" />
            ))}
          </div>
        )}

        {error && (
          <div role="alert" className="bg-red-50 border border-red-200 text-red-700 rounded-lg px-4 py-3
                                       text-sm flex items-center justify-between gap-3">
            <span>{error}</span>
            <button
              type="button"
              onClick={() => setAttempt((n) => n + 1)}
              className="text-red-700 underline font-medium"
            >
              Retry
            </button>
          </div>
        )}

        {documents !== null && documents.length === 0 && (
          <p className="text-sm text-amber-700 bg-amber-50 border border-amber-200 rounded-lg px-3 py-2">
            No documents available.
          </p>
        )}

        {documents !== null && documents.length > 0 && (
          <div className="grid grid-cols-3 gap-4">
            {documents.map((doc) => (
              <DocumentCard
                key={doc.id}
                document={doc}
                defaultImageUrl={config.defaultImageUrl}
                onSelect={handleSelect}
              />
            ))}
          </div>
        )}
      </main>
    </div>
  );
}
