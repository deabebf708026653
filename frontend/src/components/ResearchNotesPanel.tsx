/**
 * ResearchNotesPanel.tsx: Save the current Q&A as a research note, and
 * list the notes already saved for this document.
 */

import { useState } from "react";
import ReactMarkdown from "react-markdown";
import remarkGfm from "remark-gfm";
import { fetchResearchNotes, saveResearchNote } from "../api/client";
import { errorMessage, isCancelled } from "../api/errors";
import { usePageSignal } from "../hooks/usePageSignal";
import { formatResearchNote } from "../session/history";
import type { ConversationEntry, Flash } from "../types";
import FlashBanner from "./FlashBanner";

interface Props {
  documentId: string;
  token: string;
  history: ConversationEntry[];
}

export default function ResearchNotesPanel({ documentId, token, history }: Props) {
  const [saving, setSaving] = useState(false);
  const [saveResult, setSaveResult] = useState<Flash | null>(null);
  const [loadingNotes, setLoadingNotes] = useState(false);
  const [notes, setNotes] = useState<string[] | null>(null);
  const [notesError, setNotesError] = useState<string | null>(null);
  const pageSignal = usePageSignal();

  async function handleSave() {
    if (history.length === 0) {
      setSaveResult({ variant: "info", text: "No Q&A history to save." });
      return;
    }
    setSaving(true);
    setSaveResult(null);
    try {
      const ok = await saveResearchNote(documentId, formatResearchNote(history), token, pageSignal());
      setSaveResult(
        ok
          ? { variant: "success", text: "Entire Q&A session saved as a research note successfully." }
          : { variant: "error", text: "Failed to save the Q&A session as a research note." }
      );
    } catch (err: unknown) {
      if (isCancelled(err)) return;
      setSaveResult({ variant: "error", text: errorMessage(err) });
    } finally {
      setSaving(false);
    }
  }

  async function handleView() {
    setLoadingNotes(true);
    setNotesError(null);
    try {
      setNotes(await fetchResearchNotes(documentId, token, pageSignal()));
    } catch (err: unknown) {
      if (isCancelled(err)) return;
      setNotesError(errorMessage(err));
    } finally {
      setLoadingNotes(false);
    }
  }

  return (
    <section className="bg-white border border-slate-200 rounded-2xl p-4 space-y-3">
      <h2 className="text-sm font-semibold text-slate-800">Research Notes</h2>

      <div className="flex gap-2">
        <button
          type="button"
          onClick={handleSave}
          disabled={saving}
          className="bg-indigo-600 hover:bg-indigo-700 disabled:bg-indigo-300 text-white rounded-lg
                     px-3 py-1.5 text-xs font-medium"
        >
          {saving ? "Saving…" : "Save Q&A as Research Note"}
        </button>
        <button
          type="button"
          onClick={handleView}
          disabled={loadingNotes}
          className="border border-slate-200 hover:bg-slate-50 text-slate-700 rounded-lg px-3 py-1.5
                     text-xs font-medium"
        >
          {loadingNotes ? "Fetching saved research notes…" : "View Saved Research Notes"}
        </button>
      </div>

      <FlashBanner flash={saveResult} />

      {notesError && (
        <p role="alert" className="text-sm text-red-600">
          {notesError}
        </p>
      )}

      {notes !== null && notes.length === 0 && (
        <p className="text-sm text-slate-500">No research notes saved for this document.</p>
      )}

      {notes !== null && notes.length > 0 && (
        <div className="space-y-4">
          {notes.map((note, i) => (
            <article key={i} className="border-t border-slate-100 pt-3">
              <h3 className="text-xs font-semibold text-slate-600 mb-1">Research Note {i + 1}</h3>
              <div className="space-y-2 [&_ul]:list-disc [&_ul]:pl-5 [&_ol]:list-decimal [&_ol]:pl-5">
                <ReactMarkdown remarkPlugins={[remarkGfm]}>{note}</ReactMarkdown>
              </div>
            </article>
          ))}
        </div>
      )}
    </section>
  );
}
