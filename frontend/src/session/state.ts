/**
 * state.ts: Everything one signed-in user's session holds, as a reducer.
 *
 * App owns a single SessionState via useReducer and hands it (plus dispatch)
 * to the current page; nothing here is module-level, so two App instances
 * are two independent sessions.
 *
 * The page is a tagged union. The selected document is carried by the qna
 * variant itself, so "on the Q&A page with no document" cannot be built.
 */

import type { ConversationEntry, DocumentSummary, Flash } from "../types";
import { needsSatisfaction } from "./history";

export type Page =
  | { name: "login" }
  | { name: "register" }
  | { name: "home" }
  | { name: "qna"; document: DocumentSummary };

export interface SessionState {
  token: string | null;
  page: Page;
  documents: DocumentSummary[] | null;   // null = not fetched yet
  summary: string;                       // "" = not generated yet
  embeddingsReady: boolean;
  history: ConversationEntry[];
  flash: Flash | null;
}

export type SessionAction =
  | { type: "loginSucceeded"; token: string }
  | { type: "logout"; flash?: Flash }
  | { type: "showLogin" }
  | { type: "showRegister" }
  | { type: "registered" }
  | { type: "documentsLoaded"; documents: DocumentSummary[] }
  | { type: "clearDocumentCache" }
  | { type: "selectDocument"; document: DocumentSummary }
  | { type: "backToLibrary"; flash?: Flash }
  | { type: "summaryGenerated"; summary: string }
  | { type: "regenerateSummary" }
  | { type: "embeddingsReady" }
  | { type: "questionAsked"; content: string }
  | { type: "answerReceived"; content: string; isReport?: boolean }
  | { type: "satisfactionSubmitted"; satisfied: boolean }
  | { type: "clearHistory" }
  | { type: "dismissFlash" };

export const initialSession: SessionState = {
  token: null,
  page: { name: "login" },
  documents: null,
  summary: "",
  embeddingsReady: false,
  history: [],
  flash: null,
};

/** Per-document fields, reset whenever a document is entered or left */
const freshDocumentState: Pick<SessionState, "summary" | "embeddingsReady" | "history"> = {
  summary: "",
  embeddingsReady: false,
  history: [],
};

export function sessionReducer(state: SessionState, action: SessionAction): SessionState {
  switch (action.type) {
    case "loginSucceeded":
      return { ...state, token: action.token, page: { name: "home" }, flash: null };

    // Logging out ends the session: nothing, including the document cache, survives.
    case "logout":
      return { ...initialSession, flash: action.flash ?? null };

    case "showLogin":
      return { ...state, page: { name: "login" }, flash: null };

    case "showRegister":
      return { ...state, page: { name: "register" }, flash: null };

    case "registered":
      return {
        ...state,
        page: { name: "login" },
        flash: { variant: "success", text: "Registration successful! Please login." },
      };

    case "documentsLoaded":
      return { ...state, documents: action.documents };

    case "clearDocumentCache":
      return { ...state, documents: null };

    case "selectDocument":
      return {
        ...state,
        ...freshDocumentState,
        page: { name: "qna", document: action.document },
        flash: null,
      };

    case "backToLibrary":
      return {
        ...state,
        ...freshDocumentState,
        page: { name: "home" },
        flash: action.flash ?? null,
      };

    case "summaryGenerated":
      return { ...state, summary: action.summary };

    case "regenerateSummary":
      return { ...state, summary: "" };

    case "embeddingsReady":
      return { ...state, embeddingsReady: true };

    case "questionAsked":
      return { ...state, history: [...state.history, { role: "user", content: action.content }] };

    case "answerReceived": {
      const entry: ConversationEntry = action.isReport
        ? { role: "assistant", content: action.content, isReport: true }
        : { role: "assistant", content: action.content };
      return { ...state, history: [...state.history, entry] };
    }

    // Only the newest entry, and only while it is still awaiting a verdict.
    case "satisfactionSubmitted": {
      if (!needsSatisfaction(state.history)) return state;
      const last = state.history.length - 1;
      return {
        ...state,
        history: state.history.map((entry, i) =>
          i === last ? { ...entry, satisfied: action.satisfied } : entry
        ),
      };
    }

    case "clearHistory":
      return { ...state, history: [] };

    case "dismissFlash":
      return { ...state, flash: null };
  }
}
