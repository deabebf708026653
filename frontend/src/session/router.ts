/**
 * router.ts: Which page component to show for the current session.
 *
 *   no token               → login (or register, if that was asked for)
 *   token + home           → library
 *   token + qna            → Q&A for the page's document
 *   token + login/register → invalid; App forces a logout
 */

import type { DocumentSummary } from "../types";
import type { SessionState } from "./state";

export type View =
  | { kind: "login" }
  | { kind: "register" }
  | { kind: "library"; token: string }
  | { kind: "qna"; token: string; document: DocumentSummary }
  | { kind: "invalid" };

export function resolveView(state: Pick<SessionState, "token" | "page">): View {
  const { token, page } = state;

  if (!token) {
    return page.name === "register" ? { kind: "register" } : { kind: "login" };
  }

  switch (page.name) {
    case "home":
      return { kind: "library", token };
    case "qna":
      return { kind: "qna", token, document: page.document };
    default:
      return { kind: "invalid" };
  }
}
