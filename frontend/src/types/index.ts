/**
 * types/index.ts: Shared TypeScript types used across components.
 *
 * Wire shapes (what the backend sends) live beside their zod schemas in
 * api/schemas.ts; the types here are the client-side view of them.
 */

/** One entry of GET /list_documents_info, normalised */
export interface DocumentSummary {
  id: string;
  title: string;
  imageLink: string;     // "" means the card goes straight to the default image
  pdfLink: string | null;
}

export type Role = "user" | "assistant";

/**
 * One turn of the Q&A conversation.
 * satisfied is only ever set on assistant entries, once the user answers
 * the "Are you satisfied?" prompt; isReport marks detailed-report answers.
 */
export interface ConversationEntry {
  role: Role;
  content: string;
  satisfied?: boolean;
  isReport?: boolean;
}

/** One-shot notice carried to the next page (e.g. "Session history saved.") */
export interface Flash {
  variant: "success" | "info" | "error";
  text: string;
}
