import type { ConversationEntry } from "../types";

/** The last entry is an answer the user has not judged yet */
export function needsSatisfaction(history: ConversationEntry[]): boolean {
  const last = history[history.length - 1];
  return last !== undefined && last.role === "assistant" && last.satisfied === undefined;
}

/** Render a whole Q&A session as one Markdown research note */
export function formatResearchNote(history: ConversationEntry[]): string {
  let note = "## Research Notes\n\n";
  for (const entry of history) {
    const speaker = entry.role === "user" ? "User" : "Assistant";
    note += `**${speaker}:** ${entry.content}\n\n`;
  }
  return note;
}
