/**
 * MessageBubble.tsx: Renders a single conversation entry (user or assistant).
 *
 * LAYOUT:
 *   User entries:      right-aligned, indigo background, plain text.
 *   Assistant entries: left-aligned, white card, Markdown-rendered; a
 *                      detailed report is labelled "Generated Report".
 *
 * Once the user has judged an answer, the verdict is shown under it as
 * "User Satisfaction: Yes/No".
 */

import ReactMarkdown from "react-markdown";
import remarkGfm from "remark-gfm";
import type { ConversationEntry } from "../types";

interface Props {
  entry: ConversationEntry;
}

export default function MessageBubble({ entry }: Props) {
  const isUser = entry.role === "user";

  return (
    <div className={`flex ${isUser ? "justify-end" : "justify-start"} mb-4`}>
      <div className={`max-w-[80%] ${isUser ? "items-end" : "items-start"} flex flex-col`}>
        {!isUser && entry.isReport && (
          <span className="text-[10px] font-medium uppercase tracking-wide text-indigo-700 mb-1">
            Generated Report
          </span>
        )}

        <div
          className={
            isUser
              ? "bg-indigo-600 text-white rounded-2xl rounded-tr-sm px-4 py-3 text-sm leading-relaxed whitespace-pre-wrap"
              : "bg-white border border-slate-200 text-slate-800 rounded-2xl rounded-tl-sm px-4 py-3 text-sm leading-relaxed shadow-sm"
          }
        >
          {isUser ? (
            entry.content
          ) : (
            <div className="space-y-2 [&_ul]:list-disc [&_ul]:pl-5 [&_ol]:list-decimal [&_ol]:pl-5">
              <ReactMarkdown remarkPlugins={[remarkGfm]}>{entry.content}</ReactMarkdown>
            </div>
          )}
        </div>

        {!isUser && entry.satisfied !== undefined && (
          <p className="mt-1 text-xs text-slate-500">
            User Satisfaction: {entry.satisfied ? "Yes" : "No"}
          </p>
        )}
      </div>
    </div>
  );
}
