/**
 * AuthForm.tsx: Username/password card used by both the login and the
 * register page.
 *
 * VALIDATION:
 *   Both fields must be filled (username is trimmed). A failing form shows
 *   the message inline and never reaches onSubmit, so no request is made.
 *
 * ERRORS:
 *   Whatever onSubmit throws is shown below the fields; a cancelled request
 *   (the page unmounted mid-call) is ignored.
 */

import { useId, useState, type FormEvent, type ReactNode } from "react";
import { errorMessage, isCancelled } from "../api/errors";
import { validateCredentials, type Credentials } from "../lib/validation";
import type { Flash } from "../types";
import FlashBanner from "./FlashBanner";

interface Props {
  title: string;
  subtitle: string;
  submitLabel: string;
  busyLabel: string;
  flash: Flash | null;
  /** Non-error progress text, e.g. "Unable to connect. Retrying…" */
  notice?: string | null;
  onSubmit: (credentials: Credentials) => Promise<void>;
  footer: ReactNode;
}

export default function AuthForm({
  title,
  subtitle,
  submitLabel,
  busyLabel,
  flash,
  notice,
  onSubmit,
  footer,
}: Props) {
  const [username, setUsername] = useState("");
  const [password, setPassword] = useState("");
  const [submitting, setSubmitting] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const fieldId = useId();

  async function handleSubmit(e: FormEvent) {
    e.preventDefault();
    setError(null);

    const check = validateCredentials(username, password);
    if (!check.ok) {
      setError(check.message);
      return;
    }

    setSubmitting(true);
    try {
      await onSubmit(check.credentials);
    } catch (err: unknown) {
      if (isCancelled(err)) return;
      setError(errorMessage(err));
    } finally {
      setSubmitting(false);
    }
  }

  return (
    <div className="min-h-screen bg-slate-50 flex items-center justify-center p-4">
      <div className="bg-white rounded-2xl shadow-lg w-full max-w-sm p-8">
        <h1 className="text-2xl font-bold text-slate-800 mb-1">{title}</h1>
        <p className="text-sm text-slate-500 mb-6">{subtitle}</p>

        {flash && (
          <div className="mb-4">
            <FlashBanner flash={flash} />
          </div>
        )}

        <form onSubmit={handleSubmit} className="space-y-4" noValidate>
          <div>
            <label htmlFor={`${fieldId}-username`} className="block text-sm font-medium text-slate-700 mb-1">
              Username
            </label>
            <input
              id={`${fieldId}-username`}
              type="text"
              autoComplete="username"
              value={username}
              onChange={(e) => setUsername(e.target.value)}
              className="w-full border border-slate-200 rounded-lg px-3 py-2 text-sm
                         focus:outline-none focus:ring-2 focus:ring-indigo-500"
            />
          </div>

          <div>
            <label htmlFor={`${fieldId}-password`} className="block text-sm font-medium text-slate-700 mb-1">
              Password
            </label>
            <input
              id={`${fieldId}-password`}
              type="password"
              autoComplete="current-password"
              value={password}
              onChange={(e) => setPassword(e.target.value)}
              className="w-full border border-slate-200 rounded-lg px-3 py-2 text-sm
                         focus:outline-none focus:ring-2 focus:ring-indigo-500"
            />
          </div>

          {notice && submitting && (
            <p className="text-xs text-amber-700 bg-amber-50 border border-amber-200 rounded-lg px-3 py-2">
              {notice}
            </p>
          )}

          {error && (
            <p role="alert" className="text-sm text-red-600 bg-red-50 border border-red-200
                                       rounded-lg px-3 py-2">
              {error}
            </p>
          )}

          <button
            type="submit"
            disabled={submitting}
            className="w-full bg-indigo-600 hover:bg-indigo-700 disabled:bg-indigo-300
                       text-white font-medium py-2.5 rounded-lg transition-colors text-sm"
          >
            {submitting ? busyLabel : submitLabel}
          </button>
        </form>

        <div className="mt-6 pt-4 border-t border-slate-100 text-sm text-slate-500">{footer}</div>
      </div>
    </div>
  );
}
