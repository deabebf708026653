/**
 * LoginPage.tsx: Sign-in screen (the router's default when there is no token).
 *
 * The login call retries on connection failure for up to ~25 s; while it
 * does, the form shows a "Retrying…" notice instead of looking frozen.
 */

import { useState, type Dispatch } from "react";
import { login } from "../api/client";
import { usePageSignal } from "../hooks/usePageSignal";
import type { Credentials } from "../lib/validation";
import type { SessionAction } from "../session/state";
import type { Flash } from "../types";
import AuthForm from "./AuthForm";

interface Props {
  flash: Flash | null;
  dispatch: Dispatch<SessionAction>;
}

export default function LoginPage({ flash, dispatch }: Props) {
  const [notice, setNotice] = useState<string | null>(null);
  const pageSignal = usePageSignal();

  async function handleLogin({ username, password }: Credentials) {
    setNotice(null);
    const token = await login(username, password, {
      signal: pageSignal(),
      onRetry: (attempt, attempts) =>
        setNotice(`Unable to connect. Retrying… (attempt ${attempt} of ${attempts})`),
    });
    dispatch({ type: "loginSucceeded", token });
  }

  return (
    <AuthForm
      title="Login"
      subtitle="Sign in to browse and question your documents."
      submitLabel="Log in"
      busyLabel="Signing in…"
      flash={flash}
      notice={notice}
      onSubmit={handleLogin}
      footer={
        <p>
          Don&apos;t have an account?{" "}
          <button
            type="button"
            onClick={() => dispatch({ type: "showRegister" })}
            className="text-indigo-600 hover:text-indigo-700 font-medium"
          >
            Register
          </button>
        </p>
      }
    />
  );
}
