import type { Dispatch } from "react";
import { register } from "../api/client";
import { usePageSignal } from "../hooks/usePageSignal";
import type { Credentials } from "../lib/validation";
import type { SessionAction } from "../session/state";
import type { Flash } from "../types";
import AuthForm from "./AuthForm";

interface Props {
  flash: Flash | null;
  dispatch: Dispatch<SessionAction>;
}

export default function RegisterPage({ flash, dispatch }: Props) {
  const pageSignal = usePageSignal();

  async function handleRegister({ username, password }: Credentials) {
    await register(username, password, pageSignal());
    dispatch({ type: "registered" });
  }

  return (
    <AuthForm
      title="Register"
      subtitle="Create an account to get started."
      submitLabel="Register"
      busyLabel="Registering…"
      flash={flash}
      onSubmit={handleRegister}
      footer={
        <p>
          Already have an account?{" "}
          <button
            type="button"
            onClick={() => dispatch({ type: "showLogin" })}
            className="text-indigo-600 hover:text-indigo-700 font-medium"
          >
            Log in
          </button>
        </p>
      }
    />
  );
}
