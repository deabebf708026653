/**
 * App.tsx: Root component. Owns the session and routes between pages.
 *
 * The session lives in a reducer here and is passed down explicitly, so
 * pages never reach for global state. resolveView picks the page:
 *
 *   Login / Register: no token yet
 *   Library: signed in, no document selected
 *   Q&A: signed in, a document selected
 *
 * A token paired with the login/register page is treated as a broken
 * session: an error is shown and the user is logged out.
 */

import { useEffect, useReducer } from "react";
import LibraryPage from "./components/LibraryPage";
import LoginPage from "./components/LoginPage";
import QnaPage from "./components/QnaPage";
import RegisterPage from "./components/RegisterPage";
import { createLogger } from "./lib/logger";
import { resolveView } from "./session/router";
import { initialSession, sessionReducer, type SessionState } from "./session/state";

const log = createLogger("app");

interface Props {
  initialState?: SessionState;
}

export default function App({ initialState = initialSession }: Props) {
  const [session, dispatch] = useReducer(sessionReducer, initialState);
  const view = resolveView(session);

  useEffect(() => {
    if (view.kind !== "invalid") return;
    log.error(`Invalid page or authentication state (page: ${session.page.name}); logging out.`);
    dispatch({
      type: "logout",
      flash: { variant: "error", text: "Invalid page or authentication state." },
    });
  }, [view.kind, session.page.name]);

  switch (view.kind) {
    case "login":
      return <LoginPage key="login" flash={session.flash} dispatch={dispatch} />;
    case "register":
      return <RegisterPage key="register" flash={session.flash} dispatch={dispatch} />;
    case "library":
      return (
        <LibraryPage
          key="library"
          token={view.token}
          documents={session.documents}
          flash={session.flash}
          dispatch={dispatch}
        />
      );
    case "qna":
      return (
        <QnaPage
          key={`qna-${view.document.id}`}
          token={view.token}
          document={view.document}
          summary={session.summary}
          embeddingsReady={session.embeddingsReady}
          history={session.history}
          dispatch={dispatch}
        />
      );
    case "invalid":
      return (
        <div role="alert" className="min-h-screen flex items-center justify-center text-sm text-red-600">
          Invalid page or authentication state.
        </div>
      );
  }
}
