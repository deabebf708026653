/**
 * PageHeader.tsx: Sticky top bar shared by the signed-in pages.
 * Holds the page title, an optional left-side back control and Logout.
 */

import type { ReactNode } from "react";

interface Props {
  title: string;
  subtitle?: string;
  left?: ReactNode;
  onLogout: () => void;
}

export default function PageHeader({ title, subtitle, left, onLogout }: Props) {
  return (
    <header className="bg-white border-b border-slate-200 px-4 py-3 flex items-center gap-3
                        sticky top-0 z-10">
      {left}

      <div className="flex-1 min-w-0">
        <h1 className="text-sm font-semibold text-slate-800">{title}</h1>
        {subtitle && <p className="text-xs text-slate-400 truncate">{subtitle}</p>}
      </div>

      <button
        type="button"
        onClick={onLogout}
        className="text-sm text-slate-500 hover:text-indigo-600 transition-colors px-3 py-1.5
                   rounded-lg hover:bg-slate-100"
      >
        Logout
      </button>
    </header>
  );
}
