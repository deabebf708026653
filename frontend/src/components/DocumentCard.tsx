/**
 * DocumentCard.tsx: One tile of the library grid: image, title, Select.
 *
 * The image URL is resolved on mount (own image → default image → text
 * placeholder, see lib/image.ts) and the probe is aborted on unmount.
 */

import { useEffect, useState } from "react";
import { isCancelled } from "../api/errors";
import { resolveImage } from "../lib/image";
import type { DocumentSummary } from "../types";

interface Props {
  document: DocumentSummary;
  defaultImageUrl: string;
  onSelect: (document: DocumentSummary) => void;
}

type ImageState =
  | { status: "loading" }
  | { status: "ready"; src: string }
  | { status: "missing" };

export default function DocumentCard({ document, defaultImageUrl, onSelect }: Props) {
  const [image, setImage] = useState<ImageState>({ status: "loading" });

  useEffect(() => {
    const controller = new AbortController();
    setImage({ status: "loading" });
    resolveImage(document.imageLink, defaultImageUrl, { signal: controller.signal })
      .then((src) => setImage(src ? { status: "ready", src } : { status: "missing" }))
      .catch((err: unknown) => {
        if (!isCancelled(err)) setImage({ status: "missing" });
      });
    return () => controller.abort();
  }, [document.imageLink, defaultImageUrl]);

  return (
    <div className="bg-white border border-slate-200 rounded-2xl shadow-sm overflow-hidden flex flex-col">
      <div className="aspect-[4/3] bg-slate-100 flex items-center justify-center">
        {image.status === "loading" && <div className="w-full h-full animate-pulse bg-slate-100" />}
        {image.status === "ready" && (
          <img src={image.src} alt={document.title} className="w-full h-full object-cover" />
        )}
        {image.status === "missing" && (
          <span className="text-xs text-slate-400">No Image Available</span>
        )}
      </div>

      <div className="p-4 flex-1 flex flex-col gap-3">
        <p className="text-sm font-medium text-slate-800 flex-1">{document.title}</p>
        <button
          type="button"
          onClick={() => onSelect(document)}
          aria-label={`Select ${document.title}`}
          className="w-full bg-indigo-600 hover:bg-indigo-700 text-white font-medium py-2
                     rounded-lg transition-colors text-sm"
        >
          Select
        </button>
      </div>
    </div>
  );
}
