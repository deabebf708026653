import type { Flash } from "../types";

interface Props {
  flash: Flash | null;
  onDismiss?: () => void;
}

const VARIANT_CLASSES: Record<Flash["variant"], string> = {
  success: "text-emerald-700 bg-emerald-50 border-emerald-200",
  info: "text-indigo-700 bg-indigo-50 border-indigo-200",
  error: "text-red-600 bg-red-50 border-red-200",
};

export default function FlashBanner({ flash, onDismiss }: Props) {
  if (!flash) return null;

  return (
    <div
      role={flash.variant === "error" ? "alert" : "status"}
      className={`text-sm border rounded-lg px-3 py-2 flex items-start gap-2 ${VARIANT_CLASSES[flash.variant]}`}
    >
      <span className="flex-1">{flash.text}</span>
      {onDismiss && (
        <button
          type="button"
          onClick={onDismiss}
          className="text-xs opacity-60 hover:opacity-100"
          aria-label="Dismiss"
        >
          ✕
        </button>
      )}
    </div>
  );
}
