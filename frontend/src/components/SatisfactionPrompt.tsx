import { useState, type FormEvent } from "react";

interface Props {
  onSubmit: (satisfied: boolean) => void;
}

/** Yes/No verdict on the latest answer; rendered only while it is pending. */
export default function SatisfactionPrompt({ onSubmit }: Props) {
  const [choice, setChoice] = useState<"yes" | "no">("yes");

  function handleSubmit(e: FormEvent) {
    e.preventDefault();
    onSubmit(choice === "yes");
  }

  return (
    <form
      onSubmit={handleSubmit}
      className="bg-white border border-slate-200 rounded-xl px-4 py-3 mb-4 flex items-center gap-4 text-sm"
    >
      <fieldset className="flex items-center gap-4">
        <legend className="sr-only">Are you satisfied with the answer?</legend>
        <span className="text-slate-700">Are you satisfied with the answer?</span>
        <label className="flex items-center gap-1.5 text-slate-600">
          <input
            type="radio"
            name="satisfaction"
            value="yes"
            checked={choice === "yes"}
            onChange={() => setChoice("yes")}
          />
          Yes
        </label>
        <label className="flex items-center gap-1.5 text-slate-600">
          <input
            type="radio"
            name="satisfaction"
            value="no"
            checked={choice === "no"}
            onChange={() => setChoice("no")}
          />
          No
        </label>
      </fieldset>
      <button
        type="submit"
        className="ml-auto bg-indigo-600 hover:bg-indigo-700 text-white rounded-lg px-3 py-1.5 text-xs font-medium"
      >
        Submit Satisfaction
      </button>
    </form>
  );
}
