import React, { useEffect, useState } from 'react';
import { useScoreStore } from '../../store/scoreStore';

export const NoteInput: React.FC = () => {
  const tokens = useScoreStore((state) => state.tokens);
  const setTokensFromText = useScoreStore((state) => state.setTokensFromText);
  const [draft, setDraft] = useState(tokens.join(' '));

  // Keep the draft in sync when notes arrive from elsewhere (e.g. a transcription)
  useEffect(() => {
    setDraft(tokens.join(' '));
  }, [tokens]);

  const handleSubmit = (e: React.FormEvent) => {
    e.preventDefault();
    setTokensFromText(draft);
  };

  return (
    <form onSubmit={handleSubmit} className="note-input">
      <label htmlFor="note-tokens" className="note-input__label">
        Notes (e.g. c/4 d/4 f#/4)
      </label>
      <input
        id="note-tokens"
        type="text"
        value={draft}
        onChange={(e) => setDraft(e.target.value)}
        className="note-input__field"
      />
      <button type="submit" className="px-3 py-1 text-sm border rounded">
        Render
      </button>
    </form>
  );
};
