import React, { useRef, useState } from 'react';
import { transcribeAudio } from '../../api/api';
import { useScoreStore } from '../../store/scoreStore';

export const TranscribeButton: React.FC = () => {
  const [isBusy, setIsBusy] = useState(false);
  const [error, setError] = useState('');
  const inputRef = useRef<HTMLInputElement>(null);
  const loadTranscription = useScoreStore((state) => state.loadTranscription);

  const handleFile = async (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0];
    if (!file) return;

    setIsBusy(true);
    setError('');
    try {
      console.log(`🎙️ Transcribing ${file.name}...`);
      const result = await transcribeAudio(file, file.name);
      loadTranscription(result);
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Transcription failed');
    } finally {
      setIsBusy(false);
      if (inputRef.current) inputRef.current.value = '';
    }
  };

  return (
    <div className="transcribe">
      <label className="px-3 py-1 text-sm border rounded cursor-pointer">
        {isBusy ? 'Transcribing…' : 'Transcribe Audio'}
        <input
          ref={inputRef}
          type="file"
          accept="audio/*"
          onChange={(e) => void handleFile(e)}
          disabled={isBusy}
          hidden
        />
      </label>
      {error && <span className="text-sm text-red-600">{error}</span>}
    </div>
  );
};
