// src/pages/HomePage.tsx
import { Link } from 'react-router-dom';
import { SheetMusic } from '../components/Canvas/SheetMusic';
import { NoteInput } from '../components/Controls/NoteInput';
import { PlaybackControls } from '../components/Controls/PlaybackControls';
import { TranscribeButton } from '../components/Controls/TranscribeButton';
import { useScoreStore } from '../store/scoreStore';
import { summarizeNotes } from '../utils/transcription';
import { midiToNoteName } from '../utils/musicMath';

export function HomePage() {
  const { clearScore, lastTranscription } = useScoreStore();
  const summary = lastTranscription ? summarizeNotes(lastTranscription.notes) : null;

  return (
    <div className="container">
      <header className="header flex justify-between items-center">
        <h1>Score Player</h1>

        <div className="controls">
          <PlaybackControls />
          <TranscribeButton />
          <button
            onClick={clearScore}
            className="px-3 py-1 text-sm text-red-600 border border-red-200 rounded hover:bg-red-50"
          >
            Clear Sheet
          </button>
          <Link to="/upload" className="ml-4 text-sm text-gray-600 underline">
            Upload Recording
          </Link>
        </div>
      </header>

      <main className="main-content">
        <NoteInput />
        <SheetMusic />

        {summary && summary.count > 0 && (
          <p className="text-sm text-gray-500">
            {summary.count} notes · {summary.totalDuration.toFixed(2)}s · avg velocity{' '}
            {summary.averageVelocity.toFixed(2)}
            {summary.lowestPitch !== null && summary.highestPitch !== null &&
              ` · range ${midiToNoteName(summary.lowestPitch)}–${midiToNoteName(summary.highestPitch)}`}
          </p>
        )}
      </main>
    </div>
  );
}
