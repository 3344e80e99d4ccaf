import React from 'react';
import { useScoreStore } from '../../store/scoreStore';
import { usePlayback } from '../../hooks/usePlayback';

export const PlaybackControls: React.FC = () => {
  const playbackState = useScoreStore((state) => state.playbackState);
  const tokenCount = useScoreStore((state) => state.tokens.length);
  const { play, stop } = usePlayback();

  const isPlaying = playbackState === 'playing';

  return (
    <div className="playback-controls">
      <button
        onClick={() => void play()}
        disabled={tokenCount === 0}
        className="px-3 py-1 text-sm border rounded text-blue-600 border-blue-200 bg-white hover:bg-blue-50"
        title={isPlaying ? 'Restart from the beginning' : 'Play'}
      >
        {isPlaying ? '⟲ Restart' : '▶ Play'}
      </button>
      <button
        onClick={stop}
        disabled={!isPlaying}
        className="px-3 py-1 text-sm border rounded text-red-600 border-red-200 bg-white hover:bg-red-50"
      >
        ◼ Stop
      </button>
    </div>
  );
};
