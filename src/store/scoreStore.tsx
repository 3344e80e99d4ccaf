import { create } from 'zustand';
import { persist } from 'zustand/middleware';
import type { NoteToken, TranscriptionResult } from '../types';
import type { PlaybackState } from '../audio/PlaybackSession';
import { notesToTokens } from '../utils/transcription';

export const DEFAULT_TOKENS: NoteToken[] = ['c/4', 'd/4', 'e/4', 'f/4', 'g/4', 'a/4', 'b/4', 'c/5', 'd/5'];

interface ScoreState {
  tokens: NoteToken[];
  highlightedIndex: number | null;
  playbackState: PlaybackState;
  lastTranscription: TranscriptionResult | null;

  setTokens: (tokens: NoteToken[]) => void;
  setTokensFromText: (text: string) => void;
  loadTranscription: (result: TranscriptionResult) => void;
  setHighlightedIndex: (index: number | null) => void;
  setPlaybackState: (state: PlaybackState) => void;
  clearScore: () => void;
}

// Accepts tokens separated by commas and/or whitespace
export const parseTokenText = (text: string): NoteToken[] =>
  text
    .split(/[\s,]+/)
    .map((token) => token.trim())
    .filter((token) => token.length > 0);

export const useScoreStore = create<ScoreState>()(
  persist(
    (set) => ({
      tokens: DEFAULT_TOKENS,
      highlightedIndex: null,
      playbackState: 'idle',
      lastTranscription: null,

      setTokens: (tokens) => set({ tokens, highlightedIndex: null }),

      setTokensFromText: (text) => set({ tokens: parseTokenText(text), highlightedIndex: null }),

      loadTranscription: (result) => {
        const tokens = notesToTokens(result.notes);
        console.log(`🎼 Loaded ${tokens.length} transcribed notes`);
        set({ tokens, lastTranscription: result, highlightedIndex: null });
      },

      setHighlightedIndex: (index) => set({ highlightedIndex: index }),

      setPlaybackState: (playbackState) => set({ playbackState }),

      clearScore: () => set({ tokens: [], highlightedIndex: null, lastTranscription: null }),
    }),
    {
      name: 'score-player-tokens',
      partialize: (state) => ({ tokens: state.tokens }),
    }
  )
);
