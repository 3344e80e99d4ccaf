import { useCallback, useEffect, useState } from 'react';
import type { PlaybackEngine } from '../audio/PlaybackSession';
import { PlaybackController } from '../audio/PlaybackController';
import { getToneEngine } from '../audio/toneEngine';
import { useScoreStore } from '../store/scoreStore';

/**
 * Play while playing restarts from the top instead of stacking a second
 * schedule on the transport.
 */
export const usePlayback = (loadEngine: () => Promise<PlaybackEngine> = getToneEngine) => {
  const tokens = useScoreStore((state) => state.tokens);

  const [controller] = useState(
    () =>
      new PlaybackController(loadEngine, {
        onHighlight: (index) => useScoreStore.getState().setHighlightedIndex(index),
        onStateChange: (state) => useScoreStore.getState().setPlaybackState(state),
      })
  );

  const play = useCallback(async () => {
    try {
      await controller.play(tokens);
    } catch (error) {
      console.error('❌ Playback failed to start:', error);
      useScoreStore.getState().setPlaybackState('idle');
    }
  }, [controller, tokens]);

  const stop = useCallback(() => controller.stop(), [controller]);

  // Editing the score or unmounting invalidates a running or pending schedule
  useEffect(() => () => controller.stop(), [tokens, controller]);

  return { play, stop };
};
