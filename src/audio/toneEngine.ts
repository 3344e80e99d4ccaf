import * as Tone from 'tone';
import type { PlaybackEngine } from './PlaybackSession';

let engine: PlaybackEngine | null = null;

/**
 * Unlocks the AudioContext (must run inside a user gesture) and hands back
 * the shared Tone.js transport, synth and draw queue.
 */
export const getToneEngine = async (): Promise<PlaybackEngine> => {
  await Tone.start();
  if (engine) return engine;

  const transport = Tone.getTransport();
  const draw = Tone.getDraw();
  const synth = new Tone.Synth().toDestination();

  engine = {
    transport: {
      schedule: (callback, at) => transport.schedule(callback, at),
      clear: (eventId) => {
        transport.clear(eventId);
      },
      start: () => {
        transport.start();
      },
      stop: () => {
        transport.stop();
      },
    },
    synth: {
      triggerAttackRelease: (pitch, duration, time) => {
        synth.triggerAttackRelease(pitch, duration, time);
      },
    },
    draw: (callback, time) => {
      draw.schedule(callback, time);
    },
  };

  console.log('🎹 Audio engine ready');
  return engine;
};
