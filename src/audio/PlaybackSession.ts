import { NOTE_LENGTH, NOTE_SPACING_SECONDS } from '../config';
import type { NoteToken, PlaybackEvent } from '../types';
import { tokenToPitch } from '../utils/musicMath';

// The slice of Tone.js the scheduler needs; see toneEngine.ts for the real one.
export interface TransportClock {
  schedule(callback: (time: number) => void, at: number): number;
  clear(eventId: number): void;
  start(): void;
  stop(): void;
}

export interface NoteSynth {
  triggerAttackRelease(pitch: string, duration: string, time: number): void;
}

export interface PlaybackEngine {
  transport: TransportClock;
  synth: NoteSynth;
  // Runs `callback` in step with the audio clock, e.g. Tone's Draw.
  draw(callback: () => void, time: number): void;
}

export type PlaybackState = 'idle' | 'playing' | 'finished' | 'stopped';

export interface PlaybackListener {
  onHighlight?: (noteIndex: number | null) => void;
  onStateChange?: (state: PlaybackState) => void;
}

export class PlaybackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PlaybackError';
  }
}

/**
 * One event per playable token, `spacing` seconds apart. Malformed tokens
 * keep their slot on the timeline but produce no event.
 */
export const buildPlaybackEvents = (
  tokens: NoteToken[],
  spacing: number = NOTE_SPACING_SECONDS,
): PlaybackEvent[] => {
  const events: PlaybackEvent[] = [];

  tokens.forEach((token, noteIndex) => {
    const pitch = tokenToPitch(token);
    if (!pitch) {
      console.warn(`⚠️ Skipping unplayable note #${noteIndex}: "${token}"`);
      return;
    }
    events.push({ noteIndex, pitch, offset: noteIndex * spacing });
  });

  return events;
};

export class PlaybackSession {
  private state: PlaybackState = 'idle';
  private cursor: number | null = null;
  private scheduledIds: number[] = [];
  private readonly events: PlaybackEvent[];
  private readonly endOffset: number;

  constructor(
    private readonly engine: PlaybackEngine,
    tokens: NoteToken[],
    private readonly listener: PlaybackListener = {},
    spacing: number = NOTE_SPACING_SECONDS,
  ) {
    this.events = buildPlaybackEvents(tokens, spacing);
    this.endOffset = tokens.length * spacing;
  }

  getState(): PlaybackState {
    return this.state;
  }

  getCursor(): number | null {
    return this.cursor;
  }

  getEvents(): readonly PlaybackEvent[] {
    return this.events;
  }

  start() {
    if (this.state !== 'idle') {
      throw new PlaybackError(`Cannot start a session that is ${this.state}`);
    }

    const { transport, synth } = this.engine;

    for (const event of this.events) {
      const id = transport.schedule((time) => {
        if (this.state !== 'playing') return;
        synth.triggerAttackRelease(event.pitch, NOTE_LENGTH, time);
        this.engine.draw(() => this.moveCursor(event.noteIndex), time);
      }, event.offset);
      this.scheduledIds.push(id);
    }

    const endId = transport.schedule((time) => {
      if (this.state !== 'playing') return;
      this.engine.draw(() => this.finish(), time);
    }, this.endOffset);
    this.scheduledIds.push(endId);

    this.setState('playing');
    transport.start();
    console.log(`▶️ Playback started: ${this.events.length} notes`);
  }

  stop() {
    if (this.state !== 'playing') return;
    this.teardown();
    this.setState('stopped');
    console.log('⏹️ Playback stopped');
  }

  private finish() {
    if (this.state !== 'playing') return;
    this.teardown();
    this.setState('finished');
    console.log('✅ Playback finished');
  }

  private teardown() {
    const { transport } = this.engine;
    this.scheduledIds.forEach((id) => transport.clear(id));
    this.scheduledIds = [];
    transport.stop();
    this.moveCursor(null);
  }

  private moveCursor(noteIndex: number | null) {
    // Draw callbacks can land after stop(); only teardown may clear the cursor then
    if (noteIndex !== null && this.state !== 'playing') return;
    if (this.cursor === noteIndex) return;
    this.cursor = noteIndex;
    this.listener.onHighlight?.(noteIndex);
  }

  private setState(state: PlaybackState) {
    this.state = state;
    this.listener.onStateChange?.(state);
  }
}
