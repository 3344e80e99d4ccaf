import type { NoteToken } from '../types';
import { PlaybackSession, type PlaybackEngine, type PlaybackListener } from './PlaybackSession';

/**
 * Keeps at most one live PlaybackSession. Every play() or stop() bumps a
 * generation counter, so a play() still waiting on the engine gives up once
 * something newer has happened.
 */
export class PlaybackController {
  private session: PlaybackSession | null = null;
  private generation = 0;

  constructor(
    private readonly loadEngine: () => Promise<PlaybackEngine>,
    private readonly listener: PlaybackListener = {},
  ) {}

  getSession(): PlaybackSession | null {
    return this.session;
  }

  async play(tokens: NoteToken[]): Promise<PlaybackSession | null> {
    this.stop();
    const generation = this.generation;

    const engine = await this.loadEngine();
    if (generation !== this.generation) return null;

    const session = new PlaybackSession(engine, tokens, this.listener);
    this.session = session;
    session.start();
    return session;
  }

  stop() {
    this.generation++;
    this.session?.stop();
    this.session = null;
  }
}
