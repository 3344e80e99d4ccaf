import { ApiError } from '../api/errors';
import type { NoteSummary, NoteToken, SheetMusicFile, TranscribedNote, TranscriptionResult } from '../types';
import { midiToToken } from './musicMath';

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const readNumber = (source: JsonObject, key: string): number => {
  const value = source[key];
  if (typeof value !== 'number' || Number.isNaN(value)) {
    throw new ApiError(`Malformed transcription: "${key}" must be a number`);
  }
  return value;
};

const parseNote = (raw: unknown, position: number): TranscribedNote => {
  if (!isObject(raw)) {
    throw new ApiError(`Malformed transcription: note ${position} is not an object`);
  }
  const noteName = raw.note_name;
  if (typeof noteName !== 'string') {
    throw new ApiError('Malformed transcription: "note_name" must be a string');
  }

  return {
    note_name: noteName,
    time: readNumber(raw, 'time'),
    duration: readNumber(raw, 'duration'),
    velocity: readNumber(raw, 'velocity'),
    velocity_midi: readNumber(raw, 'velocity_midi'),
    pitch: readNumber(raw, 'pitch'),
    frequency: readNumber(raw, 'frequency'),
  };
};

const parseSheetMusic = (raw: unknown): SheetMusicFile | null => {
  if (!isObject(raw)) return null;
  return {
    fileUrl: typeof raw.fileUrl === 'string' ? raw.fileUrl : '',
    format: typeof raw.format === 'string' ? raw.format : 'pdf',
    size: typeof raw.size === 'number' ? raw.size : 0,
  };
};

/** Validates a `/transcribe` response body. Missing optional fields get defaults. */
export const parseTranscriptionResult = (body: unknown): TranscriptionResult => {
  if (!isObject(body)) {
    throw new ApiError('Malformed transcription: body is not an object');
  }

  const rawNotes = body.notes ?? [];
  if (!Array.isArray(rawNotes)) {
    throw new ApiError('Malformed transcription: "notes" must be a list');
  }

  return {
    success: body.success === true,
    notes: rawNotes.map(parseNote),
    midi_file: typeof body.midi_file === 'string' ? body.midi_file : '',
    musescore_available: body.musescore_available === true,
    sheet_music: parseSheetMusic(body.sheet_music),
    error: typeof body.error === 'string' ? body.error : null,
  };
};

// Onset order; ties broken by pitch so chords read bottom-up
export const notesToTokens = (notes: TranscribedNote[]): NoteToken[] =>
  [...notes]
    .sort((a, b) => a.time - b.time || a.pitch - b.pitch)
    .map((note) => midiToToken(note.pitch));

export const summarizeNotes = (notes: TranscribedNote[]): NoteSummary => {
  if (notes.length === 0) {
    return { count: 0, averageVelocity: 0, lowestPitch: null, highestPitch: null, totalDuration: 0 };
  }

  const pitches = notes.map((note) => note.pitch);
  const velocitySum = notes.reduce((sum, note) => sum + note.velocity, 0);

  return {
    count: notes.length,
    averageVelocity: velocitySum / notes.length,
    lowestPitch: Math.min(...pitches),
    highestPitch: Math.max(...pitches),
    totalDuration: Math.max(...notes.map((note) => note.time + note.duration)),
  };
};
