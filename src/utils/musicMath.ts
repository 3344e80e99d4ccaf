import type { Accidental, NoteToken, ParsedNote } from '../types';

const TOKEN_PATTERN = /^([a-gA-G])(##|#|bb|b|n)?\/([0-9])$/;
const ACCIDENTALS: readonly Accidental[] = ['', '#', '##', 'b', 'bb', 'n'];
const SHARP_NAMES = ['c', 'c#', 'd', 'd#', 'e', 'f', 'f#', 'g', 'g#', 'a', 'a#', 'b'];

/**
 * Parses a VexFlow key such as "f#/5". Returns null for anything the
 * renderer or the synth would not understand.
 */
export const parseNoteToken = (token: NoteToken): ParsedNote | null => {
  const match = TOKEN_PATTERN.exec(token.trim());
  if (!match) return null;

  const [, letter, rawAccidental = '', octave] = match;
  const accidental = ACCIDENTALS.find((a) => a === rawAccidental);
  if (accidental === undefined) return null;

  return {
    letter: letter.toLowerCase(),
    accidental,
    octave: Number(octave),
  };
};

/**
 * "d/4" -> "D4", "bb/3" -> "Bb3". The synth does not know naturals, so "n" is dropped.
 */
export const tokenToPitch = (token: NoteToken): string | null => {
  const parsed = parseNoteToken(token);
  if (!parsed) return null;
  const accidental = parsed.accidental === 'n' ? '' : parsed.accidental;
  return `${parsed.letter.toUpperCase()}${accidental}${parsed.octave}`;
};

/** MIDI 60 -> "c/4". Sharps only. */
export const midiToToken = (midi: number): NoteToken => {
  const pitchClass = ((midi % 12) + 12) % 12;
  const octave = Math.floor(midi / 12) - 1;
  return `${SHARP_NAMES[pitchClass]}/${octave}`;
};

/** MIDI 61 -> "C#4", the server's note_name spelling. */
export const midiToNoteName = (midi: number): string => {
  const [name, octave] = midiToToken(midi).split('/');
  return `${name.toUpperCase()}${octave}`;
};
