import {
  MEASURES_PER_ROW,
  NOTES_PER_MEASURE,
  STAVE_WIDTH,
  START_X,
  START_Y,
  SYSTEM_HEIGHT,
} from '../config';
import type { LayoutMeasure, LayoutRow, LayoutSlot, NoteToken, ScoreLayout } from '../types';
import { parseNoteToken } from './musicMath';

export interface LayoutOptions {
  notesPerMeasure: number;
  measuresPerRow: number;
  staveWidth: number;
  systemHeight: number;
}

export const DEFAULT_LAYOUT_OPTIONS: LayoutOptions = {
  notesPerMeasure: NOTES_PER_MEASURE,
  measuresPerRow: MEASURES_PER_ROW,
  staveWidth: STAVE_WIDTH,
  systemHeight: SYSTEM_HEIGHT,
};

// Splits tokens into fixed-size measures, padding the last one with rests.
const groupIntoMeasures = (tokens: NoteToken[], size: number, malformed: number[]): LayoutSlot[][] => {
  const measures: LayoutSlot[][] = [];
  let current: LayoutSlot[] = [];

  tokens.forEach((token, noteIndex) => {
    if (parseNoteToken(token)) {
      current.push({ kind: 'note', noteIndex, token });
    } else {
      malformed.push(noteIndex);
      current.push({ kind: 'rest' });
    }

    if (current.length === size) {
      measures.push(current);
      current = [];
    }
  });

  if (current.length > 0 || measures.length === 0) {
    while (current.length < size) current.push({ kind: 'rest' });
    measures.push(current);
  }

  return measures;
};

/**
 * Computes where every measure goes before anything touches the DOM.
 * Rows wrap after `measuresPerRow` measures; each row opens with a clef and
 * the first measure of the score also carries the time signature.
 */
export const layoutScore = (
  tokens: NoteToken[],
  options: LayoutOptions = DEFAULT_LAYOUT_OPTIONS,
): ScoreLayout => {
  if (options.notesPerMeasure < 1 || options.measuresPerRow < 1) {
    throw new RangeError('notesPerMeasure and measuresPerRow must be at least 1');
  }

  const malformed: number[] = [];
  const grouped = groupIntoMeasures(tokens, options.notesPerMeasure, malformed);
  const rows: LayoutRow[] = [];

  grouped.forEach((slots, index) => {
    const rowIndex = Math.floor(index / options.measuresPerRow);
    const column = index % options.measuresPerRow;

    if (column === 0) rows.push({ index: rowIndex, measures: [] });

    const measure: LayoutMeasure = {
      index,
      x: START_X + column * options.staveWidth,
      y: START_Y + rowIndex * options.systemHeight,
      width: options.staveWidth,
      withClef: column === 0,
      withTimeSignature: index === 0,
      slots,
    };
    rows[rows.length - 1].measures.push(measure);
  });

  const widestRow = Math.max(...rows.map((row) => row.measures.length));

  return {
    rows,
    width: START_X * 2 + widestRow * options.staveWidth,
    height: START_Y + rows.length * options.systemHeight,
    malformed,
  };
};
