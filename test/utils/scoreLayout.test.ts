import { describe, it, expect } from 'vitest';
import { DEFAULT_LAYOUT_OPTIONS, layoutScore } from '../../src/utils/scoreLayout';
import type { LayoutSlot } from '../../src/types';

const noteIndices = (slots: LayoutSlot[]) =>
  slots.map((slot) => (slot.kind === 'note' ? slot.noteIndex : 'rest'));

const tokensOf = (count: number) => Array.from({ length: count }, () => 'c/4');

describe('layoutScore', () => {
  it('groups four notes per measure and pads the last one with rests', () => {
    const layout = layoutScore(['c/4', 'd/4', 'e/4', 'f/4', 'g/4', 'a/4']);

    expect(layout.rows).toHaveLength(1);
    const [first, second] = layout.rows[0].measures;
    expect(noteIndices(first.slots)).toEqual([0, 1, 2, 3]);
    expect(noteIndices(second.slots)).toEqual([4, 5, 'rest', 'rest']);
  });

  it('positions measures along the row', () => {
    const layout = layoutScore(tokensOf(6));
    const [first, second] = layout.rows[0].measures;

    expect(first).toMatchObject({ x: 10, y: 20, width: 250, withClef: true, withTimeSignature: true });
    expect(second).toMatchObject({ x: 260, y: 20, withClef: false, withTimeSignature: false });
    expect(layout.width).toBe(520);
    expect(layout.height).toBe(170);
  });

  it('wraps to a new row after four measures', () => {
    const layout = layoutScore(tokensOf(20));

    expect(layout.rows.map((row) => row.measures.length)).toEqual([4, 1]);
    const wrapped = layout.rows[1].measures[0];
    expect(wrapped).toMatchObject({ index: 4, x: 10, y: 170, withClef: true, withTimeSignature: false });
    expect(layout.width).toBe(1020);
    expect(layout.height).toBe(320);
  });

  it('lays out an empty score as one measure of rests', () => {
    const layout = layoutScore([]);

    expect(layout.rows).toHaveLength(1);
    expect(layout.rows[0].measures).toHaveLength(1);
    expect(noteIndices(layout.rows[0].measures[0].slots)).toEqual(['rest', 'rest', 'rest', 'rest']);
  });

  it('keeps malformed tokens in place as rests', () => {
    const layout = layoutScore(['c/4', 'zz', 'e/4']);

    expect(noteIndices(layout.rows[0].measures[0].slots)).toEqual([0, 'rest', 2, 'rest']);
    expect(layout.malformed).toEqual([1]);
  });

  it('places every token index exactly once', () => {
    const layout = layoutScore(tokensOf(9));
    const placed = layout.rows
      .flatMap((row) => row.measures)
      .flatMap((measure) => measure.slots)
      .flatMap((slot) => (slot.kind === 'note' ? [slot.noteIndex] : []));

    expect(placed).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it('honours custom grouping options', () => {
    const layout = layoutScore(tokensOf(5), { ...DEFAULT_LAYOUT_OPTIONS, notesPerMeasure: 3, measuresPerRow: 1 });

    expect(layout.rows).toHaveLength(2);
    expect(noteIndices(layout.rows[1].measures[0].slots)).toEqual([3, 4, 'rest']);
  });

  it('rejects empty measures', () => {
    expect(() => layoutScore(['c/4'], { ...DEFAULT_LAYOUT_OPTIONS, notesPerMeasure: 0 })).toThrow(RangeError);
  });
});
