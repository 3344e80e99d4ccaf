import { describe, it, expect } from 'vitest';
import { buildMeasure, convertToVexNotes } from '../../src/utils/VexMap';
import type { LayoutSlot } from '../../src/types';

const note = (noteIndex: number, token: string): LayoutSlot => ({ kind: 'note', noteIndex, token });
const rest: LayoutSlot = { kind: 'rest' };

describe('convertToVexNotes', () => {
  it('keeps the token as the note key', () => {
    const [{ staveNote }] = convertToVexNotes([note(0, 'f#/4')]);

    expect(staveNote.getKeys()).toEqual(['f#/4']);
    expect(staveNote.getTicks().value()).toBe(4096);
    expect(staveNote.getNoteType()).toBe('n');
  });

  it('draws padding slots as quarter rests', () => {
    const [{ staveNote }] = convertToVexNotes([rest]);

    expect(staveNote.getKeys()).toEqual(['b/4']);
    expect(staveNote.getTicks().value()).toBe(4096);
    expect(staveNote.getNoteType()).toBe('r');
  });

  it('points stems down above the middle line and up below it', () => {
    const [high, low] = convertToVexNotes([note(0, 'a/5'), note(1, 'c/4')]);

    expect(high.staveNote.getStemDirection()).toBe(-1);
    expect(low.staveNote.getStemDirection()).toBe(1);
  });
});

describe('buildMeasure', () => {
  it('sizes the voice to the slot count', () => {
    const { voice } = buildMeasure([note(0, 'c/4'), note(1, 'd/4'), rest]);

    expect(voice.getTotalTicks().value()).toBe(12288);
  });

  it('keys drawn notes by token index and leaves rests out', () => {
    const { byIndex } = buildMeasure([note(4, 'c/4'), rest, note(6, 'e/4'), rest]);

    expect([...byIndex.keys()]).toEqual([4, 6]);
    expect(byIndex.get(6)?.getKeys()).toEqual(['e/4']);
  });
});
