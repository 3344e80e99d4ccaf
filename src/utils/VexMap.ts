import { Formatter, Renderer, Stave, StaveNote, Voice } from 'vexflow';
import { NOTES_PER_MEASURE, REST_KEY } from '../config';
import type { LayoutSlot, ScoreLayout } from '../types';

export type RenderedNotes = Map<number, StaveNote>;

export const convertToVexNotes = (slots: LayoutSlot[]) => {
  return slots.map((slot) => {
    // Rests still need a key; VexFlow uses it for vertical placement only
    const isRest = slot.kind === 'rest';
    const staveNote = new StaveNote({
      clef: 'treble',
      keys: [isRest ? REST_KEY : slot.token],
      duration: isRest ? 'qr' : 'q',
      auto_stem: true,
    });
    return { slot, staveNote };
  });
};

/**
 * One measure's voice, plus the StaveNotes keyed by the token index they
 * render. Rest slots are drawn but never keyed.
 */
export const buildMeasure = (slots: LayoutSlot[]) => {
  const converted = convertToVexNotes(slots);
  const voice = new Voice({ num_beats: slots.length, beat_value: 4 });
  voice.addTickables(converted.map(({ staveNote }) => staveNote));

  const byIndex: RenderedNotes = new Map();
  for (const { slot, staveNote } of converted) {
    if (slot.kind === 'note') byIndex.set(slot.noteIndex, staveNote);
  }

  return { voice, byIndex };
};

/**
 * Draws the whole layout into `container`, replacing whatever was there.
 * Returns the drawn StaveNotes keyed by the token index they render.
 */
export const renderScore = (container: HTMLDivElement, layout: ScoreLayout): RenderedNotes => {
  container.innerHTML = '';

  const renderer = new Renderer(container, Renderer.Backends.SVG);
  renderer.resize(layout.width, layout.height);
  const context = renderer.getContext();
  const rendered: RenderedNotes = new Map();

  for (const row of layout.rows) {
    for (const measure of row.measures) {
      const stave = new Stave(measure.x, measure.y, measure.width);
      if (measure.withClef) stave.addClef('treble');
      if (measure.withTimeSignature) stave.addTimeSignature(`${NOTES_PER_MEASURE}/4`);
      stave.setContext(context).draw();

      const { voice, byIndex } = buildMeasure(measure.slots);
      new Formatter().joinVoices([voice]).formatToStave([voice], stave);
      voice.draw(context, stave);

      byIndex.forEach((note, noteIndex) => rendered.set(noteIndex, note));
    }
  }

  return rendered;
};

/**
 * Recolours one drawn note in place. VexFlow bakes fill/stroke into each path,
 * so the attributes are patched on the note's SVG group rather than via CSS.
 */
export const paintStaveNote = (note: StaveNote, color: string) => {
  note.setStyle({ fillStyle: color, strokeStyle: color });

  const element = note.getSVGElement();
  if (!element) return;

  element.querySelectorAll('path, rect').forEach((part) => {
    if (part.getAttribute('fill') !== 'none') part.setAttribute('fill', color);
    if (part.hasAttribute('stroke')) part.setAttribute('stroke', color);
  });
};
