import React, { useEffect, useMemo, useRef } from 'react';
import { useScoreStore } from '../../store/scoreStore';
import { layoutScore } from '../../utils/scoreLayout';
import { paintStaveNote, renderScore, type RenderedNotes } from '../../utils/VexMap';
import { DEFAULT_NOTE_COLOR, HIGHLIGHT_COLOR } from '../../config';

export const SheetMusic: React.FC = () => {
  const rendererRef = useRef<HTMLDivElement>(null);
  const renderedNotesRef = useRef<RenderedNotes>(new Map());
  const paintedIndexRef = useRef<number | null>(null);

  const tokens = useScoreStore((state) => state.tokens);
  const highlightedIndex = useScoreStore((state) => state.highlightedIndex);

  const layout = useMemo(() => layoutScore(tokens), [tokens]);

  // Layout pass: only when the tokens change
  useEffect(() => {
    if (!rendererRef.current) return;

    if (layout.malformed.length > 0) {
      console.warn(`⚠️ Rendering ${layout.malformed.length} malformed note(s) as rests:`, layout.malformed);
    }

    try {
      renderedNotesRef.current = renderScore(rendererRef.current, layout);
    } catch (error) {
      console.error('❌ Notation failed to render:', error);
      renderedNotesRef.current = new Map();
    }
    paintedIndexRef.current = null;
  }, [layout]);

  // Style pass: repaint the previous and current note only
  useEffect(() => {
    const rendered = renderedNotesRef.current;
    const previous = paintedIndexRef.current;

    if (previous !== null && previous !== highlightedIndex) {
      const note = rendered.get(previous);
      if (note) paintStaveNote(note, DEFAULT_NOTE_COLOR);
    }
    if (highlightedIndex !== null) {
      const note = rendered.get(highlightedIndex);
      if (note) paintStaveNote(note, HIGHLIGHT_COLOR);
    }
    paintedIndexRef.current = highlightedIndex;
  }, [highlightedIndex, layout]);

  return (
    <div
      className="p-4 bg-white border rounded shadow-md overflow-auto relative"
      style={{ height: '400px', width: '100%' }}
    >
      <div ref={rendererRef} />
    </div>
  );
};
