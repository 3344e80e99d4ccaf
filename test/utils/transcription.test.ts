import { describe, it, expect } from 'vitest';
import { ApiError } from '../../src/api/errors';
import { notesToTokens, parseTranscriptionResult, summarizeNotes } from '../../src/utils/transcription';
import type { TranscribedNote } from '../../src/types';

const note = (pitch: number, time: number, duration = 0.5, velocity = 0.8): TranscribedNote => ({
  note_name: `n${pitch}`,
  time,
  duration,
  velocity,
  velocity_midi: Math.round(velocity * 127),
  pitch,
  frequency: 440 * 2 ** ((pitch - 69) / 12),
});

describe('parseTranscriptionResult', () => {
  it('reads a complete payload', () => {
    const result = parseTranscriptionResult({
      success: true,
      notes: [
        { note_name: 'A4', time: 0.1, duration: 0.4, velocity: 0.9, velocity_midi: 114, pitch: 69, frequency: 440 },
      ],
      midi_file: '/files/out.mid',
      musescore_available: true,
      sheet_music: { fileUrl: '/files/out.pdf', format: 'pdf', size: 2048 },
    });

    expect(result).toEqual({
      success: true,
      notes: [
        { note_name: 'A4', time: 0.1, duration: 0.4, velocity: 0.9, velocity_midi: 114, pitch: 69, frequency: 440 },
      ],
      midi_file: '/files/out.mid',
      musescore_available: true,
      sheet_music: { fileUrl: '/files/out.pdf', format: 'pdf', size: 2048 },
      error: null,
    });
  });

  it('fills defaults for missing optional fields', () => {
    expect(parseTranscriptionResult({ success: false, error: 'model not loaded' })).toEqual({
      success: false,
      notes: [],
      midi_file: '',
      musescore_available: false,
      sheet_music: null,
      error: 'model not loaded',
    });
  });

  it('rejects a body that is not an object', () => {
    expect(() => parseTranscriptionResult('oops')).toThrow(ApiError);
  });

  it('rejects notes that are not a list', () => {
    expect(() => parseTranscriptionResult({ success: true, notes: {} })).toThrow(
      'Malformed transcription: "notes" must be a list',
    );
  });

  it('rejects a note with a non-numeric field', () => {
    const body = {
      success: true,
      notes: [{ note_name: 'C4', time: '0', duration: 1, velocity: 1, velocity_midi: 127, pitch: 60, frequency: 261.6 }],
    };
    expect(() => parseTranscriptionResult(body)).toThrow('Malformed transcription: "time" must be a number');
  });
});

describe('notesToTokens', () => {
  it('orders notes by onset, then pitch', () => {
    const tokens = notesToTokens([note(64, 1), note(67, 0), note(60, 0)]);
    expect(tokens).toEqual(['c/4', 'g/4', 'e/4']);
  });

  it('does not reorder the input array', () => {
    const notes = [note(64, 1), note(60, 0)];
    notesToTokens(notes);
    expect(notes.map((n) => n.pitch)).toEqual([64, 60]);
  });
});

describe('summarizeNotes', () => {
  it('summarizes an empty transcription', () => {
    expect(summarizeNotes([])).toEqual({
      count: 0,
      averageVelocity: 0,
      lowestPitch: null,
      highestPitch: null,
      totalDuration: 0,
    });
  });

  it('reports count, velocity, range and length', () => {
    const summary = summarizeNotes([note(60, 0, 1, 0.5), note(72, 0.5, 2, 1), note(65, 1, 0.25, 0.75)]);

    expect(summary).toEqual({
      count: 3,
      averageVelocity: 0.75,
      lowestPitch: 60,
      highestPitch: 72,
      totalDuration: 2.5,
    });
  });
});
