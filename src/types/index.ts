// VexFlow key notation, e.g. "d/4", "f#/5", "bb/3"
export type NoteToken = string;

export type Accidental = '' | '#' | '##' | 'b' | 'bb' | 'n';

export interface ParsedNote {
  letter: string;       // lowercase a-g
  accidental: Accidental;
  octave: number;
}

export type LayoutSlot =
  | { kind: 'note'; noteIndex: number; token: NoteToken }
  | { kind: 'rest' };

export interface LayoutMeasure {
  index: number;
  x: number;
  y: number;
  width: number;
  withClef: boolean;
  withTimeSignature: boolean;
  slots: LayoutSlot[];
}

export interface LayoutRow {
  index: number;
  measures: LayoutMeasure[];
}

export interface ScoreLayout {
  rows: LayoutRow[];
  width: number;
  height: number;
  malformed: number[]; // token indices laid out as rests
}

export interface PlaybackEvent {
  noteIndex: number;
  pitch: string;   // scientific pitch for the synth, e.g. "D4"
  offset: number;  // seconds from playback start
}

// --- SERVER PAYLOADS ---
export interface TranscribedNote {
  note_name: string;
  time: number;
  duration: number;
  velocity: number;
  velocity_midi: number;
  pitch: number;
  frequency: number;
}

export interface SheetMusicFile {
  fileUrl: string;
  format: string;
  size: number;
}

export interface TranscriptionResult {
  success: boolean;
  notes: TranscribedNote[];
  midi_file: string;
  musescore_available: boolean;
  sheet_music: SheetMusicFile | null;
  error: string | null;
}

export interface NoteSummary {
  count: number;
  averageVelocity: number;
  lowestPitch: number | null;
  highestPitch: number | null;
  totalDuration: number;
}

export type UploadResponse =
  | {
      success: true;
      message: string;
      recording_id: string;
      files: Record<string, string>;
    }
  | { success: false; error: string };

export interface RecordingSummary {
  recording_id: string;
  title: string;
  description: string;
  upload_date: string | null;
  url: string;
  has_image: boolean;
  has_pdf: boolean;
  has_midi: boolean;
}
