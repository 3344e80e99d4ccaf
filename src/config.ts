// Values come from Vite's env in the browser and from process.env under the CLI.
const readEnv = (key: string): string | undefined => {
  const viteValue: unknown = import.meta.env?.[key];
  if (typeof viteValue === 'string' && viteValue.length > 0) return viteValue;
  if (typeof process !== 'undefined') return process.env[key];
  return undefined;
};

export const API_BASE_URL = readEnv('VITE_API_BASE_URL') ?? 'http://localhost:5000';
export const UPLOAD_BASE_URL = readEnv('VITE_UPLOAD_BASE_URL') ?? API_BASE_URL;

// --- LAYOUT ---
export const NOTES_PER_MEASURE = 4;
export const MEASURES_PER_ROW = 4;
export const STAVE_WIDTH = 250;
export const SYSTEM_HEIGHT = 150;
export const START_X = 10;
export const START_Y = 20;
export const REST_KEY = 'b/4';

// --- PLAYBACK ---
export const NOTE_SPACING_SECONDS = 0.5;
export const NOTE_LENGTH = '8n';
export const HIGHLIGHT_COLOR = '#ff0000';
export const DEFAULT_NOTE_COLOR = '#000000';
