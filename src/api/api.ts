// src/api/api.ts
import axios from 'axios';
import { API_BASE_URL } from '../config';
import type { RecordingSummary, TranscriptionResult, UploadResponse } from '../types';
import { parseTranscriptionResult } from '../utils/transcription';
import { ApiError, toApiError } from './errors';

export const apiClient = axios.create({
  baseURL: API_BASE_URL,
});

// --- INTERCEPTOR ---
apiClient.interceptors.request.use((config) => {
  console.log(`📡 ${config.method?.toUpperCase()} ${config.url}`);
  return config;
});

// --- TYPES ---
export interface RecordingUpload {
  userId: string;
  title?: string;
  description?: string;
  audio: Blob;
  audioName: string;
  pdf?: Blob;
  midi?: Blob;
}

// --- API FUNCTIONS ---

export const fetchServerStatus = async (): Promise<string> => {
  try {
    const response = await apiClient.get<{ message?: string }>('/hello');
    return response.data.message ?? 'ok';
  } catch (error) {
    throw toApiError(error, 'Server is unreachable');
  }
};

export const transcribeAudio = async (audio: Blob, filename = 'recording.m4a'): Promise<TranscriptionResult> => {
  const formData = new FormData();
  formData.append('audio', audio, filename);

  try {
    const response = await apiClient.post<unknown>('/api/transcribe', formData);
    const result = parseTranscriptionResult(response.data);
    if (!result.success) {
      throw new ApiError(result.error ?? 'Transcription failed', response.status);
    }
    return result;
  } catch (error) {
    console.error('❌ Error transcribing audio:', error);
    throw toApiError(error, 'Transcription failed');
  }
};

const parseUploadResponse = (body: unknown): UploadResponse => {
  if (typeof body !== 'object' || body === null || !('success' in body)) {
    throw new ApiError('Malformed upload response');
  }
  if (body.success !== true) {
    const error = 'error' in body && typeof body.error === 'string' ? body.error : 'Upload failed';
    return { success: false, error };
  }

  const files: Record<string, string> = {};
  if ('files' in body && typeof body.files === 'object' && body.files !== null) {
    for (const [kind, url] of Object.entries(body.files)) {
      if (typeof url === 'string') files[kind] = url;
    }
  }

  return {
    success: true,
    message: 'message' in body && typeof body.message === 'string' ? body.message : '',
    recording_id: 'recording_id' in body && typeof body.recording_id === 'string' ? body.recording_id : '',
    files,
  };
};

export const uploadRecording = async (upload: RecordingUpload): Promise<UploadResponse> => {
  if (!upload.userId.trim()) throw new ApiError('User ID is required', 400);
  if (upload.audio.size === 0) throw new ApiError('Audio file is required', 400);

  const formData = new FormData();
  formData.append('userId', upload.userId);
  formData.append('title', upload.title || 'Untitled Recording');
  formData.append('description', upload.description ?? '');
  formData.append('audio_file', upload.audio, upload.audioName);
  if (upload.pdf) formData.append('pdf_file', upload.pdf, 'sheet_music.pdf');
  if (upload.midi) formData.append('midi_file', upload.midi, 'transcription.mid');

  try {
    const response = await apiClient.post<unknown>('/upload', formData);
    return parseUploadResponse(response.data);
  } catch (error) {
    throw toApiError(error, 'Upload failed');
  }
};

const readString = (source: object, key: string, fallback: string): string => {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : fallback;
};

const parseRecording = (raw: unknown): RecordingSummary | null => {
  if (typeof raw !== 'object' || raw === null) return null;
  const recordingId = readString(raw, 'recording_id', '');
  if (!recordingId) return null;

  const uploadDate: unknown = Reflect.get(raw, 'upload_date');
  return {
    recording_id: recordingId,
    title: readString(raw, 'title', 'Untitled'),
    description: readString(raw, 'description', ''),
    upload_date: typeof uploadDate === 'string' ? uploadDate : null,
    url: readString(raw, 'url', ''),
    has_image: Reflect.get(raw, 'has_image') === true,
    has_pdf: Reflect.get(raw, 'has_pdf') === true,
    has_midi: Reflect.get(raw, 'has_midi') === true,
  };
};

// Newest first, as the server sorts them
export const fetchRecordings = async (userId: string): Promise<RecordingSummary[]> => {
  if (!userId.trim()) throw new ApiError('User ID is required', 400);

  try {
    const response = await apiClient.get<unknown>(`/recordings/${encodeURIComponent(userId)}`);
    const body = response.data;
    if (typeof body !== 'object' || body === null || !('recordings' in body) || !Array.isArray(body.recordings)) {
      throw new ApiError('Malformed recordings response', response.status);
    }

    const recordings: RecordingSummary[] = [];
    for (const raw of body.recordings) {
      const recording = parseRecording(raw);
      if (recording) recordings.push(recording);
      else console.warn('⚠️ Skipping malformed recording entry:', raw);
    }
    return recordings;
  } catch (error) {
    throw toApiError(error, 'Could not load recordings');
  }
};
