import React, { useEffect, useState } from 'react';
import { Link } from 'react-router-dom';
import { fetchRecordings, fetchServerStatus, uploadRecording } from '../api/api';
import type { RecordingSummary, UploadResponse } from '../types';

export const UploadPage = () => {
  const [userId, setUserId] = useState('');
  const [title, setTitle] = useState('');
  const [description, setDescription] = useState('');
  const [audio, setAudio] = useState<File | null>(null);
  const [midi, setMidi] = useState<File | null>(null);
  const [pdf, setPdf] = useState<File | null>(null);
  const [recordings, setRecordings] = useState<RecordingSummary[] | null>(null);
  const [serverStatus, setServerStatus] = useState('checking…');
  const [result, setResult] = useState<UploadResponse | null>(null);
  const [error, setError] = useState('');

  useEffect(() => {
    fetchServerStatus()
      .then(setServerStatus)
      .catch((err: unknown) => setServerStatus(err instanceof Error ? err.message : 'offline'));
  }, []);

  const loadRecordings = async () => {
    setError('');
    try {
      setRecordings(await fetchRecordings(userId));
    } catch (err) {
      console.error('❌ Could not load recordings:', err);
      setError(err instanceof Error ? err.message : 'Could not load recordings');
    }
  };

  const handleSubmit = async (e: React.FormEvent) => {
    e.preventDefault();
    setError('');
    setResult(null);

    if (!audio) {
      setError('Audio file is required');
      return;
    }

    try {
      const response = await uploadRecording({
        userId,
        title,
        description,
        audio,
        audioName: audio.name,
        midi: midi ?? undefined,
        pdf: pdf ?? undefined,
      });
      setResult(response);
      if (response.success) await loadRecordings();
      else setError(response.error);
    } catch (err) {
      console.error('❌ Upload failed:', err);
      setError(err instanceof Error ? err.message : 'Upload failed');
    }
  };

  return (
    <div className="upload-page">
      <div className="upload-card">
        <h2>Upload Recording</h2>
        <p className="upload-subtitle">Server: {serverStatus}</p>

        {error && <div className="upload-alert upload-alert--error">{error}</div>}
        {result?.success && (
          <div className="upload-alert upload-alert--success">
            {result.message} ({result.recording_id})
          </div>
        )}

        <form onSubmit={(e) => void handleSubmit(e)} className="upload-form">
          <div className="upload-field">
            <label htmlFor="user-id">User ID</label>
            <input id="user-id" value={userId} onChange={(e) => setUserId(e.target.value)} required />
          </div>
          <div className="upload-field">
            <label htmlFor="title">Title</label>
            <input id="title" value={title} onChange={(e) => setTitle(e.target.value)} />
          </div>
          <div className="upload-field">
            <label htmlFor="description">Description</label>
            <input id="description" value={description} onChange={(e) => setDescription(e.target.value)} />
          </div>
          <div className="upload-field">
            <label htmlFor="audio">Audio</label>
            <input id="audio" type="file" accept="audio/*" onChange={(e) => setAudio(e.target.files?.[0] ?? null)} />
          </div>
          <div className="upload-field">
            <label htmlFor="midi">MIDI (optional)</label>
            <input id="midi" type="file" accept=".mid,.midi" onChange={(e) => setMidi(e.target.files?.[0] ?? null)} />
          </div>
          <div className="upload-field">
            <label htmlFor="pdf">Sheet music PDF (optional)</label>
            <input id="pdf" type="file" accept=".pdf" onChange={(e) => setPdf(e.target.files?.[0] ?? null)} />
          </div>
          <button type="submit" className="upload-submit">
            Upload
          </button>
        </form>

        <button type="button" onClick={() => void loadRecordings()} disabled={!userId.trim()}>
          Show my recordings
        </button>

        {recordings && (
          <ul className="recording-list">
            {recordings.length === 0 && <li>No recordings yet</li>}
            {recordings.map((recording) => (
              <li key={recording.recording_id}>
                <a href={recording.url} target="_blank" rel="noreferrer">
                  {recording.title}
                </a>
                {recording.upload_date && <span className="mono"> {recording.upload_date.slice(0, 10)}</span>}
                {recording.has_midi && <span className="badge">midi</span>}
                {recording.has_pdf && <span className="badge">pdf</span>}
              </li>
            ))}
          </ul>
        )}

        <Link to="/" className="upload-back">
          ← Back to the score
        </Link>
      </div>
    </div>
  );
};
