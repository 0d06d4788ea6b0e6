import { memo, useState, type FormEvent } from 'react';
import type { SpeakerInfo, SpeechMode, SpeechStatus } from '../types/speech.js';

interface SpeechPanelProps {
  speakers: SpeakerInfo[];
  languages: string[];
  status: SpeechStatus;
  error: string | null;
  audioUrl: string | null;
  downloadUrl: string | null;
  onGenerate: (mode: SpeechMode, body: Record<string, unknown>) => void;
  onStop: () => void;
}

const MODE_LABELS: Record<SpeechMode, string> = {
  custom: 'Preset voice',
  design: 'Voice design',
  clone: 'Voice clone',
};

const STATUS_LABELS: Record<SpeechStatus, string> = {
  idle: 'Ready',
  streaming: 'Generating…',
  completed: 'Done',
  failed: 'Failed',
};

const isSpeechMode = (value: string): value is SpeechMode => value in MODE_LABELS;

export const buildRequestBody = (
  mode: SpeechMode,
  fields: { text: string; language: string; speaker: string; instruct: string; refAudioIds: string }
): Record<string, unknown> => {
  const base = { text: fields.text, language: fields.language };
  switch (mode) {
    case 'custom':
      return { ...base, speaker: fields.speaker, ...(fields.instruct ? { instruct: fields.instruct } : {}) };
    case 'design':
      return { ...base, instruct: fields.instruct };
    case 'clone':
      return {
        ...base,
        refAudioIds: fields.refAudioIds
          .split(',')
          .map((id) => id.trim())
          .filter(Boolean),
      };
  }
};

export const SpeechPanel = memo(
  ({ speakers, languages, status, error, audioUrl, downloadUrl, onGenerate, onStop }: SpeechPanelProps) => {
    const [mode, setMode] = useState<SpeechMode>('custom');
    const [text, setText] = useState('');
    const [language, setLanguage] = useState('English');
    const [speaker, setSpeaker] = useState('');
    const [instruct, setInstruct] = useState('');
    const [refAudioIds, setRefAudioIds] = useState('');

    const selectedSpeaker = speaker || speakers[0]?.name || '';
    const streaming = status === 'streaming';

    const handleSubmit = (event: FormEvent<HTMLFormElement>) => {
      event.preventDefault();
      onGenerate(mode, buildRequestBody(mode, { text, language, speaker: selectedSpeaker, instruct, refAudioIds }));
    };

    return (
      <form className="speech-panel" onSubmit={handleSubmit}>
        <div className="speech-panel__row">
          <label>
            Mode
            <select
              value={mode}
              onChange={(event) => {
                if (isSpeechMode(event.target.value)) setMode(event.target.value);
              }}
            >
              {Object.entries(MODE_LABELS).map(([value, label]) => (
                <option key={value} value={value}>
                  {label}
                </option>
              ))}
            </select>
          </label>
          <label>
            Language
            <select value={language} onChange={(event) => setLanguage(event.target.value)}>
              {languages.map((lang) => (
                <option key={lang} value={lang}>
                  {lang}
                </option>
              ))}
            </select>
          </label>
          {mode === 'custom' && (
            <label>
              Speaker
              <select value={selectedSpeaker} onChange={(event) => setSpeaker(event.target.value)}>
                {speakers.map((info) => (
                  <option key={info.name} value={info.name} title={info.description}>
                    {info.name}
                  </option>
                ))}
              </select>
            </label>
          )}
        </div>

        <label>
          Text
          <textarea value={text} onChange={(event) => setText(event.target.value)} rows={5} />
        </label>

        {mode !== 'clone' && (
          <label>
            {mode === 'design' ? 'Voice description' : 'Style instruction (optional)'}
            <input value={instruct} onChange={(event) => setInstruct(event.target.value)} />
          </label>
        )}
        {mode === 'clone' && (
          <label>
            Reference audio IDs (comma separated)
            <input value={refAudioIds} onChange={(event) => setRefAudioIds(event.target.value)} />
          </label>
        )}

        <div className="speech-panel__actions">
          <button type="submit" disabled={streaming || text.trim().length === 0}>
            Generate
          </button>
          <button type="button" onClick={onStop} disabled={!streaming}>
            Stop
          </button>
          {downloadUrl ? (
            <a className="button" href={downloadUrl} download>
              Download WAV
            </a>
          ) : (
            <button type="button" disabled>
              Download WAV
            </button>
          )}
          <span className={`status status--${status}`} role="status">
            {STATUS_LABELS[status]}
          </span>
        </div>

        {error && (
          <p className="error" role="alert">
            {error}
          </p>
        )}
        {audioUrl && <audio controls src={audioUrl} />}
      </form>
    );
  }
);
