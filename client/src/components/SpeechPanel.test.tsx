// @vitest-environment jsdom
import { cleanup, render, screen } from '@testing-library/react';
import { afterEach, describe, expect, it } from 'vitest';
import { SpeechPanel, buildRequestBody } from './SpeechPanel.js';

const noop = () => {};

const renderPanel = (downloadUrl: string | null) =>
  render(
    <SpeechPanel
      speakers={[{ name: 'Ryan', description: 'warm', language: 'English' }]}
      languages={['English']}
      status={downloadUrl ? 'completed' : 'failed'}
      error={downloadUrl ? null : 'model not loaded'}
      audioUrl={null}
      downloadUrl={downloadUrl}
      onGenerate={noop}
      onStop={noop}
    />
  );

describe('SpeechPanel', () => {
  afterEach(cleanup);

  it('links the download only for a completed job', () => {
    renderPanel('/api/tts/download/abc123');
    expect(screen.getByRole('link', { name: 'Download WAV' }).getAttribute('href')).toBe('/api/tts/download/abc123');
  });

  it('disables the download and shows the error after a failure', () => {
    renderPanel(null);
    const button = screen.getByRole('button', { name: 'Download WAV' });
    expect(button.hasAttribute('disabled')).toBe(true);
    expect(screen.getByRole('alert').textContent).toBe('model not loaded');
  });
});

describe('buildRequestBody', () => {
  const fields = { text: 'hi', language: 'English', speaker: 'Ryan', instruct: '', refAudioIds: ' a , b ,' };

  it('shapes the body per mode', () => {
    expect(buildRequestBody('custom', fields)).toEqual({ text: 'hi', language: 'English', speaker: 'Ryan' });
    expect(buildRequestBody('design', { ...fields, instruct: 'calm' })).toEqual({
      text: 'hi',
      language: 'English',
      instruct: 'calm',
    });
    expect(buildRequestBody('clone', fields)).toEqual({ text: 'hi', language: 'English', refAudioIds: ['a', 'b'] });
  });
});
