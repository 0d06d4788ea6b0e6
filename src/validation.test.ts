import { describe, expect, it } from 'vitest';
import { HttpError } from './errors.js';
import { createSpeechRequestSchemas, isSpeechMode, isValidJobId, parseSpeechRequest } from './validation.js';

const schemas = createSpeechRequestSchemas({ maxTextLength: 10, maxInstructLength: 5 });
const REF_ID = '0f8fad5b-d9cb-469f-a165-70867728950e';

function messageOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof HttpError) return `${err.statusCode}:${err.message}`;
    throw err;
  }
  return 'no error';
}

describe('parseSpeechRequest', () => {
  it('fills defaults for a custom voice request', () => {
    expect(parseSpeechRequest(schemas, 'custom', { text: 'hi', speaker: 'Ryan' })).toEqual({
      mode: 'custom',
      text: 'hi',
      language: 'English',
      speaker: 'Ryan',
      fast: false,
    });
  });

  it('pads clone transcripts to one per reference sample', () => {
    const parsed = parseSpeechRequest(schemas, 'clone', { text: 'hi', refAudioIds: [REF_ID, REF_ID], refTexts: ['a'] });
    expect(parsed).toMatchObject({ mode: 'clone', refTexts: ['a', null] });
  });

  it('reports the first problem as a 400', () => {
    expect(messageOf(() => parseSpeechRequest(schemas, 'custom', { speaker: 'Ryan' }))).toBe('400:text is required');
    expect(messageOf(() => parseSpeechRequest(schemas, 'custom', { text: 'hi' }))).toBe('400:Speaker is required');
    expect(messageOf(() => parseSpeechRequest(schemas, 'custom', { text: 'x'.repeat(11), speaker: 'Ryan' }))).toBe(
      '400:text exceeds maximum length of 10 characters'
    );
    expect(messageOf(() => parseSpeechRequest(schemas, 'design', { text: 'hi' }))).toBe(
      '400:Voice design instruction is required'
    );
    expect(messageOf(() => parseSpeechRequest(schemas, 'design', { text: 'hi', instruct: 'too long' }))).toBe(
      '400:Instruction exceeds maximum length of 5 characters'
    );
    expect(messageOf(() => parseSpeechRequest(schemas, 'clone', { text: 'hi', refAudioIds: [] }))).toBe(
      '400:At least one reference audio is required'
    );
    expect(messageOf(() => parseSpeechRequest(schemas, 'clone', { text: 'hi', refAudioIds: ['../etc'] }))).toBe(
      '400:Invalid audio ID'
    );
  });
});

describe('id helpers', () => {
  it('accepts only lowercase uuids as job ids', () => {
    expect(isValidJobId(REF_ID)).toBe(true);
    expect(isValidJobId(REF_ID.toUpperCase())).toBe(false);
    expect(isValidJobId('abc123')).toBe(false);
  });

  it('recognises speech modes', () => {
    expect(isSpeechMode('design')).toBe(true);
    expect(isSpeechMode('karaoke')).toBe(false);
  });
});
