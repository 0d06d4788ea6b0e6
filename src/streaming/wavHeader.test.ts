import { describe, expect, it } from 'vitest';
import {
  createStreamingWavHeader,
  createWavFile,
  UNKNOWN_LENGTH,
  WAV_HEADER_BYTES,
  WAV_SAMPLE_RATE_OFFSET,
} from './wavHeader.js';

describe('createStreamingWavHeader', () => {
  it('writes a 44-byte RIFF/WAVE header with unknown sizes', () => {
    const header = createStreamingWavHeader(24_000);

    expect(header.length).toBe(WAV_HEADER_BYTES);
    expect(header.toString('ascii', 0, 4)).toBe('RIFF');
    expect(header.readUInt32LE(4)).toBe(UNKNOWN_LENGTH);
    expect(header.toString('ascii', 8, 12)).toBe('WAVE');
    expect(header.toString('ascii', 12, 16)).toBe('fmt ');
    expect(header.toString('ascii', 36, 40)).toBe('data');
    expect(header.readUInt32LE(40)).toBe(UNKNOWN_LENGTH - 36);
  });

  it('describes mono 16-bit PCM at the requested rate', () => {
    const header = createStreamingWavHeader(24_000);

    expect(header.readUInt32LE(16)).toBe(16);
    expect(header.readUInt16LE(20)).toBe(1);
    expect(header.readUInt16LE(22)).toBe(1);
    expect(header.readUInt32LE(WAV_SAMPLE_RATE_OFFSET)).toBe(24_000);
    expect(header.readUInt32LE(28)).toBe(48_000);
    expect(header.readUInt16LE(32)).toBe(2);
    expect(header.readUInt16LE(34)).toBe(16);
  });
});

describe('createWavFile', () => {
  it('declares the real payload length', () => {
    const wav = createWavFile(Int16Array.from([1, 2, 3]), 16_000);

    expect(wav.length).toBe(WAV_HEADER_BYTES + 6);
    expect(wav.readUInt32LE(4)).toBe(36 + 6);
    expect(wav.readUInt32LE(40)).toBe(6);
    expect(wav.readUInt32LE(WAV_SAMPLE_RATE_OFFSET)).toBe(16_000);
    expect(wav.readInt16LE(44)).toBe(1);
    expect(wav.readInt16LE(48)).toBe(3);
  });
});
