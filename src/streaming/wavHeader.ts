// RIFF/WAVE layout (little-endian):
// - 0..3   "RIFF"          4..7   riff size
// - 8..11  "WAVE"          12..15 "fmt "
// - 16..19 fmt size (16)   20..21 format (1 = PCM)
// - 22..23 channels        24..27 sample rate
// - 28..31 byte rate       32..33 block align
// - 34..35 bits/sample     36..39 "data"   40..43 data size
export const WAV_HEADER_BYTES = 44;
export const WAV_SAMPLE_RATE_OFFSET = 24;
export const UNKNOWN_LENGTH = 0xffffffff;

export interface WavFormat {
  sampleRate: number;
  channels?: number;
  bitsPerSample?: number;
}

function writeHeader(riffSize: number, dataSize: number, format: WavFormat): Buffer {
  const channels = format.channels ?? 1;
  const bitsPerSample = format.bitsPerSample ?? 16;
  const blockAlign = (channels * bitsPerSample) / 8;
  const byteRate = format.sampleRate * blockAlign;

  const header = Buffer.alloc(WAV_HEADER_BYTES);
  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(riffSize, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(format.sampleRate, WAV_SAMPLE_RATE_OFFSET);
  header.writeUInt32LE(byteRate, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(bitsPerSample, 34);
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataSize, 40);
  return header;
}

/** Header for a stream whose final length is not known yet. */
export function createStreamingWavHeader(sampleRate: number): Buffer {
  return writeHeader(UNKNOWN_LENGTH, UNKNOWN_LENGTH - 36, { sampleRate });
}

export function createWavFile(samples: Int16Array, sampleRate: number): Buffer {
  const dataSize = samples.byteLength;
  const header = writeHeader(36 + dataSize, dataSize, { sampleRate });
  return Buffer.concat([header, Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength)]);
}
