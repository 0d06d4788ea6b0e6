export const WAV_HEADER_BYTES = 44;
const SAMPLE_RATE_OFFSET = 24;
const MIN_SAMPLE_RATE = 3_000;
const MAX_SAMPLE_RATE = 384_000;

const ascii = (bytes: Uint8Array, start: number, end: number) => String.fromCharCode(...bytes.subarray(start, end));

export type WavHeaderResult = { ok: true; sampleRate: number } | { ok: false; reason: string };

/** Validates the leading 44 bytes of a streamed WAV; size fields are ignored since the server sends 0xFFFFFFFF. */
export function parseWavHeader(bytes: Uint8Array): WavHeaderResult {
  if (bytes.length < WAV_HEADER_BYTES) {
    return { ok: false, reason: 'incomplete WAV header' };
  }
  if (ascii(bytes, 0, 4) !== 'RIFF' || ascii(bytes, 8, 12) !== 'WAVE') {
    return { ok: false, reason: 'response is not a WAV stream' };
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, WAV_HEADER_BYTES);
  const sampleRate = view.getUint32(SAMPLE_RATE_OFFSET, true);
  if (sampleRate < MIN_SAMPLE_RATE || sampleRate > MAX_SAMPLE_RATE) {
    return { ok: false, reason: `invalid sample rate ${sampleRate}` };
  }
  return { ok: true, sampleRate };
}

/** Rebuilds a finite mono 16-bit WAV from the PCM chunks received during streaming. */
export function buildWavFile(chunks: readonly Uint8Array[], sampleRate: number) {
  const dataBytes = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Uint8Array(WAV_HEADER_BYTES + dataBytes);
  const view = new DataView(out.buffer);
  const writeAscii = (offset: number, text: string) => {
    for (let i = 0; i < text.length; i += 1) out[offset + i] = text.charCodeAt(i);
  };

  writeAscii(0, 'RIFF');
  view.setUint32(4, 36 + dataBytes, true);
  writeAscii(8, 'WAVE');
  writeAscii(12, 'fmt ');
  view.setUint32(16, 16, true);
  view.setUint16(20, 1, true);
  view.setUint16(22, 1, true);
  view.setUint32(SAMPLE_RATE_OFFSET, sampleRate, true);
  view.setUint32(28, sampleRate * 2, true);
  view.setUint16(32, 2, true);
  view.setUint16(34, 16, true);
  writeAscii(36, 'data');
  view.setUint32(40, dataBytes, true);

  let offset = WAV_HEADER_BYTES;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}

/** Little-endian int16 PCM to [-1, 1) floats for an AudioBuffer. */
export function pcm16ToFloat32(bytes: Uint8Array) {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.length);
  const out = new Float32Array(Math.floor(bytes.length / 2));
  for (let i = 0; i < out.length; i += 1) {
    out[i] = view.getInt16(i * 2, true) / 32768;
  }
  return out;
}
