const INT16_MAX = 32767;
const INT16_MIN = -32768;

/**
 * Float [-1, 1] to int16. Positive values scale by 32767 and negative values
 * by 32768 so both rails are reachable; anything outside is clamped.
 */
export function floatSampleToInt16(sample: number): number {
  if (Number.isNaN(sample)) return 0;
  const scaled = Math.round(sample < 0 ? sample * 32768 : sample * INT16_MAX);
  // `|| 0` folds -0 from tiny negative inputs
  return Math.min(INT16_MAX, Math.max(INT16_MIN, scaled)) || 0;
}

export function floatToInt16(samples: Float32Array): Int16Array {
  const out = new Int16Array(samples.length);
  for (let i = 0; i < samples.length; i += 1) {
    out[i] = floatSampleToInt16(samples[i]);
  }
  return out;
}

/** Little-endian bytes of an int16 array, without copying. */
export function int16ToBuffer(samples: Int16Array): Buffer {
  return Buffer.from(samples.buffer, samples.byteOffset, samples.byteLength);
}

export function concatInt16(chunks: readonly Int16Array[]): Int16Array {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const out = new Int16Array(total);
  let offset = 0;
  for (const chunk of chunks) {
    out.set(chunk, offset);
    offset += chunk.length;
  }
  return out;
}
