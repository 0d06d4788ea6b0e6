// Trailer markers appended by the server after the PCM body.
const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const JOB_ID_PREFIX = encoder.encode('<!--JOB_ID:');
export const ERROR_PREFIX = encoder.encode('<!--ERROR:');
const MARKER_SUFFIX = encoder.encode('-->');

/** Longest marker the client waits for before treating buffered bytes as audio. */
export const MAX_MARKER_BYTES = 1024;

export type StreamMarker = { kind: 'job'; jobId: string; start: number } | { kind: 'error'; message: string; start: number };

const matchesAt = (haystack: Uint8Array, needle: Uint8Array, at: number) => {
  if (at < 0 || at + needle.length > haystack.length) return false;
  for (let i = 0; i < needle.length; i += 1) {
    if (haystack[at + i] !== needle[i]) return false;
  }
  return true;
};

export function indexOfBytes(haystack: Uint8Array, needle: Uint8Array, from = 0): number {
  for (let i = Math.max(0, from); i <= haystack.length - needle.length; i += 1) {
    if (matchesAt(haystack, needle, i)) return i;
  }
  return -1;
}

export function lastIndexOfBytes(haystack: Uint8Array, needle: Uint8Array): number {
  for (let i = haystack.length - needle.length; i >= 0; i -= 1) {
    if (matchesAt(haystack, needle, i)) return i;
  }
  return -1;
}

/** Start of the last complete marker prefix, or -1. */
export function lastMarkerStart(bytes: Uint8Array): number {
  return Math.max(lastIndexOfBytes(bytes, JOB_ID_PREFIX), lastIndexOfBytes(bytes, ERROR_PREFIX));
}

/** How many trailing bytes could be the beginning of a marker prefix split across reads. */
export function trailingPrefixLength(bytes: Uint8Array): number {
  const longest = Math.max(JOB_ID_PREFIX.length, ERROR_PREFIX.length) - 1;
  for (let len = Math.min(longest, bytes.length); len > 0; len -= 1) {
    const tail = bytes.subarray(bytes.length - len);
    if (matchesAt(JOB_ID_PREFIX, tail, 0) || matchesAt(ERROR_PREFIX, tail, 0)) return len;
  }
  return 0;
}

const markerAt = (bytes: Uint8Array, start: number, end: number): StreamMarker | null => {
  if (matchesAt(bytes, JOB_ID_PREFIX, start)) {
    const jobId = decoder.decode(bytes.subarray(start + JOB_ID_PREFIX.length, end));
    return jobId.length > 0 && !jobId.includes('>') ? { kind: 'job', jobId, start } : null;
  }
  if (matchesAt(bytes, ERROR_PREFIX, start)) {
    return { kind: 'error', message: decoder.decode(bytes.subarray(start + ERROR_PREFIX.length, end)), start };
  }
  return null;
};

/** A marker that closes the buffer, as sent at end of stream. */
export function findTrailingMarker(bytes: Uint8Array): StreamMarker | null {
  const end = bytes.length - MARKER_SUFFIX.length;
  if (!matchesAt(bytes, MARKER_SUFFIX, end)) return null;
  const start = lastMarkerStart(bytes);
  if (start < 0 || start > end) return null;
  return markerAt(bytes, start, end);
}

/** First complete error marker anywhere in the buffer; used before the WAV header arrives. */
export function findErrorMarker(bytes: Uint8Array): StreamMarker | null {
  const start = indexOfBytes(bytes, ERROR_PREFIX);
  if (start < 0) return null;
  const end = indexOfBytes(bytes, MARKER_SUFFIX, start + ERROR_PREFIX.length);
  if (end < 0) return null;
  return markerAt(bytes, start, end);
}
