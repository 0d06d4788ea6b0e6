// In-band terminal markers appended after the last PCM byte. A consumer that
// has already parsed the WAV header scans the tail of the stream as text.
const MARKER_OPEN = '<!--';
const MARKER_CLOSE = '-->';
const JOB_ID_MARKER_PREFIX = `${MARKER_OPEN}JOB_ID:`;
const ERROR_MARKER_PREFIX = `${MARKER_OPEN}ERROR:`;

export function formatJobIdMarker(jobId: string): Buffer {
  return Buffer.from(`${JOB_ID_MARKER_PREFIX}${jobId}${MARKER_CLOSE}`, 'utf-8');
}

/** The message may neither close the marker early nor open another one. */
export function sanitizeMarkerMessage(message: string): string {
  const flat = message
    .replace(/[\r\n]+/g, ' ')
    .split(MARKER_OPEN)
    .join('<! --')
    .split(MARKER_CLOSE)
    .join('- ->')
    .trim();
  return flat || 'generation failed';
}

export function formatErrorMarker(message: string): Buffer {
  return Buffer.from(`${ERROR_MARKER_PREFIX}${sanitizeMarkerMessage(message)}${MARKER_CLOSE}`, 'utf-8');
}
