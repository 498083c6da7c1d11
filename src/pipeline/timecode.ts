// Bare `[M:SS]` marker at the start of a line, with the spaces after it; `[M:SS](url)` is already a link
const LEADING_MARKER = /^\[(\d+):(\d{2})\](?!\()[ \t]*/;

/** `HH:MM:SS.mmm` (or `MM:SS.mmm`) to seconds. */
export function parseVttTimestamp(ts: string): number {
  const parts = ts.split(':').map(Number);
  let seconds = 0;
  for (const p of parts) seconds = seconds * 60 + p;
  return seconds;
}

/**
 * Whole seconds as `M:SS`. There is no hour component: an hour and a quarter
 * renders as `75:00`.
 */
export function formatTimestamp(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  const m = Math.floor(total / 60);
  const s = total % 60;
  return `${m}:${String(s).padStart(2, '0')}`;
}

export function leadingMarkerSeconds(line: string): number | undefined {
  const m = LEADING_MARKER.exec(line);
  if (!m) return undefined;
  return Number(m[1]) * 60 + Number(m[2]);
}

export function stripLeadingMarker(line: string): string {
  return line.replace(LEADING_MARKER, '');
}
