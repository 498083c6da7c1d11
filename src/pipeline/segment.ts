import { formatTimestamp } from './timecode';
import type { TimedWord, TranscriptUnit } from './types';

export interface SegmentOptions {
  /** A gap longer than this (seconds) between two words starts a new paragraph */
  pauseSec: number;
  /** Prefix each sentence with `[M:SS]` */
  timestamps: boolean;
}

const SENTENCE_END = /[.!?]["'’”)]*$/;

export function isSentenceEnd(word: string): boolean {
  return SENTENCE_END.test(word);
}

export function wordsToUnits(words: TimedWord[], opts: SegmentOptions): TranscriptUnit[] {
  const units: TranscriptUnit[] = [];
  if (!words.length) return units;

  let buffer: string[] = [];
  let pendingStart: number | null = null;
  let prevSec = words[0].startSec;

  const flush = () => {
    if (!buffer.length || pendingStart === null) return;
    const body = buffer.join(' ');
    units.push({
      kind: 'sentence',
      startSec: pendingStart,
      text: opts.timestamps ? `[${formatTimestamp(pendingStart)}] ${body}` : body,
    });
    buffer = [];
    pendingStart = null;
  };

  for (const word of words) {
    const gap = word.startSec - prevSec;
    if (gap > opts.pauseSec && (buffer.length || units.length)) {
      flush();
      units.push({ kind: 'paragraphBreak' });
      pendingStart = word.startSec;
    }

    if (pendingStart === null) pendingStart = word.startSec;
    buffer.push(word.text);
    prevSec = word.startSec;

    if (isSentenceEnd(word.text)) flush();
  }
  flush();
  return units;
}
