import { parseSync } from 'subtitle';
import type { NodeCue, NodeList } from 'subtitle';
import { parseVttTimestamp } from './timecode';
import type { Cue, TimedWord } from './types';

const INLINE_TS = String.raw`<(\d{2}:\d{2}:\d{2}\.\d{3})>`;

function isCue(node: NodeList[number]): node is NodeCue {
  return node.type === 'cue';
}

export function readCues(vttText: string): Cue[] {
  return parseSync(vttText)
    .filter(isCue)
    .map((node) => ({
      startSec: node.data.start / 1000,
      endSec: node.data.end / 1000,
      text: node.data.text || '',
    }));
}

/**
 * Words of one rolling cue. Line 1 repeats text already covered by the
 * previous cue; line 2 is `lead<TS><c> word</c><TS><c> word</c>...` where the
 * lead word takes the cue start and every tagged word its own timestamp.
 */
export function parseRollingCue(cueStartSec: number, raw: string): TimedWord[] {
  const lines = raw.split('\n');
  if (lines.length < 2) return [];
  const second = lines[1];
  const words: TimedWord[] = [];

  const lead = new RegExp(String.raw`^([^\n<]+?)(?=${INLINE_TS})`).exec(second);
  if (lead) {
    const text = lead[1].trim();
    if (text) words.push({ startSec: cueStartSec, text });
  }

  const tagged = new RegExp(String.raw`${INLINE_TS}<c>\s*(.*?)</c>`, 'g');
  for (const m of second.matchAll(tagged)) {
    const text = m[2].trim();
    if (text) words.push({ startSec: parseVttTimestamp(m[1]), text });
  }
  return words;
}

/**
 * Chronological word stream from word-timed cues. A (time, word) pair seen
 * again in an overlapping cue is dropped; cues without inline tags are skipped.
 */
export function extractTimedWords(cues: Cue[]): TimedWord[] {
  const seen = new Set<string>();
  const words: TimedWord[] = [];
  for (const cue of cues) {
    if (!cue.text.includes('<c>')) continue;
    for (const w of parseRollingCue(cue.startSec, cue.text)) {
      const key = `${w.startSec}\u0000${w.text}`;
      if (seen.has(key)) continue;
      seen.add(key);
      words.push(w);
    }
  }
  // Array.prototype.sort is stable
  return words.sort((a, b) => a.startSec - b.startSec);
}
