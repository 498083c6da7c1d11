import { describe, it, expect } from 'vitest';
import { extractTimedWords, parseRollingCue, readCues } from '../src/pipeline/vtt';
import type { Cue } from '../src/pipeline/types';

const cue = (startSec: number, text: string): Cue => ({ startSec, endSec: startSec + 2, text });

describe('parseRollingCue', () => {
  it('gives the lead word the cue start and tagged words their own time', () => {
    expect(
      parseRollingCue(1, 'previous line\nHello<00:00:01.500><c> big</c><00:00:02.000><c> world.</c>')
    ).toEqual([
      { startSec: 1, text: 'Hello' },
      { startSec: 1.5, text: 'big' },
      { startSec: 2, text: 'world.' },
    ]);
  });

  it('ignores single-line cues', () => {
    expect(parseRollingCue(0, 'Hello<00:00:01.000><c> world</c>')).toEqual([]);
  });

  it('drops empty tagged words', () => {
    expect(parseRollingCue(0, 'x\n<00:00:01.000><c> </c><00:00:01.200><c> ok</c>')).toEqual([
      { startSec: 1.2, text: 'ok' },
    ]);
  });
});

describe('extractTimedWords', () => {
  it('keeps a (time, word) pair once when overlapping cues repeat it', () => {
    const words = extractTimedWords([
      cue(0, 'a\nHello<00:00:00.500><c> world</c>'),
      cue(0, 'b\nHello<00:00:00.500><c> world</c>'),
    ]);
    expect(words).toEqual([
      { startSec: 0, text: 'Hello' },
      { startSec: 0.5, text: 'world' },
    ]);
  });

  it('skips cues without inline word tags', () => {
    expect(extractTimedWords([cue(0, 'Hello world\nsecond line')])).toEqual([]);
  });

  it('returns words in non-decreasing time order', () => {
    const words = extractTimedWords([
      cue(4, 'x\nlater<00:00:05.000><c> still</c>'),
      cue(1, 'x\nearly<00:00:02.000><c> on</c>'),
    ]);
    expect(words.map((w) => w.text)).toEqual(['early', 'on', 'later', 'still']);
    const times = words.map((w) => w.startSec);
    expect(times).toEqual([...times].sort((a, b) => a - b));
  });
});

describe('readCues', () => {
  it('reads cue start times and raw text from WebVTT', () => {
    const cues = readCues(
      [
        'WEBVTT',
        '',
        '00:00:01.000 --> 00:00:03.000',
        'intro',
        'Hello<00:00:01.500><c> world.</c>',
        '',
      ].join('\n')
    );
    expect(cues).toHaveLength(1);
    expect(cues[0].startSec).toBe(1);
    expect(cues[0].endSec).toBe(3);
    expect(cues[0].text).toBe('intro\nHello<00:00:01.500><c> world.</c>');
  });
});
