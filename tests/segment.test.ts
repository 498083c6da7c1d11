import { describe, it, expect } from 'vitest';
import { isSentenceEnd, wordsToUnits } from '../src/pipeline/segment';
import type { TimedWord } from '../src/pipeline/types';

const w = (startSec: number, text: string): TimedWord => ({ startSec, text });
const opts = { pauseSec: 2.0, timestamps: true };

describe('wordsToUnits', () => {
  it('splits sentences and inserts a paragraph break after a long pause', () => {
    const units = wordsToUnits(
      [w(0.0, 'Hello'), w(0.5, 'world.'), w(3.0, 'Next'), w(3.4, 'sentence.')],
      opts
    );
    expect(units).toEqual([
      { kind: 'sentence', startSec: 0, text: '[0:00] Hello world.' },
      { kind: 'paragraphBreak' },
      { kind: 'sentence', startSec: 3, text: '[0:03] Next sentence.' },
    ]);
  });

  it('omits markers when timestamps are off', () => {
    const units = wordsToUnits([w(0, 'Hi'), w(0.4, 'there.')], { pauseSec: 2, timestamps: false });
    expect(units).toEqual([{ kind: 'sentence', startSec: 0, text: 'Hi there.' }]);
  });

  it('flushes an unfinished sentence at a pause', () => {
    const units = wordsToUnits([w(0, 'one'), w(5, 'two.')], opts);
    expect(units).toEqual([
      { kind: 'sentence', startSec: 0, text: '[0:00] one' },
      { kind: 'paragraphBreak' },
      { kind: 'sentence', startSec: 5, text: '[0:05] two.' },
    ]);
  });

  it('flushes trailing words without terminal punctuation', () => {
    expect(wordsToUnits([w(0, 'no'), w(1, 'period')], opts)).toEqual([
      { kind: 'sentence', startSec: 0, text: '[0:00] no period' },
    ]);
  });

  it('stamps a one-word sentence with its own time', () => {
    expect(wordsToUnits([w(0, 'Hi.'), w(1, 'Yes.')], opts)).toEqual([
      { kind: 'sentence', startSec: 0, text: '[0:00] Hi.' },
      { kind: 'sentence', startSec: 1, text: '[0:01] Yes.' },
    ]);
  });

  it('does not break on a gap equal to the threshold', () => {
    const units = wordsToUnits([w(0, 'a.'), w(2, 'b.')], opts);
    expect(units.some((u) => u.kind === 'paragraphBreak')).toBe(false);
  });

  it('never starts with a paragraph break', () => {
    expect(wordsToUnits([w(10, 'late.')], opts)).toEqual([
      { kind: 'sentence', startSec: 10, text: '[0:10] late.' },
    ]);
  });

  it('returns nothing for no words', () => {
    expect(wordsToUnits([], opts)).toEqual([]);
  });
});

describe('isSentenceEnd', () => {
  it('accepts terminal punctuation followed by closing quotes or brackets', () => {
    expect(isSentenceEnd('done."')).toBe(true);
    expect(isSentenceEnd('really?)')).toBe(true);
    expect(isSentenceEnd('wow!’')).toBe(true);
  });

  it('rejects words without terminal punctuation', () => {
    expect(isSentenceEnd('e.g')).toBe(false);
    expect(isSentenceEnd('word')).toBe(false);
  });
});
