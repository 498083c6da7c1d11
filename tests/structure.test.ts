import { describe, it, expect } from 'vitest';
import { applyStructure, chapterSections } from '../src/pipeline/structure';
import type { StructureHints } from '../src/pipeline/types';

const hints = (over: Partial<StructureHints> = {}): StructureHints => ({
  sections: [],
  paragraphs: [],
  links: [],
  ...over,
});

describe('applyStructure', () => {
  it('adds a title and a section heading and joins paragraph lines', () => {
    const md = applyStructure(
      ['[0:00] One.', '[0:02] Two.', '[0:04] Three.'],
      hints({ title: 'T', sections: [{ line: 2, title: 'S' }] })
    );
    expect(md).toBe('# T\n\n[0:00] One.\n\n## S\n\n[0:02] Two. Three.\n');
  });

  it('breaks paragraphs at the hinted lines', () => {
    const md = applyStructure(
      ['[0:00] A.', '[0:01] B.', '[0:05] C.', '[0:06] D.'],
      hints({ paragraphs: [3] })
    );
    expect(md).toBe('[0:00] A. B.\n\n[0:05] C. D.\n');
  });

  it('keeps existing headings and skips blank lines', () => {
    const md = applyStructure(['## Intro', '', '[0:00] A.', '[0:01] B.'], hints());
    expect(md).toBe('## Intro\n\n[0:00] A. B.\n');
  });

  it('ends with a single newline after a final heading', () => {
    expect(applyStructure(['[0:00] A.', '## End'], hints())).toBe('[0:00] A.\n\n## End\n');
  });

  it('falls back to the video title', () => {
    expect(applyStructure(['x'], hints(), { fallbackTitle: 'Video' })).toBe('# Video\n\nx\n');
  });

  it('prefers chapter sections over hinted ones', () => {
    const md = applyStructure(
      ['[0:00] A.', '[0:30] B.', '[1:05] C.', '[1:10] D.'],
      hints({ sections: [{ line: 1, title: 'Ignored' }] }),
      {
        chapters: [
          { startTime: 0, title: 'Start' },
          { startTime: 60.5, title: 'Later' },
        ],
      }
    );
    expect(md).toBe('## Start\n\n[0:00] A. B.\n\n## Later\n\n[1:05] C. D.\n');
  });

  it('uses hinted sections when the chapter list is empty', () => {
    const md = applyStructure(['a', 'b'], hints({ sections: [{ line: 2, title: 'S' }] }), {
      chapters: [],
    });
    expect(md).toBe('a\n\n## S\n\nb\n');
  });
});

describe('chapterSections', () => {
  it('skips chapters already present as headings', () => {
    expect(
      chapterSections(
        ['## Intro', '[0:00] A.'],
        [
          { startTime: 0, title: 'Intro' },
          { startTime: 0, title: 'Other' },
        ]
      )
    ).toEqual([{ line: 2, title: 'Other' }]);
  });

  it('gives a line to the earliest chapter only', () => {
    expect(
      chapterSections(
        ['[0:05] x'],
        [
          { startTime: 1, title: 'B' },
          { startTime: 0, title: 'A' },
        ]
      )
    ).toEqual([{ line: 1, title: 'A' }]);
  });

  it('drops chapters after the last timed line', () => {
    expect(chapterSections(['[0:05] x', 'untimed'], [{ startTime: 30, title: 'Late' }])).toEqual([]);
  });
});
