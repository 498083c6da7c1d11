import type { Chapter, TranscriptUnit } from './types';

function pushBlank(out: string[]) {
  if (out.length && out[out.length - 1] !== '') out.push('');
}

/** Joins lines, dropping trailing blanks, with exactly one final newline. */
export function finishMarkdown(lines: string[]): string {
  const out = [...lines];
  while (out.length && out[out.length - 1] === '') out.pop();
  return out.join('\n') + '\n';
}

/**
 * Sentence-per-line Markdown. A `## Title` heading goes before the first
 * sentence at or after each chapter's start.
 */
export function renderMarkdown(units: TranscriptUnit[], chapters: Chapter[] = []): string {
  const queue = chapters
    .filter((c) => c.title.trim() !== '')
    .sort((a, b) => a.startTime - b.startTime);
  const out: string[] = [];

  for (const unit of units) {
    if (unit.kind === 'paragraphBreak') {
      pushBlank(out);
      continue;
    }
    while (queue.length && queue[0].startTime <= unit.startSec) {
      const chapter = queue.shift();
      if (!chapter) break;
      pushBlank(out);
      out.push(`## ${chapter.title}`, '');
    }
    out.push(unit.text);
  }

  return finishMarkdown(out);
}
