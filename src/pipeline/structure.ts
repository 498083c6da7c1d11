import { finishMarkdown } from './render';
import { leadingMarkerSeconds, stripLeadingMarker } from './timecode';
import type { Chapter, SectionHint, StructureHints } from './types';

export interface StructureOptions {
  /** When non-empty, sections come from these instead of the hints */
  chapters?: Chapter[];
  /** Used when the hints carry no title */
  fallbackTitle?: string;
}

function isHeading(line: string): boolean {
  return line.startsWith('#');
}

/**
 * Places each chapter on the first timed line at or after its start. A line
 * keeps the earliest chapter; chapters already present as headings are skipped.
 */
export function chapterSections(lines: string[], chapters: Chapter[]): SectionHint[] {
  const existing = new Set(
    lines.filter(isHeading).map((l) => l.replace(/^#+\s*/, '').trim().toLowerCase())
  );
  const timed: Array<{ line: number; sec: number }> = [];
  lines.forEach((raw, i) => {
    const line = raw.trimEnd();
    if (isHeading(line)) return;
    const sec = leadingMarkerSeconds(line);
    if (sec !== undefined) timed.push({ line: i + 1, sec });
  });

  const taken = new Set<number>();
  const sections: SectionHint[] = [];
  const sorted = [...chapters].sort((a, b) => a.startTime - b.startTime);
  for (const ch of sorted) {
    const title = ch.title.trim();
    if (!title || existing.has(title.toLowerCase())) continue;
    const target = timed.find((t) => t.sec >= ch.startTime);
    if (!target || taken.has(target.line)) continue;
    taken.add(target.line);
    sections.push({ line: target.line, title });
  }
  return sections;
}

export function applyStructure(
  lines: string[],
  hints: StructureHints,
  opts: StructureOptions = {}
): string {
  const title = hints.title || opts.fallbackTitle || '';
  const sectionList =
    opts.chapters && opts.chapters.length
      ? chapterSections(lines, opts.chapters)
      : hints.sections;
  const sections = new Map(sectionList.map((s) => [s.line, s.title]));
  const paragraphBreaks = new Set(hints.paragraphs);

  const out: string[] = [];
  let para: string[] = [];

  const flushPara = () => {
    if (para.length) out.push(para.join(' '));
    para = [];
  };
  const ensureBlank = () => {
    if (out.length && out[out.length - 1] !== '') out.push('');
  };

  if (title) out.push(`# ${title}`, '');

  lines.forEach((raw, i) => {
    const lineNo = i + 1;
    let line = raw.trimEnd();
    if (!line) return;

    if (isHeading(line)) {
      flushPara();
      ensureBlank();
      out.push(line, '');
      return;
    }

    const section = sections.get(lineNo);
    if (section !== undefined) {
      flushPara();
      ensureBlank();
      out.push(`## ${section}`, '');
    } else if (paragraphBreaks.has(lineNo)) {
      flushPara();
      ensureBlank();
    }

    // Only the first line of a paragraph keeps its [M:SS] marker
    if (para.length) line = stripLeadingMarker(line);
    para.push(line);
  });
  flushPara();

  return finishMarkdown(out);
}
