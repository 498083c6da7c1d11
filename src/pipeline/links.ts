import type { UnmatchedLinkMode } from './env';
import { warn } from './log';
import type { LinkEntry } from './types';

export interface EnrichOptions {
  onUnmatched?: UnmatchedLinkMode;
}

export interface EnrichResult {
  markdown: string;
  linked: LinkEntry[];
  unmatched: LinkEntry[];
}

interface Span {
  start: number;
  end: number;
}

export function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Existing `[text](url)` links and `[M:SS]` markers. */
export function protectedSpans(text: string): Span[] {
  const re = /\[[^\]]*\]\([^)]+\)|\[\d+:\d{2}\]/g;
  return Array.from(text.matchAll(re), (m) => {
    const start = m.index ?? 0;
    return { start, end: start + m[0].length };
  });
}

/**
 * Links the first case-insensitive occurrence of `phrase` in `text` that does
 * not overlap a protected span. Returns null when there is none.
 */
export function linkFirst(text: string, phrase: string, url: string): string | null {
  if (!phrase) return null;
  const spans = protectedSpans(text);
  const re = new RegExp(escapeRegExp(phrase), 'gi');
  for (const m of text.matchAll(re)) {
    const start = m.index ?? 0;
    const end = start + m[0].length;
    if (spans.some((s) => start < s.end && end > s.start)) continue;
    return `${text.slice(0, start)}[${m[0]}](${url})${text.slice(end)}`;
  }
  return null;
}

/**
 * Turns the first occurrence of each phrase into a Markdown link. Longer
 * phrases go first; a phrase links once per document; headings are untouched.
 */
export function enrichLinks(
  markdown: string,
  links: LinkEntry[],
  opts: EnrichOptions = {}
): EnrichResult {
  const ordered = links
    .map((entry, idx) => ({ entry, idx }))
    .sort((a, b) => b.entry.phrase.length - a.entry.phrase.length || a.idx - b.idx)
    .map((x) => x.entry);

  const lines = markdown.split(/(?<=\n)/);
  const used = new Set<string>();
  const linked: LinkEntry[] = [];
  const unmatched: LinkEntry[] = [];

  for (const entry of ordered) {
    const key = entry.phrase.toLowerCase();
    if (used.has(key)) continue;

    let done = false;
    for (let i = 0; i < lines.length && !done; i++) {
      if (lines[i].startsWith('#')) continue;
      const replaced = linkFirst(lines[i], entry.phrase, entry.url);
      if (replaced !== null) {
        lines[i] = replaced;
        done = true;
      }
    }

    if (done) {
      used.add(key);
      linked.push(entry);
    } else {
      unmatched.push(entry);
      if (opts.onUnmatched === 'warn') {
        warn('links.unmatched', { phrase: entry.phrase, url: entry.url });
      }
    }
  }

  return { markdown: lines.join(''), linked, unmatched };
}
