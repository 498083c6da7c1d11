import type { DescriptionLink } from './types';

const URL_RE = /https?:\/\/[^\s)>\]]+/g;
const HTTP_RE = /^https?:\/\//;
// "Label: URL" or "Label - URL"
const LABEL_BEFORE_RE = /^(?<label>[^:\n]{2,80})\s*[-:]\s*(?<url>https?:\/\/[^\s)>\]]+)/;
// "URL - Label"
const LABEL_AFTER_RE = /^(?<url>https?:\/\/[^\s)>\]]+)\s+[-–—]\s+(?<label>.{2,80}?)$/;

export function cleanTitle(title: string): string {
  return title
    .trim()
    .replace(/:+$/, '')
    .replace(/^[\u{1F300}-\u{1FAD6}\u2600-\u27BF\uFE00-\uFEFF\s]+/u, '')
    .trim();
}

function hasUrl(line: string): boolean {
  return new RegExp(URL_RE.source).test(line);
}

/**
 * Collects links from a video description together with a human label,
 * taken from the same line when there is one, else from the line above.
 */
export function extractDescriptionLinks(description: string): DescriptionLink[] {
  if (!description) return [];
  const lines = description.split(/\r?\n/);
  const results: DescriptionLink[] = [];
  const seen = new Set<string>();

  const add = (url: string, title: string) => {
    if (seen.has(url)) return;
    seen.add(url);
    results.push({ url, title });
  };

  lines.forEach((line, i) => {
    const stripped = line.trim();
    if (!stripped) return;

    const before = LABEL_BEFORE_RE.exec(stripped);
    if (before?.groups && !HTTP_RE.test(before.groups.label.trim())) {
      add(before.groups.url, cleanTitle(before.groups.label));
      return;
    }

    const after = LABEL_AFTER_RE.exec(stripped);
    if (after?.groups) {
      add(after.groups.url, cleanTitle(after.groups.label));
      return;
    }

    for (const m of stripped.matchAll(URL_RE)) {
      const url = m[0];
      if (seen.has(url)) continue;

      const prefix = stripped.slice(0, stripped.indexOf(url)).trim().replace(/[:-]+$/, '');
      if (prefix && !HTTP_RE.test(prefix)) {
        add(url, cleanTitle(prefix));
        continue;
      }

      let title = '';
      for (let j = i - 1; j >= 0; j--) {
        const prev = lines[j].trim();
        if (prev && !hasUrl(prev)) {
          title = cleanTitle(prev);
          break;
        }
      }
      add(url, title);
    }
  });

  return results;
}
