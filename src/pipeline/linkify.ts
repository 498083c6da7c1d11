import { ENV } from './env';

export interface LinkifyOptions {
  baseUrl?: string;
  separator?: string;
}

/**
 * Rewrites each line-leading `[M:SS] text` into
 * `[M:SS](<base>/<id>?t=<seconds>) ▸ text`. Markers that are already links
 * are left as they are.
 */
export function linkifyTimestamps(
  markdown: string,
  videoId: string,
  opts: LinkifyOptions = {}
): string {
  const base = (opts.baseUrl ?? ENV.videoLinkBase).replace(/\/+$/, '');
  const sep = opts.separator ?? ENV.timestampSeparator;
  return markdown.replace(/^\[(\d+):(\d{2})\](?!\()[ \t]*/gm, (_m, mm: string, ss: string) => {
    const minutes = Number(mm);
    const seconds = Number(ss);
    const total = minutes * 60 + seconds;
    const label = `${minutes}:${String(seconds).padStart(2, '0')}`;
    return `[${label}](${base}/${videoId}?t=${total}) ${sep} `;
  });
}
