const ID = '([a-zA-Z0-9_-]{6,})';

/** Video id from a watch, short, shorts or embed URL; anything else is taken as an id already. */
export function toVideoId(videoOrUrl: string): string {
  const input = videoOrUrl.trim();
  const query = input.match(new RegExp(`[?&]v=${ID}`));
  if (query) return query[1];
  const pathForm = input.match(new RegExp(`(?:youtu\\.be/|/shorts/|/embed/|/live/)${ID}`));
  if (pathForm) return pathForm[1];
  return input;
}

export function isUrl(input: string): boolean {
  return /^https?:\/\//i.test(input);
}
