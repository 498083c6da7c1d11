import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { ENV } from './env';
import type { UnmatchedLinkMode } from './env';
import { extractDescriptionLinks } from './description';
import { InvalidInputError } from './errors';
import { isUrl, toVideoId } from './ids';
import {
  readHints,
  readLinkMap,
  readRequiredText,
  readVideoInfo,
  writeOutput,
} from './inputs';
import { enrichLinks } from './links';
import { linkifyTimestamps } from './linkify';
import { info, startStep, warn } from './log';
import { renderMarkdown } from './render';
import { wordsToUnits } from './segment';
import { applyStructure } from './structure';
import type { DescriptionLink, LinkEntry, StructureHints, VideoInfo } from './types';
import { extractTimedWords, readCues } from './vtt';
import { fetchInfoJson, fetchSubtitles } from './ytdlp';

export interface ConvertOptions {
  vttText: string;
  info?: VideoInfo;
  pauseSec?: number;
  timestamps?: boolean;
}

export interface ConvertResult {
  markdown: string;
  wordCount: number;
  sentenceCount: number;
}

export function convertVtt(opts: ConvertOptions): ConvertResult {
  const pauseSec = opts.pauseSec ?? ENV.pauseSec;
  if (!Number.isFinite(pauseSec) || pauseSec < 0) {
    throw new InvalidInputError(`Pause must be a non-negative number of seconds, got ${opts.pauseSec}`, {
      pauseSec: String(opts.pauseSec),
    });
  }
  const timer = startStep('vtt.convert');
  const words = extractTimedWords(readCues(opts.vttText));
  if (!words.length) {
    warn('vtt.noWords', { reason: 'no word-level timestamps found in VTT' });
  }
  const units = wordsToUnits(words, {
    pauseSec,
    timestamps: opts.timestamps ?? true,
  });
  const markdown = renderMarkdown(units, opts.info?.chapters ?? []);
  const sentenceCount = units.filter((u) => u.kind === 'sentence').length;
  timer.end({ words: words.length, sentences: sentenceCount });
  return { markdown, wordCount: words.length, sentenceCount };
}

export interface StructureRunOptions {
  markdown: string;
  hints: StructureHints;
  info?: VideoInfo;
  extraLinks?: LinkEntry[];
  videoId?: string;
  onUnmatched?: UnmatchedLinkMode;
}

export interface StructureRunResult {
  markdown: string;
  unmatched: LinkEntry[];
}

/** Structure, then hyperlinks (hint links before extra links), then timestamp links. */
export function structureTranscript(opts: StructureRunOptions): StructureRunResult {
  const lines = opts.markdown.split(/\r?\n/);
  let result = applyStructure(lines, opts.hints, {
    chapters: opts.info?.chapters,
    fallbackTitle: opts.info?.title,
  });

  const links = [...opts.hints.links, ...(opts.extraLinks ?? [])];
  let unmatched: LinkEntry[] = [];
  if (links.length) {
    const enriched = enrichLinks(result, links, {
      onUnmatched: opts.onUnmatched ?? ENV.unmatchedLinks,
    });
    result = enriched.markdown;
    unmatched = enriched.unmatched;
  }

  if (opts.videoId) {
    result = linkifyTimestamps(result, toVideoId(opts.videoId));
  }
  return { markdown: result, unmatched };
}

// ---------------------------------------------------------------------------
// File-level runners used by the CLI entry points
// ---------------------------------------------------------------------------

export interface Vtt2MdArgs {
  input: string;
  output?: string;
  pauseSec?: number;
  timestamps?: boolean;
  lang?: string;
  infoJson?: string;
}

export interface Vtt2MdResult extends ConvertResult {
  info?: VideoInfo;
}

export async function runVtt2Md(args: Vtt2MdArgs): Promise<Vtt2MdResult> {
  let vttText: string;
  let videoInfo: VideoInfo | undefined;

  if (isUrl(args.input)) {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'vtt2md-'));
    try {
      const fetched = await fetchSubtitles(args.input, args.lang ?? ENV.subtitleLang, tmp);
      info('vtt.fetched', { url: args.input, vtt: path.basename(fetched.vttPath) });
      vttText = await readRequiredText(fetched.vttPath, 'Subtitle file');
      videoInfo = await readVideoInfo(fetched.infoJsonPath);
    } finally {
      await fs.remove(tmp);
    }
  } else {
    vttText = await readRequiredText(args.input, 'Subtitle file');
  }
  if (args.infoJson) {
    videoInfo = await readVideoInfo(args.infoJson);
  }

  const res = convertVtt({
    vttText,
    info: videoInfo,
    pauseSec: args.pauseSec,
    timestamps: args.timestamps,
  });
  await writeOutput(args.output, res.markdown);
  return { ...res, info: videoInfo };
}

export interface StructureArgs {
  input: string;
  hints: string;
  output?: string;
  videoId?: string;
  infoJson?: string;
  links?: string;
  onUnmatched?: UnmatchedLinkMode;
  deleteInput?: boolean;
}

export async function runStructure(args: StructureArgs): Promise<StructureRunResult> {
  const markdown = await readRequiredText(args.input);
  const hints = await readHints(args.hints);
  const videoInfo = args.infoJson ? await readVideoInfo(args.infoJson) : undefined;
  const extraLinks = args.links ? await readLinkMap(args.links) : [];

  const res = structureTranscript({
    markdown,
    hints,
    info: videoInfo,
    extraLinks,
    videoId: args.videoId,
    onUnmatched: args.onUnmatched,
  });
  await writeOutput(args.output, res.markdown);

  if (args.deleteInput && args.output && path.resolve(args.input) !== path.resolve(args.output)) {
    await fs.remove(args.input);
    info('input.deleted', { path: path.resolve(args.input) });
  }
  return res;
}

export interface EnrichArgs {
  input: string;
  links: string;
  output?: string;
  onUnmatched?: UnmatchedLinkMode;
}

export async function runEnrich(args: EnrichArgs): Promise<LinkEntry[]> {
  const markdown = await readRequiredText(args.input);
  const links = await readLinkMap(args.links);
  const res = enrichLinks(markdown, links, {
    onUnmatched: args.onUnmatched ?? ENV.unmatchedLinks,
  });
  await writeOutput(args.output, res.markdown);
  return res.unmatched;
}

export interface LinkifyArgs {
  input: string;
  videoId: string;
  output?: string;
}

export async function runLinkify(args: LinkifyArgs): Promise<void> {
  const markdown = await readRequiredText(args.input);
  await writeOutput(args.output, linkifyTimestamps(markdown, toVideoId(args.videoId)));
}

export interface ExtractLinksArgs {
  input: string;
  output?: string;
}

export async function runExtractLinks(args: ExtractLinksArgs): Promise<DescriptionLink[]> {
  let videoInfo: VideoInfo;
  if (isUrl(args.input)) {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'extract-links-'));
    try {
      videoInfo = await readVideoInfo(await fetchInfoJson(args.input, tmp));
    } finally {
      await fs.remove(tmp);
    }
  } else {
    videoInfo = await readVideoInfo(args.input);
  }
  const links = extractDescriptionLinks(videoInfo.description);
  await writeOutput(args.output, JSON.stringify(links, null, 2) + '\n');
  info('links.extracted', { count: links.length });
  return links;
}
