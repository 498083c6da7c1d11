import fs from 'fs-extra';
import path from 'path';
import { z } from 'zod';
import { InputNotFoundError, InvalidInputError, errorMessage } from './errors';
import { info } from './log';
import type { LinkEntry, StructureHints, VideoInfo } from './types';

const linkEntrySchema = z.object({
  phrase: z.string(),
  url: z.string(),
});

export const linkMapSchema = z.array(linkEntrySchema);

export const hintsSchema = z.object({
  title: z.string().optional(),
  sections: z
    .array(z.object({ line: z.number().int().positive(), title: z.string() }))
    .default([]),
  paragraphs: z.array(z.number().int().positive()).default([]),
  links: linkMapSchema.default([]),
});

// yt-dlp .info.json; only the fields the pipeline reads
export const videoInfoSchema = z
  .object({
    id: z.string().optional(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    chapters: z
      .array(
        z.object({
          start_time: z.number().default(0),
          title: z.string().nullish(),
        })
      )
      .nullish(),
  })
  .transform(
    (raw): VideoInfo => ({
      id: raw.id,
      title: raw.title ?? '',
      description: raw.description ?? '',
      chapters: (raw.chapters ?? []).map((c) => ({
        startTime: c.start_time,
        title: c.title ?? '',
      })),
    })
  );

export async function readRequiredText(filePath: string, what?: string): Promise<string> {
  if (!(await fs.pathExists(filePath))) {
    throw new InputNotFoundError(filePath, what);
  }
  return fs.readFile(filePath, 'utf8');
}

export async function readJsonFile<T>(
  filePath: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  what: string
): Promise<T> {
  const text = await readRequiredText(filePath, what);
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    throw new InvalidInputError(`${what} is not valid JSON: ${filePath}: ${errorMessage(e)}`, {
      path: filePath,
    });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`${what} has an unexpected shape: ${filePath}`, {
      path: filePath,
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }
  return parsed.data;
}

export function readHints(filePath: string): Promise<StructureHints> {
  return readJsonFile(filePath, hintsSchema, 'Hints file');
}

export function readLinkMap(filePath: string): Promise<LinkEntry[]> {
  return readJsonFile(filePath, linkMapSchema, 'Link map');
}

export function readVideoInfo(filePath: string): Promise<VideoInfo> {
  return readJsonFile(filePath, videoInfoSchema, 'Video info');
}

/** Writes to `outPath`, or to stdout when none is given. */
export async function writeOutput(outPath: string | undefined, content: string): Promise<void> {
  if (!outPath) {
    process.stdout.write(content);
    return;
  }
  await fs.ensureDir(path.dirname(path.resolve(outPath)));
  await fs.writeFile(outPath, content, 'utf8');
  info('output.written', { path: path.resolve(outPath), bytes: Buffer.byteLength(content) });
}
