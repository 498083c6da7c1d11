import { execa } from 'execa';
import fs from 'fs-extra';
import path from 'path';
import { ENV } from './env';
import { DownloadError, errorMessage } from './errors';
import { debug } from './log';

export interface FetchedSubtitles {
    vttPath: string;
    infoJsonPath: string;
}

function extraArgs(): string[] {
    const extra: string[] = [];
    if (ENV.ytdlpCookiesFile) {
        extra.push('--cookies', ENV.ytdlpCookiesFile);
    }
    if (ENV.ytdlpUserAgent) {
        extra.push('--user-agent', ENV.ytdlpUserAgent);
    }
    if (ENV.ytdlpExtraArgs) {
        extra.push(
            ...ENV.ytdlpExtraArgs
                .split(' ')
                .map((s) => s.trim())
                .filter(Boolean)
        );
    }
    return extra;
}

function failureText(e: unknown): string {
    if (typeof e === 'object' && e !== null) {
        if ('stderr' in e && typeof e.stderr === 'string' && e.stderr) return e.stderr;
        if ('stdout' in e && typeof e.stdout === 'string' && e.stdout) return e.stdout;
        if ('shortMessage' in e && typeof e.shortMessage === 'string') return e.shortMessage;
    }
    return errorMessage(e);
}

/**
 * Runs yt-dlp with `args`, falling back through the configured binary, plain
 * `yt-dlp`, the configured python and system python3.
 */
export async function runYtdlp(args: string[]): Promise<string> {
    const attempts: Array<[string, string[]]> = [];
    attempts.push([ENV.ytdlpBin, args]);
    if (ENV.ytdlpBin !== 'yt-dlp') attempts.push(['yt-dlp', args]);
    if (ENV.ytdlpPythonBin)
        attempts.push([ENV.ytdlpPythonBin, ['-m', 'yt_dlp', ...args]]);
    attempts.push(['python3', ['-m', 'yt_dlp', ...args]]);

    const errors: string[] = [];
    const tried: string[] = [];
    for (const [cmd, a] of attempts) {
        tried.push(a[0] === '-m' ? `${cmd} -m yt_dlp` : cmd);
        try {
            const res = await execa(cmd, a, { stdio: 'pipe' });
            debug('ytdlp.ok', { cmd });
            return res.stdout;
        } catch (e) {
            errors.push(`[${cmd}] ${failureText(e)}`);
        }
    }
    throw new DownloadError(
        `All yt-dlp attempts failed. Tried: ${tried.join(', ')}\nErrors:\n${errors.join('\n---\n')}`,
        { tried }
    );
}

async function firstWithSuffix(dir: string, suffix: string): Promise<string | undefined> {
    const files = (await fs.readdir(dir)).filter((f) => f.endsWith(suffix)).sort();
    return files.length ? path.join(dir, files[0]) : undefined;
}

/** Auto-generated subtitles (word-timed VTT) plus info.json, written into `dir`. */
export async function fetchSubtitles(
    url: string,
    lang: string,
    dir: string
): Promise<FetchedSubtitles> {
    await fs.ensureDir(dir);
    await runYtdlp([
        '--write-auto-subs',
        '--sub-langs',
        lang,
        '--sub-format',
        'vtt',
        '--write-info-json',
        '--skip-download',
        '--quiet',
        '-o',
        path.join(dir, '%(id)s'),
        ...extraArgs(),
        url,
    ]);
    const vttPath = await firstWithSuffix(dir, '.vtt');
    if (!vttPath) throw new DownloadError('yt-dlp produced no .vtt files', { url, lang });
    const infoJsonPath = await firstWithSuffix(dir, '.info.json');
    if (!infoJsonPath) throw new DownloadError('yt-dlp produced no .info.json files', { url });
    return { vttPath, infoJsonPath };
}

export async function fetchInfoJson(url: string, dir: string): Promise<string> {
    await fs.ensureDir(dir);
    await runYtdlp([
        '--write-info-json',
        '--skip-download',
        '--quiet',
        '-o',
        path.join(dir, '%(id)s'),
        ...extraArgs(),
        url,
    ]);
    const infoJsonPath = await firstWithSuffix(dir, '.info.json');
    if (!infoJsonPath) throw new DownloadError('yt-dlp produced no .info.json files', { url });
    return infoJsonPath;
}
