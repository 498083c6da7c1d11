import * as dotenv from 'dotenv';
dotenv.config();

export type UnmatchedLinkMode = 'silent' | 'warn';

/** Parses a numeric setting, keeping `fallback` when it is unset or not a finite number. */
export function numberSetting(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = Number(raw);
    return Number.isFinite(n) ? n : fallback;
}

function unmatchedMode(raw: string | undefined): UnmatchedLinkMode {
    return (raw || '').toLowerCase() === 'warn' ? 'warn' : 'silent';
}

export const ENV = {
    // Seconds of silence between words that start a new paragraph
    pauseSec: numberSetting(process.env.PAUSE_SEC, 2.0),
    subtitleLang: process.env.SUBTITLE_LANG || 'en',
    // Base of timestamp hyperlinks; the video id and ?t= are appended
    videoLinkBase: process.env.VIDEO_LINK_BASE || 'https://youtu.be',
    timestampSeparator: process.env.TIMESTAMP_SEPARATOR || '▸',
    unmatchedLinks: unmatchedMode(process.env.UNMATCHED_LINKS),
    // Optional: override yt-dlp binary name/path
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    // Optional: explicit python interpreter with yt_dlp installed for fallback (e.g. .venv/bin/python)
    ytdlpPythonBin: process.env.YTDLP_PYTHON_BIN || '.venv/bin/python',
    ytdlpCookiesFile: process.env.YTDLP_COOKIES_FILE || '',
    ytdlpUserAgent: process.env.YTDLP_USER_AGENT || '',
    ytdlpExtraArgs: process.env.YTDLP_EXTRA_ARGS || '',
    logLevel: process.env.LOG_LEVEL || 'info',
    logFormat: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
    // Optional: append every log line as JSON to this file as well
    logFile: process.env.LOG_FILE || '',
};
