import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { info, isLogLevel, setLogFile, setLogFormat, setLogLevel, warn } from '../src/pipeline/log';

describe('log', () => {
  let spy: MockInstance<typeof console.error>;

  beforeEach(() => {
    setLogFormat('json');
    spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    spy.mockRestore();
    setLogLevel('error');
  });

  it('writes JSON lines with level, message and meta to stderr', () => {
    setLogLevel('info');
    info('output.written', { bytes: 12 });
    const payload = JSON.parse(String(spy.mock.calls[0][0]));
    expect(payload.level).toBe('info');
    expect(payload.msg).toBe('output.written');
    expect(payload.bytes).toBe(12);
  });

  it('filters messages below the current level', () => {
    setLogLevel('warn');
    info('quiet');
    warn('loud');
    expect(spy).toHaveBeenCalledTimes(1);
  });

  it('appends every line to the log file', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vtt2md-log-'));
    const file = path.join(dir, 'nested', 'run.log');
    setLogFile(file);
    setLogLevel('info');
    info('first');
    info('second');
    const lines = (await fs.readFile(file, 'utf8')).trim().split('\n');
    expect(lines.map((l) => JSON.parse(l).msg)).toEqual(['first', 'second']);
    await fs.remove(dir);
  });

  it('recognizes log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel('constructor')).toBe(false);
    expect(isLogLevel('__proto__')).toBe(false);
  });
});
