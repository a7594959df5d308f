import fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  appendSuccess,
  evaluateRunGate,
  formatOutcomeLine,
  formatTimestamp,
  parseOutcomeLine,
  readLastSuccess,
} from '../src/outcome-log.js';

const HOUR_MS = 60 * 60 * 1000;

describe('formatTimestamp', () => {
  it('renders wall-clock time in the configured zone', () => {
    expect(formatTimestamp(new Date('2026-01-02T03:04:05Z'), 'Asia/Tokyo')).toEqual({
      text: '2026-01-02 12:04:05',
      zone: 'Asia/Tokyo',
    });
  });

  it('falls back to UTC for an unknown zone', () => {
    expect(formatTimestamp(new Date('2026-01-02T03:04:05Z'), 'Mars/Olympus_Mons')).toEqual({
      text: '2026-01-02 03:04:05',
      zone: 'UTC',
    });
  });

  it('renders midnight as 00 rather than 24', () => {
    expect(formatTimestamp(new Date('2026-03-31T15:00:00Z'), 'Asia/Tokyo').text).toBe('2026-04-01 00:00:00');
  });
});

describe('formatOutcomeLine', () => {
  it('ends with the zone and the success token', () => {
    expect(formatOutcomeLine(new Date('2026-10-18T00:00:00Z'), 'Asia/Tokyo')).toBe(
      '2026-10-18 09:00:00 Asia/Tokyo 成功'
    );
  });
});

describe('parseOutcomeLine', () => {
  it('reads a zoned line back into the same instant', () => {
    expect(parseOutcomeLine('2026-01-02 12:04:05 Asia/Tokyo 成功')?.toISOString()).toBe(
      '2026-01-02T03:04:05.000Z'
    );
  });

  it('reads UTC lines', () => {
    expect(parseOutcomeLine('2026-01-02 03:04:05 UTC 成功')?.toISOString()).toBe('2026-01-02T03:04:05.000Z');
  });

  it('honours daylight saving offsets', () => {
    expect(parseOutcomeLine('2026-07-01 08:00:00 America/New_York 成功')?.toISOString()).toBe(
      '2026-07-01T12:00:00.000Z'
    );
  });

  it('ignores surrounding whitespace', () => {
    expect(parseOutcomeLine('  2026-01-02 03:04:05 UTC 成功 ')?.toISOString()).toBe('2026-01-02T03:04:05.000Z');
  });

  it('rejects lines that are not success records', () => {
    expect(parseOutcomeLine('# renewal history')).toBeNull();
    expect(parseOutcomeLine('2026-01-02 03:04:05 UTC 失敗')).toBeNull();
    expect(parseOutcomeLine('2026-01-02 03:04:05 Mars/Olympus_Mons 成功')).toBeNull();
  });
});

describe('evaluateRunGate', () => {
  const now = new Date('2026-10-18T00:00:00Z');

  it('is due when there is no previous success', () => {
    expect(evaluateRunGate({ lastSuccessAt: null, now, minIntervalHours: 24, force: false })).toEqual({
      due: true,
      elapsedHours: null,
    });
  });

  it('skips one hour before the interval has passed', () => {
    const lastSuccessAt = new Date(now.getTime() - 23 * HOUR_MS);
    expect(evaluateRunGate({ lastSuccessAt, now, minIntervalHours: 24, force: false })).toEqual({
      due: false,
      elapsedHours: 23,
    });
  });

  it('proceeds one hour after the interval has passed', () => {
    const lastSuccessAt = new Date(now.getTime() - 25 * HOUR_MS);
    expect(evaluateRunGate({ lastSuccessAt, now, minIntervalHours: 24, force: false })).toEqual({
      due: true,
      elapsedHours: 25,
    });
  });

  it('proceeds exactly at the interval', () => {
    const lastSuccessAt = new Date(now.getTime() - 24 * HOUR_MS);
    expect(evaluateRunGate({ lastSuccessAt, now, minIntervalHours: 24, force: false }).due).toBe(true);
  });

  it('proceeds inside the interval when forced', () => {
    const lastSuccessAt = new Date(now.getTime() - HOUR_MS);
    expect(evaluateRunGate({ lastSuccessAt, now, minIntervalHours: 24, force: true })).toEqual({
      due: true,
      elapsedHours: 1,
    });
  });
});

describe('outcome record file', () => {
  let dir: string;
  let recordPath: string;

  beforeEach(async () => {
    dir = await fsp.mkdtemp(path.join(os.tmpdir(), 'outcome-log-'));
    recordPath = path.join(dir, 'renew_result.md');
  });

  afterEach(async () => {
    await fsp.rm(dir, { recursive: true, force: true });
  });

  it('reads nothing from a missing file', async () => {
    expect(await readLastSuccess(recordPath)).toBeNull();
  });

  it('uses the last non-empty line', async () => {
    await fsp.writeFile(
      recordPath,
      '2026-10-16 09:00:00 Asia/Tokyo 成功\n2026-10-17 09:00:00 Asia/Tokyo 成功\n\n',
      'utf-8'
    );
    expect((await readLastSuccess(recordPath))?.toISOString()).toBe('2026-10-17T00:00:00.000Z');
  });

  it('reads nothing when the last line is not a success record', async () => {
    await fsp.writeFile(recordPath, '2026-10-16 09:00:00 Asia/Tokyo 成功\nnotes\n', 'utf-8');
    expect(await readLastSuccess(recordPath)).toBeNull();
  });

  it('appends one line per success without touching earlier lines', async () => {
    const start = Date.parse('2026-10-18T00:00:00Z');
    const written: string[] = [];
    for (let i = 0; i < 3; i++) {
      written.push(await appendSuccess(recordPath, 'Asia/Tokyo', new Date(start + i * 25 * HOUR_MS)));
    }

    const lines = (await fsp.readFile(recordPath, 'utf-8')).split('\n');
    expect(lines).toEqual([...written, '']);
    expect(written).toEqual([
      '2026-10-18 09:00:00 Asia/Tokyo 成功',
      '2026-10-19 10:00:00 Asia/Tokyo 成功',
      '2026-10-20 11:00:00 Asia/Tokyo 成功',
    ]);

    const instants = written.map((line) => parseOutcomeLine(line)?.getTime() ?? 0);
    expect(instants[0]).toBeLessThan(instants[1] ?? 0);
    expect(instants[1]).toBeLessThan(instants[2] ?? 0);
    expect((await readLastSuccess(recordPath))?.getTime()).toBe(start + 50 * HOUR_MS);
  });
});
