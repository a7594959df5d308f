/**
 * Outcome Record and run gate
 *
 * Successful renewals are appended to a Markdown file, one line each:
 *
 *   2026-10-18 09:00:00 Asia/Tokyo 成功
 *
 * The file is never rewritten. Its last line is the only record of when
 * the server was last renewed, and the gate reads it to skip runs that
 * come too soon after a success.
 */

import fsp from 'node:fs/promises';

export const SUCCESS_TOKEN = '成功';
export const UTC_LABEL = 'UTC';

const HOUR_MS = 60 * 60 * 1000;

const LINE_PATTERN = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2}) (\S+) (\S+)$/;

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

export interface FormattedTimestamp {
  text: string;
  zone: string;
}

export interface RunGateInput {
  lastSuccessAt: Date | null;
  now: Date;
  minIntervalHours: number;
  force: boolean;
}

export interface RunGateDecision {
  due: boolean;
  elapsedHours: number | null;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

function wallClockIn(date: Date, timeZone: string): WallClock {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
  });
  const parts: Record<string, number> = {};
  for (const part of formatter.formatToParts(date)) {
    if (part.type !== 'literal') {
      parts[part.type] = Number(part.value);
    }
  }
  return {
    year: parts.year ?? 0,
    month: parts.month ?? 0,
    day: parts.day ?? 0,
    hour: parts.hour ?? 0,
    minute: parts.minute ?? 0,
    second: parts.second ?? 0,
  };
}

function isKnownZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch {
    return false;
  }
}

function wallClockToUtcMs(wall: WallClock): number {
  return Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
}

function zoneOffsetMs(instantMs: number, timeZone: string): number {
  const truncated = Math.floor(instantMs / 1000) * 1000;
  return wallClockToUtcMs(wallClockIn(new Date(truncated), timeZone)) - truncated;
}

/**
 * Wall-clock time in the given zone, or in UTC when the zone is unknown
 */
export function formatTimestamp(date: Date, timeZone: string): FormattedTimestamp {
  const zone = isKnownZone(timeZone) ? timeZone : UTC_LABEL;
  const w = wallClockIn(date, zone);
  return {
    text: `${pad(w.year, 4)}-${pad(w.month)}-${pad(w.day)} ${pad(w.hour)}:${pad(w.minute)}:${pad(w.second)}`,
    zone,
  };
}

export function formatOutcomeLine(date: Date, timeZone: string): string {
  const { text, zone } = formatTimestamp(date, timeZone);
  return `${text} ${zone} ${SUCCESS_TOKEN}`;
}

/**
 * Reads a record line back into an instant. Returns null for anything
 * that is not a well-formed success line in a known zone.
 */
export function parseOutcomeLine(line: string): Date | null {
  const match = LINE_PATTERN.exec(line.trim());
  if (!match) return null;

  const [, year, month, day, hour, minute, second, zone, status] = match;
  if (status !== SUCCESS_TOKEN || !zone || !isKnownZone(zone)) return null;

  const wall: WallClock = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hour: Number(hour),
    minute: Number(minute),
    second: Number(second),
  };
  const guess = wallClockToUtcMs(wall);
  const offset = zoneOffsetMs(guess, zone);
  let instant = guess - offset;
  // Re-resolve once when the guess straddles a DST transition
  const corrected = zoneOffsetMs(instant, zone);
  if (corrected !== offset) {
    instant = guess - corrected;
  }
  return new Date(instant);
}

/**
 * Time of the most recent success, or null when the record is missing
 * or its last line is not a success line
 */
export async function readLastSuccess(filepath: string): Promise<Date | null> {
  let content: string;
  try {
    content = await fsp.readFile(filepath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }

  const lines = content.split(/\r?\n/).filter((l) => l.trim().length > 0);
  const last = lines[lines.length - 1];
  return last === undefined ? null : parseOutcomeLine(last);
}

export function evaluateRunGate(input: RunGateInput): RunGateDecision {
  if (!input.lastSuccessAt) {
    return { due: true, elapsedHours: null };
  }
  const elapsedMs = input.now.getTime() - input.lastSuccessAt.getTime();
  const elapsedHours = elapsedMs / HOUR_MS;
  if (input.force) {
    return { due: true, elapsedHours };
  }
  return { due: elapsedMs >= input.minIntervalHours * HOUR_MS, elapsedHours };
}

/**
 * Appends one success line and returns it (without the newline)
 */
export async function appendSuccess(filepath: string, timeZone: string, now: Date): Promise<string> {
  const line = formatOutcomeLine(now, timeZone);
  await fsp.appendFile(filepath, `${line}\n`, 'utf-8');
  return line;
}
