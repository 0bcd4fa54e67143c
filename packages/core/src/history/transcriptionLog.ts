import { appendFile, mkdir, readdir, readFile, rm } from 'fs/promises';
import { join } from 'path';
import { HistoryItemSchema, type HistoryItem } from '../domain/schemas';
import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import type { HistoryRepository } from '../repositories/types';

const DAY_FILE_PATTERN = /^(\d{4}-\d{2}-\d{2})\.jsonl$/;
const DAY_MS = 24 * 60 * 60 * 1000;

const pad = (value: number) => String(value).padStart(2, '0');

/** Local calendar day, YYYY-MM-DD. */
export const dayKey = (timestamp: number) => {
  const date = new Date(timestamp);
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
};

const startOfLocalDay = (timestamp: number) => {
  const date = new Date(timestamp);
  date.setHours(0, 0, 0, 0);
  return date.getTime();
};

const parseDayKey = (key: string) => {
  const [year, month, day] = key.split('-').map(Number);
  return new Date(year, month - 1, day).getTime();
};

/** Append-only JSONL log, one file per day. */
export const createTranscriptionLog = (
  directory: string,
  logger: Logger = createLogger('history')
): HistoryRepository => {
  const fileFor = (day: string) => join(directory, `${day}.jsonl`);

  const readDay = async (day: string) => {
    let raw: string;
    try {
      raw = await readFile(fileFor(day), 'utf8');
    } catch {
      return [];
    }
    const items: HistoryItem[] = [];
    raw.split('\n').forEach((line, index) => {
      if (!line.trim()) return;
      try {
        const parsed = HistoryItemSchema.safeParse(JSON.parse(line));
        if (parsed.success) items.push(parsed.data);
        else logger.warn(`Skipping invalid history line ${day}:${index + 1}`);
      } catch (error) {
        logger.warn(`Skipping unreadable history line ${day}:${index + 1}`, toErrorMessage(error));
      }
    });
    return items.sort((a, b) => b.createdAt - a.createdAt);
  };

  const days = async () => {
    try {
      const names = await readdir(directory);
      return names
        .map((name) => DAY_FILE_PATTERN.exec(name)?.[1])
        .filter((day): day is string => Boolean(day))
        .sort()
        .reverse();
    } catch {
      return [];
    }
  };

  const append = async (item: HistoryItem) => {
    const entry = HistoryItemSchema.parse(item);
    await mkdir(directory, { recursive: true });
    await appendFile(fileFor(dayKey(entry.createdAt)), `${JSON.stringify(entry)}\n`, 'utf8');
  };

  const list = (day: string = dayKey(Date.now())) => readDay(day);

  const search = async (term: string, limit = 50) => {
    const needle = term.trim().toLowerCase();
    if (!needle) return [];
    const matches: HistoryItem[] = [];
    for (const day of await days()) {
      for (const item of await readDay(day)) {
        const matched =
          item.text.toLowerCase().includes(needle) ||
          item.rawText?.toLowerCase().includes(needle);
        if (matched) {
          matches.push(item);
          if (matches.length >= limit) return matches;
        }
      }
    }
    return matches;
  };

  const cleanup = async (retentionDays: number, now = Date.now()) => {
    const cutoff = startOfLocalDay(now) - retentionDays * DAY_MS;
    let removed = 0;
    for (const day of await days()) {
      if (parseDayKey(day) < cutoff) {
        await rm(fileFor(day), { force: true });
        removed += 1;
      }
    }
    if (removed) logger.info(`Removed ${removed} history files older than ${retentionDays} days`);
    return removed;
  };

  return { append, list, search, cleanup };
};
