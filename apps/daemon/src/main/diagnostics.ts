import { createWriteStream, existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import archiver from 'archiver';
import { z } from 'zod';
import {
  createLogger,
  maskSecrets,
  redactSecrets,
  toErrorMessage,
  type HistoryItem,
  type ModelCacheInfo,
  type Settings,
} from '@chordcast/core';

const logger = createLogger('diagnostics');

const MAX_RECENT_ERRORS = 50;
const MAX_HISTORY_ITEMS = 200;

const RecentErrorSchema = z.object({
  timestamp: z.number(),
  message: z.string(),
});
export type RecentError = z.infer<typeof RecentErrorSchema>;

export const loadRecentErrors = (errorsFile: string): RecentError[] => {
  try {
    if (!existsSync(errorsFile)) return [];
    const raw: unknown = JSON.parse(readFileSync(errorsFile, 'utf-8'));
    const parsed = z.array(RecentErrorSchema).safeParse(raw);
    return parsed.success ? parsed.data : [];
  } catch (error) {
    logger.error('Failed to read recent errors', toErrorMessage(error));
    return [];
  }
};

export const recordError = (errorsFile: string, error: unknown, now = Date.now()) => {
  const entry: RecentError = {
    timestamp: now,
    message: redactSecrets(toErrorMessage(error)),
  };
  try {
    const existing = loadRecentErrors(errorsFile);
    existing.unshift(entry);
    const kept = existing.slice(0, MAX_RECENT_ERRORS);
    writeFileSync(errorsFile, JSON.stringify(kept, null, 2), 'utf-8');
  } catch (writeError) {
    logger.error('Failed to write recent errors', toErrorMessage(writeError));
  }
};

export interface DiagnosticsInput {
  settings: Settings;
  history: HistoryItem[];
  recentErrors: RecentError[];
  modelCache: ModelCacheInfo;
  logFile?: string;
}

export interface DiagnosticsEntry {
  name: string;
  content: string;
}

/** The JSON documents of a diagnostics bundle. Credentials never appear in them. */
export const diagnosticsEntries = (input: DiagnosticsInput): DiagnosticsEntry[] => [
  { name: 'settings.json', content: JSON.stringify(maskSecrets(input.settings), null, 2) },
  {
    name: 'history.json',
    content: redactSecrets(JSON.stringify(input.history.slice(0, MAX_HISTORY_ITEMS), null, 2)),
  },
  { name: 'recent-errors.json', content: JSON.stringify(input.recentErrors, null, 2) },
  { name: 'model-cache.json', content: JSON.stringify(input.modelCache, null, 2) },
];

export const exportDiagnostics = async (
  targetDir: string,
  input: DiagnosticsInput,
  now = Date.now()
) => {
  if (!existsSync(targetDir)) {
    mkdirSync(targetDir, { recursive: true });
  }
  const filePath = join(targetDir, `chordcast-diagnostics-${now}.zip`);
  const archive = archiver('zip', { zlib: { level: 9 } });
  const stream = createWriteStream(filePath);

  return new Promise<{ filePath: string }>((resolve, reject) => {
    stream.on('close', () => resolve({ filePath }));
    archive.on('error', (err: Error) => reject(err));

    archive.pipe(stream);

    diagnosticsEntries(input).forEach((entry) => {
      archive.append(entry.content, { name: entry.name });
    });

    if (input.logFile && existsSync(input.logFile)) {
      archive.file(input.logFile, { name: 'logs/chordcast.log' });
    }

    archive.finalize().catch(reject);
  });
};
