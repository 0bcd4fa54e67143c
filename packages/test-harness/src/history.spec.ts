import { appendFileSync, existsSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  SettingsSchema,
  createAudioNotifier,
  createTranscriptionLog,
  dayKey,
  type HistoryItem,
  type PipelineMode,
} from '@chordcast/core';

let directory: string;

beforeEach(() => {
  directory = mkdtempSync(join(tmpdir(), 'chordcast-history-'));
});

afterEach(() => {
  rmSync(directory, { recursive: true, force: true });
});

const at = (day: number, hour: number) => new Date(2026, 2, day, hour, 0).getTime();

const item = (
  id: string,
  createdAt: number,
  text: string,
  mode: PipelineMode = 'transcribe'
): HistoryItem => ({
  id,
  createdAt,
  mode,
  text,
  status: 'success',
});

describe('transcription log', () => {
  it('keys files by local calendar day', () => {
    expect(dayKey(at(5, 23))).toBe('2026-03-05');
  });

  it('lists one day newest first', async () => {
    const log = createTranscriptionLog(directory);
    await log.append(item('a', at(10, 9), 'morning note'));
    await log.append(item('b', at(10, 15), 'afternoon note'));
    await log.append(item('c', at(11, 9), 'next day'));

    const listed = await log.list('2026-03-10');

    expect(listed.map((entry) => entry.id)).toEqual(['b', 'a']);
    expect(existsSync(join(directory, '2026-03-11.jsonl'))).toBe(true);
  });

  it('skips unreadable lines', async () => {
    const log = createTranscriptionLog(directory);
    await log.append(item('a', at(10, 9), 'kept'));
    appendFileSync(join(directory, '2026-03-10.jsonl'), '{not json\n{"id":"x"}\n');

    await expect(log.list('2026-03-10')).resolves.toEqual([item('a', at(10, 9), 'kept')]);
  });

  it('returns nothing for a day without a file', async () => {
    const log = createTranscriptionLog(directory);

    await expect(log.list('2026-01-01')).resolves.toEqual([]);
  });

  it('searches text and raw text across days', async () => {
    const log = createTranscriptionLog(directory);
    await log.append(item('a', at(10, 9), 'Quarterly Report draft'));
    await log.append({
      ...item('b', at(11, 9), 'Bonjour', 'promptLlm'),
      rawText: 'translate the report',
    });
    await log.append(item('c', at(12, 9), 'unrelated'));

    const matches = await log.search('REPORT');

    expect(matches.map((entry) => entry.id)).toEqual(['b', 'a']);
    await expect(log.search('report', 1)).resolves.toHaveLength(1);
    await expect(log.search('  ')).resolves.toEqual([]);
  });

  it('removes day files older than the retention window', async () => {
    const log = createTranscriptionLog(directory);
    await log.append(item('old', at(10, 9), 'old'));
    await log.append(item('edge', at(13, 9), 'edge'));
    writeFileSync(join(directory, 'notes.txt'), 'ignored');

    await expect(log.cleanup(7, at(20, 12))).resolves.toBe(1);
    expect(existsSync(join(directory, '2026-03-10.jsonl'))).toBe(false);
    expect(existsSync(join(directory, '2026-03-13.jsonl'))).toBe(true);
    expect(existsSync(join(directory, 'notes.txt'))).toBe(true);
  });
});

describe('audio notifier', () => {
  const makeDeps = (audioNotification: Record<string, unknown>) => {
    const settings = SettingsSchema.parse({ audioNotification });
    const player = {
      start: vi.fn(async (_filePath: string, _options?: { volume?: number }) => ({
        isPlaying: () => false,
        stop: async () => undefined,
      })),
    };
    return { notifier: createAudioNotifier({ settings: () => settings, player }), player };
  };

  it('plays the configured sound at its volume', async () => {
    const sound = join(directory, 'ding.wav');
    writeFileSync(sound, 'RIFF');
    const { notifier, player } = makeDeps({ enabled: true, filePath: sound, volume: 0.3 });

    await notifier.notify('speechToText');

    expect(player.start).toHaveBeenCalledWith(sound, { volume: 0.3 });
  });

  it('stays silent when disabled or not wanted for the kind', async () => {
    const sound = join(directory, 'ding.wav');
    writeFileSync(sound, 'RIFF');
    const disabled = makeDeps({ enabled: false, filePath: sound });
    const noLlm = makeDeps({ enabled: true, filePath: sound, playOnLlmResponse: false });

    await disabled.notifier.notify('speechToText');
    await noLlm.notifier.notify('llmResponse');

    expect(disabled.player.start).not.toHaveBeenCalled();
    expect(noLlm.player.start).not.toHaveBeenCalled();
  });

  it('ignores a missing sound file and player errors', async () => {
    const missing = makeDeps({ enabled: true, filePath: join(directory, 'missing.wav') });
    await expect(missing.notifier.notify('llmResponse')).resolves.toBeUndefined();
    expect(missing.player.start).not.toHaveBeenCalled();

    const sound = join(directory, 'ding.wav');
    writeFileSync(sound, 'RIFF');
    const broken = makeDeps({ enabled: true, filePath: sound });
    broken.player.start.mockRejectedValueOnce(new Error('device busy'));
    await expect(broken.notifier.notify('llmResponse')).resolves.toBeUndefined();
  });
});
