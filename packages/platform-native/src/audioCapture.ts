import { createRequire } from 'module';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { createLogger, encodeWav, pcmDurationMs } from '@chordcast/core';
import type { AudioCaptureAdapter } from '@chordcast/platform';

type RecordModule = {
  record: (options?: {
    sampleRate?: number;
    channels?: number;
    threshold?: number;
    verbose?: boolean;
    audioType?: string;
    recorder?: string;
  }) => { stop(): void; stream(): NodeJS.ReadableStream };
};

const require = createRequire(import.meta.url);
const logger = createLogger('capture');

const DEFAULT_SAMPLE_RATE = 16000;

const concatChunks = (chunks: Uint8Array[]) => {
  const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
  const merged = new Uint8Array(total);
  let offset = 0;
  chunks.forEach((chunk) => {
    merged.set(chunk, offset);
    offset += chunk.length;
  });
  return merged;
};

interface ActiveRecording {
  filePath: string;
  sampleRate: number;
  recorder: { stop(): void };
  chunks: Uint8Array[];
  stopped: Promise<void>;
  error: Error | null;
}

/** Microphone capture through node-record-lpcm16 (sox/arecord), written out as 16-bit mono WAV. */
export const createMicrophoneCapture = (
  loadRecorder: () => RecordModule = () => require('node-record-lpcm16') as RecordModule
): AudioCaptureAdapter => {
  let current: ActiveRecording | null = null;

  const start = async (filePath: string, options: { sampleRate?: number } = {}) => {
    if (current) throw new Error('Audio capture is already running');
    const sampleRate = options.sampleRate ?? DEFAULT_SAMPLE_RATE;
    const recorder = loadRecorder().record({
      sampleRate,
      channels: 1,
      threshold: 0,
      verbose: false,
      audioType: 'raw',
    });
    const stream = recorder.stream();
    let resolveStopped = () => {};
    const stopped = new Promise<void>((resolve) => {
      resolveStopped = () => resolve();
    });
    const recording: ActiveRecording = {
      filePath,
      sampleRate,
      recorder,
      chunks: [],
      stopped,
      error: null,
    };
    stream.on('data', (chunk: Buffer | string) => {
      recording.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : new Uint8Array(chunk));
    });
    stream.on('error', (error: Error) => {
      recording.error = error;
      resolveStopped();
    });
    stream.on('end', resolveStopped);
    stream.on('close', resolveStopped);
    current = recording;
  };

  const stop = async () => {
    const recording = current;
    if (!recording) return;
    current = null;
    recording.recorder.stop();
    await recording.stopped;
    const pcm = concatChunks(recording.chunks);
    if (recording.error && pcm.length === 0) {
      throw new Error(`Audio capture failed: ${recording.error.message}`);
    }
    await mkdir(dirname(recording.filePath), { recursive: true });
    await writeFile(recording.filePath, encodeWav(pcm, recording.sampleRate));
    logger.info(`Captured ${pcmDurationMs(pcm.length, recording.sampleRate)}ms of audio`);
  };

  return { start, stop };
};
