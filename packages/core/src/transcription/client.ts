import { readFile } from 'fs/promises';
import { basename } from 'path';
import { ChordcastError, isChordcastError, toErrorMessage } from '../errors';
import { delay } from '../util/serialQueue';
import {
  type RetryPolicy,
  RetryPolicySchema,
  type TranscriptionClient,
  type TranscriptionClientOptions,
  type TranscriptionResult,
  VerboseTranscriptionSchema,
} from './types';

const joinUrl = (base: string, path: string) => {
  if (!base.endsWith('/') && !path.startsWith('/')) return `${base}/${path}`;
  if (base.endsWith('/') && path.startsWith('/')) return `${base}${path.slice(1)}`;
  return `${base}${path}`;
};

export const resolveTranscriptionUrl = (baseUrl: string) => {
  if (baseUrl.endsWith('/audio/transcriptions')) return baseUrl;
  if (baseUrl.includes('/v1/audio')) {
    return joinUrl(baseUrl, 'transcriptions');
  }
  if (baseUrl.endsWith('/v1') || baseUrl.endsWith('/v1/')) {
    return joinUrl(baseUrl, 'audio/transcriptions');
  }
  return joinUrl(baseUrl, '/v1/audio/transcriptions');
};

/**
 * Client for OpenAI-compatible transcription servers (a local whisper server by default).
 * Requests `verbose_json` so that segments and language come back with the text.
 */
export const createTranscriptionClient = (
  options: TranscriptionClientOptions,
  retryPolicy: RetryPolicy = RetryPolicySchema.parse({})
): TranscriptionClient => {
  const readAudio =
    options.readAudio ?? (async (filePath: string) => new Uint8Array(await readFile(filePath)));
  const requestTimeoutMs = options.requestTimeoutMs ?? 120_000;
  const url = resolveTranscriptionUrl(options.baseUrl);

  const transcribeOnce = async (audioPath: string): Promise<TranscriptionResult> => {
    const audio = await readAudio(audioPath);
    const form = new FormData();
    form.append('file', new Blob([audio], { type: 'audio/wav' }), basename(audioPath));
    form.append('model', options.model);
    form.append('response_format', 'verbose_json');
    if (options.language && options.language !== 'auto') form.append('language', options.language);
    const headers: Record<string, string> = {};
    if (options.apiKey) headers.Authorization = `Bearer ${options.apiKey}`;

    const response = await options.fetcher(url, {
      method: 'POST',
      headers,
      body: form,
      signal: AbortSignal.timeout(requestTimeoutMs),
    });
    if (!response.ok) {
      const details = await response.text().catch(() => '');
      throw new ChordcastError(
        'transcriptionFailed',
        `Transcription failed: ${response.status} ${details}`.trim()
      );
    }
    const contentType = response.headers.get('content-type') ?? '';
    if (!contentType.includes('application/json')) {
      const text = (await response.text()).trim();
      return { fullText: text, segments: [], language: options.language ?? 'unknown' };
    }
    const parsed = VerboseTranscriptionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new ChordcastError(
        'transcriptionFailed',
        'Transcription response had an unexpected shape'
      );
    }
    const data = parsed.data;
    return {
      fullText: data.text.trim(),
      segments: (data.segments ?? []).map((segment) => ({
        start: segment.start,
        end: segment.end,
        text: segment.text.trim(),
      })),
      language: data.language ?? options.language ?? 'unknown',
      durationSeconds: data.duration,
    };
  };

  const transcribe = async (audioPath: string) => {
    let attempt = 0;
    let lastError: unknown;

    while (attempt < retryPolicy.maxAttempts) {
      try {
        return await transcribeOnce(audioPath);
      } catch (error) {
        lastError = error;
        attempt += 1;
        if (attempt >= retryPolicy.maxAttempts) break;
        await delay(retryPolicy.baseDelayMs * attempt);
      }
    }

    if (isChordcastError(lastError)) throw lastError;
    throw new ChordcastError(
      'transcriptionFailed',
      `Transcription failed: ${toErrorMessage(lastError)}`,
      { cause: lastError }
    );
  };

  return { transcribe };
};
