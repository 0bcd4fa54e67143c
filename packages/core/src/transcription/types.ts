import { z } from 'zod';
import type { TranscriptSegment } from '../domain/schemas';

export interface TranscriptionResult {
  fullText: string;
  segments: TranscriptSegment[];
  language: string;
  durationSeconds?: number;
}

export interface TranscriptionClient {
  transcribe(audioPath: string): Promise<TranscriptionResult>;
}

export interface TranscriptionClientOptions {
  fetcher: typeof fetch;
  baseUrl: string;
  model: string;
  apiKey?: string;
  language?: string;
  readAudio?: (filePath: string) => Promise<Uint8Array>;
  requestTimeoutMs?: number;
}

export const VerboseTranscriptionSchema = z.object({
  text: z.string().default(''),
  language: z.string().optional(),
  duration: z.number().optional(),
  segments: z
    .array(
      z.object({
        start: z.number().default(0),
        end: z.number().default(0),
        text: z.string().default(''),
      })
    )
    .optional(),
});

export const RetryPolicySchema = z.object({
  maxAttempts: z.number().int().min(1).max(5).default(2),
  baseDelayMs: z.number().int().min(50).default(200),
});
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
