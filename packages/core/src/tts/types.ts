import type { VoiceDescriptor } from '../process/capabilityManager';

export interface TtsRequest {
  text: string;
  voice: string;
  speed: number;
}

export interface TtsResult {
  success: boolean;
  audioBytes: Uint8Array | null;
  errorMessage?: string;
  elapsedMs: number;
  /** Name of the engine that produced the audio. */
  engine?: string;
}

export interface SpeechEngine {
  readonly name: string;
  isAvailable(): Promise<boolean>;
  /** Always resolves; failures are reported through `success` and `errorMessage`. */
  generate(request: TtsRequest): Promise<TtsResult>;
  listVoices(): Promise<VoiceDescriptor[]>;
}

export const failedResult = (
  errorMessage: string,
  startedAt: number,
  engine?: string
): TtsResult => ({
  success: false,
  audioBytes: null,
  errorMessage,
  elapsedMs: Date.now() - startedAt,
  engine,
});

/** Lazily runs `check` once and reuses the answer. */
export const cachedAvailability = (check: () => Promise<boolean>) => {
  let result: Promise<boolean> | null = null;
  return () => {
    if (!result) {
      result = check().catch(() => false);
    }
    return result;
  };
};
