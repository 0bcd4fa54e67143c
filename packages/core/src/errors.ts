export type ErrorCode =
  | 'invalidBinding'
  | 'recordingFailed'
  | 'noSpeechDetected'
  | 'transcriptionFailed'
  | 'llmNotConfigured'
  | 'llmFailed'
  | 'emptyResponse'
  | 'screenCaptureCancelled'
  | 'screenCaptureFailed'
  | 'clipboardFailed'
  | 'speechFailed'
  | 'internalError'
  | 'hotkeyInfrastructureFailure';

export class ChordcastError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChordcastError';
    this.code = code;
  }
}

export const isChordcastError = (error: unknown): error is ChordcastError =>
  error instanceof ChordcastError;

export const toErrorMessage = (error: unknown) =>
  error instanceof Error ? error.message : String(error);

export const redactSecrets = (value: string) =>
  value
    .replace(/sk-[A-Za-z0-9_-]{20,}/g, 'sk-REDACTED')
    .replace(/\bBearer\s+[A-Za-z0-9._-]+\b/gi, 'Bearer REDACTED');
