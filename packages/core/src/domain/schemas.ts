import { z } from 'zod';

export const SCHEMA_VERSION = 1;

export const PIPELINE_MODES = [
  'transcribe',
  'promptLlm',
  'clipboardPromptLlm',
  'visionCapture',
  'speechVision',
  'clipboardTts',
] as const;

export const PipelineModeSchema = z.enum(PIPELINE_MODES);
export type PipelineMode = z.infer<typeof PipelineModeSchema>;

export const HotkeySettingsSchema = z.object({
  transcribe: z.string().default('F1'),
  promptLlm: z.string().default('Shift+F2'),
  clipboardPromptLlm: z.string().default('Ctrl+F2'),
  visionCapture: z.string().default('Shift+F3'),
  speechVision: z.string().default('Ctrl+F3'),
  clipboardTts: z.string().default('Ctrl+F1'),
});
export type HotkeySettings = z.infer<typeof HotkeySettingsSchema>;

export const VocabularyEntrySchema = z.object({
  source: z.string(),
  replacement: z.string(),
});
export type VocabularyEntry = z.infer<typeof VocabularyEntrySchema>;

export const DEFAULT_LLM_SYSTEM_PROMPT =
  'You are a helpful assistant. ' +
  "Please provide a clear, concise response to the user's voice input.";

export const DEFAULT_VISION_SYSTEM_PROMPT =
  'You are a helpful AI assistant that can analyze images. ' +
  'Answer the user request about the image clearly and concisely.';

export const SettingsSchema = z.object({
  hotkeys: HotkeySettingsSchema.default({}),
  recording: z
    .object({
      settleDelayMs: z.number().int().min(0).default(1000),
      minAudioBytes: z.number().int().min(0).default(1024),
      sampleRate: z.number().int().min(8000).default(16000),
    })
    .default({}),
  transcription: z
    .object({
      baseUrl: z.string().default('http://127.0.0.1:8000/v1'),
      model: z.string().default('whisper-1'),
      language: z.string().optional(),
      apiKey: z.string().optional(),
      punctuationNormalization: z.boolean().default(true),
    })
    .default({}),
  llmProvider: z.enum(['openRouter', 'ollama']).default('openRouter'),
  openRouter: z
    .object({
      apiKey: z.string().optional(),
      baseUrl: z.string().default('https://openrouter.ai/api/v1'),
      model: z.string().default('anthropic/claude-sonnet-4'),
      systemPrompt: z.string().default(DEFAULT_LLM_SYSTEM_PROMPT),
      temperature: z.number().min(0).max(2).default(0.7),
      maxTokens: z.number().int().min(1).default(1000),
    })
    .default({}),
  ollama: z
    .object({
      serverUrl: z.string().default('http://localhost:11434'),
      model: z.string().default(''),
      systemPrompt: z.string().default(DEFAULT_LLM_SYSTEM_PROMPT),
      temperature: z.number().min(0).max(2).default(0.7),
      maxTokens: z.number().int().min(1).default(1000),
    })
    .default({}),
  vision: z
    .object({
      prompt: z.string().default('Describe the image in a single line paragraph'),
      systemPrompt: z.string().default(DEFAULT_VISION_SYSTEM_PROMPT),
      model: z.string().optional(),
    })
    .default({}),
  tts: z
    .object({
      enabled: z.boolean().default(true),
      voice: z.string().default('expr-voice-2-f'),
      speed: z.number().min(0.5).max(2).default(1),
      maxTextLength: z.number().int().min(1).default(5000),
      volume: z.number().min(0).max(1).default(1),
      timeoutSeconds: z.number().int().min(1).default(30),
      useNativeFallback: z.boolean().default(true),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
      enableTranscriptionLogging: z.boolean().default(true),
      saveAudioFiles: z.boolean().default(false),
      retentionDays: z.number().int().min(1).default(30),
    })
    .default({}),
  audioNotification: z
    .object({
      enabled: z.boolean().default(false),
      filePath: z.string().default(''),
      volume: z.number().min(0).max(1).default(0.5),
      playOnSpeechToText: z.boolean().default(true),
      playOnLlmResponse: z.boolean().default(true),
    })
    .default({}),
  vocabulary: z.array(VocabularyEntrySchema).default([]),
});
export type Settings = z.infer<typeof SettingsSchema>;

export const TranscriptSegmentSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string(),
});
export type TranscriptSegment = z.infer<typeof TranscriptSegmentSchema>;

export const HistoryItemSchema = z.object({
  id: z.string(),
  createdAt: z.number(),
  mode: PipelineModeSchema,
  text: z.string().default(''),
  rawText: z.string().optional(),
  clipboardText: z.string().optional(),
  segments: z.array(TranscriptSegmentSchema).optional(),
  language: z.string().optional(),
  modelId: z.string().optional(),
  latencyMs: z.number().int().optional(),
  audioFilePath: z.string().optional(),
  status: z.enum(['success', 'failed']).default('success'),
  errorCode: z.string().optional(),
  errorMessage: z.string().optional(),
});
export type HistoryItem = z.infer<typeof HistoryItemSchema>;

export const DomainEnvelopeSchema = z.object({
  version: z.number().int().optional(),
  payload: z.unknown(),
});
export type DomainEnvelope = z.infer<typeof DomainEnvelopeSchema>;
