export * from './domain/schemas';
export * from './domain/migrations';
export * from './errors';
export * from './events';
export * from './logging/logger';
export * from './util/serialQueue';
export * from './audio/wav';
export * from './hotkeys/chord';
export * from './hotkeys/stateMachine';
export * from './hotkeys/service';
export * from './recording/sessionManager';
export * from './pipeline/cleanup';
export * from './transcription/types';
export * from './transcription/client';
export * from './llm/types';
export * from './llm/openRouter';
export * from './llm/ollama';
export * from './llm/router';
export * from './process/runner';
export * from './process/capabilityManager';
export * from './tts/types';
export * from './tts/neuralEngine';
export * from './tts/nativeEngine';
export * from './tts/fallbackChain';
export * from './tts/readAloud';
export * from './playback/controller';
export * from './models/types';
export * from './models/schemaVariants';
export * from './models/cache';
export * from './models/discovery';
export * from './history/transcriptionLog';
export * from './notifications/audioNotifier';
export * from './repositories/types';
export * from './security/settings';
export * from './dispatch/dispatcher';
