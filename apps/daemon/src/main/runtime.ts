import { tmpdir } from 'os';
import {
  createAudioNotifier,
  createCapabilityProcessManager,
  createEventBus,
  createFileModelCache,
  createHotkeyService,
  createLlmRouter,
  createLogger,
  createModelDiscovery,
  createNativeSpeechEngine,
  createNeuralSpeechEngine,
  createOllamaClient,
  createOpenRouterClient,
  createPipelineDispatcher,
  createPlaybackController,
  createReadAloudController,
  createRecordingSessionManager,
  createSpeechFallbackChain,
  createTranscriptionClient,
  createTranscriptionLog,
  type ChordcastEvent,
  type Settings,
} from '@chordcast/core';
import type { PlatformAdapter } from '@chordcast/platform';
import type { AppPaths } from './paths';

const logger = createLogger('runtime');

export interface RuntimeOptions {
  paths: AppPaths;
  settings: Settings;
  platform: PlatformAdapter;
  /** Directory holding `scripts/` and any bundled interpreter. */
  appDir: string;
  fetcher?: typeof fetch;
}

/** Wires the core components to one platform adapter. Nothing starts until `hotkeys.init()`. */
export const createRuntime = (options: RuntimeOptions) => {
  const { paths, platform } = options;
  const settings = () => options.settings;
  const fetcher = options.fetcher ?? fetch;
  const tempDir = tmpdir();
  const current = settings();

  const events = createEventBus<ChordcastEvent>((error, event) => {
    logger.error(`Event listener failed on ${event.type}`, error);
  });

  const capabilities = createCapabilityProcessManager({ appDir: options.appDir });
  const neural = createNeuralSpeechEngine({
    capabilities,
    tempDir,
    timeoutMs: current.tts.timeoutSeconds * 1000,
  });
  const native = createNativeSpeechEngine({
    tempDir,
    timeoutMs: current.tts.timeoutSeconds * 1000,
  });
  const speech = createSpeechFallbackChain({
    primary: neural,
    secondary: current.tts.useNativeFallback ? native : undefined,
  });
  const playback = createPlaybackController({
    player: platform.player,
    tempDir,
    volume: () => settings().tts.volume,
  });
  const readAloud = createReadAloudController({
    settings,
    clipboard: platform.clipboard,
    engine: speech,
    playback,
  });

  const transcription = createTranscriptionClient({
    fetcher,
    baseUrl: current.transcription.baseUrl,
    model: current.transcription.model,
    apiKey: current.transcription.apiKey,
    language: current.transcription.language,
  });
  const ollama = createOllamaClient({ fetcher, config: () => settings().ollama });
  const llm = createLlmRouter({
    settings,
    openRouter: createOpenRouterClient({ fetcher, config: () => settings().openRouter }),
    ollama,
  });

  const modelCache = createFileModelCache(paths.modelCacheDir);
  const models = createModelDiscovery({
    fetcher,
    cache: modelCache,
    baseUrl: current.openRouter.baseUrl,
  });
  const history = createTranscriptionLog(paths.historyDir);

  const dispatcher = createPipelineDispatcher(
    {
      settings,
      transcription,
      llm,
      screenCapture: platform.screenCapture,
      clipboard: platform.clipboard,
      readAloud,
      notifier: createAudioNotifier({ settings, player: platform.player }),
      history,
    },
    { onEvent: events.emit }
  );

  const sessions = createRecordingSessionManager(
    {
      audio: platform.audioCapture,
      clipboard: platform.clipboard,
      dispatch: dispatcher.dispatch,
      settings,
      tempDir,
    },
    {
      onRecordingFailure: (failure) => events.emit({ type: 'recordingFailed', ...failure }),
    }
  );

  const hotkeys = createHotkeyService(
    { source: platform.keyboard, bindings: current.hotkeys },
    {
      onModeStart: (mode) => {
        events.emit({ type: 'modeStarted', mode, at: Date.now() });
        sessions.handleModeStart(mode);
      },
      onModeEnd: (mode) => {
        events.emit({ type: 'modeEnded', mode, at: Date.now() });
        sessions.handleModeEnd(mode);
      },
      onInfrastructureFailure: (failure) =>
        events.emit({ type: 'hotkeyInfrastructureFailure', ...failure }),
    }
  );

  /** Startup housekeeping: retention, expired model caches and the bridge check. */
  const maintain = async () => {
    await history.cleanup(settings().logging.retentionDays);
    await modelCache.cleanupExpired();
    const available = await capabilities.initialize();
    logger.info(`Neural speech ${available ? 'available' : 'unavailable'}`);
  };

  const dispose = async () => {
    hotkeys.dispose();
    await readAloud.cancel();
    await sessions.dispose();
  };

  return {
    events,
    capabilities,
    speech,
    readAloud,
    ollama,
    models,
    modelCache,
    history,
    sessions,
    hotkeys,
    maintain,
    dispose,
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
