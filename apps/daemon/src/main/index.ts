import { existsSync } from 'fs';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import {
  configureLogging,
  createLogger,
  currentLogFilePath,
  dayKey,
  maskSecrets,
  toErrorMessage,
  type ChordcastEvent,
} from '@chordcast/core';
import { createNativeAdapter } from '@chordcast/platform-native';
import { exportDiagnostics, loadRecentErrors, recordError } from './diagnostics';
import { ensureDirectories, resolvePaths } from './paths';
import { createRuntime, type Runtime } from './runtime';
import { applyEnvironment, loadSettings, saveSettings } from './store';

const logger = createLogger('main');

const appDir = fileURLToPath(new URL('../../../../', import.meta.url));

const USAGE = `Usage: chordcast [options]

  --export-diagnostics   Write a diagnostics zip and print its path
  --list-models          Print the OpenRouter models (add --refresh to bypass the cache)
  --list-voices          Print the available speech voices
  --help                 Show this message`;

const describeEvent = (event: ChordcastEvent) => {
  switch (event.type) {
    case 'modeStarted':
      return `Mode ${event.mode} started`;
    case 'modeEnded':
      return `Mode ${event.mode} ended`;
    case 'recordingFailed':
      return `Recording failed (${event.mode}, ${event.reason}): ${event.message}`;
    case 'pipelineCompleted':
      return (
        `Pipeline ${event.mode} produced ${event.text.length} characters ` +
        `in ${event.elapsedMs}ms`
      );
    case 'pipelineFailed':
      return `Pipeline ${event.mode} failed [${event.code}]: ${event.message}`;
    case 'hotkeyInfrastructureFailure':
      return `Hotkeys unavailable after ${event.attempts} attempts: ${event.message}`;
  }
};

const recentHistory = async (runtime: Runtime) => {
  const today = await runtime.history.list();
  const yesterday = await runtime.history.list(dayKey(Date.now() - 24 * 60 * 60 * 1000));
  return [...today, ...yesterday];
};

const main = async () => {
  const { values } = parseArgs({
    options: {
      'export-diagnostics': { type: 'boolean', default: false },
      'list-models': { type: 'boolean', default: false },
      'list-voices': { type: 'boolean', default: false },
      refresh: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
  });
  if (values.help) {
    console.log(USAGE);
    return;
  }

  const paths = resolvePaths();
  ensureDirectories(paths);
  const stored = loadSettings(paths.settingsFile);
  if (!existsSync(paths.settingsFile)) saveSettings(paths.settingsFile, stored);
  const settings = applyEnvironment(stored);
  configureLogging({ filePath: paths.logFile, level: settings.logging.level });
  logger.info('Settings loaded', JSON.stringify(maskSecrets(settings)));

  const runtime = createRuntime({ paths, settings, platform: createNativeAdapter(), appDir });

  if (values['export-diagnostics']) {
    const { filePath } = await exportDiagnostics(paths.diagnosticsDir, {
      settings,
      history: await recentHistory(runtime),
      recentErrors: loadRecentErrors(paths.errorsFile),
      modelCache: await runtime.modelCache.info(),
      logFile: currentLogFilePath(),
    });
    console.log(filePath);
    return;
  }
  if (values['list-models']) {
    if (settings.llmProvider === 'ollama') {
      (await runtime.ollama.listModels()).forEach((name) => console.log(name));
      return;
    }
    const { models, source } = await runtime.models.getModels(
      settings.openRouter.apiKey,
      values.refresh
    );
    models.forEach((model) => console.log(`${model.id}\t${model.name}\t${model.contextLength}`));
    logger.info(`Listed ${models.length} models from ${source}`);
    return;
  }
  if (values['list-voices']) {
    const voices = await runtime.speech.listVoices();
    voices.forEach((voice) => console.log(`${voice.id}\t${voice.description}`));
    return;
  }

  runtime.events.subscribe((event) => {
    const message = describeEvent(event);
    const failed =
      event.type === 'pipelineFailed' ||
      event.type === 'recordingFailed' ||
      event.type === 'hotkeyInfrastructureFailure';
    if (failed) {
      logger.warn(message);
      recordError(paths.errorsFile, message);
    } else {
      logger.info(message);
    }
  });

  runtime.maintain().catch((error: unknown) => {
    logger.warn('Startup maintenance failed', toErrorMessage(error));
  });
  runtime.hotkeys.init();
  logger.info('chordcast is listening');

  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down`);
    runtime
      .dispose()
      .catch((error: unknown) => logger.error('Shutdown failed', toErrorMessage(error)))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

main().catch((error: unknown) => {
  logger.error('chordcast failed to start', toErrorMessage(error));
  console.error(toErrorMessage(error));
  process.exit(1);
});
