import { existsSync, readFileSync, writeFileSync } from 'fs';
import {
  DomainEnvelopeSchema,
  SCHEMA_VERSION,
  SettingsSchema,
  createLogger,
  migrateToCurrent,
  toErrorMessage,
  type DomainEnvelope,
  type Settings,
} from '@chordcast/core';

const logger = createLogger('store');

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export class UnsupportedSettingsVersionError extends Error {}

const readEnvelope = (filePath: string): DomainEnvelope => {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  const parsed = DomainEnvelopeSchema.safeParse(raw);
  // Files written before the envelope existed hold the settings object itself.
  return parsed.success && parsed.data.payload !== undefined ? parsed.data : { payload: raw };
};

/**
 * Loads settings from disk. A missing or corrupted file yields defaults; a file written
 * by a newer version is refused so that it is never overwritten with an older shape.
 */
export const loadSettings = (filePath: string): Settings => {
  if (!existsSync(filePath)) return SettingsSchema.parse({});
  let envelope: DomainEnvelope;
  try {
    envelope = readEnvelope(filePath);
  } catch (error) {
    logger.error('Failed to read settings, using defaults.', toErrorMessage(error));
    return SettingsSchema.parse({});
  }
  if ((envelope.version ?? 0) > SCHEMA_VERSION) {
    throw new UnsupportedSettingsVersionError(
      `Settings file version ${envelope.version} is newer than supported version ${SCHEMA_VERSION}`
    );
  }
  try {
    return migrateToCurrent(envelope, (payload) => SettingsSchema.parse(payload ?? {}));
  } catch (error) {
    // Keep startup resilient if settings were manually edited into an invalid shape.
    logger.error('Failed to load settings, using defaults.', toErrorMessage(error));
    return SettingsSchema.parse({});
  }
};

export const saveSettings = (filePath: string, settings: Settings) => {
  const envelope = {
    version: SCHEMA_VERSION,
    payload: settings,
  };
  writeFileSync(filePath, JSON.stringify(envelope, null, 2), 'utf-8');
};

const isLogLevel = (value: string): value is Settings['logging']['level'] =>
  LOG_LEVELS.some((level) => level === value);

/** Settings with environment overrides applied. The result is never persisted. */
export const applyEnvironment = (
  settings: Settings,
  env: NodeJS.ProcessEnv = process.env
): Settings => {
  const apiKey = env.OPENROUTER_API_KEY?.trim();
  const level = env.CHORDCAST_LOG_LEVEL?.trim().toLowerCase();
  return SettingsSchema.parse({
    ...settings,
    openRouter: apiKey ? { ...settings.openRouter, apiKey } : settings.openRouter,
    logging: level && isLogLevel(level) ? { ...settings.logging, level } : settings.logging,
  });
};
