import { SettingsSchema, type Settings } from '../domain/schemas';

export const SECRET_MASK = 'REDACTED';

/** Copy of the settings with every credential replaced by a marker, for logs and diagnostics. */
export const maskSecrets = (settings: Settings, marker = SECRET_MASK): Settings =>
  SettingsSchema.parse({
    ...settings,
    openRouter: {
      ...settings.openRouter,
      apiKey: settings.openRouter.apiKey ? marker : undefined,
    },
    transcription: {
      ...settings.transcription,
      apiKey: settings.transcription.apiKey ? marker : undefined,
    },
  });
