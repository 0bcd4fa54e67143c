import { describe, expect, it } from 'vitest';
import { SECRET_MASK, SettingsSchema, maskSecrets, redactSecrets } from '@chordcast/core';

describe('security settings helpers', () => {
  const settings = SettingsSchema.parse({
    openRouter: { apiKey: 'test-secret' },
    transcription: { apiKey: 'test-transcription-secret' },
  });

  it('masks credential presence without exposing the secret', () => {
    const masked = maskSecrets(settings);
    expect(masked.openRouter.apiKey).toBe(SECRET_MASK);
    expect(masked.transcription.apiKey).toBe(SECRET_MASK);
    expect(JSON.stringify(masked)).not.toContain('test-secret');
  });

  it('keeps credential fields undefined when nothing is configured', () => {
    const masked = maskSecrets(SettingsSchema.parse({}));
    expect(masked.openRouter.apiKey).toBeUndefined();
    expect(masked.transcription.apiKey).toBeUndefined();
  });

  it('redacts bearer tokens and sk- keys in error text', () => {
    const message = redactSecrets(
      '401 for Bearer abc.def-123 using sk-test-placeholder-key-000000'
    );
    expect(message).toBe('401 for Bearer REDACTED using sk-REDACTED');
  });
});
