import { randomUUID } from 'crypto';
import { readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createLogger, runProcess, type ProcessRunner } from '@chordcast/core';
import type { ScreenCaptureAdapter } from '@chordcast/platform';
import { regionCaptureCommand } from './commands';

const logger = createLogger('screen');

/** The user may take a while to drag a selection. */
const SELECTION_TIMEOUT_MS = 120_000;

export const createScreenCapture = (
  options: { platform?: NodeJS.Platform; runner?: ProcessRunner; tempDir?: string } = {}
): ScreenCaptureAdapter => {
  const platform = options.platform ?? process.platform;
  const runner = options.runner ?? runProcess;
  const tempDir = options.tempDir ?? tmpdir();

  const captureRegion = async () => {
    const outputPath = join(tempDir, `chordcast-capture-${randomUUID()}.png`);
    const command = regionCaptureCommand(platform, outputPath);
    if (!command) throw new Error(`Region capture is not implemented on ${platform}`);
    try {
      const result = await runner(command.command, command.args, {
        timeoutMs: SELECTION_TIMEOUT_MS,
      });
      if (!result.success) {
        logger.info(`Region capture ended without an image (exit ${result.exitCode})`);
        return null;
      }
      let image: Uint8Array;
      try {
        image = new Uint8Array(await readFile(outputPath));
      } catch {
        return null;
      }
      return image.length ? image : null;
    } finally {
      await rm(outputPath, { force: true });
    }
  };

  return { captureRegion };
};
