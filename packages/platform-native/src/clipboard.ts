import { runProcess, type ProcessRunner } from '@chordcast/core';
import type { ClipboardAdapter } from '@chordcast/platform';
import { clipboardReadCommand, clipboardWriteCommand } from './commands';

const CLIPBOARD_TIMEOUT_MS = 5000;

export const createClipboard = (
  options: { platform?: NodeJS.Platform; runner?: ProcessRunner } = {}
): ClipboardAdapter => {
  const platform = options.platform ?? process.platform;
  const runner = options.runner ?? runProcess;

  const get = async () => {
    const { command, args } = clipboardReadCommand(platform);
    const result = await runner(command, args, { timeoutMs: CLIPBOARD_TIMEOUT_MS });
    if (!result.success) {
      // xclip exits non-zero when the clipboard holds no text.
      if (platform === 'linux' && !result.stdout) return '';
      const reason = result.stderr.trim() || `exit ${result.exitCode}`;
      throw new Error(`Clipboard read failed: ${reason}`);
    }
    return platform === 'win32' ? result.stdout.replace(/\r?\n$/, '') : result.stdout;
  };

  const set = async (text: string) => {
    const { command, args } = clipboardWriteCommand(platform);
    const result = await runner(command, args, { timeoutMs: CLIPBOARD_TIMEOUT_MS, input: text });
    if (!result.success) {
      const reason = result.stderr.trim() || `exit ${result.exitCode}`;
      throw new Error(`Clipboard write failed: ${reason}`);
    }
  };

  return { get, set };
};
