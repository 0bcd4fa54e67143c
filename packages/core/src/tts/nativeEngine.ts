import { randomUUID } from 'crypto';
import { readFile, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';
import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import { runProcess, type ProcessRunner } from '../process/runner';
import { cachedAvailability, failedResult, type SpeechEngine, type TtsRequest } from './types';

interface NativeCommand {
  command: string;
  args: string[];
}

export interface NativeSynthesisPlan {
  check: NativeCommand;
  synthesize(textFile: string, outputFile: string, speed: number): NativeCommand;
  voices: Array<{ id: string; description: string }>;
}

const quotePowerShell = (value: string) => `'${value.replace(/'/g, "''")}'`;

/** Maps a 0.5–2.0 speed multiplier onto SAPI's -10..10 rate scale. */
export const sapiRate = (speed: number) =>
  Math.max(-10, Math.min(10, Math.round((speed - 1) * 10)));

export const nativeSynthesisPlan = (platform: NodeJS.Platform): NativeSynthesisPlan | null => {
  if (platform === 'darwin') {
    return {
      check: { command: 'say', args: ['-v', '?'] },
      synthesize: (textFile, outputFile, speed) => ({
        command: 'say',
        args: [
          '-r',
          String(Math.round(175 * speed)),
          '--data-format=LEI16@22050',
          '-o',
          outputFile,
          '-f',
          textFile,
        ],
      }),
      voices: [{ id: 'system-default', description: 'macOS system voice' }],
    };
  }
  if (platform === 'win32') {
    return {
      check: {
        command: 'powershell',
        args: ['-NoProfile', '-NonInteractive', '-Command', 'Add-Type -AssemblyName System.Speech'],
      },
      synthesize: (textFile, outputFile, speed) => ({
        command: 'powershell',
        args: [
          '-NoProfile',
          '-NonInteractive',
          '-Command',
          [
            'Add-Type -AssemblyName System.Speech',
            '$synth = New-Object System.Speech.Synthesis.SpeechSynthesizer',
            `$synth.Rate = ${sapiRate(speed)}`,
            `$synth.SetOutputToWaveFile(${quotePowerShell(outputFile)})`,
            `$synth.Speak((Get-Content -Raw -Encoding UTF8 -Path ${quotePowerShell(textFile)}))`,
            '$synth.Dispose()',
          ].join('; '),
        ],
      }),
      voices: [{ id: 'system-default', description: 'Windows SAPI voice' }],
    };
  }
  if (platform === 'linux') {
    return {
      check: { command: 'espeak-ng', args: ['--version'] },
      synthesize: (textFile, outputFile, speed) => ({
        command: 'espeak-ng',
        args: ['-s', String(Math.round(175 * speed)), '-w', outputFile, '-f', textFile],
      }),
      voices: [{ id: 'system-default', description: 'eSpeak NG voice' }],
    };
  }
  return null;
};

export interface NativeEngineDeps {
  tempDir: string;
  platform?: NodeJS.Platform;
  runner?: ProcessRunner;
  timeoutMs?: number;
  logger?: Logger;
}

/** Synthesis through the operating system's own speech tools. */
export const createNativeSpeechEngine = (deps: NativeEngineDeps): SpeechEngine => {
  const logger = deps.logger ?? createLogger('tts-native');
  const run = deps.runner ?? runProcess;
  const plan = nativeSynthesisPlan(deps.platform ?? process.platform);
  const timeoutMs = deps.timeoutMs ?? 30_000;
  const name = 'native';

  const isAvailable = cachedAvailability(async () => {
    if (!plan) return false;
    const result = await run(plan.check.command, plan.check.args, { timeoutMs: 5_000 });
    if (!result.success) logger.info(`Native speech unavailable: ${result.stderr.trim()}`);
    return result.success;
  });

  const generate = async (request: TtsRequest) => {
    const startedAt = Date.now();
    if (!request.text.trim()) return failedResult('Text cannot be empty', startedAt, name);
    if (!plan || !(await isAvailable())) {
      return failedResult('Native speech engine is not available', startedAt, name);
    }
    const base = join(deps.tempDir, `chordcast-native-${randomUUID()}`);
    const textFile = `${base}.txt`;
    const outputFile = `${base}.wav`;
    try {
      await writeFile(textFile, request.text, 'utf8');
      const { command, args } = plan.synthesize(textFile, outputFile, request.speed);
      const result = await run(command, args, { timeoutMs });
      if (!result.success) {
        const reason = result.stderr.trim() || `${command} exited with code ${result.exitCode}`;
        return failedResult(reason, startedAt, name);
      }
      const size = await stat(outputFile).then(
        (info) => info.size,
        () => 0
      );
      if (size === 0) return failedResult(`${command} produced no audio`, startedAt, name);
      const audioBytes = new Uint8Array(await readFile(outputFile));
      return { success: true, audioBytes, elapsedMs: Date.now() - startedAt, engine: name };
    } catch (error) {
      return failedResult(toErrorMessage(error), startedAt, name);
    } finally {
      await Promise.all([rm(textFile, { force: true }), rm(outputFile, { force: true })]).catch(
        (error: unknown) => {
          logger.warn('Failed to remove native synthesis files', toErrorMessage(error));
        }
      );
    }
  };

  const listVoices = async () => (plan && (await isAvailable()) ? plan.voices : []);

  return { name, isAvailable, generate, listVoices };
};
