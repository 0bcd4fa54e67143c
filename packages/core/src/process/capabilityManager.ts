import { access } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import { runProcess, type ProcessExecutionResult, type ProcessRunner } from './runner';

export interface CapabilityProvider {
  invoke(args: readonly string[], timeoutMs?: number): Promise<ProcessExecutionResult>;
}

export const VoiceDescriptorSchema = z.object({
  id: z.string().min(1),
  description: z.string().default(''),
});
export type VoiceDescriptor = z.infer<typeof VoiceDescriptorSchema>;

const ListVoicesResponseSchema = z.object({
  success: z.literal(true),
  voices: z.array(VoiceDescriptorSchema),
});

export type CapabilityStatus =
  | { state: 'unknown' }
  | { state: 'available'; interpreter: string }
  | { state: 'unavailable'; reason: string };

export interface CapabilityManagerOptions {
  /** Directory the application runs from; bundled interpreter and bridge live beneath it. */
  appDir: string;
  bridgeScript?: string;
  bundledInterpreters?: string[];
  systemInterpreters?: string[];
  versionCheckTimeoutMs?: number;
  verifyTimeoutMs?: number;
  invokeTimeoutMs?: number;
  runner?: ProcessRunner;
  fileExists?: (filePath: string) => Promise<boolean>;
  platform?: NodeJS.Platform;
  logger?: Logger;
}

export interface CapabilityProcessManager extends CapabilityProvider {
  /** Locates and verifies the interpreter. Returns false instead of throwing. */
  initialize(): Promise<boolean>;
  isAvailable(): Promise<boolean>;
  listVoices(): Promise<VoiceDescriptor[]>;
  status(): CapabilityStatus;
}

const defaultFileExists = async (filePath: string) => {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
};

export const defaultBundledInterpreters = (appDir: string, platform: NodeJS.Platform) =>
  platform === 'win32'
    ? [join(appDir, 'python', 'python.exe')]
    : [join(appDir, 'python', 'bin', 'python3'), join(appDir, 'python', 'python')];

export const defaultSystemInterpreters = (platform: NodeJS.Platform) =>
  platform === 'win32' ? ['python', 'py', 'python3'] : ['python3', 'python'];

export const createCapabilityProcessManager = (
  options: CapabilityManagerOptions
): CapabilityProcessManager => {
  const logger = options.logger ?? createLogger('capability');
  const platform = options.platform ?? process.platform;
  const run = options.runner ?? runProcess;
  const fileExists = options.fileExists ?? defaultFileExists;
  const bridgeScript = options.bridgeScript ?? join(options.appDir, 'scripts', 'speech_bridge.py');
  const bundled =
    options.bundledInterpreters ?? defaultBundledInterpreters(options.appDir, platform);
  const system = options.systemInterpreters ?? defaultSystemInterpreters(platform);
  const versionCheckTimeoutMs = options.versionCheckTimeoutMs ?? 5_000;
  const verifyTimeoutMs = options.verifyTimeoutMs ?? 10_000;
  const invokeTimeoutMs = options.invokeTimeoutMs ?? 30_000;

  let status: CapabilityStatus = { state: 'unknown' };
  let initializing: Promise<boolean> | null = null;

  const checkVersion = async (interpreter: string) => {
    const result = await run(interpreter, ['--version'], { timeoutMs: versionCheckTimeoutMs });
    if (!result.success) {
      logger.debug(`Interpreter check failed for ${interpreter}: ${result.stderr.trim()}`);
      return false;
    }
    logger.debug(`Found ${interpreter}: ${(result.stdout || result.stderr).trim()}`);
    return true;
  };

  const locateInterpreter = async () => {
    for (const candidate of bundled) {
      if ((await fileExists(candidate)) && (await checkVersion(candidate))) return candidate;
    }
    for (const candidate of system) {
      if (await checkVersion(candidate)) return candidate;
    }
    return null;
  };

  const parseVoices = (result: ProcessExecutionResult): VoiceDescriptor[] | null => {
    if (!result.success) return null;
    try {
      const parsed = ListVoicesResponseSchema.safeParse(JSON.parse(result.stdout.trim()));
      return parsed.success ? parsed.data.voices : null;
    } catch {
      return null;
    }
  };

  const markUnavailable = (reason: string) => {
    status = { state: 'unavailable', reason };
    logger.warn(`Speech bridge unavailable: ${reason}`);
    return false;
  };

  const doInitialize = async () => {
    try {
      if (!(await fileExists(bridgeScript))) {
        return markUnavailable(`bridge script not found at ${bridgeScript}`);
      }
      const interpreter = await locateInterpreter();
      if (!interpreter) return markUnavailable('no usable interpreter found');
      const check = await run(interpreter, [bridgeScript, '--list-voices'], {
        timeoutMs: verifyTimeoutMs,
      });
      if (!parseVoices(check)) {
        const detail = check.timedOut
          ? check.stderr
          : check.stderr.trim() || `exit code ${check.exitCode}`;
        return markUnavailable(`verification failed: ${detail}`);
      }
      status = { state: 'available', interpreter };
      logger.info(`Speech bridge ready (${interpreter})`);
      return true;
    } catch (error) {
      return markUnavailable(toErrorMessage(error));
    }
  };

  const initialize = () => {
    if (!initializing) {
      initializing = doInitialize();
    }
    return initializing;
  };

  const invoke = async (args: readonly string[], timeoutMs = invokeTimeoutMs) => {
    await initialize();
    if (status.state !== 'available') {
      return {
        success: false,
        stdout: '',
        stderr: status.state === 'unavailable' ? status.reason : 'speech bridge not initialized',
        exitCode: -1,
        elapsedMs: 0,
        timedOut: false,
      };
    }
    const result = await run(status.interpreter, [bridgeScript, ...args], { timeoutMs });
    if (!result.success) {
      logger.warn(`Bridge invocation failed (exit ${result.exitCode}): ${result.stderr.trim()}`);
    }
    return result;
  };

  const listVoices = async () => {
    const result = await invoke(['--list-voices'], verifyTimeoutMs);
    return parseVoices(result) ?? [];
  };

  return {
    initialize,
    isAvailable: initialize,
    invoke,
    listVoices,
    status: () => status,
  };
};
