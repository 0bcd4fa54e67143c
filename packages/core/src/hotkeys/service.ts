import type { PipelineMode } from '../domain/schemas';
import { toErrorMessage } from '../errors';
import { createLogger, type Logger } from '../logging/logger';
import { parseBindings } from './chord';
import {
  createHotkeyStateMachine,
  type HotkeyState,
  type HotkeyStateMachine,
} from './stateMachine';

export interface KeySink {
  onKey(event: { key: string; kind: 'down' | 'up' }): boolean;
  onFault(error: unknown): void;
}

export interface KeySource {
  start(sink: KeySink): void;
  stop(): void;
}

export interface HotkeyServiceDeps {
  source: KeySource;
  bindings: Record<PipelineMode, string>;
  maxRestartAttempts?: number;
  restartBaseDelayMs?: number;
  /** How long a restarted hook must run without a fault before the attempt count resets. */
  stableAfterMs?: number;
  logger?: Logger;
}

export interface HotkeyServiceHooks {
  onModeStart?: (mode: PipelineMode) => void;
  onModeEnd?: (mode: PipelineMode) => void;
  onInfrastructureFailure?: (failure: { attempts: number; message: string }) => void;
}

export type HotkeyServiceStatus = 'stopped' | 'listening' | 'restarting' | 'failed';

export interface HotkeyService {
  init(): void;
  dispose(): void;
  status(): HotkeyServiceStatus;
  state(): HotkeyState;
}

/**
 * Owns the global key hook. Bindings are validated on init; hook faults are retried
 * with exponential backoff before the service gives up.
 */
export const createHotkeyService = (
  deps: HotkeyServiceDeps,
  hooks: HotkeyServiceHooks = {}
): HotkeyService => {
  const logger = deps.logger ?? createLogger('hotkeys');
  const maxAttempts = deps.maxRestartAttempts ?? 3;
  const baseDelayMs = deps.restartBaseDelayMs ?? 1000;
  const stableAfterMs = deps.stableAfterMs ?? 5 * 60 * 1000;
  let machine: HotkeyStateMachine | null = null;
  let status: HotkeyServiceStatus = 'stopped';
  let attempts = 0;
  let restartTimer: NodeJS.Timeout | null = null;
  let stableTimer: NodeJS.Timeout | null = null;

  const clearStableTimer = () => {
    if (stableTimer) {
      clearTimeout(stableTimer);
      stableTimer = null;
    }
  };

  const sink: KeySink = {
    onKey: (event) => {
      if (!machine) return false;
      const result = event.kind === 'down' ? machine.keyDown(event.key) : machine.keyUp(event.key);
      return result.consumed;
    },
    onFault: (error) => handleFault(error),
  };

  const stopSource = () => {
    try {
      deps.source.stop();
    } catch (error) {
      logger.warn('Key hook stop failed', toErrorMessage(error));
    }
  };

  const tryStart = () => {
    try {
      deps.source.start(sink);
      status = 'listening';
      logger.info('Key hook listening');
      clearStableTimer();
      if (attempts > 0) {
        stableTimer = setTimeout(() => {
          stableTimer = null;
          if (status === 'listening') attempts = 0;
        }, stableAfterMs);
      }
    } catch (error) {
      handleFault(error);
    }
  };

  const handleFault = (error: unknown) => {
    if (status === 'stopped' || status === 'failed') return;
    const message = toErrorMessage(error);
    logger.warn('Key hook fault', message);
    clearStableTimer();
    machine?.reset();
    stopSource();
    if (attempts >= maxAttempts) {
      status = 'failed';
      logger.error(
        `Key hook could not be restored after ${attempts} attempts; hotkeys are disabled`
      );
      hooks.onInfrastructureFailure?.({ attempts, message });
      return;
    }
    attempts += 1;
    status = 'restarting';
    const delayMs = baseDelayMs * 2 ** (attempts - 1);
    logger.info(`Restarting key hook in ${delayMs}ms (attempt ${attempts}/${maxAttempts})`);
    restartTimer = setTimeout(() => {
      restartTimer = null;
      if (status === 'restarting') tryStart();
    }, delayMs);
  };

  const init = () => {
    if (status !== 'stopped') return;
    machine = createHotkeyStateMachine(parseBindings(deps.bindings), {
      onModeStart: hooks.onModeStart,
      onModeEnd: hooks.onModeEnd,
    });
    attempts = 0;
    status = 'restarting';
    tryStart();
  };

  const dispose = () => {
    clearStableTimer();
    if (restartTimer) {
      clearTimeout(restartTimer);
      restartTimer = null;
    }
    if (status === 'listening') stopSource();
    status = 'stopped';
    machine = null;
  };

  return {
    init,
    dispose,
    status: () => status,
    state: () => machine?.getState() ?? { kind: 'idle' },
  };
};
