import { createRequire } from 'module';
import { createLogger } from '@chordcast/core';
import type { KeyEvent, KeyEventSink, KeyEventSource } from '@chordcast/platform';

type UiohookModule = typeof import('uiohook-napi');

const require = createRequire(import.meta.url);
const logger = createLogger('keyboard');

let uiohookModule: UiohookModule | null = null;

const loadUiohook = (): UiohookModule => {
  if (uiohookModule) return uiohookModule;
  let loaded: UiohookModule;
  try {
    loaded = require('uiohook-napi') as UiohookModule;
  } catch (error) {
    const details = error instanceof Error ? error.message : String(error);
    throw new Error(
      `uiohook-napi failed to load. Reinstall it for this Node.js version. ${details}`
    );
  }
  uiohookModule = loaded;
  return loaded;
};

/** Reverse lookup from hook keycodes to key names. The first name listed for a code wins. */
export const buildKeyNameMap = (keys: Record<string, number>) => {
  const names = new Map<number, string>();
  Object.entries(keys).forEach(([name, code]) => {
    if (!names.has(code)) names.set(code, name);
  });
  return names;
};

type HookEventName = 'keydown' | 'keyup';

export interface HookEmitter {
  on(event: HookEventName, listener: (event: { keycode: number }) => void): unknown;
  removeAllListeners(event: HookEventName): unknown;
  start(): void;
  stop(): void;
}

/**
 * Global keyboard hook on uiohook-napi. The hook only observes events, so a consumed
 * chord still reaches the focused application.
 */
export const createUiohookKeySource = (
  load: () => { uIOhook: HookEmitter; UiohookKey: Record<string, number> } = loadUiohook
): KeyEventSource => {
  let hook: HookEmitter | null = null;

  const stop = () => {
    if (!hook) return;
    const current = hook;
    hook = null;
    current.removeAllListeners('keydown');
    current.removeAllListeners('keyup');
    try {
      current.stop();
    } catch (error) {
      const details = error instanceof Error ? error.message : String(error);
      logger.warn('Keyboard hook did not stop cleanly', details);
    }
  };

  const start = (sink: KeyEventSink) => {
    stop();
    const { uIOhook, UiohookKey } = load();
    const names = buildKeyNameMap(UiohookKey);
    const forward = (kind: KeyEvent['kind']) => (event: { keycode: number }) => {
      const key = names.get(event.keycode);
      if (!key) return;
      try {
        sink.onKey({ key, kind });
      } catch (error) {
        sink.onFault(error);
      }
    };
    uIOhook.on('keydown', forward('down'));
    uIOhook.on('keyup', forward('up'));
    uIOhook.start();
    hook = uIOhook;
    logger.info('Keyboard hook installed');
  };

  return { start, stop, suppressesConsumedEvents: false };
};
