import type { PlatformAdapter } from '@chordcast/platform';
import { createMicrophoneCapture } from './audioCapture';
import { createClipboard } from './clipboard';
import { createUiohookKeySource } from './keyboard';
import { createCommandPlayer } from './player';
import { createScreenCapture } from './screenCapture';

export * from './commands';
export { buildKeyNameMap, createUiohookKeySource, type HookEmitter } from './keyboard';
export { createMicrophoneCapture } from './audioCapture';
export { createClipboard } from './clipboard';
export { createCommandPlayer } from './player';
export { createScreenCapture } from './screenCapture';

export const createNativeAdapter = (): PlatformAdapter => ({
  keyboard: createUiohookKeySource(),
  audioCapture: createMicrophoneCapture(),
  clipboard: createClipboard(),
  player: createCommandPlayer(),
  screenCapture: createScreenCapture(),
});
