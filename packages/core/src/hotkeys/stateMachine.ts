import type { PipelineMode } from '../domain/schemas';
import {
  modifierTagOf,
  normalizeKeyName,
  sameModifiers,
  type HotkeyBinding,
  type ModifierTag,
} from './chord';

export type HotkeyState = { kind: 'idle' } | { kind: 'active'; mode: PipelineMode; key: string };

export interface KeyHandlingResult {
  /** True when the event belongs to a bound chord and should not reach other applications. */
  consumed: boolean;
}

export interface HotkeyHooks {
  onModeStart?: (mode: PipelineMode) => void;
  onModeEnd?: (mode: PipelineMode) => void;
}

export interface HotkeyStateMachine {
  getState(): HotkeyState;
  heldModifiers(): ReadonlySet<ModifierTag>;
  keyDown(key: string): KeyHandlingResult;
  keyUp(key: string): KeyHandlingResult;
  /** Clears held modifiers; an active mode is ended so its session is not left open. */
  reset(): void;
}

const PASS: KeyHandlingResult = { consumed: false };
const CONSUME: KeyHandlingResult = { consumed: true };

/**
 * Pure chord recognizer. Every call returns synchronously; all work triggered by a
 * mode change happens in the hooks' receivers.
 */
export const createHotkeyStateMachine = (
  bindings: HotkeyBinding[],
  hooks: HotkeyHooks = {}
): HotkeyStateMachine => {
  let state: HotkeyState = { kind: 'idle' };
  const held = new Set<ModifierTag>();

  const findBinding = (key: string) =>
    bindings.find(
      (binding) => binding.chord.key === key && sameModifiers(binding.chord.modifiers, held)
    );

  const keyDown = (rawKey: string): KeyHandlingResult => {
    const modifier = modifierTagOf(rawKey);
    if (modifier) {
      held.add(modifier);
      return PASS;
    }
    const key = normalizeKeyName(rawKey);
    if (state.kind === 'active') {
      // Auto-repeat of the active key, or another chord while a mode runs: dropped.
      if (state.key === key) return CONSUME;
      return findBinding(key) ? CONSUME : PASS;
    }
    const binding = findBinding(key);
    if (!binding) return PASS;
    state = { kind: 'active', mode: binding.mode, key };
    hooks.onModeStart?.(binding.mode);
    return CONSUME;
  };

  const keyUp = (rawKey: string): KeyHandlingResult => {
    const modifier = modifierTagOf(rawKey);
    if (modifier) {
      held.delete(modifier);
      return PASS;
    }
    const key = normalizeKeyName(rawKey);
    if (state.kind !== 'active' || state.key !== key) return PASS;
    const { mode } = state;
    state = { kind: 'idle' };
    hooks.onModeEnd?.(mode);
    return CONSUME;
  };

  const reset = () => {
    held.clear();
    if (state.kind !== 'active') return;
    const { mode } = state;
    state = { kind: 'idle' };
    hooks.onModeEnd?.(mode);
  };

  return {
    getState: () => state,
    heldModifiers: () => held,
    keyDown,
    keyUp,
    reset,
  };
};
