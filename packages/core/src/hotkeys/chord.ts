import { PIPELINE_MODES, type PipelineMode } from '../domain/schemas';
import { ChordcastError } from '../errors';

export type ModifierTag = 'shift' | 'ctrl' | 'alt' | 'meta';

export interface Chord {
  modifiers: ReadonlySet<ModifierTag>;
  key: string;
}

export interface HotkeyBinding {
  chord: Chord;
  mode: PipelineMode;
}

const MODIFIER_ALIASES: Record<string, ModifierTag> = {
  shift: 'shift',
  ctrl: 'ctrl',
  control: 'ctrl',
  alt: 'alt',
  option: 'alt',
  meta: 'meta',
  cmd: 'meta',
  command: 'meta',
  super: 'meta',
  win: 'meta',
};

const KEY_ALIASES: Record<string, string> = {
  ESC: 'ESCAPE',
  RETURN: 'ENTER',
  DEL: 'DELETE',
  INS: 'INSERT',
  PGUP: 'PAGEUP',
  PGDN: 'PAGEDOWN',
};

const MAX_MODIFIERS = 2;

/**
 * Maps a raw key name from the input hook ("ShiftRight", "CtrlLeft", "Meta")
 * onto the modifier tag it represents, or null for ordinary keys.
 */
export const modifierTagOf = (key: string): ModifierTag | null => {
  const base = key.replace(/(Left|Right)$/i, '').toLowerCase();
  return MODIFIER_ALIASES[base] ?? null;
};

/** Canonical key names are upper-case: "F1", "A", "ESCAPE", "ARROWLEFT". */
export const normalizeKeyName = (key: string) => {
  const upper = key.replace(/\s+/g, '').toUpperCase();
  return KEY_ALIASES[upper] ?? upper;
};

export const parseChord = (value: string): Chord => {
  const tokens = value
    .split('+')
    .map((token) => token.trim())
    .filter(Boolean);
  if (!tokens.length) {
    throw new ChordcastError('invalidBinding', `Empty hotkey binding: "${value}"`);
  }
  const keyToken = tokens[tokens.length - 1];
  if (modifierTagOf(keyToken)) {
    throw new ChordcastError('invalidBinding', `Hotkey "${value}" has no primary key`);
  }
  const modifiers = new Set<ModifierTag>();
  tokens.slice(0, -1).forEach((token) => {
    const tag = modifierTagOf(token);
    if (!tag) {
      throw new ChordcastError('invalidBinding', `Unknown modifier "${token}" in "${value}"`);
    }
    modifiers.add(tag);
  });
  if (modifiers.size > MAX_MODIFIERS) {
    throw new ChordcastError(
      'invalidBinding',
      `Hotkey "${value}" uses more than ${MAX_MODIFIERS} modifiers`
    );
  }
  return { modifiers, key: normalizeKeyName(keyToken) };
};

export const formatChord = (chord: Chord) => {
  const order: ModifierTag[] = ['ctrl', 'alt', 'shift', 'meta'];
  const names: Record<ModifierTag, string> = {
    ctrl: 'Ctrl',
    alt: 'Alt',
    shift: 'Shift',
    meta: 'Meta',
  };
  const held = order.filter((tag) => chord.modifiers.has(tag)).map((tag) => names[tag]);
  return [...held, chord.key].join('+');
};

export const sameModifiers = (a: ReadonlySet<ModifierTag>, b: ReadonlySet<ModifierTag>) =>
  a.size === b.size && [...a].every((tag) => b.has(tag));

export const chordsEqual = (a: Chord, b: Chord) =>
  a.key === b.key && sameModifiers(a.modifiers, b.modifiers);

export const parseBindings = (hotkeys: Record<PipelineMode, string>): HotkeyBinding[] => {
  const bindings: HotkeyBinding[] = [];
  PIPELINE_MODES.forEach((mode) => {
    const chord = parseChord(hotkeys[mode]);
    const clash = bindings.find((binding) => chordsEqual(binding.chord, chord));
    if (clash) {
      throw new ChordcastError(
        'invalidBinding',
        `Hotkey ${formatChord(chord)} is bound to both ${clash.mode} and ${mode}`
      );
    }
    bindings.push({ chord, mode });
  });
  return bindings;
};
