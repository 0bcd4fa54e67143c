import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  SettingsSchema,
  createHotkeyService,
  createHotkeyStateMachine,
  formatChord,
  parseBindings,
  parseChord,
  type KeySink,
  type KeySource,
  type PipelineMode,
} from '@chordcast/core';

const defaultBindings = () => parseBindings(SettingsSchema.parse({}).hotkeys);

const makeMachine = () => {
  const started: PipelineMode[] = [];
  const ended: PipelineMode[] = [];
  const machine = createHotkeyStateMachine(defaultBindings(), {
    onModeStart: (mode) => started.push(mode),
    onModeEnd: (mode) => ended.push(mode),
  });
  return { machine, started, ended };
};

describe('chord parsing', () => {
  it('normalizes modifiers and key names', () => {
    const chord = parseChord(' control + shift + esc ');
    expect([...chord.modifiers].sort()).toEqual(['ctrl', 'shift']);
    expect(chord.key).toBe('ESCAPE');
    expect(formatChord(chord)).toBe('Ctrl+Shift+ESCAPE');
  });

  it('accepts a bare key', () => {
    const chord = parseChord('F1');
    expect(chord.modifiers.size).toBe(0);
    expect(chord.key).toBe('F1');
  });

  it.each([
    ['', 'Empty hotkey binding: ""'],
    ['Ctrl+Shift', 'Hotkey "Ctrl+Shift" has no primary key'],
    ['Hyper+F1', 'Unknown modifier "Hyper" in "Hyper+F1"'],
    ['Ctrl+Alt+Shift+F1', 'Hotkey "Ctrl+Alt+Shift+F1" uses more than 2 modifiers'],
  ])('rejects %j', (value, message) => {
    expect(() => parseChord(value)).toThrow(message);
  });

  it('rejects duplicate bindings', () => {
    const hotkeys = { ...SettingsSchema.parse({}).hotkeys, promptLlm: 'F1' };
    expect(() => parseBindings(hotkeys)).toThrow(
      'Hotkey F1 is bound to both transcribe and promptLlm'
    );
  });
});

describe('hotkey state machine', () => {
  it('starts on an exact chord and ends when the primary key is released', () => {
    const { machine, started, ended } = makeMachine();

    expect(machine.keyDown('Shift')).toEqual({ consumed: false });
    expect(machine.keyDown('F2')).toEqual({ consumed: true });
    expect(machine.getState()).toEqual({ kind: 'active', mode: 'promptLlm', key: 'F2' });
    expect(machine.keyUp('F2')).toEqual({ consumed: true });

    expect(started).toEqual(['promptLlm']);
    expect(ended).toEqual(['promptLlm']);
    expect(machine.getState()).toEqual({ kind: 'idle' });
  });

  it('requires the exact modifier set', () => {
    const { machine, started } = makeMachine();

    machine.keyDown('Ctrl');
    machine.keyDown('Shift');
    expect(machine.keyDown('F2')).toEqual({ consumed: false });
    expect(started).toEqual([]);
  });

  it('treats left and right modifiers alike', () => {
    const { machine, started } = makeMachine();

    machine.keyDown('CtrlRight');
    machine.keyDown('F3');
    expect(started).toEqual(['speechVision']);
  });

  it('consumes auto-repeat of the active key without restarting', () => {
    const { machine, started } = makeMachine();

    machine.keyDown('F1');
    expect(machine.keyDown('F1')).toEqual({ consumed: true });
    expect(machine.keyDown('F1')).toEqual({ consumed: true });
    expect(started).toEqual(['transcribe']);
  });

  it('drops other chords while a mode is active', () => {
    const { machine, started, ended } = makeMachine();

    machine.keyDown('F1');
    machine.keyDown('Shift');
    expect(machine.keyDown('F3')).toEqual({ consumed: true });
    expect(machine.keyDown('A')).toEqual({ consumed: false });
    machine.keyUp('F3');
    expect(ended).toEqual([]);
    machine.keyUp('F1');
    expect(started).toEqual(['transcribe']);
    expect(ended).toEqual(['transcribe']);
  });

  it('keeps the mode active when a modifier is released first', () => {
    const { machine, ended } = makeMachine();

    machine.keyDown('Ctrl');
    machine.keyDown('F2');
    machine.keyUp('Ctrl');
    expect(machine.getState()).toEqual({ kind: 'active', mode: 'clipboardPromptLlm', key: 'F2' });
    machine.keyUp('F2');
    expect(ended).toEqual(['clipboardPromptLlm']);
  });

  it('passes unbound keys through', () => {
    const { machine, started } = makeMachine();

    expect(machine.keyDown('A')).toEqual({ consumed: false });
    expect(machine.keyUp('A')).toEqual({ consumed: false });
    expect(started).toEqual([]);
  });

  it('ends an active mode on reset', () => {
    const { machine, ended } = makeMachine();

    machine.keyDown('Shift');
    machine.keyDown('F3');
    machine.reset();
    expect(ended).toEqual(['visionCapture']);
    expect(machine.heldModifiers().size).toBe(0);
  });
});

describe('hotkey service', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const makeSource = (failStarts: number) => {
    let sink: KeySink | null = null;
    let starts = 0;
    const source: KeySource & { starts: () => number; sink: () => KeySink | null } = {
      start: vi.fn((next: KeySink) => {
        starts += 1;
        if (starts <= failStarts) throw new Error('hook unavailable');
        sink = next;
      }),
      stop: vi.fn(),
      starts: () => starts,
      sink: () => sink,
    };
    return source;
  };

  it('routes key events into the state machine', () => {
    const source = makeSource(0);
    const onModeStart = vi.fn();
    const service = createHotkeyService(
      { source, bindings: SettingsSchema.parse({}).hotkeys },
      { onModeStart }
    );

    service.init();

    expect(service.status()).toBe('listening');
    expect(source.sink()?.onKey({ key: 'F1', kind: 'down' })).toBe(true);
    expect(onModeStart).toHaveBeenCalledWith('transcribe');
    expect(service.state()).toEqual({ kind: 'active', mode: 'transcribe', key: 'F1' });
  });

  it('restarts with backoff and recovers', () => {
    const source = makeSource(2);
    const service = createHotkeyService({ source, bindings: SettingsSchema.parse({}).hotkeys });

    service.init();
    expect(service.status()).toBe('restarting');
    vi.advanceTimersByTime(999);
    expect(source.starts()).toBe(1);
    vi.advanceTimersByTime(1);
    expect(source.starts()).toBe(2);
    vi.advanceTimersByTime(2000);
    expect(source.starts()).toBe(3);
    expect(service.status()).toBe('listening');
  });

  it('gives up after three restart attempts', () => {
    const source = makeSource(Number.POSITIVE_INFINITY);
    const onInfrastructureFailure = vi.fn();
    const service = createHotkeyService(
      { source, bindings: SettingsSchema.parse({}).hotkeys },
      { onInfrastructureFailure }
    );

    service.init();
    vi.advanceTimersByTime(1000 + 2000 + 4000);

    expect(source.starts()).toBe(4);
    expect(service.status()).toBe('failed');
    expect(onInfrastructureFailure).toHaveBeenCalledWith({
      attempts: 3,
      message: 'hook unavailable',
    });
  });

  it('gives up on a hook that faults after every restart', () => {
    const source = makeSource(0);
    const onInfrastructureFailure = vi.fn();
    const service = createHotkeyService(
      { source, bindings: SettingsSchema.parse({}).hotkeys },
      { onInfrastructureFailure }
    );

    service.init();
    for (let fault = 0; fault < 10; fault += 1) {
      source.sink()?.onFault(new Error('hook died'));
      vi.advanceTimersByTime(60_000);
    }

    expect(source.starts()).toBe(4);
    expect(service.status()).toBe('failed');
    expect(onInfrastructureFailure).toHaveBeenCalledTimes(1);
    expect(onInfrastructureFailure).toHaveBeenCalledWith({ attempts: 3, message: 'hook died' });
  });

  it('resets the backoff once a restarted hook stays up', () => {
    const source = makeSource(0);
    const service = createHotkeyService({ source, bindings: SettingsSchema.parse({}).hotkeys });

    service.init();
    source.sink()?.onFault(new Error('hook died'));
    vi.advanceTimersByTime(1000);
    expect(source.starts()).toBe(2);
    vi.advanceTimersByTime(5 * 60 * 1000);

    source.sink()?.onFault(new Error('hook died again'));
    vi.advanceTimersByTime(1000);

    expect(source.starts()).toBe(3);
    expect(service.status()).toBe('listening');
    service.dispose();
  });

  it('ends the active mode when the hook faults', () => {
    const source = makeSource(0);
    const onModeEnd = vi.fn();
    const service = createHotkeyService({ source, bindings: SettingsSchema.parse({}).hotkeys }, {
      onModeEnd,
    });

    service.init();
    source.sink()?.onKey({ key: 'F1', kind: 'down' });
    source.sink()?.onFault(new Error('hook died'));

    expect(onModeEnd).toHaveBeenCalledWith('transcribe');
    expect(source.stop).toHaveBeenCalled();
    expect(service.status()).toBe('restarting');
    service.dispose();
  });

  it('rejects invalid bindings on init', () => {
    const source = makeSource(0);
    const service = createHotkeyService({
      source,
      bindings: { ...SettingsSchema.parse({}).hotkeys, clipboardTts: 'Ctrl+' },
    });

    expect(() => service.init()).toThrow('Hotkey "Ctrl+" has no primary key');
    expect(source.start).not.toHaveBeenCalled();
  });
});
