export type KeyEventKind = 'down' | 'up';

export interface KeyEvent {
  /** Key name as the hook reports it, e.g. "F1", "A", "Shift", "CtrlRight". */
  key: string;
  kind: KeyEventKind;
}

export interface KeyEventSink {
  /** Returns true when the event matched a bound chord. */
  onKey(event: KeyEvent): boolean;
  onFault(error: unknown): void;
}

export interface KeyEventSource {
  /** Installs the global hook. Throws when the hook cannot be installed. */
  start(sink: KeyEventSink): void;
  stop(): void;
  /** Whether consumed events are kept from other applications. */
  readonly suppressesConsumedEvents: boolean;
}

export interface AudioCaptureAdapter {
  /** Starts recording into a WAV file at `filePath`. */
  start(filePath: string, options?: { sampleRate?: number }): Promise<void>;
  /** Stops recording and flushes the file. */
  stop(): Promise<void>;
}

export interface ClipboardAdapter {
  set(text: string): Promise<void>;
  get(): Promise<string>;
}

export interface PlaybackHandle {
  isPlaying(): boolean;
  stop(): Promise<void>;
}

export interface AudioPlayerAdapter {
  start(filePath: string, options?: { volume?: number }): Promise<PlaybackHandle>;
}

export interface ScreenCaptureAdapter {
  /** Lets the user pick a region. Resolves to PNG bytes, or null on a cancelled selection. */
  captureRegion(): Promise<Uint8Array | null>;
}

export interface PlatformAdapter {
  keyboard: KeyEventSource;
  audioCapture: AudioCaptureAdapter;
  clipboard: ClipboardAdapter;
  player: AudioPlayerAdapter;
  screenCapture: ScreenCaptureAdapter;
}
