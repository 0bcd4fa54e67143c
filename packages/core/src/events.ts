import type { PipelineMode } from './domain/schemas';
import type { ErrorCode } from './errors';

export type RecordingFailureReason = 'captureFailed' | 'fileMissing' | 'tooShort';

export type ChordcastEvent =
  | { type: 'modeStarted'; mode: PipelineMode; at: number }
  | { type: 'modeEnded'; mode: PipelineMode; at: number }
  | {
      type: 'recordingFailed';
      sessionId: string;
      mode: PipelineMode;
      reason: RecordingFailureReason;
      message: string;
    }
  | {
      type: 'pipelineCompleted';
      sessionId: string;
      mode: PipelineMode;
      text: string;
      elapsedMs: number;
    }
  | {
      type: 'pipelineFailed';
      sessionId: string;
      mode: PipelineMode;
      code: ErrorCode;
      message: string;
    }
  | { type: 'hotkeyInfrastructureFailure'; attempts: number; message: string };

export type ChordcastEventType = ChordcastEvent['type'];

export type EventListener<E> = (event: E) => void;

export interface EventBus<E extends { type: string }> {
  emit(event: E): void;
  subscribe(listener: EventListener<E>): () => void;
  on<T extends E['type']>(type: T, listener: EventListener<Extract<E, { type: T }>>): () => void;
}

export const createEventBus = <E extends { type: string }>(
  onListenerError?: (error: unknown, event: E) => void
): EventBus<E> => {
  const listeners = new Set<EventListener<E>>();

  const emit = (event: E) => {
    listeners.forEach((listener) => {
      try {
        listener(event);
      } catch (error) {
        onListenerError?.(error, event);
      }
    });
  };

  const subscribe = (listener: EventListener<E>) => {
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  };

  const on = <T extends E['type']>(
    type: T,
    listener: EventListener<Extract<E, { type: T }>>
  ) =>
    subscribe((event) => {
      if (isEventOfType(event, type)) listener(event);
    });

  return { emit, subscribe, on };
};

const isEventOfType = <E extends { type: string }, T extends E['type']>(
  event: E,
  type: T
): event is Extract<E, { type: T }> => event.type === type;
