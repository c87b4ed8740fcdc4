import type { StageEvent, StageName, StageStatus } from '../../shared/types';

export type StageEventSender = <T>(event: StageEvent<T>) => void;

export interface StagePayload<T> {
  message?: string;
  data?: T;
}

export interface StageEmitter {
  start: <T>(payload?: StagePayload<T>) => void;
  progress: <T>(payload?: StagePayload<T>) => void;
  success: <T>(payload?: StagePayload<T>) => void;
  failure: (error: unknown, options?: { data?: unknown }) => void;
}

export const makeStageEmitter = (runId: string, stage: StageName, send: StageEventSender): StageEmitter => {
  const emit = <T>(status: StageStatus, payload?: StagePayload<T>) => {
    send({ runId, stage, status, message: payload?.message, data: payload?.data, ts: new Date().toISOString() });
  };
  return {
    start: (payload) => emit('start', payload),
    progress: (payload) => emit('progress', payload),
    success: (payload) => emit('success', payload),
    failure: (error, options) => {
      const message = error instanceof Error ? error.message : String(error);
      emit('failure', { message, data: options?.data ?? { error: message } });
    },
  };
};

/** Discards every event; used by the one-shot CLI. */
export const noopStageSender: StageEventSender = () => {};
