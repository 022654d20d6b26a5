import type { PlaybackSnapshot } from '@autodj/dj';

/** In playlist mode the Auto-DJ only refills an empty queue, never on the interval. */
export type QueueMode = 'smart' | 'playlist';

/**
 * Everything the console session owns. Mutated only by the orchestrator;
 * the Auto-DJ controller keeps its own state and history.
 */
export interface SessionState {
  playback: PlaybackSnapshot | null;
  /** When the current track was first seen playing. */
  trackStartedAt: Date | null;
  volume: number | null;
  statusLine: string;
  djMessage: string | null;
  showHelp: boolean;
  queueMode: QueueMode;
  lastPollAt: number | null;
  lastTriggerAt: number | null;
  lastTickAt: number | null;
  stopping: boolean;
}

export function createSessionState(): SessionState {
  return {
    playback: null,
    trackStartedAt: null,
    volume: null,
    statusLine: 'Press 1 to start the Auto-DJ, ? for help',
    djMessage: null,
    showHelp: false,
    queueMode: 'smart',
    lastPollAt: null,
    lastTriggerAt: null,
    lastTickAt: null,
    stopping: false,
  };
}
