import { setTimeout as sleep } from 'node:timers/promises';
import { createChildLogger } from '@autodj/logger';
import {
  describeError,
  formatTrack,
  intervalElapsed,
  parseRecommendation,
  promptVariables,
  shouldRefillQueue,
  type AutoDjController,
  type CompletionBackend,
  type CycleOutcome,
  type DjMetrics,
  type HistoryLog,
  type LyricsAdapter,
  type MysteryCrate,
  type PlaybackAdapter,
  type PlaybackSnapshot,
  type PromptKey,
  type PromptVariables,
  type QueueAllResult,
  type RecommendationEngine,
  type ResolvedTrack,
  type ScrobbleAdapter,
  type TrackQueuer,
  type TriggerReason,
  type UpNext,
} from '@autodj/dj';
import type { CommandSource } from '../input/command-source.js';
import { CHOICE_COMMANDS, type Command } from '../input/keymap.js';
import type { MysteryStatus, StatusView } from '../ui/status-view.js';
import { createSessionState, type QueueMode, type SessionState } from './session-state.js';

const log = createChildLogger({ component: 'session' });

const VOLUME_STEP = 10;
const DEFAULT_VOLUME = 50;
// Last.fm only accepts scrobbles of tracks heard for at least this long.
const MIN_SCROBBLE_MS = 30_000;
const WATCHDOG_FACTOR = 5;
const QUEUE_TEN_SIZE = 10;
const PLAYLIST_SIZE = 15;
const THEME_PLAYLIST_SIZE = 10;

export interface SessionSettings {
  queueTarget: number;
  intervalMs: number;
  pollIntervalMs: number;
  tickMs: number;
  repeatWindow: number;
}

export interface SessionDependencies {
  commands: CommandSource;
  playback: PlaybackAdapter;
  controller: AutoDjController;
  history: HistoryLog;
  upNext: UpNext;
  queuer: TrackQueuer;
  mystery: MysteryCrate;
  /** Picks the song queued on request. */
  engine: RecommendationEngine;
  assistant: CompletionBackend;
  lyrics: LyricsAdapter;
  scrobbler: ScrobbleAdapter;
  metrics: DjMetrics;
  view?: StatusView;
  now?: () => number;
}

interface AssistantReply {
  status: string;
  /** Replaces the DJ message when set. */
  message?: string;
}

/**
 * Single control loop of the console session. Every iteration drains the
 * pending commands, polls playback when due, decides whether the Auto-DJ
 * should run, and redraws. Remote calls are started, never awaited, inside
 * an iteration; their results land in the session state when they settle.
 */
export class SessionOrchestrator {
  readonly state: SessionState = createSessionState();
  private readonly tasks = new Set<Promise<void>>();
  private readonly now: () => number;
  /** Aborted at shutdown; covers requests the cancel key does not. */
  private readonly lifetime = new AbortController();
  private assistantRequest: AbortController | null = null;
  private themeEntry: Promise<void> | null = null;
  private polling = false;
  private stopped: Promise<void> | null = null;

  constructor(
    private readonly deps: SessionDependencies,
    private readonly settings: SessionSettings,
  ) {
    this.now = deps.now ?? Date.now;
    deps.controller.on('outcome', (outcome) => this.onOutcome(outcome));
  }

  get stopping(): boolean {
    return this.state.stopping;
  }

  /** One loop iteration. Never throws and never waits on the network. */
  tick(): void {
    const now = this.now();
    this.checkLag(now);

    for (const command of this.deps.commands.drain()) {
      this.apply(command);
      if (this.state.stopping) return;
    }

    if (this.state.lastPollAt === null || now - this.state.lastPollAt >= this.settings.pollIntervalMs) {
      this.state.lastPollAt = now;
      this.poll();
    }

    const reason = this.triggerReason(now);
    if (reason) {
      this.state.lastTriggerAt = now;
      this.spawn('auto-dj', this.deps.controller.trigger(reason).then(() => undefined));
    }

    this.render(now);
  }

  /** Runs iterations until a quit command or `stop()`, then shuts down. */
  async run(): Promise<void> {
    log.info({ tickMs: this.settings.tickMs }, 'Session started');
    while (!this.state.stopping) {
      this.tick();
      await sleep(this.settings.tickMs);
    }
    await this.shutdown();
  }

  /** Waits for every remote call started so far. */
  async settle(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.allSettled([...this.tasks]);
    }
  }

  stop(): void {
    this.state.stopping = true;
  }

  /**
   * Graceful exit: Auto-DJ off, outstanding calls settled, history flushed,
   * input released. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    this.stopped ??= this.runShutdown();
    return this.stopped;
  }

  private async runShutdown(): Promise<void> {
    this.state.stopping = true;
    this.deps.controller.disable();
    this.lifetime.abort();
    this.assistantRequest?.abort();
    await this.settle();
    await this.deps.history.flush();
    await this.deps.scrobbler.settle();
    this.deps.commands.close();
    await this.themeEntry;
    const { history, metrics } = this.deps;
    log.info(
      {
        historyEntries: history.size,
        persistenceFailures: history.persistenceFailures,
        metrics: await metrics.snapshot(),
      },
      'Session ended',
    );
  }

  apply(command: Command): void {
    const { playback, controller, history } = this.deps;
    const current = this.state.playback;

    switch (command) {
      case 'toggle-auto-dj': {
        const enabled = controller.toggle();
        this.status(enabled ? 'Auto-DJ on' : 'Auto-DJ off');
        break;
      }
      case 'play-pause':
        if (current?.isPlaying) {
          current.isPlaying = false;
          this.userAction('pause', playback.pause());
        } else {
          if (current) current.isPlaying = true;
          this.userAction('play', playback.play());
        }
        break;
      case 'skip':
        this.userAction('skip', playback.skip());
        break;
      case 'previous':
        this.userAction('previous', playback.previous());
        break;
      case 'restart':
        this.userAction('restart', playback.seek(0));
        break;
      case 'volume-up':
      case 'volume-down': {
        const base = this.state.volume ?? current?.volumePercent ?? DEFAULT_VOLUME;
        const step = command === 'volume-up' ? VOLUME_STEP : -VOLUME_STEP;
        const volume = Math.min(100, Math.max(0, base + step));
        this.state.volume = volume;
        this.status(`Volume ${volume}%`);
        this.userAction('volume', playback.setVolume(volume));
        break;
      }
      case 'like':
        if (!current) {
          this.status('Nothing playing to like');
          break;
        }
        history.record({ track: current.track, source: 'user', action: 'liked' });
        this.status(`Liked ${formatTrack(current.track)}`);
        break;
      case 'dislike':
        if (!current) {
          this.status('Nothing playing to skip');
          break;
        }
        history.record({ track: current.track, source: 'user', action: 'skipped' });
        this.status(`Skipped ${formatTrack(current.track)}`);
        this.userAction('skip', playback.skip());
        break;
      case 'request-suggestion':
        this.queueSuggestion();
        break;
      case 'queue-ten':
        this.queueFromPrompt('10 songs', 'recommend_next_ten_songs', QUEUE_TEN_SIZE, null);
        break;
      case 'queue-playlist':
        this.queueFromPrompt('playlist', 'create_playlist', PLAYLIST_SIZE, 'playlist');
        break;
      case 'theme-playlist':
        this.askTheme();
        break;
      case 'toggle-queue-mode':
        this.state.queueMode = this.state.queueMode === 'smart' ? 'playlist' : 'smart';
        this.status(`Queue mode: ${this.state.queueMode}`);
        break;
      case 'toggle-mystery': {
        const enabled = this.deps.mystery.toggle();
        this.syncChoices();
        if (!enabled) {
          this.status('Mystery crate off');
        } else if (this.state.playback) {
          this.status('Mystery crate on');
          this.dealMystery(this.state.playback.track);
        } else {
          this.status('Mystery crate on, waiting for a track');
        }
        break;
      }
      case 'choose-1':
      case 'choose-2':
      case 'choose-3':
      case 'choose-4':
      case 'choose-5':
        this.choose(CHOICE_COMMANDS.indexOf(command) + 1);
        break;
      case 'song-insight':
        this.ask('song insight', (signal, playing) =>
          this.deps.assistant.complete(
            'song_insights',
            { song_name: playing.track.title, artist_name: playing.track.artist },
            { signal },
          ),
        );
        break;
      case 'explain-lyrics':
        this.ask('lyrics explanation', async (signal, playing) => {
          const lyrics = await this.deps.lyrics.fetch(playing.track.title, playing.track.artist);
          if (lyrics === null) {
            return `No lyrics found for ${formatTrack(playing.track)}`;
          }
          return this.deps.assistant.complete(
            'explain_lyrics',
            { song_name: playing.track.title, artist_name: playing.track.artist, lyrics },
            { signal },
          );
        });
        break;
      case 'cancel':
        if (this.assistantRequest) {
          this.assistantRequest.abort();
          this.assistantRequest = null;
          this.status('Request cancelled');
        }
        break;
      case 'help':
        this.state.showHelp = !this.state.showHelp;
        break;
      case 'quit':
        this.status('Shutting down...');
        this.stop();
        break;
    }
  }

  private triggerReason(now: number): TriggerReason | null {
    const { controller, upNext } = this.deps;
    if (this.state.stopping || controller.state !== 'idle') return null;
    if (shouldRefillQueue(upNext.length, this.settings.queueTarget)) return 'queue-low';
    if (this.state.queueMode === 'playlist') return null;
    if (intervalElapsed(this.state.lastTriggerAt, now, this.settings.intervalMs)) return 'interval';
    return null;
  }

  private poll(): void {
    if (this.polling) return;
    this.polling = true;
    const request = this.deps.playback
      .currentlyPlaying()
      .then((snapshot) => this.onSnapshot(snapshot))
      .finally(() => {
        this.polling = false;
      });
    this.spawn('poll', request);
  }

  private onSnapshot(snapshot: PlaybackSnapshot | null): void {
    const previous = this.state.playback;
    const changed = previous?.track.id !== snapshot?.track.id;

    if (changed) {
      const now = new Date(this.now());
      if (previous && this.state.trackStartedAt) {
        const heardMs = now.getTime() - this.state.trackStartedAt.getTime();
        if (heardMs >= Math.min(MIN_SCROBBLE_MS, previous.durationMs / 2)) {
          this.deps.scrobbler.scrobble(previous.track, this.state.trackStartedAt);
        }
      }
      if (snapshot) {
        const source = this.deps.upNext.consume(snapshot.track) ?? 'user';
        this.deps.history.record({ track: snapshot.track, source, action: 'played', timestamp: now });
        this.deps.scrobbler.submitNowPlaying(snapshot.track);
        log.info({ track: formatTrack(snapshot.track), source }, 'Now playing');
      }
      this.state.trackStartedAt = snapshot ? now : null;
    }

    if (changed && snapshot && this.deps.mystery.enabled) {
      this.dealMystery(snapshot.track);
    }

    this.state.playback = snapshot;
    if (snapshot?.volumePercent != null) {
      this.state.volume = snapshot.volumePercent;
    }
  }

  private onOutcome(outcome: CycleOutcome): void {
    switch (outcome.kind) {
      case 'queued':
        this.status(`Auto-DJ queued ${formatTrack(outcome.track)}`);
        if (outcome.narrative) {
          this.state.djMessage = outcome.narrative;
        } else {
          this.introduce(outcome.track);
        }
        break;
      case 'upstream-unavailable':
        this.status(`Warning: ${outcome.error.message}. Auto-DJ paused.`);
        break;
      case 'error':
        this.status(`Warning: Auto-DJ failed (${outcome.error.message})`);
        break;
      default:
        break;
    }
  }

  /**
   * Asks for an on-air intro when the recommendation came without one. A
   * cycle that finishes after the Auto-DJ was switched off gets none.
   */
  private introduce(track: ResolvedTrack): void {
    if (this.state.stopping || !this.deps.controller.enabled) return;
    const request = this.deps.assistant
      .complete(
        'generate_radio_intro',
        { track_name: track.title, artist_name: track.artist },
        { signal: this.lifetime.signal },
      )
      .then(
        (text) => {
          if (!this.state.stopping) this.state.djMessage = text;
        },
        (error: unknown) => {
          log.warn({ track: formatTrack(track), error: describeError(error) }, 'Radio intro failed');
        },
      );
    this.spawn('radio intro', request);
  }

  /** Queues the engine's best fresh candidate as a listener request. */
  private queueSuggestion(): void {
    const current = this.state.playback?.track ?? null;
    const recent = this.deps.history.recent(this.settings.repeatWindow);
    this.startAssistant('suggestion', async (signal) => {
      const result = await this.deps.engine.suggest({ current, recent, signal });
      if (!result.success) {
        return { status: `No song queued (${result.error.message})` };
      }
      const outcome = await this.deps.queuer.queueAll(result.data.candidates, { source: 'user', limit: 1, current, signal });
      const [track] = outcome.queued;
      if (!track) {
        return { status: nothingQueued(outcome) };
      }
      const status = `Queued ${formatTrack(track)}`;
      return result.data.narrative ? { status, message: result.data.narrative } : { status };
    });
  }

  private queueFromPrompt(
    label: string,
    key: Extract<PromptKey, 'recommend_next_ten_songs' | 'create_playlist'>,
    limit: number,
    mode: QueueMode | null,
  ): void {
    const variables = promptVariables({
      current: this.state.playback?.track ?? null,
      recent: this.deps.history.recent(this.settings.repeatWindow),
    });
    this.queueBatch(label, key, variables, limit, mode);
  }

  /** Reads a theme from the keyboard, then queues a playlist for it. */
  private askTheme(): void {
    if (this.themeEntry) return;
    this.status('Theme (enter to confirm, esc to cancel): ');
    this.themeEntry = this.deps.commands
      .readLine((text) => this.status(`Theme (enter to confirm, esc to cancel): ${text}`))
      .then((theme) => {
        this.themeEntry = null;
        if (this.state.stopping) return;
        if (!theme) {
          this.status('Theme playlist cancelled');
          return;
        }
        this.queueBatch(`${theme} playlist`, 'theme_based_playlist', { theme }, THEME_PLAYLIST_SIZE, 'playlist');
      });
  }

  private queueBatch(label: string, key: PromptKey, variables: PromptVariables, limit: number, mode: QueueMode | null): void {
    const current = this.state.playback?.track ?? null;
    this.startAssistant(label, async (signal) => {
      const text = await this.deps.assistant.complete(key, variables, { signal });
      const parsed = parseRecommendation(text, limit);
      if (!parsed.success) {
        return { status: `No songs queued (${parsed.error.message})` };
      }
      const outcome = await this.deps.queuer.queueAll(parsed.data.candidates, { source: 'user', limit, current, signal });
      const count = outcome.queued.length;
      if (count === 0) {
        return { status: nothingQueued(outcome) };
      }
      if (mode && !signal.aborted) {
        this.state.queueMode = mode;
      }
      return { status: mode === 'playlist' ? `Playlist queued with ${count} tracks` : `Queued ${count} songs` };
    });
  }

  private dealMystery(current: ResolvedTrack): void {
    if (this.state.stopping) return;
    const { mystery, history } = this.deps;
    const round = mystery
      .deal({ current, recent: history.recent(this.settings.repeatWindow), signal: this.lifetime.signal })
      .then(
        (outcome) => {
          if (outcome.kind === 'dealt') {
            this.state.djMessage = mystery.display();
            this.status('Mystery crate ready');
          } else if (outcome.kind === 'failed') {
            this.status(`Warning: mystery crate failed (${outcome.error.message})`);
          }
          this.syncChoices();
        },
        (error: unknown) => {
          if (this.state.stopping) return;
          log.warn({ error: describeError(error) }, 'Mystery crate round failed');
          this.status(`Warning: mystery crate failed (${describeError(error).message})`);
        },
      );
    this.spawn('mystery crate', round);
  }

  private choose(choice: number): void {
    const picked = this.deps.mystery.choose(choice);
    this.syncChoices();
    if (!picked.success) {
      this.status(picked.error);
      return;
    }
    this.state.djMessage = null;
    this.status(`Now playing ${formatTrack(picked.data)}`);
    this.userAction('play', this.deps.playback.play(picked.data.id));
  }

  private syncChoices(): void {
    this.deps.commands.setChoiceCount(this.deps.mystery.choiceCount);
  }

  private ask(label: string, request: (signal: AbortSignal, playing: PlaybackSnapshot) => Promise<string>): void {
    const playing = this.state.playback;
    if (!playing) {
      this.status(`Nothing playing for a ${label}`);
      return;
    }
    this.startAssistant(label, async (signal) => ({ status: `Ready: ${label}`, message: await request(signal, playing) }));
  }

  /** One assistant request at a time; a new one cancels the previous. */
  private startAssistant(label: string, request: (signal: AbortSignal) => Promise<AssistantReply>): void {
    this.assistantRequest?.abort();
    const controller = new AbortController();
    this.assistantRequest = controller;
    this.status(`Fetching ${label}...`);

    const task = request(controller.signal).then(
      (reply) => {
        if (controller.signal.aborted) return;
        if (reply.message !== undefined) this.state.djMessage = reply.message;
        this.status(reply.status);
      },
      (error: unknown) => {
        if (controller.signal.aborted) return;
        log.warn({ label, error: describeError(error) }, 'Assistant request failed');
        this.status(`Warning: ${label} failed (${describeError(error).message})`);
      },
    );
    this.spawn(label, task.finally(() => {
      if (this.assistantRequest === controller) {
        this.assistantRequest = null;
      }
    }));
  }

  private userAction(action: string, request: Promise<void>): void {
    this.spawn(
      action,
      request.catch((error: unknown) => {
        log.warn({ action, error: describeError(error) }, 'Playback action failed');
        this.status(`Warning: ${action} failed (${describeError(error).message})`);
      }),
    );
  }

  private spawn(label: string, task: Promise<void>): void {
    const tracked = task.catch((error: unknown) => {
      log.error({ task: label, error: describeError(error) }, 'Background task failed');
      this.status(`Warning: ${describeError(error).message}`);
    });
    this.tasks.add(tracked);
    void tracked.finally(() => this.tasks.delete(tracked));
  }

  private checkLag(now: number): void {
    const last = this.state.lastTickAt;
    this.state.lastTickAt = now;
    if (last === null) return;
    const lag = now - last - this.settings.tickMs;
    if (lag > WATCHDOG_FACTOR * this.settings.tickMs) {
      log.warn({ lagMs: lag, tickMs: this.settings.tickMs }, 'Session loop stalled');
    }
  }

  private status(message: string): void {
    this.state.statusLine = message;
  }

  private render(now: number): void {
    const { mystery } = this.deps;
    let mysteryStatus: MysteryStatus = 'off';
    if (mystery.awaitingChoice) mysteryStatus = 'awaiting choice';
    else if (mystery.enabled) mysteryStatus = 'on';
    this.deps.view?.render({
      session: this.state,
      autoDj: this.deps.controller.state,
      cooldownEndsAt: this.deps.controller.cooldownEndsAt,
      upNext: this.deps.upNext.pending(),
      mystery: mysteryStatus,
      hiddenTrackId: mystery.hiddenPickId,
      now,
    });
  }
}

function nothingQueued(outcome: QueueAllResult): string {
  const [missing] = outcome.missing;
  if (missing) return `Could not find ${formatTrack(missing)}`;
  return outcome.rejected.length > 0 ? 'Nothing queued, every pick was a recent repeat' : 'Nothing queued';
}
