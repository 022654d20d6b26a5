import { createChildLogger } from '@autodj/logger';
import { describeError, PersistenceFailure } from '../errors.js';
import { KeyedMutex } from '../keyedMutex.js';
import { sameSong } from '../autoplay/matching.js';
import type { HistoryAction, HistoryEntry, HistorySource, ResolvedTrack, TrackCandidate } from '../types.js';
import type { HistoryStore } from './history-store.js';

const log = createChildLogger({ component: 'history' });

export interface RecordInput {
  track: ResolvedTrack;
  source: HistorySource;
  action: HistoryAction;
  timestamp?: Date;
}

const REPEAT_ACTIONS: ReadonlySet<HistoryAction> = new Set<HistoryAction>(['played', 'queued']);

/**
 * Session history and repeat guard.
 *
 * Entries are only ever appended, in the order `record` is called. The
 * in-memory sequence is authoritative for the session; the store is a
 * best-effort mirror whose failures are logged and counted, never thrown.
 */
export class HistoryLog {
  private readonly entries: HistoryEntry[] = [];
  private failedWrites = 0;
  private lastWrite: Promise<void> = Promise.resolve();

  constructor(
    private readonly store?: HistoryStore,
    private readonly writes: KeyedMutex = new KeyedMutex(),
  ) {}

  /** Opens a log seeded with whatever the store already holds. */
  static async open(store: HistoryStore): Promise<HistoryLog> {
    const history = new HistoryLog(store);
    try {
      history.entries.push(...(await store.load()));
    } catch (error) {
      log.error({ error: describeError(error), file: store.location }, 'Starting with an empty history');
    }
    return history;
  }

  get size(): number {
    return this.entries.length;
  }

  get persistenceFailures(): number {
    return this.failedWrites;
  }

  record(input: RecordInput): HistoryEntry {
    const entry: HistoryEntry = Object.freeze({
      timestamp: input.timestamp ?? new Date(),
      track: input.track,
      source: input.source,
      action: input.action,
    });
    this.entries.push(entry);
    this.persist(entry);
    return entry;
  }

  /** True iff `trackId` is among the last `window` played/queued entries. */
  isRecent(trackId: string, window: number): boolean {
    return this.repeatWindow(window).some((entry) => entry.track.id === trackId);
  }

  /** Same check by title and artist, for candidates not yet resolved. */
  isRecentCandidate(candidate: TrackCandidate, window: number): boolean {
    return this.repeatWindow(window).some((entry) => sameSong(entry.track, candidate));
  }

  /** At most `window` entries, most recent last. */
  recent(window: number): HistoryEntry[] {
    if (window <= 0) return [];
    return this.entries.slice(-window);
  }

  all(): readonly HistoryEntry[] {
    return this.entries;
  }

  /** Waits for every write issued so far. */
  async flush(): Promise<void> {
    await this.lastWrite;
  }

  private repeatWindow(window: number): HistoryEntry[] {
    if (window <= 0) return [];
    return this.entries.filter((entry) => REPEAT_ACTIONS.has(entry.action)).slice(-window);
  }

  private persist(entry: HistoryEntry): void {
    const store = this.store;
    if (!store) return;
    this.lastWrite = this.writes
      .run(store.location, () => store.append(entry))
      .catch((error: unknown) => {
        this.failedWrites++;
        const failure =
          error instanceof PersistenceFailure
            ? error
            : new PersistenceFailure(describeError(error).message, store.location);
        log.error({ error: describeError(failure), file: store.location }, 'History entry kept in memory only');
      });
  }
}
