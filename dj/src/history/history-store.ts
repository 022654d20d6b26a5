import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { createChildLogger } from '@autodj/logger';
import { PersistenceFailure } from '../errors.js';
import { resolvedTrack, type HistoryEntry } from '../types.js';

const log = createChildLogger({ component: 'history-store' });

const entrySchema = z.object({
  timestamp: z.string().datetime({ offset: true }),
  track: z.object({
    id: z.string().min(1),
    title: z.string(),
    artist: z.string(),
  }),
  source: z.enum(['user', 'auto']),
  action: z.enum(['played', 'skipped', 'liked', 'queued']),
});

export interface HistoryStore {
  /** Where entries are persisted; also the serialization key for writes. */
  readonly location: string;
  load(): Promise<HistoryEntry[]>;
  append(entry: HistoryEntry): Promise<void>;
}

export function serializeEntry(entry: HistoryEntry): string {
  return JSON.stringify({
    timestamp: entry.timestamp.toISOString(),
    track: { id: entry.track.id, title: entry.track.title, artist: entry.track.artist },
    source: entry.source,
    action: entry.action,
  });
}

export function deserializeEntry(line: string): HistoryEntry | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const parsed = entrySchema.safeParse(raw);
  if (!parsed.success) return null;
  const { timestamp, track, source, action } = parsed.data;
  return Object.freeze({
    timestamp: new Date(timestamp),
    track: resolvedTrack(track.id, track.title, track.artist),
    source,
    action,
  });
}

/** Append-only JSON Lines file, one history entry per line. */
export class JsonlHistoryStore implements HistoryStore {
  constructor(public readonly location: string) {}

  async load(): Promise<HistoryEntry[]> {
    let text: string;
    try {
      text = await fs.readFile(this.location, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw new PersistenceFailure(`Cannot read history: ${errorMessage(error)}`, this.location);
    }

    const entries: HistoryEntry[] = [];
    let skipped = 0;
    for (const line of text.split('\n')) {
      if (!line.trim()) continue;
      const entry = deserializeEntry(line);
      if (entry) {
        entries.push(entry);
      } else {
        skipped++;
      }
    }
    if (skipped > 0) {
      log.warn({ file: this.location, skipped }, 'Skipped malformed history lines');
    }
    return entries;
  }

  async append(entry: HistoryEntry): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.location), { recursive: true });
      await fs.appendFile(this.location, `${serializeEntry(entry)}\n`, 'utf8');
    } catch (error) {
      throw new PersistenceFailure(`Cannot append history: ${errorMessage(error)}`, this.location);
    }
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
