import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createChildLogger } from '@autodj/logger';
import { UpstreamUnavailable } from '../errors.js';

const log = createChildLogger({ component: 'lyrics' });

export const LRCLIB_API_URL = 'https://lrclib.net/api';

const lyricsSchema = z.object({
  plainLyrics: z.string().nullish(),
  syncedLyrics: z.string().nullish(),
  instrumental: z.boolean().optional(),
});

export interface LyricsAdapter {
  /** Lyrics text, or null when the service has none for the song. */
  fetch(title: string, artist: string): Promise<string | null>;
}

/** Drops `[mm:ss.xx]` timing tags from synced lyrics. */
export function stripTimestamps(synced: string): string {
  return synced
    .split('\n')
    .map((line) => line.replace(/^(\[\d{1,2}:\d{2}(?:[.:]\d{1,3})?\]\s*)+/, '').trimEnd())
    .join('\n')
    .trim();
}

export class LrclibLyricsAdapter implements LyricsAdapter {
  private readonly http: AxiosInstance;

  constructor(options: { adapter?: AxiosAdapter } = {}) {
    this.http = axios.create({ baseURL: LRCLIB_API_URL, adapter: options.adapter, timeout: 10_000 });
  }

  async fetch(title: string, artist: string): Promise<string | null> {
    let data: unknown;
    try {
      const response = await this.http.get('/get', { params: { track_name: title, artist_name: artist } });
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response?.status === 404) {
        log.debug({ title, artist }, 'No lyrics found');
        return null;
      }
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new UpstreamUnavailable('Lyrics service request failed', 'lyrics', status);
    }

    const parsed = lyricsSchema.safeParse(data);
    if (!parsed.success || parsed.data.instrumental) {
      return null;
    }
    const plain = parsed.data.plainLyrics?.trim();
    if (plain) {
      return plain;
    }
    const synced = parsed.data.syncedLyrics;
    return synced ? stripTimestamps(synced) || null : null;
  }
}
