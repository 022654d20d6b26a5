import { createHash } from 'node:crypto';
import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { createChildLogger } from '@autodj/logger';
import { describeError } from '../errors.js';
import type { ResolvedTrack } from '../types.js';

const log = createChildLogger({ component: 'lastfm' });

export const LASTFM_API_URL = 'https://ws.audioscrobbler.com/2.0/';

export interface ScrobbleAdapter {
  submitNowPlaying(track: ResolvedTrack): void;
  scrobble(track: ResolvedTrack, startedAt: Date): void;
  /** Resolves once every submission started so far has settled. */
  settle(): Promise<void>;
}

export interface LastFmCredentials {
  apiKey: string;
  apiSecret: string;
  sessionKey: string;
}

/**
 * Request signature: parameters sorted by name, concatenated as name+value,
 * followed by the shared secret, md5-hashed. `format` is not signed.
 */
export function signLastFmParams(params: Record<string, string>, secret: string): string {
  const payload = Object.keys(params)
    .filter((key) => key !== 'format')
    .sort()
    .map((key) => `${key}${params[key] ?? ''}`)
    .join('');
  return createHash('md5').update(payload + secret, 'utf8').digest('hex');
}

// Only the first artist of a joined credit is known to Last.fm.
function primaryArtist(track: ResolvedTrack): string {
  return track.artist.split(', ')[0] ?? track.artist;
}

/** Fire-and-forget Last.fm client. Failures are logged and never rethrown. */
export class LastFmScrobbler implements ScrobbleAdapter {
  private readonly http: AxiosInstance;
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly credentials: LastFmCredentials,
    options: { adapter?: AxiosAdapter } = {},
  ) {
    this.http = axios.create({ baseURL: LASTFM_API_URL, adapter: options.adapter, timeout: 10_000 });
  }

  submitNowPlaying(track: ResolvedTrack): void {
    this.submit('track.updateNowPlaying', { artist: primaryArtist(track), track: track.title });
  }

  scrobble(track: ResolvedTrack, startedAt: Date): void {
    this.submit('track.scrobble', {
      artist: primaryArtist(track),
      track: track.title,
      timestamp: String(Math.floor(startedAt.getTime() / 1000)),
    });
  }

  async settle(): Promise<void> {
    await Promise.allSettled([...this.pending]);
  }

  private submit(method: string, fields: Record<string, string>): void {
    const params: Record<string, string> = {
      ...fields,
      method,
      api_key: this.credentials.apiKey,
      sk: this.credentials.sessionKey,
    };
    params.api_sig = signLastFmParams(params, this.credentials.apiSecret);
    params.format = 'json';

    const request = this.http
      .post('', new URLSearchParams(params).toString(), {
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      })
      .then(() => {
        log.debug({ method, track: fields.track }, 'Last.fm call succeeded');
      })
      .catch((error: unknown) => {
        log.warn({ method, error: describeError(error) }, 'Last.fm call failed');
      })
      .finally(() => {
        this.pending.delete(request);
      });
    this.pending.add(request);
  }
}

/** Used when Last.fm credentials are not configured. */
export class DisabledScrobbler implements ScrobbleAdapter {
  submitNowPlaying(): void {}

  scrobble(): void {}

  async settle(): Promise<void> {}
}
