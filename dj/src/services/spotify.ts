import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { z } from 'zod';
import { createChildLogger } from '@autodj/logger';
import { UpstreamUnavailable, withRetry } from '../errors.js';
import { KeyedMutex } from '../keyedMutex.js';
import type { PlaybackAdapter, PlaybackSnapshot } from '../playback.js';
import { resolvedTrack, type ResolvedTrack } from '../types.js';

const log = createChildLogger({ component: 'spotify' });

export const SPOTIFY_API_BASE = 'https://api.spotify.com/v1';
export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token';

// Refresh a little before the service would reject the token.
const EXPIRY_MARGIN_MS = 60_000;

const tokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
});

const trackSchema = z.object({
  id: z.string(),
  name: z.string(),
  duration_ms: z.number(),
  artists: z.array(z.object({ name: z.string() })),
});

const searchSchema = z.object({
  tracks: z.object({ items: z.array(trackSchema) }),
});

const playerSchema = z.object({
  is_playing: z.boolean(),
  progress_ms: z.number().nullable(),
  item: trackSchema.nullable(),
  device: z.object({ volume_percent: z.number().nullable() }).nullish(),
});

type SpotifyTrack = z.infer<typeof trackSchema>;

export interface SpotifyCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export interface SpotifyAdapterOptions {
  /** Transport override, used by tests. */
  adapter?: AxiosAdapter;
  mutex?: KeyedMutex;
  now?: () => number;
}

function toResolved(track: SpotifyTrack): ResolvedTrack {
  return resolvedTrack(track.id, track.name, track.artists.map((artist) => artist.name).join(', '));
}

function describeStatus(status: number | undefined): string {
  switch (status) {
    case undefined:
      return 'Spotify is unreachable';
    case 401:
      return 'Spotify rejected the credentials';
    case 403:
      return 'Spotify refused the request (Premium required?)';
    case 404:
      return 'No active Spotify device found';
    case 429:
      return 'Spotify rate limit hit';
    default:
      return `Spotify request failed with HTTP ${status}`;
  }
}

function toUpstream(error: unknown, action: string): UpstreamUnavailable {
  if (error instanceof UpstreamUnavailable) {
    return error;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return new UpstreamUnavailable(`${describeStatus(status)} (${action})`, 'spotify', status);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new UpstreamUnavailable(`Spotify ${action} failed: ${message}`, 'spotify');
}

/**
 * Spotify Web API playback adapter. Holds a refresh token and exchanges it
 * for access tokens on demand; every public verb throws UpstreamUnavailable
 * on failure.
 */
export class SpotifyPlaybackAdapter implements PlaybackAdapter {
  private readonly api: AxiosInstance;
  private readonly accounts: AxiosInstance;
  private readonly mutex: KeyedMutex;
  private readonly now: () => number;
  private token: { value: string; expiresAt: number } | null = null;

  constructor(
    private readonly credentials: SpotifyCredentials,
    options: SpotifyAdapterOptions = {},
  ) {
    this.mutex = options.mutex ?? new KeyedMutex();
    this.now = options.now ?? Date.now;
    this.accounts = axios.create({ adapter: options.adapter, timeout: 10_000 });
    this.api = axios.create({ baseURL: SPOTIFY_API_BASE, adapter: options.adapter, timeout: 10_000 });

    this.api.interceptors.request.use(async (config) => {
      config.headers.set('Authorization', `Bearer ${await this.accessToken()}`);
      return config;
    });
  }

  async search(title: string, artist: string, limit: number = 5): Promise<ResolvedTrack[]> {
    const queries = [`track:"${title}" artist:"${artist}"`, `track:${title} artist:${artist}`];
    for (const q of queries) {
      const response = await this.call('search', () =>
        this.api.get('/search', { params: { q, type: 'track', limit } }),
      );
      const parsed = searchSchema.safeParse(response.data);
      if (!parsed.success) {
        throw new UpstreamUnavailable('Unexpected search response from Spotify', 'spotify');
      }
      if (parsed.data.tracks.items.length > 0) {
        return parsed.data.tracks.items.map(toResolved);
      }
    }
    return [];
  }

  async enqueue(trackId: string): Promise<void> {
    await this.call('enqueue', () =>
      this.api.post('/me/player/queue', null, { params: { uri: `spotify:track:${trackId}` } }),
    );
  }

  async play(trackId?: string): Promise<void> {
    const body = trackId === undefined ? undefined : { uris: [`spotify:track:${trackId}`] };
    await this.call('play', () => this.api.put('/me/player/play', body));
  }

  async pause(): Promise<void> {
    await this.call('pause', () => this.api.put('/me/player/pause'));
  }

  async skip(): Promise<void> {
    await this.call('skip', () => this.api.post('/me/player/next'));
  }

  async previous(): Promise<void> {
    await this.call('previous', () => this.api.post('/me/player/previous'));
  }

  async seek(positionMs: number): Promise<void> {
    const position_ms = Math.max(0, Math.round(positionMs));
    await this.call('seek', () => this.api.put('/me/player/seek', null, { params: { position_ms } }));
  }

  async setVolume(percent: number): Promise<void> {
    const volume_percent = Math.min(100, Math.max(0, Math.round(percent)));
    await this.call('volume', () => this.api.put('/me/player/volume', null, { params: { volume_percent } }));
  }

  async currentlyPlaying(): Promise<PlaybackSnapshot | null> {
    const response = await this.call('player state', () => this.api.get('/me/player'));
    if (response.status === 204 || response.data === '' || response.data == null) {
      return null;
    }
    const parsed = playerSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new UpstreamUnavailable('Unexpected player state from Spotify', 'spotify');
    }
    const { item, is_playing, progress_ms, device } = parsed.data;
    if (!item) {
      return null;
    }
    return {
      track: toResolved(item),
      isPlaying: is_playing,
      progressMs: progress_ms ?? 0,
      durationMs: item.duration_ms,
      volumePercent: device?.volume_percent ?? null,
    };
  }

  /** Runs a request, retrying it once with a fresh token after a 401. */
  private async call<T>(action: string, request: () => Promise<T>): Promise<T> {
    try {
      try {
        return await request();
      } catch (error) {
        if (!axios.isAxiosError(error) || error.response?.status !== 401) {
          throw error;
        }
        this.token = null;
        log.info({ action }, 'Spotify access token rejected, refreshing');
        return await request();
      }
    } catch (error) {
      const upstream = toUpstream(error, action);
      log.warn({ action, status: upstream.status }, upstream.message);
      throw upstream;
    }
  }

  private async accessToken(): Promise<string> {
    // Concurrent requests share a single refresh.
    return this.mutex.run('spotify-token', async () => {
      if (this.token && this.token.expiresAt - EXPIRY_MARGIN_MS > this.now()) {
        return this.token.value;
      }
      const token = await withRetry(() => this.refresh(), 2, 500, 'spotify token refresh');
      this.token = token;
      return token.value;
    });
  }

  private async refresh(): Promise<{ value: string; expiresAt: number }> {
    const { clientId, clientSecret, refreshToken } = this.credentials;
    const body = new URLSearchParams({ grant_type: 'refresh_token', refresh_token: refreshToken });
    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64');

    let data: unknown;
    try {
      const response = await this.accounts.post(SPOTIFY_TOKEN_URL, body.toString(), {
        headers: {
          Authorization: `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
      });
      data = response.data;
    } catch (error) {
      throw toUpstream(error, 'token refresh');
    }

    const parsed = tokenSchema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamUnavailable('Spotify token response was malformed', 'spotify');
    }
    log.debug({ expiresIn: parsed.data.expires_in }, 'Spotify access token refreshed');
    return {
      value: parsed.data.access_token,
      expiresAt: this.now() + parsed.data.expires_in * 1000,
    };
  }
}
