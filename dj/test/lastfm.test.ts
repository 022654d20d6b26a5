import { describe, it, expect } from 'vitest';
import { DisabledScrobbler, LastFmScrobbler, signLastFmParams } from '../src/services/lastfm.js';
import { resolvedTrack } from '../src/types.js';
import { fakeTransport } from './support/transport.js';

const credentials = { apiKey: 'test-api-key', apiSecret: 'test-secret', sessionKey: 'test-session' };
const seville = resolvedTrack('sev', 'Seville', 'Pinback, Guest');

function body(data: unknown): Record<string, string> {
  return Object.fromEntries(new URLSearchParams(typeof data === 'string' ? data : ''));
}

describe('signLastFmParams', () => {
  it('hashes sorted name/value pairs with the secret and skips format', () => {
    const params = {
      track: 'Seville',
      artist: 'Pinback',
      method: 'track.updateNowPlaying',
      api_key: 'test-api-key',
      sk: 'test-session',
      format: 'json',
    };
    expect(signLastFmParams(params, 'test-secret')).toBe('6e5194955cabec06f36a5d97731fa3fa');
  });
});

describe('LastFmScrobbler', () => {
  it('submits now playing for the primary artist', async () => {
    const transport = fakeTransport(() => ({ status: 200, data: {} }));
    const scrobbler = new LastFmScrobbler(credentials, { adapter: transport.adapter });

    scrobbler.submitNowPlaying(seville);
    await scrobbler.settle();

    expect(body(transport.requests[0]?.data)).toEqual({
      artist: 'Pinback',
      track: 'Seville',
      method: 'track.updateNowPlaying',
      api_key: 'test-api-key',
      sk: 'test-session',
      api_sig: '6e5194955cabec06f36a5d97731fa3fa',
      format: 'json',
    });
  });

  it('scrobbles with the start time in seconds', async () => {
    const transport = fakeTransport(() => ({ status: 200, data: {} }));
    const scrobbler = new LastFmScrobbler(credentials, { adapter: transport.adapter });

    scrobbler.scrobble(seville, new Date('2026-01-02T03:04:05.900Z'));
    await scrobbler.settle();

    const sent = body(transport.requests[0]?.data);
    expect(sent.method).toBe('track.scrobble');
    expect(sent.timestamp).toBe(String(Date.UTC(2026, 0, 2, 3, 4, 5) / 1000));
  });

  it('swallows failures', async () => {
    const transport = fakeTransport(() => ({ status: 500 }));
    const scrobbler = new LastFmScrobbler(credentials, { adapter: transport.adapter });

    scrobbler.submitNowPlaying(seville);

    await expect(scrobbler.settle()).resolves.toBeUndefined();
    expect(transport.requests).toHaveLength(1);
  });

  it('does nothing when disabled', async () => {
    const scrobbler = new DisabledScrobbler();
    scrobbler.submitNowPlaying();
    await expect(scrobbler.settle()).resolves.toBeUndefined();
  });
});
