import { describe, it, expect, vi } from 'vitest';
import { TrackNotFound } from '../src/errors.js';
import { CatalogTrackResolver } from '../src/resolver.js';
import { resolvedTrack, type ResolvedTrack } from '../src/types.js';

function catalog(hits: ResolvedTrack[]) {
  return { search: vi.fn(async (_title: string, _artist: string, _limit?: number) => hits) };
}

describe('CatalogTrackResolver', () => {
  it('returns the first relevant hit', async () => {
    const playback = catalog([
      resolvedTrack('x1', 'Seville', 'Some Cover Band'),
      resolvedTrack('x2', 'Seville - 2011 Remaster', 'Pinback'),
    ]);
    const resolver = new CatalogTrackResolver(playback);

    const result = await resolver.resolve({ title: 'Seville', artist: 'Pinback' });

    expect(result).toEqual({ success: true, data: { id: 'x2', title: 'Seville - 2011 Remaster', artist: 'Pinback' } });
    expect(playback.search).toHaveBeenCalledWith('Seville', 'Pinback', 5);
  });

  it('is idempotent for an unchanged catalog', async () => {
    const resolver = new CatalogTrackResolver(catalog([resolvedTrack('x2', 'Seville', 'Pinback')]));
    const candidate = { title: 'Seville', artist: 'Pinback' };

    const first = await resolver.resolve(candidate);
    const second = await resolver.resolve(candidate);

    expect(first.success && second.success && first.data.id === second.data.id).toBe(true);
  });

  it('reports NotFound when nothing clears the relevance bar', async () => {
    const resolver = new CatalogTrackResolver(catalog([resolvedTrack('x3', 'Penelope', 'Slint')]));

    const result = await resolver.resolve({ title: 'Seville', artist: 'Pinback' });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(TrackNotFound);
      expect(result.error.message).toBe('No catalog match for "Seville" by Pinback');
    }
  });

  it('rejects a hit that matches on title alone', async () => {
    const resolver = new CatalogTrackResolver(catalog([resolvedTrack('x4', 'Seville', 'Some Cover Band')]));

    const result = await resolver.resolve({ title: 'Seville', artist: 'Pinback' });

    expect(result.success).toBe(false);
  });

  it('reports NotFound for an empty search', async () => {
    const resolver = new CatalogTrackResolver(catalog([]));
    expect((await resolver.resolve({ title: 'Seville', artist: 'Pinback' })).success).toBe(false);
  });
});
