import { describe, it, expect, vi } from 'vitest';
import { MysteryCrate } from '../src/autoplay/mystery-crate.js';
import { TrackQueuer } from '../src/autoplay/track-queuer.js';
import { UpNext } from '../src/autoplay/up-next.js';
import { TrackNotFound } from '../src/errors.js';
import { HistoryLog } from '../src/history/history-log.js';
import type { CompletionBackend } from '../src/recommendation/engine.js';
import type { TrackResolver } from '../src/resolver.js';
import { fail, ok, resolvedTrack, type TrackCandidate } from '../src/types.js';

const current = resolvedTrack('now', 'Now', 'Artist');

const crate = JSON.stringify({
  options: [
    { track_name: 'Song A', artist_name: 'Artist A' },
    { track_name: 'Song B', artist_name: 'Artist B' },
    { track_name: 'Song C', artist_name: 'Artist C' },
    { track_name: 'Song D', artist_name: 'Artist D' },
    { track_name: 'Song E', artist_name: 'Artist E' },
  ],
  selected_index: 2,
});

const resolver: TrackResolver = {
  resolve: async (candidate: TrackCandidate) =>
    candidate.title === 'Song D'
      ? fail(new TrackNotFound(candidate.title, candidate.artist))
      : ok(resolvedTrack(`uri:${candidate.title}`, candidate.title, candidate.artist)),
};

function setup(response: string = crate) {
  const complete = vi.fn<CompletionBackend['complete']>(async () => response);
  const enqueue = vi.fn(async (_trackId: string): Promise<void> => undefined);
  const history = new HistoryLog();
  const upNext = new UpNext();
  const queuer = new TrackQueuer({ resolver, history, playback: { enqueue }, upNext }, 10);
  const mystery = new MysteryCrate({ assistant: { complete }, resolver, queuer });
  return { mystery, complete, enqueue, upNext, history };
}

describe('MysteryCrate', () => {
  it('does nothing while off', async () => {
    const { mystery, complete } = setup();

    expect(await mystery.deal({ current, recent: [] })).toEqual({ kind: 'discarded' });
    expect(complete).not.toHaveBeenCalled();
  });

  it('queues the secret pick and lists every option', async () => {
    const { mystery, complete, enqueue, upNext } = setup();
    mystery.toggle();

    const outcome = await mystery.deal({ current, recent: [] });

    expect(outcome.kind).toBe('dealt');
    expect(complete).toHaveBeenCalledWith(
      'mystery_crate',
      { song_name: 'Now', artist_name: 'Artist', recent_tracks: '- (none)' },
      { signal: undefined },
    );
    expect(enqueue.mock.calls).toEqual([['uri:Song B']]);
    expect(mystery.hiddenPickId).toBe('uri:Song B');
    expect(upNext.consume(resolvedTrack('uri:Song B', 'Song B', 'Artist B'))).toBe('auto');
    expect(mystery.awaitingChoice).toBe(true);
    expect(mystery.choiceCount).toBe(5);
    expect(mystery.display()).toBe(
      [
        'Mystery crate picks:',
        '1. Song A by Artist A',
        '2. Song B by Artist B',
        '3. Song C by Artist C',
        '4. Song D by Artist D (unavailable)',
        '5. Song E by Artist E',
        'Press 1-5 to choose the next track',
      ].join('\n'),
    );
  });

  it('hands out the chosen track and closes the round', async () => {
    const { mystery } = setup();
    mystery.toggle();
    await mystery.deal({ current, recent: [] });

    expect(mystery.choose(4)).toEqual({ success: false, error: 'Selected track is unavailable' });
    expect(mystery.choose(6)).toEqual({ success: false, error: 'Invalid selection' });
    expect(mystery.choose(3)).toEqual({ success: true, data: resolvedTrack('uri:Song C', 'Song C', 'Artist C') });
    expect(mystery.awaitingChoice).toBe(false);
    expect(mystery.choose(1)).toEqual({ success: false, error: 'No mystery selection pending' });
  });

  it('reports a response it cannot read', async () => {
    const { mystery, enqueue } = setup('no idea');
    mystery.toggle();

    const outcome = await mystery.deal({ current, recent: [] });

    expect(outcome.kind).toBe('failed');
    expect(enqueue).not.toHaveBeenCalled();
    expect(mystery.awaitingChoice).toBe(false);
  });

  it('does not queue a pick that is already playing', async () => {
    const { mystery, enqueue } = setup();
    mystery.toggle();

    await mystery.deal({ current: resolvedTrack('uri:Song B', 'Song B', 'Artist B'), recent: [] });

    expect(enqueue).not.toHaveBeenCalled();
    expect(mystery.hiddenPickId).toBeNull();
    expect(mystery.choiceCount).toBe(5);
  });

  it('drops a round that finishes after being toggled off', async () => {
    const { mystery, complete, enqueue } = setup();
    let answer: (text: string) => void = () => undefined;
    complete.mockImplementationOnce(
      () =>
        new Promise<string>((resolve) => {
          answer = resolve;
        }),
    );
    mystery.toggle();

    const round = mystery.deal({ current, recent: [] });
    mystery.toggle();
    answer(crate);

    expect(await round).toEqual({ kind: 'discarded' });
    expect(enqueue).not.toHaveBeenCalled();
    expect(mystery.awaitingChoice).toBe(false);
  });
});
