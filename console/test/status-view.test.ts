import { PassThrough } from 'node:stream';
import { describe, it, expect, vi } from 'vitest';
import { resolvedTrack } from '@autodj/dj';
import { createSessionState } from '../src/session/session-state.js';
import { formatDuration, formatStatus, progressBar, TerminalStatusView, type StatusModel } from '../src/ui/status-view.js';

const seville = resolvedTrack('sev', 'Seville', 'Pinback');

function model(overrides: Partial<StatusModel> = {}): StatusModel {
  return {
    session: createSessionState(),
    autoDj: 'disabled',
    cooldownEndsAt: null,
    upNext: [],
    mystery: 'off',
    now: 0,
    ...overrides,
  };
}

describe('status view', () => {
  it('formats durations and progress', () => {
    expect(formatDuration(65_400)).toBe('1:05');
    expect(progressBar(0.5, 10)).toBe('[#####-----]');
    expect(progressBar(Number.NaN, 4)).toBe('[----]');
  });

  it('renders the playing track, Auto-DJ state and up next', () => {
    const session = createSessionState();
    session.playback = { track: seville, isPlaying: true, progressMs: 60_000, durationMs: 240_000, volumePercent: 40 };
    session.statusLine = 'Auto-DJ on';
    session.djMessage = 'A slow one';

    const lines = formatStatus(
      model({ session, autoDj: 'cooldown', cooldownEndsAt: 4_500, now: 1_000, upNext: [resolvedTrack('p', 'Penelope', 'Pinback')] }),
    );

    expect(lines).toEqual([
      '> Seville by Pinback',
      '[#####---------------] 1:00 / 4:00',
      'Auto-DJ: on (cooling down) 4s | Volume: 40%',
      'Mode: smart | Mystery: off',
      'Up next:',
      '  1. Penelope by Pinback',
      '',
      'DJ: A slow one',
      '',
      'Auto-DJ on',
    ]);
  });

  it('keeps the mystery pick secret in the up-next list', () => {
    const session = createSessionState();
    session.queueMode = 'playlist';
    const lines = formatStatus(
      model({
        session,
        mystery: 'awaiting choice',
        upNext: [resolvedTrack('p', 'Penelope', 'Pinback'), seville],
        hiddenTrackId: 'sev',
      }),
    );

    expect(lines.slice(1, 6)).toEqual([
      'Auto-DJ: off',
      'Mode: playlist | Mystery: awaiting choice',
      'Up next:',
      '  1. Penelope by Pinback',
      '  2. mystery pick',
    ]);
  });

  it('shows the key help when toggled', () => {
    const session = createSessionState();
    session.showHelp = true;
    const lines = formatStatus(model({ session }));
    expect(lines[0]).toBe('Nothing playing');
    expect(lines).toContain('  1       toggle Auto-DJ');
  });

  it('redraws only on change', () => {
    const output = new PassThrough();
    const write = vi.spyOn(output, 'write');
    const view = new TerminalStatusView(output);

    view.render(model());
    view.render(model());
    view.render(model({ autoDj: 'idle' }));

    expect(write).toHaveBeenCalledTimes(2);
  });
});
