import { formatTrack, type AutoDjState, type ResolvedTrack } from '@autodj/dj';
import { KEY_HELP } from '../input/keymap.js';
import type { SessionState } from '../session/session-state.js';

export type MysteryStatus = 'off' | 'on' | 'awaiting choice';

export interface StatusModel {
  session: SessionState;
  autoDj: AutoDjState;
  cooldownEndsAt: number | null;
  upNext: readonly ResolvedTrack[];
  mystery: MysteryStatus;
  /** Queued mystery pick to keep secret in the up-next list. */
  hiddenTrackId?: string | null;
  now: number;
}

const AUTO_DJ_LABELS: Record<AutoDjState, string> = {
  disabled: 'off',
  idle: 'on',
  fetching: 'on (picking the next song)',
  cooldown: 'on (cooling down)',
};

export function formatDuration(milliseconds: number): string {
  const totalSeconds = Math.max(0, Math.floor(milliseconds / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${seconds.toString().padStart(2, '0')}`;
}

export function progressBar(progress: number, length: number = 20): string {
  const ratio = Number.isFinite(progress) ? Math.min(1, Math.max(0, progress)) : 0;
  const filled = Math.round(ratio * length);
  return `[${'#'.repeat(filled)}${'-'.repeat(length - filled)}]`;
}

export function formatStatus(model: StatusModel): string[] {
  const { session, upNext } = model;
  const lines: string[] = [];
  const playback = session.playback;

  if (playback) {
    const icon = playback.isPlaying ? '>' : '||';
    lines.push(`${icon} ${formatTrack(playback.track)}`);
    lines.push(
      `${progressBar(playback.progressMs / playback.durationMs)} ${formatDuration(playback.progressMs)} / ${formatDuration(playback.durationMs)}`,
    );
  } else {
    lines.push('Nothing playing');
  }

  const volume = session.volume ?? playback?.volumePercent;
  let autoDj = `Auto-DJ: ${AUTO_DJ_LABELS[model.autoDj]}`;
  if (model.autoDj === 'cooldown' && model.cooldownEndsAt !== null) {
    autoDj += ` ${Math.max(0, Math.ceil((model.cooldownEndsAt - model.now) / 1000))}s`;
  }
  lines.push(volume == null ? autoDj : `${autoDj} | Volume: ${volume}%`);
  lines.push(`Mode: ${session.queueMode} | Mystery: ${model.mystery}`);

  if (upNext.length > 0) {
    lines.push('Up next:');
    upNext.slice(0, 3).forEach((track, index) => {
      const label = track.id === model.hiddenTrackId ? 'mystery pick' : formatTrack(track);
      lines.push(`  ${index + 1}. ${label}`);
    });
    if (upNext.length > 3) {
      lines.push(`  ...and ${upNext.length - 3} more`);
    }
  }

  if (session.djMessage) {
    lines.push('', `DJ: ${session.djMessage}`);
  }
  lines.push('', session.statusLine);

  if (session.showHelp) {
    lines.push('');
    for (const [keys, action] of KEY_HELP) {
      lines.push(`  ${keys.padEnd(7)} ${action}`);
    }
  }
  return lines;
}

export interface StatusView {
  render(model: StatusModel): void;
}

/** Redraws the terminal only when the text changed. */
export class TerminalStatusView implements StatusView {
  private last = '';

  constructor(private readonly output: NodeJS.WritableStream = process.stdout) {}

  render(model: StatusModel): void {
    const text = formatStatus(model).join('\n');
    if (text === this.last) return;
    this.last = text;
    this.output.write(`\x1b[2J\x1b[H${text}\n`);
  }
}
