/** Picks an option of the open mystery crate round. */
export type ChoiceCommand = 'choose-1' | 'choose-2' | 'choose-3' | 'choose-4' | 'choose-5';

export const CHOICE_COMMANDS: readonly ChoiceCommand[] = ['choose-1', 'choose-2', 'choose-3', 'choose-4', 'choose-5'];

export type Command =
  | 'toggle-auto-dj'
  | 'play-pause'
  | 'skip'
  | 'previous'
  | 'restart'
  | 'volume-up'
  | 'volume-down'
  | 'request-suggestion'
  | 'queue-ten'
  | 'queue-playlist'
  | 'theme-playlist'
  | 'toggle-queue-mode'
  | 'toggle-mystery'
  | 'explain-lyrics'
  | 'song-insight'
  | 'like'
  | 'dislike'
  | 'cancel'
  | 'help'
  | 'quit'
  | ChoiceCommand;

/** Shape of the `key` argument of readline keypress events. */
export interface Keypress {
  sequence?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
}

const BY_SEQUENCE: Readonly<Record<string, Command>> = {
  '1': 'toggle-auto-dj',
  ' ': 'play-pause',
  n: 'skip',
  p: 'previous',
  r: 'restart',
  '+': 'volume-up',
  '=': 'volume-up',
  '-': 'volume-down',
  '2': 'request-suggestion',
  '3': 'queue-ten',
  '4': 'queue-playlist',
  '5': 'theme-playlist',
  t: 'toggle-queue-mode',
  m: 'toggle-mystery',
  '7': 'explain-lyrics',
  '6': 'song-insight',
  s: 'like',
  d: 'dislike',
  c: 'cancel',
  '?': 'help',
  q: 'quit',
  '0': 'quit',
};

const BY_NAME: Readonly<Record<string, Command>> = {
  space: 'play-pause',
  right: 'skip',
  left: 'previous',
  up: 'volume-up',
  down: 'volume-down',
};

/**
 * While a mystery round offers `choiceCount` options, the digits 1 up to
 * that count pick an option instead of their usual command.
 */
export function commandForKey(key: Keypress, choiceCount: number = 0): Command | null {
  if (key.ctrl) {
    return key.name === 'c' ? 'quit' : null;
  }
  if (key.meta) {
    return null;
  }
  if (key.sequence !== undefined && /^[1-9]$/.test(key.sequence)) {
    const choice = Number(key.sequence);
    if (choice <= choiceCount) {
      const command = CHOICE_COMMANDS[choice - 1];
      if (command) return command;
    }
  }
  if (key.name !== undefined && BY_NAME[key.name]) {
    return BY_NAME[key.name] ?? null;
  }
  return key.sequence === undefined ? null : (BY_SEQUENCE[key.sequence] ?? null);
}

export const KEY_HELP: ReadonlyArray<readonly [keys: string, action: string]> = [
  ['1', 'toggle Auto-DJ'],
  ['space', 'play / pause'],
  ['→ / n', 'skip'],
  ['← / p', 'previous'],
  ['r', 'restart track'],
  ['↑ / +', 'volume up'],
  ['↓ / -', 'volume down'],
  ['2', 'queue a suggested song'],
  ['3', 'queue 10 songs'],
  ['4', 'queue a 15-song playlist'],
  ['5', 'queue a theme playlist'],
  ['t', 'toggle smart / playlist mode'],
  ['m', 'toggle mystery crate'],
  ['1-5', 'pick a mystery option'],
  ['6', 'song insight'],
  ['7', 'explain lyrics'],
  ['s', 'like'],
  ['d', 'dislike and skip'],
  ['c', 'cancel request'],
  ['?', 'help'],
  ['q / 0', 'quit'],
];
