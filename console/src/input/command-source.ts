import { emitKeypressEvents } from 'node:readline';
import { createChildLogger } from '@autodj/logger';
import { commandForKey, type Command, type Keypress } from './keymap.js';

const log = createChildLogger({ component: 'commands' });

export type KeyInput = NodeJS.ReadableStream & {
  isTTY?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/** Non-blocking source of commands, polled once per loop iteration. */
export interface CommandSource {
  drain(): Command[];
  /** Number of mystery options the digit keys currently pick from. */
  setChoiceCount(count: number): void;
  /**
   * Captures the following keys as a line of text instead of commands.
   * Resolves on enter, or with null on escape or close.
   */
  readLine(onInput?: (text: string) => void): Promise<string | null>;
  close(): void;
}

interface LineCapture {
  text: string;
  onInput?: (text: string) => void;
  resolve: (line: string | null) => void;
}

/**
 * Turns raw keypresses into commands. Commands buffer until drained, or are
 * handed out one by one through async iteration. The sequence cannot be
 * restarted: once closed, or once iterated, it stays that way.
 */
export class KeypressCommandSource implements CommandSource, AsyncIterable<Command> {
  private readonly buffer: Command[] = [];
  private waiter: ((result: IteratorResult<Command>) => void) | null = null;
  private started = false;
  private closed = false;
  private iterated = false;
  private choiceCount = 0;
  private capture: LineCapture | null = null;

  private readonly onKeypress = (_chunk: string | undefined, key: Keypress | undefined): void => {
    if (this.capture) {
      this.captureKey(this.capture, key ?? {});
      return;
    }
    const command = commandForKey(key ?? {}, this.choiceCount);
    if (!command) return;
    log.info({ command }, 'Command received');
    this.push(command);
  };

  constructor(private readonly input: KeyInput) {}

  start(): this {
    if (this.started || this.closed) return this;
    this.started = true;
    emitKeypressEvents(this.input);
    if (this.input.isTTY) {
      this.input.setRawMode?.(true);
    }
    this.input.on('keypress', this.onKeypress);
    this.input.resume();
    return this;
  }

  drain(): Command[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  setChoiceCount(count: number): void {
    this.choiceCount = count;
  }

  readLine(onInput?: (text: string) => void): Promise<string | null> {
    this.endCapture(null);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.capture = onInput ? { text: '', onInput, resolve } : { text: '', resolve };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.input.off('keypress', this.onKeypress);
    if (this.started && this.input.isTTY) {
      this.input.setRawMode?.(false);
    }
    this.input.pause();
    this.endCapture(null);
    this.waiter?.({ done: true, value: undefined });
    this.waiter = null;
  }

  [Symbol.asyncIterator](): AsyncIterator<Command> {
    if (this.iterated) {
      throw new Error('Command source can only be iterated once');
    }
    this.iterated = true;
    return {
      next: () => {
        const command = this.buffer.shift();
        if (command !== undefined) {
          return Promise.resolve({ done: false, value: command });
        }
        if (this.closed) {
          return Promise.resolve({ done: true, value: undefined });
        }
        return new Promise((resolve) => {
          this.waiter = resolve;
        });
      },
    };
  }

  private captureKey(capture: LineCapture, key: Keypress): void {
    if (key.ctrl && key.name === 'c') {
      this.endCapture(null);
      this.push('quit');
      return;
    }
    switch (key.name) {
      case 'return':
      case 'enter':
        this.endCapture(capture.text.trim());
        return;
      case 'escape':
        this.endCapture(null);
        return;
      case 'backspace':
        capture.text = capture.text.slice(0, -1);
        break;
      default:
        if (key.ctrl || key.meta || key.sequence === undefined || !/^[^\x00-\x1f\x7f]$/u.test(key.sequence)) return;
        capture.text += key.sequence;
    }
    capture.onInput?.(capture.text);
  }

  private endCapture(line: string | null): void {
    const capture = this.capture;
    this.capture = null;
    capture?.resolve(line);
  }

  private push(command: Command): void {
    if (this.closed) return;
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ done: false, value: command });
      return;
    }
    this.buffer.push(command);
  }
}
