/**
 * @file input.ts
 * @description Keyboard input from a terminal.
 *
 * Terminals report key presses but never key releases.  InputManager keeps
 * two collections:
 *
 *   held         key → ticks it still counts as held; refreshed by every
 *                press (and by the terminal's key repeat), counted down by
 *                flush()
 *   justPressed  KEY_DOWN events since the last poll; drained by poll()
 *
 * Ctrl-C becomes a QUIT event, since raw mode stops the terminal from
 * turning it into SIGINT.
 */

import { emitKeypressEvents, type Key } from 'node:readline';
import type { InputFrame, InputSource, RawEvent } from './types.js';

/** Ticks a key stays held after its last press or repeat. */
export const HOLD_TICKS = 4;

export class InputManager implements InputSource
{
  private held        = new Map<string, number>();
  private justPressed: RawEvent[] = [];

  private stream: NodeJS.ReadStream | null = null;
  private readonly onKeypress = (_str: string | undefined, key: Key | undefined): void =>
  {
    this.press(key);
  };

  /**
   * @method attach
   * @description Starts listening to `stream`, in raw mode when it is a TTY.
   */
  attach(stream: NodeJS.ReadStream = process.stdin): void
  {
    if (this.stream) return;

    emitKeypressEvents(stream);
    if (stream.isTTY) stream.setRawMode(true);
    stream.on('keypress', this.onKeypress);
    stream.resume();
    this.stream = stream;
  }

  /** Stops listening and gives the terminal back. */
  detach(): void
  {
    const stream = this.stream;
    if (!stream) return;

    stream.off('keypress', this.onKeypress);
    if (stream.isTTY) stream.setRawMode(false);
    stream.pause();
    this.stream = null;
  }

  /** Records one key press as reported by readline. */
  press(key: Key | undefined): void
  {
    const name = key?.name;
    if (!key || !name) return;

    if (key.ctrl && name === 'c')
    {
      this.justPressed.push({ type: 'QUIT' });
      return;
    }

    this.held.set(name, HOLD_TICKS);
    this.justPressed.push({ type: 'KEY_DOWN', key: name });
  }

  isDown(key: string): boolean
  {
    return this.held.has(key);
  }

  poll(): InputFrame
  {
    const frame: InputFrame = {
      keys:   [...this.held.keys()],
      mouse:  [],
      events: this.justPressed,
    };
    this.flush();
    return frame;
  }

  /** Ages the held keys by one tick and clears this tick's presses. */
  flush(): void
  {
    this.justPressed = [];
    for (const [key, ticks] of this.held)
    {
      if (ticks <= 1) this.held.delete(key);
      else            this.held.set(key, ticks - 1);
    }
  }
}
