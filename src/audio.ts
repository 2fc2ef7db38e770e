/**
 * @file audio.ts
 * @description AudioManager.  The terminal build has no sound output, so
 *              playback requests are only recorded and logged.
 */

import type { Logger } from 'pino';
import type { AudioSink } from './types.js';

export class AudioManager implements AudioSink
{
  private readonly log: Logger;
  private current: string | null = null;

  constructor(logger: Logger)
  {
    this.log = logger.child({ component: 'audio' });
  }

  /** Track currently looping, if any. */
  get playing(): string | null
  {
    return this.current;
  }

  playLoop(track: string): void
  {
    this.current = track;
    this.log.debug({ track }, 'loop requested');
  }
}
