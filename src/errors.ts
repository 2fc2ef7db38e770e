/**
 * @file errors.ts
 * @description Error types raised by Pong Trainer.
 *
 * The simulation itself has no recoverable errors: degenerate geometry and
 * cooldown gating are resolved where they happen.  What remains is a fatal
 * sanity check and invalid startup configuration.
 */

/**
 * @class InvariantViolation
 * @description A state the game should never reach.  The run loop stops
 *              on it instead of trying to continue.
 */
export class InvariantViolation extends Error
{
  constructor(message: string, readonly details: Record<string, unknown> = {})
  {
    super(message);
    this.name = 'InvariantViolation';
  }
}

/**
 * @class ConfigError
 * @description The environment did not describe a valid configuration.
 */
export class ConfigError extends Error
{
  constructor(message: string, readonly issues: string[])
  {
    super(`${message}: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}
