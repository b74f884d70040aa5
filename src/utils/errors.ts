/**
 * Error taxonomy for the scheduler.
 *
 * Probe-path errors never leave a worker; they are converted into a channel
 * status. The classes exist so callers and logs can tell the kinds apart.
 */

/**
 * The stream resolver failed or returned incomplete data. Recoverable: the
 * channel is retried on its normal cadence.
 */
export class ResolutionError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'ResolutionError';
  }
}

/**
 * Free space under the recording directory is below the configured threshold.
 * New recording sessions are suspended until it recovers.
 */
export class DiskSpaceExhaustedError extends Error {
  constructor(
    public readonly path: string,
    public readonly thresholdGb: number
  ) {
    super(`Free disk space under ${path} is below ${thresholdGb} GB; new recordings are suspended.`);
    this.name = 'DiskSpaceExhaustedError';
  }
}

/**
 * A channel snapshot could not be written. In-memory state stays authoritative.
 */
export class PersistenceFailureError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'PersistenceFailureError';
  }
}

/**
 * A channel patch contained unknown keys or invalid values.
 */
export class ChannelPatchError extends Error {
  constructor(
    public readonly channelId: string,
    public readonly issues: string[]
  ) {
    super(`Invalid patch for channel ${channelId}:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ChannelPatchError';
  }
}

/**
 * A new channel's configuration failed validation.
 */
export class InvalidChannelConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid channel configuration:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'InvalidChannelConfigError';
  }
}

export class DuplicateChannelError extends Error {
  constructor(public readonly channelId: string) {
    super(`Channel already registered: ${channelId}`);
    this.name = 'DuplicateChannelError';
  }
}

export class ChannelNotFoundError extends Error {
  constructor(public readonly channelId: string) {
    super(`Channel not found: ${channelId}`);
    this.name = 'ChannelNotFoundError';
  }
}

/**
 * Normalise an unknown thrown value into a message for logs and statuses.
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
