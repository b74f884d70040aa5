/**
 * Disk-space gate
 *
 * Global switch for starting new recording sessions. While free space under
 * the recording directory is below the threshold, probes keep running but
 * no session starts; running sessions are left alone.
 */

import type { DiskSpaceGuard } from '../types/collaborators.js';
import { DiskSpaceExhaustedError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.diskSpace;

export interface DiskSpaceGateOptions {
  guard: DiskSpaceGuard;
  recordingDir: string;
  /** 0 disables the check */
  thresholdGb: number;
  onChange?: (enabled: boolean) => void;
}

export class DiskSpaceGate {
  private enabled = true;

  constructor(private readonly options: DiskSpaceGateOptions) {}

  get recordingEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Re-check free space. A failing guard leaves the previous state in place.
   */
  async refresh(dir: string = this.options.recordingDir): Promise<boolean> {
    let below: boolean;
    try {
      below = await this.options.guard.freeSpaceBelow(this.options.thresholdGb, dir);
    } catch (error) {
      log.warn('Free-space check failed; keeping previous state', {
        path: dir,
        recordingEnabled: this.enabled,
        error: String(error),
      });
      return this.enabled;
    }

    this.set(!below, dir);
    return this.enabled;
  }

  private set(enabled: boolean, dir: string): void {
    if (enabled === this.enabled) {
      return;
    }
    this.enabled = enabled;

    if (enabled) {
      log.info('Free space recovered; recording re-enabled', { path: dir });
    } else {
      log.error('Recording disabled', { error: new DiskSpaceExhaustedError(dir, this.options.thresholdGb) });
    }
    this.options.onChange?.(enabled);
  }
}
