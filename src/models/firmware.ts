/**
 * Firmware and update status data structures.
 */

import type { OtaState } from './enums';

/**
 * Update status snapshot returned by the OTA status command.
 */
export interface OtaStatus {
  /**
   * Device-side update state
   */
  state: OtaState;

  /**
   * Progress percentage (0-100)
   */
  progress: number;
}
