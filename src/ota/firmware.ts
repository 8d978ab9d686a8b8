/**
 * Firmware image checks run before any transfer.
 */

import { InvalidFirmwareImageError } from '../exceptions';
import { FIRMWARE_IMAGE_MAGIC } from '../protocol/constants';

/**
 * Reject images that do not start with the bootloader magic byte.
 *
 * @throws {InvalidFirmwareImageError}
 */
export function validateFirmwareImage(image: Uint8Array): void {
  if (image.length === 0) {
    throw new InvalidFirmwareImageError('Firmware image is empty');
  }
  if (image[0] !== FIRMWARE_IMAGE_MAGIC) {
    throw new InvalidFirmwareImageError(
      `Firmware image starts with 0x${image[0].toString(16).toUpperCase().padStart(2, '0')}, ` +
        `expected 0x${FIRMWARE_IMAGE_MAGIC.toString(16).toUpperCase()}`
    );
  }
}
