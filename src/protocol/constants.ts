/**
 * Protocol constants for ScanPad devices.
 */

export const STATUS_SUCCESS = 0x00;
export const DEFAULT_COMMAND_TIMEOUT_MS = 5000;

// Key action wire layout
export const ACTION_HEADER_SIZE = 6; // [index][type][value][mask][delay_lo][delay_hi]

// Full configuration container
export const CONTAINER_MAGIC = new Uint8Array([0x47, 0x59, 0x57]); // "GYW"
export const CONTAINER_VERSION = 0x01;
export const CONTAINER_ACTION_TEXT = 0;
export const CONTAINER_ACTION_HID = 1;

// Offline fragments
export const MAX_FRAGMENTS = 99;
export const DEFAULT_COMPRESSION_LEVEL = 6;

// Firmware images must start with the bootloader magic byte
export const FIRMWARE_IMAGE_MAGIC = 0xe9;

/**
 * Config domain commands (key configuration characteristic).
 */
export enum ConfigCommand {
  SET_KEY_CONFIG = 0x10,
  GET_KEY_CONFIG = 0x11,
  CLEAR_KEY_CONFIG = 0x12,
  SET_KEY_ENABLED = 0x13,

  GET_ALL_CONFIGS = 0x20,
  SAVE_CONFIG = 0x21,
  FACTORY_RESET = 0x22,
}

/**
 * Device domain commands (LED, buzzer, settings, power, OTA, scripts, system).
 */
export enum DeviceCommand {
  // LED control
  LED_SET_STATE = 0x10,
  LED_GET_STATE = 0x11,
  LED_START_BLINK = 0x12,
  LED_STOP_BLINK = 0x13,
  LED_ALL_OFF = 0x14,
  LED_SET_PATTERN = 0x15,
  LED_GET_CONFIG = 0x16,

  // Buzzer
  BUZZER_BEEP = 0x20,
  BUZZER_MELODY = 0x21,
  BUZZER_SET_CONFIG = 0x22,
  BUZZER_GET_CONFIG = 0x23,
  BUZZER_STOP = 0x24,
  BUZZER_TEST = 0x25,

  // Device settings
  SET_ORIENTATION = 0x40,
  GET_ORIENTATION = 0x41,
  SET_LANGUAGE = 0x42,
  GET_LANGUAGE = 0x43,

  // Power management
  POWER_SET_AUTO_SHUTDOWN = 0x50,
  POWER_GET_AUTO_SHUTDOWN = 0x51,
  POWER_SET_ACTIVITY_TIMEOUT = 0x52,
  POWER_GET_ACTIVITY_TIMEOUT = 0x53,
  POWER_RESET_ACTIVITY_TIMER = 0x54,
  POWER_GET_STATUS = 0x55,

  // Firmware update
  OTA_CHECK_VERSION = 0x60,
  OTA_START = 0x61,
  OTA_GET_STATUS = 0x62,
  OTA_CANCEL = 0x63,
  OTA_GET_PROGRESS = 0x64,

  // On-device scripts
  SCRIPT_DEPLOY = 0x68,
  SCRIPT_GET_INFO = 0x69,
  SCRIPT_CLEAR = 0x6a,

  // System
  SYSTEM_RESTART = 0x70,
  SYSTEM_SHUTDOWN = 0x71,
  SYSTEM_GET_INFO = 0x72,
  SYSTEM_GET_UPTIME = 0x73,
}
