/**
 * Enums for ScanPad protocol and device settings.
 */

/**
 * Logical command/response channel on the bearer.
 *
 * Both domains share the command-ID numbering space; the same ID means
 * different things on each.
 */
export enum Domain {
  CONFIG = 'config',
  DEVICE = 'device',
}

/**
 * Wire type tag of a key action.
 */
export enum ActionType {
  TEXT = 0,
  HID = 1,
  CONSUMER = 2,
  HARDWARE = 3,
  MODIFIER_TOGGLE = 4,
}

/**
 * Typed response payload tags.
 */
export enum ResponseType {
  UINT8 = 0x01,
  UINT16 = 0x02,
  STRUCT = 0x05,
}

/**
 * Indicator LEDs.
 */
export enum Led {
  GREEN_1 = 1,
  RED = 2,
  GREEN_2 = 3,
  BLUE = 4,
  YELLOW = 5,
  CYAN = 6,
  MAGENTA = 7,
  WHITE = 8,
  GREEN_3 = 9,
}

/**
 * Built-in buzzer melodies.
 */
export enum BuzzerMelody {
  KEY = 1,
  START = 2,
  STOP = 3,
  NOTIF_UP = 4,
  NOTIF_DOWN = 5,
  CONFIRM = 6,
  WARNING = 7,
  ERROR = 8,
  SUCCESS = 9,
}

/**
 * Device orientation.
 */
export enum Orientation {
  NORMAL = 0,
  RIGHT = 1,
  INVERTED = 2,
  LEFT = 3,
}

/**
 * Hardware action IDs for `hardware` key actions.
 */
export enum HardwareAction {
  SCAN_TRIGGER = 20,
}

/**
 * HID modifier bits.
 */
export enum HidModifier {
  LEFT_CTRL = 0x01,
  LEFT_SHIFT = 0x02,
  LEFT_ALT = 0x04,
  LEFT_GUI = 0x08,
  RIGHT_CTRL = 0x10,
  RIGHT_SHIFT = 0x20,
  RIGHT_ALT = 0x40,
  RIGHT_GUI = 0x80,
}

/**
 * Firmware update state as reported by the device.
 */
export enum OtaState {
  IDLE = 0,
  CHECKING = 1,
  DOWNLOADING = 2,
  INSTALLING = 3,
  SUCCESS = 4,
  ERROR = 5,
}
