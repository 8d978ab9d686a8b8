/**
 * Key action and key configuration models.
 */

export const MAX_TEXT_BYTES = 8;
export const MAX_ACTIONS_PER_KEY = 10;
export const LONG_PRESS_OFFSET = 100;

/** Type UTF-8 text (at most 8 bytes on the wire). */
export interface TextAction {
  kind: 'text';
  text: string;
  delayMs: number;
}

/** Press a HID keycode with a modifier mask. */
export interface HidAction {
  kind: 'hid';
  keycode: number;
  modifiers: number;
  delayMs: number;
}

/** Consumer control (media/system) usage code. */
export interface ConsumerAction {
  kind: 'consumer';
  code: number;
  delayMs: number;
}

/** Latch or release modifiers until toggled again. */
export interface ModifierToggleAction {
  kind: 'modifierToggle';
  mask: number;
  delayMs: number;
}

/** Action handled on the device itself (e.g. scanner trigger). */
export interface HardwareKeyAction {
  kind: 'hardware';
  actionId: number;
  /** 0-255; the wire carries a single byte. */
  param: number;
  delayMs: number;
}

export type KeyAction =
  | TextAction
  | HidAction
  | ConsumerAction
  | ModifierToggleAction
  | HardwareKeyAction;

export type KeyActionKind = KeyAction['kind'];

export interface KeyConfig {
  keyId: number;
  enabled: boolean;
  actions: KeyAction[];
}

/**
 * Complete keyboard layout, keyed by key ID.
 */
export type FullKeyboardConfig = ReadonlyMap<number, readonly KeyAction[]>;

export function textAction(text: string, delayMs: number = 10): TextAction {
  return { kind: 'text', text, delayMs };
}

export function hidAction(keycode: number, modifiers: number = 0, delayMs: number = 10): HidAction {
  return { kind: 'hid', keycode, modifiers, delayMs };
}

export function consumerAction(code: number, delayMs: number = 10): ConsumerAction {
  return { kind: 'consumer', code, delayMs };
}

export function modifierToggleAction(mask: number, delayMs: number = 0): ModifierToggleAction {
  return { kind: 'modifierToggle', mask, delayMs };
}

export function hardwareAction(actionId: number, param: number = 0, delayMs: number = 0): HardwareKeyAction {
  return { kind: 'hardware', actionId, param, delayMs };
}

// ---------------------------------------------------------------------------
// Key IDs: 0-15 matrix, 16-19 buttons, 100-115 matrix long press
// ---------------------------------------------------------------------------

export function isShortPress(keyId: number): boolean {
  return Number.isInteger(keyId) && keyId >= 0 && keyId <= 15;
}

export function isButton(keyId: number): boolean {
  return Number.isInteger(keyId) && keyId >= 16 && keyId <= 19;
}

export function isLongPress(keyId: number): boolean {
  return Number.isInteger(keyId) && keyId >= 100 && keyId <= 115;
}

export function isValidKeyId(keyId: number): boolean {
  return isShortPress(keyId) || isButton(keyId) || isLongPress(keyId);
}

/**
 * Long-press counterpart of a matrix key, or `null` for buttons.
 */
export function toLongPress(keyId: number): number | null {
  return isShortPress(keyId) ? keyId + LONG_PRESS_OFFSET : null;
}

export function toBaseKey(keyId: number): number {
  return isLongPress(keyId) ? keyId - LONG_PRESS_OFFSET : keyId;
}

/**
 * All valid key IDs in ascending order.
 */
export const ALL_KEY_IDS: readonly number[] = [
  ...Array.from({ length: 20 }, (_, i) => i),
  ...Array.from({ length: 16 }, (_, i) => i + LONG_PRESS_OFFSET),
];

const BUTTON_NAMES: Record<number, string> = {
  16: 'Scan Trigger Double-Press',
  17: 'Scan Trigger Long-Press',
  18: 'Power Button Single-Press',
  19: 'Power Button Double-Press',
};

/**
 * Human readable key name, e.g. `Key [2,1]` or `Key [0,3] Long Press`.
 */
export function keyName(keyId: number): string {
  if (isButton(keyId)) {
    return BUTTON_NAMES[keyId];
  }
  if (isShortPress(keyId) || isLongPress(keyId)) {
    const base = toBaseKey(keyId);
    const label = `Key [${Math.floor(base / 4)},${base % 4}]`;
    return isLongPress(keyId) ? `${label} Long Press` : label;
  }
  return `Key ${keyId}`;
}
