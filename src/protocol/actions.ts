/**
 * Key action codec.
 *
 * Each action is a 6-byte header followed, for text actions only, by a
 * length-prefixed UTF-8 trailer:
 *
 *   [index][type][value][mask][delay_lo][delay_hi] ([len][utf8:len])
 */

import {
  InvalidFrameError,
  InvalidParameterError,
  InvalidUtf8Error,
  TextTooLongError,
  TruncatedFrameError,
} from '../exceptions';
import { toHex, toHexDump } from '../encoding/bytes';
import {
  type KeyAction,
  type KeyConfig,
  MAX_ACTIONS_PER_KEY,
  MAX_TEXT_BYTES,
  isValidKeyId,
} from '../models/actions';
import { ActionType } from '../models/enums';
import { ACTION_HEADER_SIZE } from './constants';
import { decodeHeader, ensureSuccess } from './responses';

const utf8Encoder = new TextEncoder();
const strictUtf8Decoder = new TextDecoder('utf-8', { fatal: true });

export interface DecodedAction {
  action: KeyAction;
  nextOffset: number;
}

export interface TruncatedText {
  bytes: Uint8Array;
  /** Byte length of the input before truncation. */
  originalLength: number;
  truncated: boolean;
}

/**
 * UTF-8 encode text, keeping at most 8 bytes.
 *
 * The cut is made at exactly 8 bytes even when it splits a multi-byte
 * character, so the result is identical for identical input.
 */
export function truncateUtf8(text: string): TruncatedText {
  const encoded = utf8Encoder.encode(text);
  if (encoded.length <= MAX_TEXT_BYTES) {
    return { bytes: encoded, originalLength: encoded.length, truncated: false };
  }
  return {
    bytes: encoded.slice(0, MAX_TEXT_BYTES),
    originalLength: encoded.length,
    truncated: true,
  };
}

function checkByte(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new InvalidParameterError(name, value, 'must be 0-255');
  }
}

function checkWord(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
    throw new InvalidParameterError(name, value, 'must be 0-65535');
  }
}

/**
 * Validate the ranges of an action without encoding it.
 *
 * @throws {InvalidParameterError} If any field is out of range
 */
export function validateAction(action: KeyAction): void {
  checkWord('delayMs', action.delayMs);
  switch (action.kind) {
    case 'text':
      break;
    case 'hid':
      checkByte('keycode', action.keycode);
      checkByte('modifiers', action.modifiers);
      break;
    case 'consumer':
      checkWord('code', action.code);
      break;
    case 'modifierToggle':
      checkByte('mask', action.mask);
      break;
    case 'hardware':
      checkByte('actionId', action.actionId);
      // Only the mask byte is available for the parameter
      checkByte('param', action.param);
      break;
  }
}

/**
 * Encode one action at position `index` within its key.
 *
 * Text longer than 8 UTF-8 bytes is truncated and a warning is logged.
 *
 * @throws {InvalidParameterError} If a field is out of range
 */
export function encodeAction(action: KeyAction, index: number): Uint8Array {
  checkByte('index', index);
  validateAction(action);

  let type: ActionType;
  let value = 0;
  let mask = 0;
  let trailer: Uint8Array | null = null;

  switch (action.kind) {
    case 'text': {
      const { bytes, originalLength, truncated } = truncateUtf8(action.text);
      if (truncated) {
        console.warn(
          `Text action truncated from ${originalLength} to ${bytes.length} bytes: '${action.text}'`
        );
      }
      type = ActionType.TEXT;
      trailer = bytes;
      break;
    }
    case 'hid':
      type = ActionType.HID;
      value = action.keycode;
      mask = action.modifiers;
      break;
    case 'consumer':
      type = ActionType.CONSUMER;
      value = action.code & 0xff;
      mask = (action.code >> 8) & 0xff;
      break;
    case 'modifierToggle':
      type = ActionType.MODIFIER_TOGGLE;
      mask = action.mask;
      break;
    case 'hardware':
      type = ActionType.HARDWARE;
      value = action.actionId;
      mask = action.param;
      break;
  }

  const size = ACTION_HEADER_SIZE + (trailer ? 1 + trailer.length : 0);
  const buffer = new ArrayBuffer(size);
  const view = new DataView(buffer);
  view.setUint8(0, index);
  view.setUint8(1, type);
  view.setUint8(2, value);
  view.setUint8(3, mask);
  view.setUint16(4, action.delayMs, true);

  const result = new Uint8Array(buffer);
  if (trailer) {
    view.setUint8(ACTION_HEADER_SIZE, trailer.length);
    result.set(trailer, ACTION_HEADER_SIZE + 1);
  }
  return result;
}

/**
 * Decode one action starting at `offset`.
 *
 * @throws {TruncatedFrameError} If the header or text trailer is cut short
 * @throws {TextTooLongError} If the text length byte exceeds 8
 * @throws {InvalidUtf8Error} If text bytes do not decode; carries `nextOffset`
 * @throws {InvalidFrameError} On an unknown type tag
 */
export function decodeAction(bytes: Uint8Array, offset: number): DecodedAction {
  if (bytes.length - offset < ACTION_HEADER_SIZE) {
    throw new TruncatedFrameError(
      `Action at offset ${offset} needs ${ACTION_HEADER_SIZE} bytes, ` +
        `${Math.max(bytes.length - offset, 0)} remain`
    );
  }

  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const type = view.getUint8(offset + 1);
  const value = view.getUint8(offset + 2);
  const mask = view.getUint8(offset + 3);
  const delayMs = view.getUint16(offset + 4, true);
  let next = offset + ACTION_HEADER_SIZE;

  switch (type) {
    case ActionType.TEXT: {
      if (next >= bytes.length) {
        throw new TruncatedFrameError(`Text action at offset ${offset} has no length byte`);
      }
      const length = bytes[next];
      next += 1;
      if (length > MAX_TEXT_BYTES) {
        throw new TextTooLongError(length);
      }
      if (next + length > bytes.length) {
        throw new TruncatedFrameError(
          `Text action at offset ${offset} declares ${length} bytes, ${bytes.length - next} remain`
        );
      }
      const textBytes = bytes.slice(next, next + length);
      next += length;
      let text: string;
      try {
        text = strictUtf8Decoder.decode(textBytes);
      } catch {
        throw new InvalidUtf8Error(textBytes, next);
      }
      return { action: { kind: 'text', text, delayMs }, nextOffset: next };
    }
    case ActionType.HID:
      return {
        action: { kind: 'hid', keycode: value, modifiers: mask, delayMs },
        nextOffset: next,
      };
    case ActionType.CONSUMER:
      return {
        action: { kind: 'consumer', code: value | (mask << 8), delayMs },
        nextOffset: next,
      };
    case ActionType.HARDWARE:
      return {
        action: { kind: 'hardware', actionId: value, param: mask, delayMs },
        nextOffset: next,
      };
    case ActionType.MODIFIER_TOGGLE:
      return {
        action: { kind: 'modifierToggle', mask, delayMs },
        nextOffset: next,
      };
    default:
      throw new InvalidFrameError(`Unknown action type 0x${type.toString(16)} at offset ${offset}`);
  }
}

/**
 * Validate a key configuration before it is sent.
 *
 * @throws {InvalidParameterError}
 */
export function validateKeyConfig(keyId: number, actions: readonly KeyAction[]): void {
  if (!isValidKeyId(keyId)) {
    throw new InvalidParameterError('keyId', keyId, 'must be 0-19 or 100-115');
  }
  if (actions.length > MAX_ACTIONS_PER_KEY) {
    throw new InvalidParameterError(
      'actions',
      actions.length,
      `at most ${MAX_ACTIONS_PER_KEY} actions per key`
    );
  }
  for (const action of actions) {
    validateAction(action);
  }
}

export interface KeyConfigInput {
  keyId: number;
  actions: readonly KeyAction[];
}

/**
 * SET_KEY_CONFIG payload: `[key_id][count]` followed by the encoded actions.
 */
export function encodeKeyConfigPayload(config: KeyConfigInput): Uint8Array {
  const { keyId, actions } = config;
  validateKeyConfig(keyId, actions);

  const encoded = actions.map((action, index) => encodeAction(action, index));
  const total = 2 + encoded.reduce((sum, part) => sum + part.length, 0);
  const payload = new Uint8Array(total);
  payload[0] = keyId;
  payload[1] = actions.length;

  let offset = 2;
  for (const part of encoded) {
    payload.set(part, offset);
    offset += part.length;
  }
  return payload;
}

export interface DecodeIssue {
  actionIndex: number;
  message: string;
}

export interface DecodedKeyConfig extends KeyConfig {
  /** Recoverable per-action problems, with placeholders substituted. */
  issues: DecodeIssue[];
}

/**
 * Parse a GET_KEY_CONFIG response:
 * `[status][cmd][key_id][enabled][count]` followed by the actions.
 *
 * Undecodable text in a single action is replaced by an
 * `<INVALID_UTF8_hex>` placeholder and reported in `issues`; every other
 * error propagates.
 */
export function parseKeyConfigResponse(raw: Uint8Array): DecodedKeyConfig {
  ensureSuccess(decodeHeader(raw));

  if (raw.length < 5) {
    throw new TruncatedFrameError(`Key config response too short: ${raw.length} bytes`);
  }

  console.debug(`Key config response: ${toHexDump(raw)}`);

  const keyId = raw[2];
  const enabled = raw[3] === 1;
  const count = raw[4];
  const actions: KeyAction[] = [];
  const issues: DecodeIssue[] = [];

  let offset = 5;
  for (let i = 0; i < count; i++) {
    try {
      const decoded = decodeAction(raw, offset);
      actions.push(decoded.action);
      offset = decoded.nextOffset;
    } catch (error) {
      if (!(error instanceof InvalidUtf8Error)) {
        throw error;
      }
      const placeholder = `<INVALID_UTF8_${toHex(error.bytes).toLowerCase()}>`;
      console.warn(`Key ${keyId} action ${i}: invalid UTF-8 text, using ${placeholder}`);
      actions.push({
        kind: 'text',
        text: placeholder,
        delayMs: raw[offset + 4] | (raw[offset + 5] << 8),
      });
      issues.push({ actionIndex: i, message: error.message });
      offset = error.nextOffset;
    }
  }

  return { keyId, enabled, actions, issues };
}
