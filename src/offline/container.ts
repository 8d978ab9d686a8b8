/**
 * Full keyboard configuration container (`$FULL:<base64>$`).
 *
 * Binary body before compression:
 *
 *   "GYW" [version] [key_count]
 *   per key, ascending ID: [key_id] [action_count] actions...
 *     text: [0][len][delay] utf8...
 *     hid:  [1][keycode][modifiers][delay]
 *
 * Only text and HID actions are representable; the delay is one byte.
 */

import {
  BadMagicError,
  InvalidParameterError,
  TextTooLongError,
  TruncatedFrameError,
  UnsupportedActionInContainerError,
  UnsupportedVersionError,
} from '../exceptions';
import { fromBase64, toBase64, toHex } from '../encoding/bytes';
import { compressPayload, decompressPayload } from '../encoding/compression';
import type { FullKeyboardConfig, KeyAction } from '../models/actions';
import { MAX_ACTIONS_PER_KEY, MAX_TEXT_BYTES, isButton, isShortPress } from '../models/actions';
import { truncateUtf8 } from '../protocol/actions';
import {
  CONTAINER_ACTION_HID,
  CONTAINER_ACTION_TEXT,
  CONTAINER_MAGIC,
  CONTAINER_VERSION,
  DEFAULT_COMPRESSION_LEVEL,
} from '../protocol/constants';
import { unwrapFrame } from './frames';

export const FULL_CONFIG_PREFIX = '$FULL:';

export interface ContainerIssue {
  keyId: number;
  actionIndex: number;
  message: string;
}

export interface DecodedFullConfig {
  keys: Map<number, KeyAction[]>;
  /** Text actions whose bytes were not valid UTF-8, replaced by placeholders. */
  issues: ContainerIssue[];
}

const strictUtf8Decoder = new TextDecoder('utf-8', { fatal: true });

function checkContainerKey(keyId: number, actions: readonly KeyAction[]): void {
  // Long-press IDs cannot be expressed in the container
  if (!isShortPress(keyId) && !isButton(keyId)) {
    throw new InvalidParameterError('keyId', keyId, 'container keys must be 0-19');
  }
  if (actions.length === 0) {
    throw new InvalidParameterError('actions', 0, `key ${keyId} must have at least one action`);
  }
  if (actions.length > MAX_ACTIONS_PER_KEY) {
    throw new InvalidParameterError(
      'actions',
      actions.length,
      `key ${keyId} has more than ${MAX_ACTIONS_PER_KEY} actions`
    );
  }
}

function checkDelay(keyId: number, delayMs: number): void {
  if (!Number.isInteger(delayMs) || delayMs < 0 || delayMs > 0xff) {
    throw new InvalidParameterError('delayMs', delayMs, `key ${keyId}: container delay must be 0-255`);
  }
}

function encodeContainerAction(keyId: number, action: KeyAction): number[] {
  switch (action.kind) {
    case 'text': {
      checkDelay(keyId, action.delayMs);
      const { bytes, originalLength, truncated } = truncateUtf8(action.text);
      if (truncated) {
        console.warn(`Key ${keyId}: text truncated from ${originalLength} to ${bytes.length} bytes`);
      }
      return [CONTAINER_ACTION_TEXT, bytes.length, action.delayMs, ...bytes];
    }
    case 'hid':
      checkDelay(keyId, action.delayMs);
      if (!Number.isInteger(action.keycode) || action.keycode < 0 || action.keycode > 0xff) {
        throw new InvalidParameterError('keycode', action.keycode, 'must be 0-255');
      }
      if (!Number.isInteger(action.modifiers) || action.modifiers < 0 || action.modifiers > 0xff) {
        throw new InvalidParameterError('modifiers', action.modifiers, 'must be 0-255');
      }
      return [CONTAINER_ACTION_HID, action.keycode, action.modifiers, action.delayMs];
    default:
      throw new UnsupportedActionInContainerError(keyId, action.kind);
  }
}

/**
 * Serialize the uncompressed container body.
 */
export function buildContainerBody(config: FullKeyboardConfig): Uint8Array {
  if (config.size === 0) {
    throw new InvalidParameterError('config', 0, 'keyboard configuration cannot be empty');
  }

  const keyIds = [...config.keys()].sort((a, b) => a - b);
  const body: number[] = [...CONTAINER_MAGIC, CONTAINER_VERSION, keyIds.length];

  for (const keyId of keyIds) {
    const actions = config.get(keyId) ?? [];
    checkContainerKey(keyId, actions);
    body.push(keyId, actions.length);
    for (const action of actions) {
      body.push(...encodeContainerAction(keyId, action));
    }
  }

  return Uint8Array.from(body);
}

/**
 * Encode a full keyboard configuration as `$FULL:<base64>$`.
 *
 * @param config - Actions per key ID (0-19)
 * @param compressionLevel - zlib level 1-9
 * @throws {InvalidParameterError} On an empty config or key, too many actions,
 *   an invalid key ID or an out-of-range field
 * @throws {UnsupportedActionInContainerError} For consumer, modifier-toggle
 *   or hardware actions
 */
export function encodeFullConfig(
  config: FullKeyboardConfig,
  compressionLevel: number = DEFAULT_COMPRESSION_LEVEL
): string {
  const body = buildContainerBody(config);
  const compressed = compressPayload(body, compressionLevel);
  const text = `${FULL_CONFIG_PREFIX}${toBase64(compressed)}$`;

  console.log(
    `Full config: ${config.size} keys, ${body.length} bytes -> ${text.length} chars`
  );
  return text;
}

/**
 * Parse the uncompressed container body.
 */
export function parseContainerBody(body: Uint8Array): DecodedFullConfig {
  if (body.length < CONTAINER_MAGIC.length + 2) {
    throw new TruncatedFrameError(`Container header needs 5 bytes, got ${body.length}`);
  }

  const magic = body.subarray(0, CONTAINER_MAGIC.length);
  if (!magic.every((byte, i) => byte === CONTAINER_MAGIC[i])) {
    throw new BadMagicError(magic.slice());
  }
  const version = body[3];
  if (version !== CONTAINER_VERSION) {
    throw new UnsupportedVersionError(version);
  }

  const keyCount = body[4];
  const keys = new Map<number, KeyAction[]>();
  const issues: ContainerIssue[] = [];
  let offset = 5;

  const need = (n: number, what: string): void => {
    if (offset + n > body.length) {
      throw new TruncatedFrameError(
        `Container truncated reading ${what} at offset ${offset}: need ${n}, have ${body.length - offset}`
      );
    }
  };

  for (let k = 0; k < keyCount; k++) {
    need(2, 'key header');
    const keyId = body[offset];
    const actionCount = body[offset + 1];
    offset += 2;

    const actions: KeyAction[] = [];
    for (let i = 0; i < actionCount; i++) {
      need(1, 'action type');
      const type = body[offset];

      if (type === CONTAINER_ACTION_TEXT) {
        need(3, 'text header');
        const length = body[offset + 1];
        const delayMs = body[offset + 2];
        offset += 3;
        if (length > MAX_TEXT_BYTES) {
          throw new TextTooLongError(length);
        }
        need(length, 'text');
        const textBytes = body.slice(offset, offset + length);
        offset += length;
        try {
          actions.push({ kind: 'text', text: strictUtf8Decoder.decode(textBytes), delayMs });
        } catch {
          const placeholder = `<INVALID_UTF8_${toHex(textBytes).toLowerCase()}>`;
          console.warn(`Key ${keyId} action ${i}: invalid UTF-8 text, using ${placeholder}`);
          actions.push({ kind: 'text', text: placeholder, delayMs });
          issues.push({ keyId, actionIndex: i, message: 'Text payload is not valid UTF-8' });
        }
      } else if (type === CONTAINER_ACTION_HID) {
        need(4, 'HID action');
        actions.push({
          kind: 'hid',
          keycode: body[offset + 1],
          modifiers: body[offset + 2],
          delayMs: body[offset + 3],
        });
        offset += 4;
      } else {
        throw new UnsupportedActionInContainerError(keyId, `type ${type}`);
      }
    }
    keys.set(keyId, actions);
  }

  return { keys, issues };
}

/**
 * Decode a `$FULL:<base64>$` text frame.
 *
 * @throws {InvalidFrameError} If the envelope or base64 is malformed
 * @throws {CorruptCompressedDataError} If the zlib stream is damaged
 * @throws {BadMagicError}
 * @throws {UnsupportedVersionError}
 * @throws {TruncatedFrameError}
 */
export function decodeFullConfig(text: string): DecodedFullConfig {
  const encoded = unwrapFrame(text, FULL_CONFIG_PREFIX);
  const body = decompressPayload(fromBase64(encoded));
  return parseContainerBody(body);
}
