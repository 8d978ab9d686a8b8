/**
 * Response frame decoding and typed accessors.
 */

import {
  DeviceRejectedError,
  InvalidFrameError,
  ShortFrameError,
  TruncatedFrameError,
} from '../exceptions';
import { OtaState, ResponseType } from '../models/enums';
import type { OtaStatus } from '../models/firmware';
import { STATUS_SUCCESS } from './constants';

/**
 * Decoded response frame.
 *
 * Wire format: `[status][echoed_cmd]` optionally followed by
 * `[type_tag][count][data:count]`.
 */
export interface Response {
  status: number;
  echoedCommandId?: number;
  typeTag?: number;
  count?: number;
  data: Uint8Array;
  raw: Uint8Array;
}

export interface ResponseHeader {
  status: number;
  echoedCommandId?: number;
}

/**
 * Read only `[status][echoed_cmd]`.
 *
 * Some responses (key config, firmware version) carry an untyped body
 * after the header; those are parsed from the frame directly.
 */
export function decodeHeader(bytes: Uint8Array): ResponseHeader {
  if (bytes.length < 1) {
    throw new TruncatedFrameError('Empty response frame');
  }
  return bytes.length >= 2
    ? { status: bytes[0], echoedCommandId: bytes[1] }
    : { status: bytes[0] };
}

/**
 * Decode a response notification.
 *
 * @param bytes - Notification payload
 * @throws {TruncatedFrameError} If the frame is empty
 * @throws {ShortFrameError} If fewer data bytes are present than `count` declares
 */
export function decodeResponse(bytes: Uint8Array): Response {
  if (bytes.length < 1) {
    throw new TruncatedFrameError('Empty response frame');
  }

  const response: Response = {
    status: bytes[0],
    data: new Uint8Array(0),
    raw: bytes,
  };

  if (bytes.length >= 2) {
    response.echoedCommandId = bytes[1];
  }

  if (bytes.length >= 4) {
    const count = bytes[3];
    const available = bytes.length - 4;
    if (available < count) {
      throw new ShortFrameError(count, available);
    }
    response.typeTag = bytes[2];
    response.count = count;
    response.data = bytes.subarray(4, 4 + count);
  }

  return response;
}

/**
 * Throw unless the response reports success.
 *
 * @throws {DeviceRejectedError} If status is nonzero
 */
export function ensureSuccess(response: ResponseHeader): void {
  if (response.status !== STATUS_SUCCESS) {
    throw new DeviceRejectedError(response.status, response.echoedCommandId);
  }
}

/**
 * Accept a plain acknowledgement.
 */
export function parseEmpty(response: Response): void {
  ensureSuccess(response);
}

/**
 * Read a UINT8 response: value at fixed offset 4.
 */
export function parseUint8(response: Response): number {
  ensureSuccess(response);
  if (response.typeTag !== ResponseType.UINT8 || response.data.length < 1) {
    throw new InvalidFrameError(
      `Expected UINT8 response, got type ${describeType(response.typeTag)} ` +
        `with ${response.data.length} data bytes`
    );
  }
  return response.data[0];
}

/**
 * Read a UINT16 (little-endian) response.
 */
export function parseUint16(response: Response): number {
  ensureSuccess(response);
  if (response.typeTag !== ResponseType.UINT16 || response.data.length < 2) {
    throw new InvalidFrameError(
      `Expected UINT16 response, got type ${describeType(response.typeTag)} ` +
        `with ${response.data.length} data bytes`
    );
  }
  return response.data[0] | (response.data[1] << 8);
}

/**
 * Read a STRUCT response of exactly `expectedCount` bytes.
 */
export function parseStruct(response: Response, expectedCount: number): Uint8Array {
  ensureSuccess(response);
  if (response.count === undefined) {
    throw new InvalidFrameError('Expected STRUCT response, got bare acknowledgement');
  }
  if (response.count !== expectedCount) {
    throw new InvalidFrameError(
      `Expected ${expectedCount} STRUCT elements, got ${response.count}`
    );
  }
  return response.data;
}

/**
 * Read a length-prefixed UTF-8 string from an untyped response:
 * `[status][echo][len][utf8:len]`.
 */
export function parseLengthPrefixedString(raw: Uint8Array): string {
  ensureSuccess(decodeHeader(raw));
  if (raw.length < 3) {
    throw new TruncatedFrameError(`String response too short: ${raw.length} bytes`);
  }

  const length = raw[2];
  if (raw.length < 3 + length) {
    throw new TruncatedFrameError(
      `String response incomplete: need ${3 + length} bytes, have ${raw.length}`
    );
  }

  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(raw.subarray(3, 3 + length));
  } catch {
    throw new InvalidFrameError('String response is not valid UTF-8');
  }
}

/**
 * Read the OTA status STRUCT: `[state][progress]`.
 */
export function parseOtaStatus(response: Response): OtaStatus {
  const data = parseStruct(response, 2);
  const state = data[0];
  if (!isOtaState(state)) {
    throw new InvalidFrameError(`Unknown OTA state ${state}`);
  }
  const progress = data[1];
  if (progress > 100) {
    throw new InvalidFrameError(`OTA progress out of range: ${progress}`);
  }
  return { state, progress };
}

function isOtaState(value: number): value is OtaState {
  return value >= OtaState.IDLE && value <= OtaState.ERROR;
}

function describeType(typeTag: number | undefined): string {
  return typeTag === undefined ? 'none' : `0x${typeTag.toString(16).padStart(2, '0')}`;
}
