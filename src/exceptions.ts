/**
 * Exception classes for the ScanPad control library.
 *
 * Every error carries a literal `code` so callers can branch on the kind
 * without `instanceof` chains.
 */

import type { Domain } from './models/enums';

export type ErrorCode =
  | 'INVALID_PARAMETER'
  | 'TRUNCATED_FRAME'
  | 'SHORT_FRAME'
  | 'INVALID_UTF8'
  | 'TEXT_TOO_LONG'
  | 'INVALID_FRAME'
  | 'CORRUPT_COMPRESSED_DATA'
  | 'BAD_MAGIC'
  | 'UNSUPPORTED_VERSION'
  | 'DEVICE_REJECTED'
  | 'TIMEOUT'
  | 'CONNECTION_LOST'
  | 'NOT_CONNECTED'
  | 'BUSY'
  | 'CANCELLED'
  | 'FRAGMENT_TOO_SMALL'
  | 'TOO_MANY_FRAGMENTS'
  | 'FRAGMENT_SEQUENCE'
  | 'UNSUPPORTED_ACTION_IN_CONTAINER'
  | 'DEVICE_NOT_READY'
  | 'SERVICE_START_FAILED'
  | 'COMMUNICATION_LOST'
  | 'DEVICE_REPORTED_ERROR'
  | 'INVALID_FIRMWARE_IMAGE';

function hex8(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(2, '0')}`;
}

export class ScanPadError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'ScanPadError';
  }
}

/**
 * Caller-side range or shape violation, raised before any I/O.
 */
export class InvalidParameterError extends ScanPadError {
  constructor(
    readonly parameter: string,
    readonly value: unknown,
    message?: string
  ) {
    super(
      'INVALID_PARAMETER',
      message
        ? `Invalid parameter '${parameter}' (${String(value)}): ${message}`
        : `Invalid parameter '${parameter}': ${String(value)}`
    );
    this.name = 'InvalidParameterError';
  }
}

// ---------------------------------------------------------------------------
// Decode-time structural errors
// ---------------------------------------------------------------------------

export class ProtocolError extends ScanPadError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = 'ProtocolError';
  }
}

export class TruncatedFrameError extends ProtocolError {
  constructor(message: string) {
    super('TRUNCATED_FRAME', message);
    this.name = 'TruncatedFrameError';
  }
}

export class ShortFrameError extends ProtocolError {
  constructor(
    readonly declared: number,
    readonly available: number
  ) {
    super(
      'SHORT_FRAME',
      `Response declares ${declared} data bytes but only ${available} present`
    );
    this.name = 'ShortFrameError';
  }
}

/**
 * Text payload of a single action is not valid UTF-8.
 *
 * Recoverable: `nextOffset` points past the bad payload so decoding of the
 * surrounding structure can continue.
 */
export class InvalidUtf8Error extends ProtocolError {
  constructor(
    readonly bytes: Uint8Array,
    readonly nextOffset: number
  ) {
    super('INVALID_UTF8', `Text payload is not valid UTF-8 (${bytes.length} bytes)`);
    this.name = 'InvalidUtf8Error';
  }
}

export class TextTooLongError extends ProtocolError {
  constructor(readonly length: number) {
    super('TEXT_TOO_LONG', `Text length ${length} exceeds 8 bytes`);
    this.name = 'TextTooLongError';
  }
}

export class InvalidFrameError extends ProtocolError {
  constructor(message: string) {
    super('INVALID_FRAME', message);
    this.name = 'InvalidFrameError';
  }
}

export class CorruptCompressedDataError extends ProtocolError {
  constructor(message: string) {
    super('CORRUPT_COMPRESSED_DATA', message);
    this.name = 'CorruptCompressedDataError';
  }
}

export class BadMagicError extends ProtocolError {
  constructor(readonly found: Uint8Array) {
    super(
      'BAD_MAGIC',
      `Container magic mismatch: got ${Array.from(found, hex8).join(' ')}`
    );
    this.name = 'BadMagicError';
  }
}

export class UnsupportedVersionError extends ProtocolError {
  constructor(readonly version: number) {
    super('UNSUPPORTED_VERSION', `Unsupported container version ${version}`);
    this.name = 'UnsupportedVersionError';
  }
}

export class DeviceRejectedError extends ProtocolError {
  constructor(
    readonly status: number,
    readonly commandId?: number
  ) {
    super(
      'DEVICE_REJECTED',
      commandId === undefined
        ? `Device rejected command with status ${hex8(status)}`
        : `Device rejected command ${hex8(commandId)} with status ${hex8(status)}`
    );
    this.name = 'DeviceRejectedError';
  }
}

export class UnsupportedActionInContainerError extends ProtocolError {
  constructor(
    readonly keyId: number,
    readonly kind: string
  ) {
    super(
      'UNSUPPORTED_ACTION_IN_CONTAINER',
      `Key ${keyId}: '${kind}' actions cannot be stored in a full configuration container`
    );
    this.name = 'UnsupportedActionInContainerError';
  }
}

// ---------------------------------------------------------------------------
// Fragmentation capacity
// ---------------------------------------------------------------------------

export class FragmentTooSmallError extends ScanPadError {
  constructor(
    readonly fragmentNumber: number,
    readonly maxFragmentText: number
  ) {
    super(
      'FRAGMENT_TOO_SMALL',
      `Fragment ${fragmentNumber}: size ${maxFragmentText} leaves no room after marker overhead`
    );
    this.name = 'FragmentTooSmallError';
  }
}

export class TooManyFragmentsError extends ScanPadError {
  constructor(readonly limit: number) {
    super('TOO_MANY_FRAGMENTS', `Payload would require more than ${limit} fragments`);
    this.name = 'TooManyFragmentsError';
  }
}

export class FragmentSequenceError extends ScanPadError {
  constructor(message: string) {
    super('FRAGMENT_SEQUENCE', message);
    this.name = 'FragmentSequenceError';
  }
}

// ---------------------------------------------------------------------------
// Command channel
// ---------------------------------------------------------------------------

export class ChannelError extends ScanPadError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = 'ChannelError';
  }
}

export class CommandTimeoutError extends ChannelError {
  constructor(
    readonly commandId: number,
    readonly timeoutMs: number
  ) {
    super('TIMEOUT', `Command ${hex8(commandId)} timed out after ${timeoutMs}ms`);
    this.name = 'CommandTimeoutError';
  }
}

export class ConnectionLostError extends ChannelError {
  constructor(readonly commandId: number) {
    super('CONNECTION_LOST', `Connection lost while awaiting command ${hex8(commandId)}`);
    this.name = 'ConnectionLostError';
  }
}

export class NotConnectedError extends ChannelError {
  constructor() {
    super('NOT_CONNECTED', 'Not connected to device');
    this.name = 'NotConnectedError';
  }
}

export class BusyError extends ChannelError {
  constructor(
    readonly domain: Domain,
    readonly pendingCommandId: number
  ) {
    super(
      'BUSY',
      `${domain} domain busy: command ${hex8(pendingCommandId)} still awaiting a response`
    );
    this.name = 'BusyError';
  }
}

export class CancelledError extends ChannelError {
  constructor(message: string) {
    super('CANCELLED', message);
    this.name = 'CancelledError';
  }
}

// ---------------------------------------------------------------------------
// Firmware update
// ---------------------------------------------------------------------------

export class OtaError extends ScanPadError {
  constructor(code: ErrorCode, message: string) {
    super(code, message);
    this.name = 'OtaError';
  }
}

export class DeviceNotReadyError extends OtaError {
  constructor(readonly status: number) {
    super('DEVICE_NOT_READY', `Version check failed with status ${hex8(status)}`);
    this.name = 'DeviceNotReadyError';
  }
}

export class ServiceStartFailedError extends OtaError {
  constructor(readonly status: number) {
    super('SERVICE_START_FAILED', `Update service refused to start (status ${hex8(status)})`);
    this.name = 'ServiceStartFailedError';
  }
}

export class CommunicationLostError extends OtaError {
  constructor(
    readonly failures: number,
    readonly lastError: unknown
  ) {
    super(
      'COMMUNICATION_LOST',
      `Lost contact with device after ${failures} consecutive failed status polls`
    );
    this.name = 'CommunicationLostError';
  }
}

export class DeviceReportedError extends OtaError {
  constructor(readonly progress: number) {
    super('DEVICE_REPORTED_ERROR', `Device reported update failure at ${progress}%`);
    this.name = 'DeviceReportedError';
  }
}

export class InvalidFirmwareImageError extends OtaError {
  constructor(message: string) {
    super('INVALID_FIRMWARE_IMAGE', message);
    this.name = 'InvalidFirmwareImageError';
  }
}
