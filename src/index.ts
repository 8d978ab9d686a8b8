/**
 * scanpad-control - TypeScript library for ScanPad keypad/scanner devices
 *
 * Main entry point exporting the public API.
 */

// Core device API
export { ScanPadDevice } from './device';
export type {
  ApplyFullConfigOptions,
  BuzzerConfig,
  ConfigBackup,
  KeyConfigRequest,
  ScanPadDeviceOptions,
} from './device';

// Transport
export type { Bearer, DisconnectListener, NotifyListener, Unsubscribe } from './transport/bearer';
export { CommandChannel } from './transport/command-channel';
export type { ChannelState, CommandChannelOptions } from './transport/command-channel';

// Firmware update
export * from './ota';

// Wire protocol and offline frames
export * from './protocol';
export * from './offline';
export { compressPayload, decompressPayload } from './encoding/compression';

// Models and types
export * from './models';

// Exceptions
export * from './exceptions';
