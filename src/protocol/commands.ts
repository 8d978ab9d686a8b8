/**
 * Command frame encoding and typed builders for ScanPad devices.
 *
 * Builders validate every parameter and return a {@link Command}; nothing
 * invalid ever reaches the wire.
 */

import { InvalidParameterError } from '../exceptions';
import type { KeyAction } from '../models/actions';
import { isValidKeyId } from '../models/actions';
import { BuzzerMelody, Domain, Orientation } from '../models/enums';
import { encodeKeyConfigPayload } from './actions';
import { ConfigCommand, DeviceCommand } from './constants';

export interface Command {
  domain: Domain;
  commandId: number;
  payload: Uint8Array;
}

const EMPTY = new Uint8Array(0);

export const LED_ID_MIN = 1;
export const LED_ID_MAX = 9;
export const BLINK_HZ_MIN = 0.1;
export const BLINK_HZ_MAX = 20;
export const BEEP_MS_MIN = 50;
export const BEEP_MS_MAX = 5000;
export const VOLUME_MAX = 100;
export const SHUTDOWN_MINUTES_MIN = 1;
export const SHUTDOWN_MINUTES_MAX = 1440;

function checkRange(name: string, value: number, min: number, max: number, integer = true): void {
  if (typeof value !== 'number' || Number.isNaN(value) || (integer && !Number.isInteger(value))) {
    throw new InvalidParameterError(name, value, integer ? 'must be an integer' : 'must be a number');
  }
  if (value < min || value > max) {
    throw new InvalidParameterError(name, value, `must be ${min}-${max}`);
  }
}

function u16le(value: number): [number, number] {
  return [value & 0xff, (value >> 8) & 0xff];
}

/**
 * Wire form of a command: `[command_id]` followed by the payload.
 *
 * @throws {InvalidParameterError} If the command ID is not a byte
 */
export function encodeCommand(domain: Domain, commandId: number, payload: Uint8Array = EMPTY): Uint8Array {
  if (domain !== Domain.CONFIG && domain !== Domain.DEVICE) {
    throw new InvalidParameterError('domain', domain);
  }
  checkRange('commandId', commandId, 0, 0xff);

  const frame = new Uint8Array(1 + payload.length);
  frame[0] = commandId;
  frame.set(payload, 1);
  return frame;
}

function configCommand(commandId: ConfigCommand, payload: Uint8Array = EMPTY): Command {
  return { domain: Domain.CONFIG, commandId, payload };
}

function deviceCommand(commandId: DeviceCommand, payload: Uint8Array = EMPTY): Command {
  return { domain: Domain.DEVICE, commandId, payload };
}

// ============================================================================
// Key configuration (config domain)
// ============================================================================

export function buildSetKeyConfig(keyId: number, actions: readonly KeyAction[]): Command {
  return configCommand(ConfigCommand.SET_KEY_CONFIG, encodeKeyConfigPayload({ keyId, actions }));
}

function checkKeyId(keyId: number): void {
  if (!isValidKeyId(keyId)) {
    throw new InvalidParameterError('keyId', keyId, 'must be 0-19 or 100-115');
  }
}

export function buildGetKeyConfig(keyId: number): Command {
  checkKeyId(keyId);
  return configCommand(ConfigCommand.GET_KEY_CONFIG, Uint8Array.of(keyId));
}

export function buildClearKeyConfig(keyId: number): Command {
  checkKeyId(keyId);
  return configCommand(ConfigCommand.CLEAR_KEY_CONFIG, Uint8Array.of(keyId));
}

export function buildSetKeyEnabled(keyId: number, enabled: boolean): Command {
  checkKeyId(keyId);
  return configCommand(ConfigCommand.SET_KEY_ENABLED, Uint8Array.of(keyId, enabled ? 1 : 0));
}

export function buildSaveConfig(): Command {
  return configCommand(ConfigCommand.SAVE_CONFIG);
}

export function buildFactoryReset(): Command {
  return configCommand(ConfigCommand.FACTORY_RESET);
}

// ============================================================================
// LEDs
// ============================================================================

function checkLed(ledId: number): void {
  checkRange('ledId', ledId, LED_ID_MIN, LED_ID_MAX);
}

export function buildLedSetState(ledId: number, on: boolean): Command {
  checkLed(ledId);
  return deviceCommand(DeviceCommand.LED_SET_STATE, Uint8Array.of(ledId, on ? 1 : 0));
}

/**
 * Only the five individually addressable LEDs report state.
 */
export function buildLedGetState(ledId: number): Command {
  checkRange('ledId', ledId, LED_ID_MIN, 5);
  return deviceCommand(DeviceCommand.LED_GET_STATE, Uint8Array.of(ledId));
}

/**
 * Start blinking. The frequency travels as whole hertz (u16 LE), so
 * sub-1 Hz values are sent as 0 and the device applies its slowest rate.
 */
export function buildLedStartBlink(ledId: number, frequencyHz: number): Command {
  checkLed(ledId);
  checkRange('frequencyHz', frequencyHz, BLINK_HZ_MIN, BLINK_HZ_MAX, false);
  const hz = Math.trunc(frequencyHz);
  return deviceCommand(DeviceCommand.LED_START_BLINK, Uint8Array.of(ledId, ...u16le(hz)));
}

export function buildLedStopBlink(ledId: number): Command {
  checkLed(ledId);
  return deviceCommand(DeviceCommand.LED_STOP_BLINK, Uint8Array.of(ledId));
}

export function buildLedAllOff(): Command {
  return deviceCommand(DeviceCommand.LED_ALL_OFF);
}

// ============================================================================
// Buzzer
// ============================================================================

export function buildBuzzerBeep(durationMs: number): Command {
  checkRange('durationMs', durationMs, BEEP_MS_MIN, BEEP_MS_MAX);
  return deviceCommand(DeviceCommand.BUZZER_BEEP, Uint8Array.of(...u16le(durationMs)));
}

export function buildBuzzerMelody(melody: BuzzerMelody): Command {
  checkRange('melody', melody, BuzzerMelody.KEY, BuzzerMelody.SUCCESS);
  return deviceCommand(DeviceCommand.BUZZER_MELODY, Uint8Array.of(melody));
}

export function buildBuzzerSetConfig(volume: number, enabled: boolean = true): Command {
  checkRange('volume', volume, 0, VOLUME_MAX);
  return deviceCommand(DeviceCommand.BUZZER_SET_CONFIG, Uint8Array.of(enabled ? 1 : 0, volume));
}

export function buildBuzzerGetConfig(): Command {
  return deviceCommand(DeviceCommand.BUZZER_GET_CONFIG);
}

export function buildBuzzerStop(): Command {
  return deviceCommand(DeviceCommand.BUZZER_STOP);
}

// ============================================================================
// Device settings
// ============================================================================

export function buildSetOrientation(orientation: Orientation): Command {
  checkRange('orientation', orientation, Orientation.NORMAL, Orientation.LEFT);
  return deviceCommand(DeviceCommand.SET_ORIENTATION, Uint8Array.of(orientation));
}

export function buildGetOrientation(): Command {
  return deviceCommand(DeviceCommand.GET_ORIENTATION);
}

/**
 * Keyboard layout identifier, e.g. 0x0409 for US English.
 */
export function buildSetLanguage(layoutId: number): Command {
  checkRange('layoutId', layoutId, 0, 0xffff);
  return deviceCommand(DeviceCommand.SET_LANGUAGE, Uint8Array.of(...u16le(layoutId)));
}

export function buildGetLanguage(): Command {
  return deviceCommand(DeviceCommand.GET_LANGUAGE);
}

// ============================================================================
// Power management
// ============================================================================

export interface AutoShutdownConfig {
  enabled: boolean;
  noConnectionTimeoutMin: number;
  noActivityTimeoutMin: number;
}

/**
 * Payload: `[enabled][no_conn u16 LE][no_activity u16 LE]`.
 */
export function buildSetAutoShutdown(config: AutoShutdownConfig): Command {
  checkRange('noConnectionTimeoutMin', config.noConnectionTimeoutMin, SHUTDOWN_MINUTES_MIN, SHUTDOWN_MINUTES_MAX);
  checkRange('noActivityTimeoutMin', config.noActivityTimeoutMin, SHUTDOWN_MINUTES_MIN, SHUTDOWN_MINUTES_MAX);
  return deviceCommand(
    DeviceCommand.POWER_SET_AUTO_SHUTDOWN,
    Uint8Array.of(
      config.enabled ? 1 : 0,
      ...u16le(config.noConnectionTimeoutMin),
      ...u16le(config.noActivityTimeoutMin)
    )
  );
}

export function buildGetAutoShutdown(): Command {
  return deviceCommand(DeviceCommand.POWER_GET_AUTO_SHUTDOWN);
}

// ============================================================================
// Firmware update, scripts, system
// ============================================================================

export function buildOtaCheckVersion(): Command {
  return deviceCommand(DeviceCommand.OTA_CHECK_VERSION);
}

export function buildOtaStart(): Command {
  return deviceCommand(DeviceCommand.OTA_START);
}

export function buildOtaGetStatus(): Command {
  return deviceCommand(DeviceCommand.OTA_GET_STATUS);
}

export function buildScriptGetInfo(): Command {
  return deviceCommand(DeviceCommand.SCRIPT_GET_INFO);
}

export function buildScriptClear(): Command {
  return deviceCommand(DeviceCommand.SCRIPT_CLEAR);
}

/**
 * Restart the device. The connection drops without a response.
 */
export function buildSystemRestart(): Command {
  return deviceCommand(DeviceCommand.SYSTEM_RESTART);
}

export function buildSystemShutdown(): Command {
  return deviceCommand(DeviceCommand.SYSTEM_SHUTDOWN);
}
