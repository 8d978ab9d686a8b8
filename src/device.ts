/**
 * Main ScanPad device class.
 */

import { decodeFullConfig } from './offline/container';
import { InvalidFrameError } from './exceptions';
import type { FullKeyboardConfig, KeyAction } from './models/actions';
import { ALL_KEY_IDS, keyName, textAction } from './models/actions';
import { type BuzzerMelody, Orientation } from './models/enums';
import type { DecodedKeyConfig } from './protocol/actions';
import { parseKeyConfigResponse } from './protocol/actions';
import {
  type AutoShutdownConfig,
  type Command,
  buildBuzzerBeep,
  buildBuzzerGetConfig,
  buildBuzzerMelody,
  buildBuzzerSetConfig,
  buildBuzzerStop,
  buildClearKeyConfig,
  buildFactoryReset,
  buildGetAutoShutdown,
  buildGetKeyConfig,
  buildGetLanguage,
  buildGetOrientation,
  buildLedAllOff,
  buildLedGetState,
  buildLedSetState,
  buildLedStartBlink,
  buildLedStopBlink,
  buildOtaCheckVersion,
  buildScriptClear,
  buildSaveConfig,
  buildSetAutoShutdown,
  buildSetKeyConfig,
  buildSetKeyEnabled,
  buildSetLanguage,
  buildSetOrientation,
  buildSystemRestart,
  buildSystemShutdown,
} from './protocol/commands';
import {
  decodeResponse,
  parseEmpty,
  parseLengthPrefixedString,
  parseStruct,
  parseUint16,
  parseUint8,
} from './protocol/responses';
import { OtaSession, type FirmwareUploader, type OtaSessionOptions } from './ota/session';
import type { Bearer } from './transport/bearer';
import { CommandChannel } from './transport/command-channel';

export interface KeyConfigRequest {
  keyId: number;
  actions: readonly KeyAction[];
  /** Sends SET_KEY_ENABLED after the actions when `false`. */
  enabled?: boolean;
}

export interface BuzzerConfig {
  enabled: boolean;
  volume: number;
}

export interface ApplyFullConfigOptions {
  /**
   * Persist to device storage afterwards (default: true)
   */
  save?: boolean;
}

/**
 * Key configuration read back from a device, in a form
 * {@link ScanPadDevice.restoreConfig} and
 * {@link ScanPadDevice.applyFullConfig} accept.
 */
export interface ConfigBackup {
  /** Keys with at least one action. */
  keys: Map<number, KeyAction[]>;
  /** IDs from `keys` whose key is disabled. */
  disabled: number[];
}

export interface ScanPadDeviceOptions {
  /**
   * Default command timeout (default: 5000ms)
   */
  timeoutMs?: number;
}

/**
 * ScanPad keypad/scanner.
 *
 * Main API for configuring keys and driving the device's peripherals over
 * an already connected bearer.
 *
 * @example
 * ```typescript
 * const device = new ScanPadDevice(bearer);
 * await device.setKeyConfig({ keyId: 0, actions: [textAction('Hi')] });
 * await device.saveConfig();
 * await device.ledBlink(Led.GREEN_1, 2);
 * ```
 */
export class ScanPadDevice {
  static readonly TIMEOUT_ACK = 5000;
  static readonly TIMEOUT_SAVE = 10000; // Flash write
  static readonly VOLUME_SETTLE_MS = 100; // Device applies volume before the next sound
  static readonly FACTORY_RESET_SETTLE_MS = 1000;

  readonly channel: CommandChannel;

  constructor(bearer: Bearer, options: ScanPadDeviceOptions = {}) {
    this.channel = new CommandChannel(bearer, {
      timeoutMs: options.timeoutMs ?? ScanPadDevice.TIMEOUT_ACK,
    });
  }

  get isConnected(): boolean {
    return this.channel.isConnected;
  }

  /**
   * Accept commands again after the bearer has reconnected.
   */
  rearm(): void {
    this.channel.rearm();
  }

  dispose(): void {
    this.channel.dispose();
  }

  // ==========================================================================
  // Key configuration
  // ==========================================================================

  async setKeyConfig(request: KeyConfigRequest): Promise<void> {
    const command = buildSetKeyConfig(request.keyId, request.actions);
    await this.execute(command);

    if (request.enabled === false) {
      await this.setKeyEnabled(request.keyId, false);
    }
    console.log(`Configured ${keyName(request.keyId)}: ${request.actions.length} action(s)`);
  }

  async getKeyConfig(keyId: number): Promise<DecodedKeyConfig> {
    const frame = await this.channel.request(buildGetKeyConfig(keyId));
    const config = parseKeyConfigResponse(frame);
    if (config.keyId !== keyId) {
      throw new InvalidFrameError(`Requested key ${keyId}, device answered for key ${config.keyId}`);
    }
    return config;
  }

  async clearKey(keyId: number): Promise<void> {
    await this.execute(buildClearKeyConfig(keyId));
    console.log(`Cleared ${keyName(keyId)}`);
  }

  async setKeyEnabled(keyId: number, enabled: boolean): Promise<void> {
    await this.execute(buildSetKeyEnabled(keyId, enabled));
  }

  /**
   * Read every key and return those with at least one action.
   */
  async getAllConfigs(): Promise<Map<number, DecodedKeyConfig>> {
    const configs = new Map<number, DecodedKeyConfig>();
    for (const keyId of ALL_KEY_IDS) {
      const config = await this.getKeyConfig(keyId);
      if (config.actions.length > 0) {
        configs.set(keyId, config);
      }
    }
    return configs;
  }

  async saveConfig(): Promise<void> {
    await this.execute(buildSaveConfig(), ScanPadDevice.TIMEOUT_SAVE);
    console.log('Configuration saved to device storage');
  }

  async factoryReset(): Promise<void> {
    await this.execute(buildFactoryReset(), ScanPadDevice.TIMEOUT_SAVE);
    console.log('Factory reset completed');
  }

  /**
   * Apply a full keyboard configuration online: one SET_KEY_CONFIG per key
   * in ascending key order, then SAVE_CONFIG unless `save` is false.
   *
   * @param config - Key map, or a `$FULL:` frame to decode first
   */
  async applyFullConfig(
    config: FullKeyboardConfig | string,
    options: ApplyFullConfigOptions = {}
  ): Promise<void> {
    const keys = typeof config === 'string' ? decodeFullConfig(config).keys : config;
    const keyIds = [...keys.keys()].sort((a, b) => a - b);

    // Validate everything before the first write
    const commands = keyIds.map((keyId) => buildSetKeyConfig(keyId, keys.get(keyId) ?? []));
    for (const command of commands) {
      await this.execute(command);
    }

    if (options.save ?? true) {
      await this.saveConfig();
    }
    console.log(`Applied full configuration: ${keyIds.length} keys`);
  }

  /**
   * Configure keys with one text action each, then save.
   *
   * @example
   * ```typescript
   * await device.quickSetup(new Map([[0, 'Hello'], [1, 'World!']]));
   * ```
   */
  async quickSetup(texts: ReadonlyMap<number, string>): Promise<void> {
    const config = new Map<number, KeyAction[]>();
    for (const [keyId, text] of texts) {
      config.set(keyId, [textAction(text)]);
    }
    await this.applyFullConfig(config);
  }

  async backupConfig(): Promise<ConfigBackup> {
    const configs = await this.getAllConfigs();
    const backup: ConfigBackup = { keys: new Map(), disabled: [] };
    for (const [keyId, config] of configs) {
      if (config.issues.length > 0) {
        console.warn(`${keyName(keyId)} backed up with ${config.issues.length} undecodable action(s)`);
      }
      backup.keys.set(keyId, [...config.actions]);
      if (!config.enabled) {
        backup.disabled.push(keyId);
      }
    }
    console.log(`Backed up configuration (${backup.keys.size} keys)`);
    return backup;
  }

  /**
   * Factory reset, then write each key in ascending order (disabling it
   * where the backup says so) and save.
   *
   * Every key is validated before the reset is sent.
   */
  async restoreConfig(backup: ConfigBackup): Promise<void> {
    const disabled = new Set(backup.disabled);
    const keyIds = [...backup.keys.keys()].sort((a, b) => a - b);
    const commands: Command[] = [];
    for (const keyId of keyIds) {
      commands.push(buildSetKeyConfig(keyId, backup.keys.get(keyId) ?? []));
      if (disabled.has(keyId)) {
        commands.push(buildSetKeyEnabled(keyId, false));
      }
    }

    console.log(`Restoring configuration (${keyIds.length} keys)`);
    await this.factoryReset();
    await this.delay(ScanPadDevice.FACTORY_RESET_SETTLE_MS);

    for (const command of commands) {
      await this.execute(command);
    }
    await this.saveConfig();
    console.log('Configuration restored');
  }

  // ==========================================================================
  // LEDs
  // ==========================================================================

  async ledOn(ledId: number): Promise<void> {
    await this.execute(buildLedSetState(ledId, true));
  }

  async ledOff(ledId: number): Promise<void> {
    await this.execute(buildLedSetState(ledId, false));
  }

  async ledBlink(ledId: number, frequencyHz: number = 2): Promise<void> {
    await this.execute(buildLedStartBlink(ledId, frequencyHz));
  }

  async ledStopBlink(ledId: number): Promise<void> {
    await this.execute(buildLedStopBlink(ledId));
  }

  async ledGetState(ledId: number): Promise<boolean> {
    const frame = await this.channel.request(buildLedGetState(ledId));
    return parseUint8(decodeResponse(frame)) !== 0;
  }

  async ledAllOff(): Promise<void> {
    await this.execute(buildLedAllOff());
  }

  // ==========================================================================
  // Buzzer
  // ==========================================================================

  /**
   * Beep, optionally setting the volume first.
   */
  async beep(durationMs: number = 200, volume?: number): Promise<void> {
    const command = buildBuzzerBeep(durationMs);
    if (volume !== undefined) {
      await this.setBuzzerVolume(volume);
      await this.delay(ScanPadDevice.VOLUME_SETTLE_MS);
    }
    await this.execute(command);
  }

  async playMelody(melody: BuzzerMelody, volume?: number): Promise<void> {
    const command = buildBuzzerMelody(melody);
    if (volume !== undefined) {
      await this.setBuzzerVolume(volume);
      await this.delay(ScanPadDevice.VOLUME_SETTLE_MS);
    }
    await this.execute(command);
  }

  async setBuzzerVolume(volume: number, enabled: boolean = true): Promise<void> {
    await this.execute(buildBuzzerSetConfig(volume, enabled));
  }

  async getBuzzerConfig(): Promise<BuzzerConfig> {
    const frame = await this.channel.request(buildBuzzerGetConfig());
    const data = parseStruct(decodeResponse(frame), 2);
    return { enabled: data[0] !== 0, volume: data[1] };
  }

  async stopBuzzer(): Promise<void> {
    await this.execute(buildBuzzerStop());
  }

  // ==========================================================================
  // Device settings
  // ==========================================================================

  async setOrientation(orientation: Orientation): Promise<void> {
    await this.execute(buildSetOrientation(orientation));
  }

  async getOrientation(): Promise<Orientation> {
    const frame = await this.channel.request(buildGetOrientation());
    const value = parseUint8(decodeResponse(frame));
    if (value > Orientation.LEFT) {
      throw new InvalidFrameError(`Unknown orientation ${value}`);
    }
    return value;
  }

  async setLanguage(layoutId: number): Promise<void> {
    await this.execute(buildSetLanguage(layoutId));
  }

  async getLanguage(): Promise<number> {
    const frame = await this.channel.request(buildGetLanguage());
    return parseUint16(decodeResponse(frame));
  }

  // ==========================================================================
  // Power management
  // ==========================================================================

  /**
   * @param config - A single timeout in minutes for both conditions, or full settings
   */
  async setAutoShutdown(config: number | AutoShutdownConfig): Promise<void> {
    const settings: AutoShutdownConfig =
      typeof config === 'number'
        ? { enabled: true, noConnectionTimeoutMin: config, noActivityTimeoutMin: config }
        : config;
    await this.execute(buildSetAutoShutdown(settings));
  }

  async getAutoShutdown(): Promise<AutoShutdownConfig> {
    const frame = await this.channel.request(buildGetAutoShutdown());
    const data = parseStruct(decodeResponse(frame), 5);
    return {
      enabled: data[0] !== 0,
      noConnectionTimeoutMin: data[1] | (data[2] << 8),
      noActivityTimeoutMin: data[3] | (data[4] << 8),
    };
  }

  // ==========================================================================
  // Firmware and system
  // ==========================================================================

  async getFirmwareVersion(): Promise<string> {
    const frame = await this.channel.request(buildOtaCheckVersion());
    const version = parseLengthPrefixedString(frame);
    console.log(`Firmware version: ${version}`);
    return version;
  }

  createOtaSession(options: OtaSessionOptions = {}): OtaSession {
    return new OtaSession(this.channel, options);
  }

  /**
   * Run a complete firmware update.
   *
   * @returns The session, for inspecting final state
   */
  async updateFirmware(
    image: Uint8Array,
    uploader: FirmwareUploader,
    options: OtaSessionOptions = {}
  ): Promise<OtaSession> {
    const session = this.createOtaSession(options);
    await session.update(image, uploader);
    return session;
  }

  /**
   * Remove the deployed script. Scripts are deployed offline as `$LUA`
   * fragments built by `buildScriptFragments`.
   */
  async clearScript(): Promise<void> {
    await this.execute(buildScriptClear());
    console.log('Device script cleared');
  }

  /**
   * Restart the device. No response is sent; the bearer will drop.
   */
  async restart(): Promise<void> {
    console.log('Sending restart command - connection will drop');
    await this.channel.send(buildSystemRestart());
  }

  /**
   * Power the device off. Like {@link restart}, no response is sent.
   */
  async shutdown(): Promise<void> {
    console.log('Sending shutdown command - connection will drop');
    await this.channel.send(buildSystemShutdown());
  }

  private async execute(command: Command, timeoutMs?: number): Promise<void> {
    const frame = await this.channel.request(command, timeoutMs);
    parseEmpty(decodeResponse(frame));
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
