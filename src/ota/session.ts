/**
 * Firmware update state machine.
 *
 * The device pulls the image over its own access point; this session
 * starts the update service, hands the image to an external uploader and
 * polls status until the device reports success or failure.
 */

import {
  CancelledError,
  CommunicationLostError,
  DeviceNotReadyError,
  DeviceReportedError,
  ServiceStartFailedError,
} from '../exceptions';
import { Domain, OtaState } from '../models/enums';
import type { OtaStatus } from '../models/firmware';
import { type Command, buildOtaCheckVersion, buildOtaGetStatus, buildOtaStart } from '../protocol/commands';
import { STATUS_SUCCESS } from '../protocol/constants';
import {
  decodeHeader,
  decodeResponse,
  parseLengthPrefixedString,
  parseOtaStatus,
} from '../protocol/responses';
import type { CommandChannel } from '../transport/command-channel';
import { validateFirmwareImage } from './firmware';

/**
 * Discrete points a caller can react to, e.g. to prompt the user.
 */
export type OtaPhase = 'service-started' | 'awaiting-upload' | 'completed' | 'failed' | 'cancelled';

/**
 * Bulk transfer of the image to the device's update service.
 */
export interface FirmwareUploader {
  /**
   * @param signal - Aborted when the session is cancelled or monitoring fails
   */
  upload(image: Uint8Array, signal: AbortSignal): Promise<void>;
}

export interface OtaSessionOptions {
  /**
   * Delay between status polls (default: 2000ms)
   */
  pollIntervalMs?: number;

  /**
   * Consecutive failed polls tolerated before giving up (default: 5)
   */
  maxConsecutivePollFailures?: number;

  /**
   * Timeout for each command (default: channel default)
   */
  commandTimeoutMs?: number;

  /**
   * Called once per distinct progress value
   */
  onProgress?: (progress: number, state: OtaState) => void;

  onPhase?: (phase: OtaPhase) => void;
}

export class OtaSession {
  static readonly POLL_INTERVAL_MS = 2000;
  static readonly MAX_CONSECUTIVE_POLL_FAILURES = 5;

  private _state: OtaState = OtaState.IDLE;
  private _progress = 0;
  private _consecutivePollFailures = 0;
  private _firmwareVersion: string | null = null;
  private cancelled = false;
  private requesting = false;
  private uploadController: AbortController | null = null;
  private wake: (() => void) | null = null;

  private readonly pollIntervalMs: number;
  private readonly maxFailures: number;

  constructor(
    private readonly channel: CommandChannel,
    private readonly options: OtaSessionOptions = {}
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? OtaSession.POLL_INTERVAL_MS;
    this.maxFailures = options.maxConsecutivePollFailures ?? OtaSession.MAX_CONSECUTIVE_POLL_FAILURES;
  }

  get state(): OtaState {
    return this._state;
  }

  get progress(): number {
    return this._progress;
  }

  get consecutivePollFailures(): number {
    return this._consecutivePollFailures;
  }

  /**
   * Firmware version reported by the version check, once started.
   */
  get firmwareVersion(): string | null {
    return this._firmwareVersion;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /**
   * Check the running version and start the update service.
   *
   * @throws {DeviceNotReadyError} If the version check is rejected
   * @throws {ServiceStartFailedError} If the service refuses to start
   */
  async start(): Promise<void> {
    this.ensureNotCancelled();

    const versionFrame = await this.request(buildOtaCheckVersion());
    const versionStatus = decodeHeader(versionFrame).status;
    if (versionStatus !== STATUS_SUCCESS) {
      throw new DeviceNotReadyError(versionStatus);
    }
    this._firmwareVersion = parseLengthPrefixedString(versionFrame);
    console.log(`Current firmware version: ${this._firmwareVersion}`);

    const startFrame = await this.request(buildOtaStart());
    const startStatus = decodeHeader(startFrame).status;
    if (startStatus !== STATUS_SUCCESS) {
      throw new ServiceStartFailedError(startStatus);
    }

    this._state = OtaState.CHECKING;
    console.log('Firmware update service started');
    this.options.onPhase?.('service-started');
  }

  /**
   * Poll status until the device reports a terminal state.
   *
   * @throws {CommunicationLostError} After more than the allowed consecutive failed polls
   * @throws {DeviceReportedError} If the device reports an update error
   * @throws {CancelledError} If {@link cancel} is called
   */
  async monitor(): Promise<void> {
    for (;;) {
      this.ensureNotCancelled();

      const status = await this.pollOnce();
      if (status) {
        this.applyStatus(status);

        if (status.state === OtaState.SUCCESS) {
          console.log('Firmware update completed');
          this.options.onPhase?.('completed');
          return;
        }
        if (status.state === OtaState.ERROR) {
          console.log(`Firmware update failed at ${status.progress}%`);
          this.options.onPhase?.('failed');
          throw new DeviceReportedError(status.progress);
        }
      }

      await this.sleep(this.pollIntervalMs);
    }
  }

  /**
   * Validate, start, then run the upload alongside status monitoring.
   *
   * The image is checked before any command is sent.
   *
   * @throws {InvalidFirmwareImageError}
   */
  async update(image: Uint8Array, uploader: FirmwareUploader): Promise<void> {
    validateFirmwareImage(image);
    await this.start();
    this.ensureNotCancelled();

    this.options.onPhase?.('awaiting-upload');

    const controller = new AbortController();
    this.uploadController = controller;
    try {
      const monitoring = this.monitor().catch((error: unknown) => {
        controller.abort(error);
        throw error;
      });
      const uploading = uploader.upload(image, controller.signal).catch((error: unknown) => {
        if (!controller.signal.aborted) {
          console.warn('Firmware upload failed, stopping status monitor');
          this.cancel();
        }
        throw error;
      });

      await Promise.all([uploading, monitoring]);
    } finally {
      this.uploadController = null;
    }
  }

  /**
   * Stop the session at any step. An in-flight session request is aborted
   * and a running upload is signalled.
   */
  cancel(): void {
    if (this.cancelled) {
      return;
    }
    this.cancelled = true;
    if (this.requesting) {
      this.channel.abort(Domain.DEVICE);
    }
    this.uploadController?.abort(new CancelledError('Firmware update cancelled'));
    this.wake?.();
    console.log('Firmware update cancelled');
    this.options.onPhase?.('cancelled');
  }

  /**
   * One status poll. Returns `null` when the poll failed but the failure
   * budget is not yet exhausted.
   */
  private async pollOnce(): Promise<OtaStatus | null> {
    try {
      const frame = await this.request(buildOtaGetStatus());
      const status = parseOtaStatus(decodeResponse(frame));
      this._consecutivePollFailures = 0;
      return status;
    } catch (error) {
      this.ensureNotCancelled();

      this._consecutivePollFailures++;
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(
        `Status poll failed (${this._consecutivePollFailures}/${this.maxFailures}): ${reason}`
      );
      if (this._consecutivePollFailures > this.maxFailures) {
        this._state = OtaState.ERROR;
        this.options.onPhase?.('failed');
        throw new CommunicationLostError(this._consecutivePollFailures, error);
      }
      return null;
    }
  }

  /**
   * Send a session command. A cancel while it is outstanding surfaces as
   * {@link CancelledError}, as does a response that arrives after one.
   */
  private async request(command: Command): Promise<Uint8Array> {
    let frame: Uint8Array;
    this.requesting = true;
    try {
      frame = await this.channel.request(command, this.options.commandTimeoutMs);
    } catch (error) {
      this.ensureNotCancelled();
      throw error;
    } finally {
      this.requesting = false;
    }
    this.ensureNotCancelled();
    return frame;
  }

  private applyStatus(status: OtaStatus): void {
    this._state = status.state;
    if (status.progress !== this._progress) {
      this._progress = status.progress;
      console.debug(`Firmware update progress: ${status.progress}% (state ${OtaState[status.state]})`);
      this.options.onProgress?.(status.progress, status.state);
    }
  }

  private sleep(ms: number): Promise<void> {
    if (this.cancelled) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }

  private ensureNotCancelled(): void {
    if (this.cancelled) {
      throw new CancelledError('Firmware update cancelled');
    }
  }
}
