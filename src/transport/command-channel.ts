/**
 * Request/response correlation over a {@link Bearer}.
 *
 * Responses carry only the echoed command ID, so each domain allows a
 * single outstanding request. A second call on a busy domain is refused
 * with {@link BusyError} rather than queued.
 */

import {
  BusyError,
  CancelledError,
  ConnectionLostError,
  NotConnectedError,
} from '../exceptions';
import { toHexDump } from '../encoding/bytes';
import { Domain } from '../models/enums';
import type { Command } from '../protocol/commands';
import { encodeCommand } from '../protocol/commands';
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../protocol/constants';
import type { Bearer, Unsubscribe } from './bearer';
import { ResponseSlot } from './response-slot';

export interface CommandChannelOptions {
  /**
   * Default response timeout per call (default: 5000ms)
   */
  timeoutMs?: number;
}

export type ChannelState = 'connected' | 'disconnected' | 'disposed';

function hex8(value: number): string {
  return `0x${value.toString(16).toUpperCase().padStart(2, '0')}`;
}

export class CommandChannel {
  static readonly DEFAULT_TIMEOUT_MS = DEFAULT_COMMAND_TIMEOUT_MS;

  private readonly slots: Record<Domain, ResponseSlot> = {
    [Domain.CONFIG]: new ResponseSlot(),
    [Domain.DEVICE]: new ResponseSlot(),
  };
  private readonly subscriptions: Unsubscribe[];
  private readonly timeoutMs: number;
  private _state: ChannelState = 'connected';

  /**
   * Bind to a bearer that is already connected.
   */
  constructor(
    private readonly bearer: Bearer,
    options: CommandChannelOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? CommandChannel.DEFAULT_TIMEOUT_MS;
    this.subscriptions = [
      bearer.onNotify((domain, frame) => this.handleNotification(domain, frame)),
      bearer.onDisconnect(() => this.handleDisconnect()),
    ];
  }

  get state(): ChannelState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === 'connected';
  }

  isAwaiting(domain: Domain): boolean {
    return this.slots[domain].isAwaiting;
  }

  /**
   * Send a command and wait for the response frame echoing its ID.
   *
   * @param domain - Channel to send on
   * @param commandId - Command ID; the response must echo it
   * @param payload - Command payload
   * @param timeoutMs - Override the default timeout
   * @returns The raw response frame
   * @throws {NotConnectedError} If the bearer dropped and the channel was not re-armed
   * @throws {BusyError} If the domain already has a request outstanding
   * @throws {CommandTimeoutError} If no matching response arrives in time
   * @throws {ConnectionLostError} If the bearer disconnects while waiting
   * @throws {CancelledError} If {@link abort} is called while waiting
   */
  async call(
    domain: Domain,
    commandId: number,
    payload: Uint8Array = new Uint8Array(0),
    timeoutMs: number = this.timeoutMs
  ): Promise<Uint8Array> {
    if (!this.isConnected) {
      throw new NotConnectedError();
    }

    const frame = encodeCommand(domain, commandId, payload);
    const slot = this.slots[domain];
    const pendingId = slot.pendingCommandId;
    if (pendingId !== null) {
      throw new BusyError(domain, pendingId);
    }

    // Armed before the write so a response delivered during it is not missed
    const wait = slot.arm(commandId, timeoutMs);
    console.debug(`[${domain}] -> ${toHexDump(frame)}`);

    try {
      const [, response] = await Promise.all([this.bearer.write(domain, frame), wait.response]);
      console.debug(`[${domain}] <- ${toHexDump(response)}`);
      return response;
    } catch (error) {
      wait.release();
      throw error;
    }
  }

  /**
   * Write a command that gets no response, such as a restart.
   *
   * @throws {NotConnectedError}
   * @throws {BusyError} If the domain has a request outstanding
   */
  async send(command: Command): Promise<void> {
    if (!this.isConnected) {
      throw new NotConnectedError();
    }
    const frame = encodeCommand(command.domain, command.commandId, command.payload);
    const pendingId = this.slots[command.domain].pendingCommandId;
    if (pendingId !== null) {
      throw new BusyError(command.domain, pendingId);
    }
    console.debug(`[${command.domain}] -> ${toHexDump(frame)} (no response expected)`);
    await this.bearer.write(command.domain, frame);
  }

  /**
   * Send a prebuilt {@link Command}.
   */
  request(command: Command, timeoutMs?: number): Promise<Uint8Array> {
    return this.call(command.domain, command.commandId, command.payload, timeoutMs);
  }

  /**
   * Deliver an inbound frame. Frames that do not echo the awaited command
   * ID, or that arrive while the domain is idle, are discarded.
   */
  handleNotification(domain: Domain, frame: Uint8Array): void {
    const slot = this.slots[domain];
    if (slot.offer(frame)) {
      return;
    }

    const awaiting = slot.pendingCommandId;
    console.warn(
      `[${domain}] Discarding frame ${toHexDump(frame)} ` +
        (awaiting === null ? '(no request outstanding)' : `(awaiting ${hex8(awaiting)})`)
    );
  }

  /**
   * Fail any outstanding request with {@link ConnectionLostError} and
   * refuse new calls until {@link rearm}.
   */
  handleDisconnect(): void {
    if (this._state === 'disposed') {
      return;
    }
    console.log('Bearer disconnected');
    this._state = 'disconnected';
    for (const slot of Object.values(this.slots)) {
      slot.fail((commandId) => new ConnectionLostError(commandId));
    }
  }

  /**
   * Accept calls again after the bearer reconnects. Both inboxes start empty.
   */
  rearm(): void {
    if (this._state === 'disposed') {
      throw new NotConnectedError();
    }
    for (const slot of Object.values(this.slots)) {
      slot.fail((commandId) => new CancelledError(`Command ${hex8(commandId)} dropped by re-arm`));
    }
    this._state = 'connected';
    console.log('Command channel re-armed');
  }

  /**
   * Reject the outstanding request on `domain` with {@link CancelledError}.
   *
   * @returns true if a request was outstanding
   */
  abort(domain: Domain): boolean {
    return this.slots[domain].fail(
      (commandId) => new CancelledError(`Command ${hex8(commandId)} on ${domain} domain aborted`)
    );
  }

  /**
   * Detach from the bearer. Outstanding requests are cancelled.
   */
  dispose(): void {
    if (this._state === 'disposed') {
      return;
    }
    for (const unsubscribe of this.subscriptions) {
      unsubscribe();
    }
    for (const slot of Object.values(this.slots)) {
      slot.fail((commandId) => new CancelledError(`Command ${hex8(commandId)} dropped: channel disposed`));
    }
    this._state = 'disposed';
  }
}
