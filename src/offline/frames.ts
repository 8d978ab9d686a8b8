/**
 * Optical-code text frames for single commands and command batches.
 *
 *   $CMD:DEV:<hex id><hex payload>CMD$   device domain
 *   $CMD:KEY:<hex id><hex payload>CMD$   config domain
 *   $BATCH:<base64>$                     [count]([len][cmd_id][payload])*
 */

import { InvalidFrameError, InvalidParameterError, TruncatedFrameError } from '../exceptions';
import { fromBase64, fromHex, toBase64, toHex } from '../encoding/bytes';
import { Domain } from '../models/enums';
import type { Command } from '../protocol/commands';
import { encodeCommand } from '../protocol/commands';

export const DEVICE_COMMAND_PREFIX = '$CMD:DEV:';
export const CONFIG_COMMAND_PREFIX = '$CMD:KEY:';
export const COMMAND_SUFFIX = 'CMD$';
export const BATCH_PREFIX = '$BATCH:';
export const MAX_BATCH_COMMANDS = 255;

/**
 * Strip `prefix` and the closing `$` from a text frame.
 *
 * @throws {InvalidFrameError} If the frame does not have that shape or is empty
 */
export function unwrapFrame(text: string, prefix: string, suffix: string = '$'): string {
  if (!text.startsWith(prefix) || !text.endsWith(suffix)) {
    throw new InvalidFrameError(`Expected '${prefix}...${suffix}' frame`);
  }
  const content = text.slice(prefix.length, text.length - suffix.length);
  if (content.length === 0) {
    throw new InvalidFrameError(`Empty '${prefix}' frame`);
  }
  return content;
}

/**
 * Format one command as a `$CMD:` frame.
 */
export function formatCommandFrame(command: Command): string {
  const wire = encodeCommand(command.domain, command.commandId, command.payload);
  const prefix = command.domain === Domain.DEVICE ? DEVICE_COMMAND_PREFIX : CONFIG_COMMAND_PREFIX;
  return `${prefix}${toHex(wire)}${COMMAND_SUFFIX}`;
}

/**
 * Parse a `$CMD:DEV:` or `$CMD:KEY:` frame.
 *
 * @throws {InvalidFrameError}
 */
export function parseCommandFrame(text: string): Command {
  let domain: Domain;
  let prefix: string;
  if (text.startsWith(DEVICE_COMMAND_PREFIX)) {
    domain = Domain.DEVICE;
    prefix = DEVICE_COMMAND_PREFIX;
  } else if (text.startsWith(CONFIG_COMMAND_PREFIX)) {
    domain = Domain.CONFIG;
    prefix = CONFIG_COMMAND_PREFIX;
  } else {
    throw new InvalidFrameError('Not a command frame');
  }

  const wire = fromHex(unwrapFrame(text, prefix, COMMAND_SUFFIX));
  return { domain, commandId: wire[0], payload: wire.slice(1) };
}

/**
 * Pack device commands into one `$BATCH:` frame.
 *
 * @throws {InvalidParameterError} If the batch is empty, too large, holds a
 *   config-domain command or a command longer than 255 bytes
 */
export function encodeBatch(commands: readonly Command[]): string {
  if (commands.length === 0 || commands.length > MAX_BATCH_COMMANDS) {
    throw new InvalidParameterError(
      'commands',
      commands.length,
      `batch must hold 1-${MAX_BATCH_COMMANDS} commands`
    );
  }

  const body: number[] = [commands.length];
  for (const command of commands) {
    if (command.domain !== Domain.DEVICE) {
      throw new InvalidParameterError('domain', command.domain, 'batches carry device commands only');
    }
    const wire = encodeCommand(command.domain, command.commandId, command.payload);
    if (wire.length > 0xff) {
      throw new InvalidParameterError('payload', command.payload.length, 'command exceeds 255 bytes');
    }
    body.push(wire.length, ...wire);
  }

  return `${BATCH_PREFIX}${toBase64(Uint8Array.from(body))}$`;
}

/**
 * Unpack a `$BATCH:` frame into device commands.
 *
 * @throws {InvalidFrameError} On a malformed envelope, zero count,
 *   zero-length entry or trailing bytes
 * @throws {TruncatedFrameError} If an entry runs past the end
 */
export function decodeBatch(text: string): Command[] {
  const body = fromBase64(unwrapFrame(text, BATCH_PREFIX));
  if (body.length === 0 || body[0] === 0) {
    throw new InvalidFrameError('Batch holds no commands');
  }

  const count = body[0];
  const commands: Command[] = [];
  let offset = 1;

  for (let i = 0; i < count; i++) {
    if (offset >= body.length) {
      throw new TruncatedFrameError(`Batch entry ${i} missing (declared ${count})`);
    }
    const length = body[offset];
    offset += 1;
    if (length === 0) {
      throw new InvalidFrameError(`Batch entry ${i} is empty`);
    }
    if (offset + length > body.length) {
      throw new TruncatedFrameError(
        `Batch entry ${i} declares ${length} bytes, ${body.length - offset} remain`
      );
    }
    commands.push({
      domain: Domain.DEVICE,
      commandId: body[offset],
      payload: body.slice(offset + 1, offset + length),
    });
    offset += length;
  }

  if (offset !== body.length) {
    throw new InvalidFrameError(`Batch has ${body.length - offset} trailing bytes`);
  }
  return commands;
}
