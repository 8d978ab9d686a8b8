import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  CancelledError,
  CommunicationLostError,
  DeviceNotReadyError,
  DeviceReportedError,
  InvalidFirmwareImageError,
  ServiceStartFailedError,
} from '../exceptions';
import { Domain, OtaState } from '../models/enums';
import { MockBearer, ackFrame, stringFrame, structFrame } from '../testing/mock-bearer';
import { CommandChannel } from '../transport/command-channel';
import type { FirmwareUploader, OtaPhase } from './session';
import { OtaSession } from './session';

const IMAGE = Uint8Array.of(0xe9, 0x01, 0x02, 0x03);

function status(state: OtaState, progress: number): Uint8Array {
  return structFrame(0x62, [state, progress]);
}

describe('OtaSession', () => {
  let bearer: MockBearer;
  let channel: CommandChannel;
  let phases: OtaPhase[];
  let progress: number[];

  function createSession(pollIntervalMs = 1): OtaSession {
    return new OtaSession(channel, {
      pollIntervalMs,
      onPhase: (phase) => phases.push(phase),
      onProgress: (value) => progress.push(value),
    });
  }

  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    bearer = new MockBearer();
    channel = new CommandChannel(bearer, { timeoutMs: 1000 });
    phases = [];
    progress = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('start', () => {
    it('checks the version then starts the service', async () => {
      bearer.queueReplies(stringFrame(0x60, '1.4.2'), ackFrame(0x61));
      const session = createSession();

      await session.start();

      expect(bearer.writtenHex().map(([, hex]) => hex)).toEqual(['60', '61']);
      expect(session.firmwareVersion).toBe('1.4.2');
      expect(session.state).toBe(OtaState.CHECKING);
      expect(phases).toEqual(['service-started']);
    });

    it('fails when the version check is rejected', async () => {
      bearer.queueReplies(stringFrame(0x60, '', 0x01));

      await expect(createSession().start()).rejects.toBeInstanceOf(DeviceNotReadyError);
      expect(bearer.writes).toHaveLength(1);
    });

    it('fails when the service refuses to start', async () => {
      bearer.queueReplies(stringFrame(0x60, '1.4.2'), ackFrame(0x61, 0x02));

      const error = await createSession().start().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ServiceStartFailedError);
      expect(error).toMatchObject({ message: 'Update service refused to start (status 0x02)' });
      expect(phases).toEqual([]);
    });

    it('aborts the version check on cancel and sends nothing more', async () => {
      bearer.queueReplies(null);
      const session = createSession();
      const starting = session.start();
      expect(channel.isAwaiting(Domain.DEVICE)).toBe(true);

      session.cancel();

      await expect(starting).rejects.toBeInstanceOf(CancelledError);
      expect(channel.isAwaiting(Domain.DEVICE)).toBe(false);
      expect(bearer.writtenHex()).toEqual([[Domain.DEVICE, '60']]);
      expect(session.firmwareVersion).toBeNull();
      expect(phases).toEqual(['cancelled']);
    });
  });

  describe('monitor', () => {
    it('reports each distinct progress value until success', async () => {
      bearer.queueReplies(
        status(OtaState.DOWNLOADING, 10),
        status(OtaState.DOWNLOADING, 55),
        status(OtaState.DOWNLOADING, 55),
        status(OtaState.INSTALLING, 80),
        status(OtaState.SUCCESS, 100)
      );
      const session = createSession();

      await session.monitor();

      expect(progress).toEqual([10, 55, 80, 100]);
      expect(session.state).toBe(OtaState.SUCCESS);
      expect(phases).toEqual(['completed']);
      expect(bearer.writes).toHaveLength(5);
    });

    it('throws when the device reports an error', async () => {
      bearer.queueReplies(status(OtaState.DOWNLOADING, 40), status(OtaState.ERROR, 40));
      const session = createSession();

      const error = await session.monitor().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DeviceReportedError);
      expect(error).toMatchObject({ progress: 40 });
      expect(phases).toEqual(['failed']);
    });

    it('tolerates five consecutive failed polls', async () => {
      const bad = ackFrame(0x62, 0x03);
      bearer.queueReplies(
        status(OtaState.DOWNLOADING, 20),
        bad,
        bad,
        bad,
        bad,
        bad,
        status(OtaState.SUCCESS, 100)
      );
      const session = createSession();

      await session.monitor();

      expect(session.consecutivePollFailures).toBe(0);
      expect(progress).toEqual([20, 100]);
    });

    it('gives up after the sixth consecutive failed poll', async () => {
      const malformed = structFrame(0x62, [0x09, 0]);
      bearer.queueReplies(malformed, malformed, malformed, malformed, malformed, malformed);
      const session = createSession();

      const error = await session.monitor().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CommunicationLostError);
      expect(error).toMatchObject({ failures: 6 });
      expect(bearer.writes).toHaveLength(6);
      expect(session.state).toBe(OtaState.ERROR);
      expect(phases).toEqual(['failed']);
    });

    it('resets the failure count after a good poll', async () => {
      const bad = ackFrame(0x62, 0x03);
      bearer.queueReplies(
        bad,
        bad,
        bad,
        bad,
        status(OtaState.DOWNLOADING, 30),
        bad,
        bad,
        bad,
        bad,
        bad,
        status(OtaState.SUCCESS, 100)
      );

      await createSession().monitor();

      expect(progress).toEqual([30, 100]);
    });

    it('aborts an in-flight poll on cancel', async () => {
      const session = createSession();
      const monitoring = session.monitor();

      session.cancel();

      await expect(monitoring).rejects.toBeInstanceOf(CancelledError);
      expect(channel.isAwaiting(Domain.DEVICE)).toBe(false);
      expect(session.isCancelled).toBe(true);
      expect(phases).toEqual(['cancelled']);
    });

    it('stops without sleeping when cancelled between polls', async () => {
      bearer.queueReplies(status(OtaState.DOWNLOADING, 10));
      const session = new OtaSession(channel, {
        pollIntervalMs: 60_000,
        onProgress: () => session.cancel(),
      });

      await expect(session.monitor()).rejects.toThrow('Firmware update cancelled');
      expect(bearer.writes).toHaveLength(1);
    });
  });

  describe('update', () => {
    it('rejects a bad image before sending anything', async () => {
      const uploader: FirmwareUploader = { upload: vi.fn(async () => {}) };

      await expect(createSession().update(Uint8Array.of(0x00, 0x01), uploader)).rejects.toThrow(
        'Firmware image starts with 0x00, expected 0xE9'
      );
      await expect(createSession().update(new Uint8Array(0), uploader)).rejects.toBeInstanceOf(
        InvalidFirmwareImageError
      );
      expect(bearer.writes).toHaveLength(0);
      expect(uploader.upload).not.toHaveBeenCalled();
    });

    it('uploads while monitoring and completes', async () => {
      bearer.queueReplies(
        stringFrame(0x60, '1.4.2'),
        ackFrame(0x61),
        status(OtaState.DOWNLOADING, 50),
        status(OtaState.SUCCESS, 100)
      );
      const upload = vi.fn(async (_image: Uint8Array) => {});
      const session = createSession();

      await session.update(IMAGE, { upload });

      expect(upload).toHaveBeenCalledWith(IMAGE, expect.any(AbortSignal));
      expect(phases).toEqual(['service-started', 'awaiting-upload', 'completed']);
      expect(progress).toEqual([50, 100]);
    });

    it('cancels monitoring when the upload fails', async () => {
      bearer.queueReplies(stringFrame(0x60, '1.4.2'), ackFrame(0x61), null);
      const session = createSession();

      await expect(
        session.update(IMAGE, { upload: async () => Promise.reject(new Error('upload refused')) })
      ).rejects.toThrow('upload refused');
      expect(session.isCancelled).toBe(true);
      expect(phases).toEqual(['service-started', 'awaiting-upload', 'cancelled']);
    });

    it('skips the upload when cancelled during start', async () => {
      bearer.queueReplies(null);
      const upload = vi.fn(async () => {});
      const session = createSession();
      const updating = session.update(IMAGE, { upload });

      session.cancel();

      await expect(updating).rejects.toBeInstanceOf(CancelledError);
      expect(upload).not.toHaveBeenCalled();
      expect(bearer.writes).toHaveLength(1);
      expect(phases).toEqual(['cancelled']);
    });

    it('aborts the upload when the device reports an error', async () => {
      bearer.queueReplies(stringFrame(0x60, '1.4.2'), ackFrame(0x61), status(OtaState.ERROR, 30));
      const signals: AbortSignal[] = [];
      const uploader: FirmwareUploader = {
        upload: (_image, signal) =>
          new Promise<void>((_resolve, reject) => {
            signals.push(signal);
            signal.addEventListener('abort', () => reject(signal.reason));
          }),
      };

      await expect(createSession().update(IMAGE, uploader)).rejects.toBeInstanceOf(DeviceReportedError);
      expect(signals.map((signal) => signal.aborted)).toEqual([true]);
      expect(phases).toEqual(['service-started', 'awaiting-upload', 'failed']);
    });

    it('signals the uploader on cancel', async () => {
      bearer.queueReplies(stringFrame(0x60, '1.4.2'), ackFrame(0x61), null);
      const reasons: unknown[] = [];
      const session = createSession();
      const uploader: FirmwareUploader = {
        upload: (_image, signal) =>
          new Promise<void>((_resolve, reject) => {
            signal.addEventListener('abort', () => {
              reasons.push(signal.reason);
              reject(signal.reason);
            });
            session.cancel();
          }),
      };

      await expect(session.update(IMAGE, uploader)).rejects.toBeInstanceOf(CancelledError);
      expect(reasons).toHaveLength(1);
      expect(reasons[0]).toBeInstanceOf(CancelledError);
      expect(channel.isAwaiting(Domain.DEVICE)).toBe(false);
      expect(phases).toEqual(['service-started', 'awaiting-upload', 'cancelled']);
    });

    it('does not start the service after cancel', async () => {
      const session = createSession();
      session.cancel();

      await expect(session.start()).rejects.toBeInstanceOf(CancelledError);
      expect(bearer.writes).toHaveLength(0);
    });
  });
});
