import { describe, expect, it } from 'vitest';

import {
  DeviceRejectedError,
  InvalidFrameError,
  InvalidParameterError,
  InvalidUtf8Error,
  TextTooLongError,
  TruncatedFrameError,
} from '../exceptions';
import {
  type KeyAction,
  consumerAction,
  hardwareAction,
  hidAction,
  modifierToggleAction,
  textAction,
} from '../models/actions';
import { HardwareAction, HidModifier } from '../models/enums';
import {
  decodeAction,
  encodeAction,
  encodeKeyConfigPayload,
  parseKeyConfigResponse,
  truncateUtf8,
} from './actions';

describe('encodeAction', () => {
  it('encodes a key with one text action', () => {
    const payload = encodeKeyConfigPayload({ keyId: 0, actions: [textAction('Hi', 10)] });

    expect(Array.from(payload)).toEqual([
      0x00, 0x01, 0x00, 0x00, 0x00, 0x00, 0x0a, 0x00, 0x02, 0x48, 0x69,
    ]);
  });

  it('maps HID keycode and modifiers to value and mask', () => {
    const bytes = encodeAction(hidAction(0x04, HidModifier.LEFT_SHIFT, 300), 1);
    expect(Array.from(bytes)).toEqual([1, 1, 0x04, 0x02, 0x2c, 0x01]);
  });

  it('splits consumer codes into low and high byte', () => {
    expect(Array.from(encodeAction(consumerAction(0x0223, 0), 0))).toEqual([0, 2, 0x23, 0x02, 0, 0]);
    expect(Array.from(encodeAction(consumerAction(0x00e9), 2))).toEqual([2, 2, 0xe9, 0x00, 10, 0]);
  });

  it('puts the modifier toggle mask in the mask byte', () => {
    const bytes = encodeAction(modifierToggleAction(HidModifier.LEFT_CTRL | HidModifier.LEFT_ALT), 3);
    expect(Array.from(bytes)).toEqual([3, 4, 0, 0x05, 0, 0]);
  });

  it('encodes hardware actions with their parameter', () => {
    const bytes = encodeAction(hardwareAction(HardwareAction.SCAN_TRIGGER, 1), 0);
    expect(Array.from(bytes)).toEqual([0, 3, 20, 1, 0, 0]);
  });

  it('rejects a hardware parameter wider than one byte', () => {
    expect(() => encodeAction(hardwareAction(HardwareAction.SCAN_TRIGGER, 300), 0)).toThrow(
      InvalidParameterError
    );
  });

  it('rejects out-of-range fields before encoding', () => {
    expect(() => encodeAction(hidAction(256), 0)).toThrow(InvalidParameterError);
    expect(() => encodeAction(textAction('a', 70000), 0)).toThrow(InvalidParameterError);
    expect(() => encodeAction(consumerAction(0x10000), 0)).toThrow(InvalidParameterError);
    expect(() => encodeAction(textAction('a'), 256)).toThrow(InvalidParameterError);
  });

  it('truncates text to exactly 8 bytes', () => {
    const bytes = encodeAction(textAction('ABCDEFGHIJ', 0), 0);
    expect(bytes[6]).toBe(8);
    expect(new TextDecoder().decode(bytes.subarray(7))).toBe('ABCDEFGH');
  });
});

describe('truncateUtf8', () => {
  it('keeps text of 8 bytes or fewer unchanged', () => {
    const result = truncateUtf8('ABCDEFGH');
    expect(result.truncated).toBe(false);
    expect(result.originalLength).toBe(8);
    expect(result.bytes.length).toBe(8);
  });

  it('reports the original length when truncating', () => {
    const result = truncateUtf8('ééééé');
    expect(result.truncated).toBe(true);
    expect(result.originalLength).toBe(10);
    expect(new TextDecoder().decode(result.bytes)).toBe('éééé');
  });

  it('is deterministic', () => {
    const first = truncateUtf8('aéééé');
    const second = truncateUtf8('aéééé');
    expect(first.bytes.length).toBe(8);
    expect(Array.from(first.bytes)).toEqual(Array.from(second.bytes));
  });
});

describe('decodeAction', () => {
  const samples: KeyAction[] = [
    textAction('', 0),
    textAction('Hi', 10),
    textAction('ABCDEFGH', 65535),
    textAction('€uro', 5),
    hidAction(0x28, HidModifier.RIGHT_GUI, 20),
    consumerAction(0x0223, 15),
    modifierToggleAction(HidModifier.LEFT_SHIFT, 0),
    hardwareAction(HardwareAction.SCAN_TRIGGER, 255, 1000),
  ];

  it.each(samples)('round-trips $kind actions', (action) => {
    const bytes = encodeAction(action, 4);
    expect(decodeAction(bytes, 0)).toEqual({ action, nextOffset: bytes.length });
  });

  it('decodes from an offset inside a larger buffer', () => {
    const buffer = Uint8Array.of(0xaa, 0xbb, 0, 1, 0x04, 0x00, 0x0a, 0x00);
    expect(decodeAction(buffer, 2)).toEqual({
      action: { kind: 'hid', keycode: 0x04, modifiers: 0, delayMs: 10 },
      nextOffset: 8,
    });
  });

  it('fails when fewer than 6 bytes remain', () => {
    expect(() => decodeAction(Uint8Array.of(0, 1, 4), 0)).toThrow(TruncatedFrameError);
  });

  it('fails when the text length byte is missing', () => {
    expect(() => decodeAction(Uint8Array.of(0, 0, 0, 0, 0, 0), 0)).toThrow(TruncatedFrameError);
  });

  it('fails when text bytes are cut short', () => {
    expect(() => decodeAction(Uint8Array.of(0, 0, 0, 0, 0, 0, 3, 0x41), 0)).toThrow(TruncatedFrameError);
  });

  it('fails on a text length above 8', () => {
    const bytes = Uint8Array.of(0, 0, 0, 0, 0, 0, 9, 1, 2, 3, 4, 5, 6, 7, 8, 9);
    expect(() => decodeAction(bytes, 0)).toThrow(TextTooLongError);
  });

  it('reports invalid UTF-8 with the offset past the text', () => {
    const bytes = Uint8Array.of(0, 0, 0, 0, 5, 0, 2, 0xff, 0xfe, 0x99);

    let caught: unknown;
    try {
      decodeAction(bytes, 0);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InvalidUtf8Error);
    if (caught instanceof InvalidUtf8Error) {
      expect(caught.nextOffset).toBe(9);
      expect(Array.from(caught.bytes)).toEqual([0xff, 0xfe]);
    }
  });

  it('rejects unknown type tags', () => {
    expect(() => decodeAction(Uint8Array.of(0, 7, 0, 0, 0, 0), 0)).toThrow(InvalidFrameError);
  });
});

describe('encodeKeyConfigPayload', () => {
  it('rejects invalid key IDs', () => {
    expect(() => encodeKeyConfigPayload({ keyId: 20, actions: [] })).toThrow(InvalidParameterError);
    expect(() => encodeKeyConfigPayload({ keyId: 116, actions: [] })).toThrow(InvalidParameterError);
  });

  it('rejects more than 10 actions', () => {
    const actions = Array.from({ length: 11 }, () => hidAction(0x04));
    expect(() => encodeKeyConfigPayload({ keyId: 1, actions })).toThrow(InvalidParameterError);
  });

  it('accepts long-press keys and an empty action list', () => {
    expect(Array.from(encodeKeyConfigPayload({ keyId: 115, actions: [] }))).toEqual([115, 0]);
  });
});

describe('parseKeyConfigResponse', () => {
  it('parses key header and actions', () => {
    const frame = Uint8Array.of(
      0x00, 0x11, 0x03, 0x01, 0x02,
      0, 0, 0, 0, 5, 0, 2, 0x6f, 0x6b,
      1, 1, 0x04, 0x02, 0, 0
    );

    expect(parseKeyConfigResponse(frame)).toEqual({
      keyId: 3,
      enabled: true,
      actions: [
        { kind: 'text', text: 'ok', delayMs: 5 },
        { kind: 'hid', keycode: 0x04, modifiers: 0x02, delayMs: 0 },
      ],
      issues: [],
    });
  });

  it('substitutes a placeholder for invalid UTF-8 and keeps decoding', () => {
    const frame = Uint8Array.of(
      0x00, 0x11, 0x03, 0x00, 0x03,
      0, 0, 0, 0, 5, 0, 2, 0x6f, 0x6b,
      1, 0, 0, 0, 7, 0, 2, 0xff, 0xfe,
      2, 1, 0x05, 0x00, 0, 0
    );

    const config = parseKeyConfigResponse(frame);

    expect(config.enabled).toBe(false);
    expect(config.actions).toEqual([
      { kind: 'text', text: 'ok', delayMs: 5 },
      { kind: 'text', text: '<INVALID_UTF8_fffe>', delayMs: 7 },
      { kind: 'hid', keycode: 0x05, modifiers: 0, delayMs: 0 },
    ]);
    expect(config.issues).toEqual([
      { actionIndex: 1, message: 'Text payload is not valid UTF-8 (2 bytes)' },
    ]);
  });

  it('propagates structural errors', () => {
    const frame = Uint8Array.of(0x00, 0x11, 0x03, 0x01, 0x02, 1, 1, 0x04, 0x02, 0, 0);
    expect(() => parseKeyConfigResponse(frame)).toThrow(TruncatedFrameError);
  });

  it('rejects a nonzero status', () => {
    expect(() => parseKeyConfigResponse(Uint8Array.of(0x03, 0x11))).toThrow(DeviceRejectedError);
  });
});
