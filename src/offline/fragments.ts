/**
 * Multi-fragment transport for payloads larger than one optical code.
 *
 * The payload is compressed and base64-encoded into one string, then cut
 * into frames `$LUA1:...$`, `$LUA2:...$`, ..., with the last one always
 * `$LUAX:...$`. Scanning the final frame makes the device reassemble and
 * run the script.
 */

import {
  FragmentSequenceError,
  FragmentTooSmallError,
  InvalidFrameError,
  InvalidParameterError,
  TooManyFragmentsError,
} from '../exceptions';
import { fromBase64, toBase64 } from '../encoding/bytes';
import { compressPayload, decompressPayload } from '../encoding/compression';
import { DEFAULT_COMPRESSION_LEVEL, MAX_FRAGMENTS } from '../protocol/constants';

export const DEFAULT_MAX_FRAGMENT_TEXT = 1000;
export const FINAL_FRAGMENT_PREFIX = '$LUAX:';

const FRAGMENT_PATTERN = /^\$LUA(X|[1-9][0-9]?):([^$]+)\$$/;

export interface ScriptFragment {
  /** 1-based position. */
  fragmentNumber: number;
  totalFragments: number;
  /** Slice of the base64 text. */
  payload: string;
  isFinal: boolean;
}

export interface FragmentOptions {
  /**
   * Maximum characters per frame, markers included (default: 1000)
   */
  maxFragmentText?: number;

  /**
   * zlib level 1-9 (default: 6)
   */
  compressionLevel?: number;
}

/**
 * Marker characters around a fragment: `$LUA<n>:` plus the closing `$`.
 */
export function fragmentOverhead(fragmentNumber: number): number {
  return fragmentNumber <= 9 ? 7 : 8;
}

/**
 * Compress `content` and cut the base64 text into fragments.
 *
 * @param content - Raw payload bytes
 * @param maxFragmentText - Maximum characters per frame, markers included
 * @param compressionLevel - zlib level 1-9
 * @throws {FragmentTooSmallError} If a fragment would have no room for payload
 * @throws {TooManyFragmentsError} If more than 99 fragments would be needed
 */
export function splitFragments(
  content: Uint8Array,
  maxFragmentText: number = DEFAULT_MAX_FRAGMENT_TEXT,
  compressionLevel: number = DEFAULT_COMPRESSION_LEVEL
): ScriptFragment[] {
  if (!Number.isInteger(maxFragmentText) || maxFragmentText < 1) {
    throw new InvalidParameterError('maxFragmentText', maxFragmentText, 'must be a positive integer');
  }

  const encoded = toBase64(compressPayload(content, compressionLevel));
  const slices: string[] = [];
  let cursor = 0;
  let fragmentNumber = 1;

  for (;;) {
    if (fragmentNumber > MAX_FRAGMENTS) {
      throw new TooManyFragmentsError(MAX_FRAGMENTS);
    }
    const available = maxFragmentText - fragmentOverhead(fragmentNumber);
    if (available <= 0) {
      throw new FragmentTooSmallError(fragmentNumber, maxFragmentText);
    }

    if (encoded.length - cursor <= available) {
      slices.push(encoded.slice(cursor));
      break;
    }
    slices.push(encoded.slice(cursor, cursor + available));
    cursor += available;
    fragmentNumber++;
  }

  console.debug(
    `Split ${content.length} bytes into ${slices.length} fragment(s) (${encoded.length} base64 chars)`
  );

  return slices.map((payload, i) => ({
    fragmentNumber: i + 1,
    totalFragments: slices.length,
    payload,
    isFinal: i === slices.length - 1,
  }));
}

/**
 * Rebuild the payload from a complete, ordered fragment list.
 *
 * @throws {FragmentSequenceError} On missing, duplicated or reordered
 *   fragments, inconsistent totals or a misplaced final marker
 * @throws {InvalidFrameError} If the joined text is not base64
 * @throws {CorruptCompressedDataError} If the stream does not inflate
 */
export function reassembleFragments(fragments: readonly ScriptFragment[]): Uint8Array {
  if (fragments.length === 0) {
    throw new FragmentSequenceError('No fragments to reassemble');
  }

  const total = fragments[0].totalFragments;
  if (total !== fragments.length) {
    throw new FragmentSequenceError(`Expected ${total} fragments, got ${fragments.length}`);
  }

  fragments.forEach((fragment, i) => {
    if (fragment.fragmentNumber !== i + 1) {
      throw new FragmentSequenceError(
        `Fragment at position ${i + 1} is numbered ${fragment.fragmentNumber}`
      );
    }
    if (fragment.totalFragments !== total) {
      throw new FragmentSequenceError(
        `Fragment ${fragment.fragmentNumber} reports ${fragment.totalFragments} total, expected ${total}`
      );
    }
    if (fragment.isFinal !== (i === total - 1)) {
      throw new FragmentSequenceError(
        fragment.isFinal
          ? `Fragment ${fragment.fragmentNumber} marked final before the end`
          : `Last fragment ${fragment.fragmentNumber} is not marked final`
      );
    }
  });

  return decompressPayload(fromBase64(fragments.map((f) => f.payload).join('')));
}

/**
 * Text frame for one fragment.
 */
export function formatFragment(fragment: ScriptFragment): string {
  return fragment.isFinal
    ? `${FINAL_FRAGMENT_PREFIX}${fragment.payload}$`
    : `$LUA${fragment.fragmentNumber}:${fragment.payload}$`;
}

export interface ParsedFragmentFrame {
  /** `null` for the final frame, which carries no number. */
  fragmentNumber: number | null;
  payload: string;
  isFinal: boolean;
}

/**
 * Parse a `$LUA<n>:...$` or `$LUAX:...$` frame.
 *
 * @throws {InvalidFrameError}
 */
export function parseFragmentFrame(text: string): ParsedFragmentFrame {
  const match = FRAGMENT_PATTERN.exec(text);
  if (!match) {
    throw new InvalidFrameError('Not a script fragment frame');
  }
  const [, marker, payload] = match;
  return marker === 'X'
    ? { fragmentNumber: null, payload, isFinal: true }
    : { fragmentNumber: Number(marker), payload, isFinal: false };
}

/**
 * UTF-8 encode a script and split it into fragments.
 *
 * @throws {InvalidParameterError} If the script is blank
 */
export function buildScriptFragments(script: string, options: FragmentOptions = {}): ScriptFragment[] {
  if (script.trim().length === 0) {
    throw new InvalidParameterError('script', '', 'script content cannot be empty');
  }
  return splitFragments(
    new TextEncoder().encode(script),
    options.maxFragmentText ?? DEFAULT_MAX_FRAGMENT_TEXT,
    options.compressionLevel ?? DEFAULT_COMPRESSION_LEVEL
  );
}

/**
 * Receiving-side reassembly of scanned fragment frames, in scan order.
 *
 * Intermediate frames must arrive numbered 1, 2, 3, ...; the `$LUAX:`
 * frame completes the payload.
 */
export class FragmentAssembler {
  private payloads: string[] = [];

  /**
   * Number of intermediate fragments held.
   */
  get received(): number {
    return this.payloads.length;
  }

  /**
   * Accept one scanned frame.
   *
   * @returns The reassembled payload on the final frame, otherwise `null`
   * @throws {FragmentSequenceError} If an intermediate frame is out of order;
   *   the assembler is reset
   */
  push(text: string): Uint8Array | null {
    const frame = parseFragmentFrame(text);

    if (!frame.isFinal) {
      const expected = this.payloads.length + 1;
      if (frame.fragmentNumber !== expected) {
        this.reset();
        throw new FragmentSequenceError(
          `Expected fragment ${expected}, got ${frame.fragmentNumber}`
        );
      }
      this.payloads.push(frame.payload);
      return null;
    }

    const joined = [...this.payloads, frame.payload].join('');
    this.reset();
    return decompressPayload(fromBase64(joined));
  }

  reset(): void {
    this.payloads = [];
  }
}
