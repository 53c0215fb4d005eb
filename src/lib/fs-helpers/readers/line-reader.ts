import type { FileHandle } from 'node:fs/promises';

import { DEFAULT_READ_BUFFER_SIZE } from '../../constants.js';

const LF = 0x0a;
const CR = 0x0d;

/**
 * One raw read of a line. Lines longer than the fragment size arrive as
 * several fragments; only the last one is `terminal`.
 */
export interface LineFragment {
  bytes: Buffer;
  terminal: boolean;
  /** True when the line was ended by a newline rather than by EOF. */
  eol: boolean;
}

/** Splits a byte stream into line fragments of at most `maxFragment` bytes. */
export class FragmentSplitter {
  private readonly maxFragment: number;
  private parts: Buffer[] = [];
  private size = 0;

  constructor(maxFragment: number) {
    if (!Number.isInteger(maxFragment) || maxFragment < 1) {
      throw new RangeError(`Invalid fragment size: ${maxFragment}`);
    }
    this.maxFragment = maxFragment;
  }

  *push(chunk: Buffer): Generator<LineFragment> {
    let offset = 0;
    while (offset < chunk.length) {
      const newline = chunk.indexOf(LF, offset);
      const end = newline === -1 ? chunk.length : newline;
      yield* this.accumulate(chunk.subarray(offset, end));
      if (newline === -1) return;
      yield this.flush(true, true);
      offset = newline + 1;
    }
  }

  *end(): Generator<LineFragment> {
    if (this.size > 0) yield this.flush(true, false);
  }

  private *accumulate(segment: Buffer): Generator<LineFragment> {
    let rest = segment;
    while (rest.length > 0) {
      if (this.size === this.maxFragment) {
        yield this.flush(false, false);
      }
      const take = Math.min(this.maxFragment - this.size, rest.length);
      this.parts.push(rest.subarray(0, take));
      this.size += take;
      rest = rest.subarray(take);
    }
  }

  private flush(terminal: boolean, eol: boolean): LineFragment {
    const bytes =
      this.parts.length === 1 && this.parts[0]
        ? this.parts[0]
        : Buffer.concat(this.parts, this.size);
    this.parts = [];
    this.size = 0;
    return { bytes, terminal, eol };
  }
}

/**
 * Reassembles fragments into logical lines. Decoding happens once the line
 * is complete, so multi-byte characters split across fragments survive.
 */
export class LineBuffer {
  private parts: Buffer[] = [];
  private size = 0;

  get pendingBytes(): number {
    return this.size;
  }

  append(fragment: LineFragment): string | undefined {
    this.parts.push(fragment.bytes);
    this.size += fragment.bytes.length;
    if (!fragment.terminal) return undefined;
    return this.take(fragment.eol);
  }

  reset(): void {
    this.parts = [];
    this.size = 0;
  }

  private take(eol: boolean): string {
    let bytes = Buffer.concat(this.parts, this.size);
    this.reset();
    if (eol && bytes.length > 0 && bytes[bytes.length - 1] === CR) {
      bytes = bytes.subarray(0, bytes.length - 1);
    }
    return bytes.toString('utf8');
  }
}

export interface ReadLinesOptions {
  fragmentSize?: number;
}

/** Stream the logical lines of a file from byte 0. */
export async function* readLines(
  handle: FileHandle,
  options: ReadLinesOptions = {}
): AsyncGenerator<string> {
  const splitter = new FragmentSplitter(
    options.fragmentSize ?? DEFAULT_READ_BUFFER_SIZE
  );
  const lineBuffer = new LineBuffer();
  const stream = handle.createReadStream({ start: 0, autoClose: false });
  const chunks: AsyncIterable<Buffer> = stream;

  try {
    for await (const chunk of chunks) {
      for (const fragment of splitter.push(chunk)) {
        const line = lineBuffer.append(fragment);
        if (line !== undefined) yield line;
      }
    }
    for (const fragment of splitter.end()) {
      const line = lineBuffer.append(fragment);
      if (line !== undefined) yield line;
    }
  } finally {
    stream.destroy();
  }
}
