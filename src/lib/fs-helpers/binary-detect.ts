import * as fs from 'node:fs/promises';

import { BINARY_RATIO_THRESHOLD, TEXT_SAMPLE_SIZE } from '../constants.js';
import { countContinuationBytes } from './readers/utf8.js';

const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;

function isControlByte(byte: number): boolean {
  if (byte === TAB || byte === LF || byte === CR) return false;
  return byte < 0x20;
}

function countControlBytes(sample: Uint8Array): number {
  let count = 0;
  for (const byte of sample) {
    // NUL falls in the control range
    if (isControlByte(byte)) count++;
  }
  return count;
}

/**
 * Classify a head-of-file sample. Control bytes (including NUL) and UTF-8
 * continuation bytes count as non-text, so text dominated by multi-byte
 * characters classifies as binary. An empty sample is text.
 */
export function isTextSample(sample: Uint8Array): boolean {
  if (sample.length === 0) return true;

  const nonText = countControlBytes(sample) + countContinuationBytes(sample);
  return nonText / sample.length < BINARY_RATIO_THRESHOLD;
}

async function readSample(
  handle: fs.FileHandle,
  sampleSize: number
): Promise<Uint8Array> {
  const buffer = Buffer.allocUnsafe(sampleSize);
  // Positional read: the handle's own read position is left at byte 0.
  const { bytesRead } = await handle.read(buffer, 0, sampleSize, 0);
  return buffer.subarray(0, bytesRead);
}

export async function looksLikeText(
  filePath: string,
  existingHandle?: fs.FileHandle,
  sampleSize: number = TEXT_SAMPLE_SIZE
): Promise<boolean> {
  if (existingHandle) {
    return isTextSample(await readSample(existingHandle, sampleSize));
  }

  const handle = await fs.open(filePath, 'r');
  try {
    return isTextSample(await readSample(handle, sampleSize));
  } finally {
    await handle.close();
  }
}
