export function isContinuationByte(byte: number): boolean {
  return (byte & 0xc0) === 0x80;
}

/**
 * Count bytes that cannot start a character: every 0x80-0xBF byte, whether
 * it trails a valid lead or stands alone.
 */
export function countContinuationBytes(bytes: Uint8Array): number {
  let count = 0;
  for (const byte of bytes) {
    if (isContinuationByte(byte)) count++;
  }
  return count;
}
