import { createHash } from 'node:crypto';
import { channel } from 'node:diagnostics_channel';

import type { FileScanOutcome, FileScanStatus } from '../../config/types.js';

type DiagnosticsDetail = 0 | 1 | 2;

export interface ScanDiagnosticsEvent {
  phase: 'start' | 'end';
  path?: string;
  durationMs?: number;
  status?: FileScanStatus;
  matches?: number;
  error?: string;
}

export const SCAN_CHANNEL_NAME = 'snipgrep:scan';

const SCAN_CHANNEL = channel(SCAN_CHANNEL_NAME);

function parseDiagnosticsEnabled(): boolean {
  const raw = process.env.SNIPGREP_DIAGNOSTICS;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

function parseDiagnosticsDetail(): DiagnosticsDetail {
  const raw = process.env.SNIPGREP_DIAGNOSTICS_DETAIL;
  if (!raw) return 0;
  const normalized = raw.trim();
  if (normalized === '2') return 2;
  if (normalized === '1') return 1;
  return 0;
}

function hashPath(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16);
}

export function normalizePathForDiagnostics(path: string): string | undefined {
  const detail = parseDiagnosticsDetail();
  if (detail === 0) return undefined;
  if (detail === 2) return path;
  return hashPath(path);
}

function resolveDurationMs(startNs: bigint): number {
  const endNs = process.hrtime.bigint();
  return Number(endNs - startNs) / 1_000_000;
}

function resolveErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export async function withScanDiagnostics(
  filePath: string,
  run: () => Promise<FileScanOutcome>
): Promise<FileScanOutcome> {
  if (!parseDiagnosticsEnabled() || !SCAN_CHANNEL.hasSubscribers) {
    return await run();
  }

  const path = normalizePathForDiagnostics(filePath);
  const startNs = process.hrtime.bigint();
  SCAN_CHANNEL.publish({
    phase: 'start',
    path,
  } satisfies ScanDiagnosticsEvent);

  try {
    const outcome = await run();
    SCAN_CHANNEL.publish({
      phase: 'end',
      path,
      status: outcome.status,
      matches: outcome.matches,
      durationMs: resolveDurationMs(startNs),
    } satisfies ScanDiagnosticsEvent);
    return outcome;
  } catch (error: unknown) {
    SCAN_CHANNEL.publish({
      phase: 'end',
      path,
      status: 'failed',
      error: resolveErrorMessage(error),
      durationMs: resolveDurationMs(startNs),
    } satisfies ScanDiagnosticsEvent);
    throw error;
  }
}
