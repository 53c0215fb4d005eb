import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import type { Dirent, Stats } from 'node:fs';

import type {
  CollectResult,
  FileCandidate,
  FilenameMatcher,
  SearchWarning,
} from '../../../config/types.js';
import { createDetailedError, ErrorCode, SearchError } from '../../errors.js';
import { includeFile } from './filename-filter.js';

export interface CollectOptions {
  recursive: boolean;
  include?: FilenameMatcher;
  exclude?: FilenameMatcher;
}

export type CollectEvent =
  | { kind: 'file'; candidate: FileCandidate }
  | { kind: 'warning'; warning: SearchWarning };

type StatResult = { stats: Stats } | { warning: SearchWarning };

function compareNames(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

async function statPath(target: string): Promise<StatResult> {
  try {
    return { stats: await fs.stat(target) };
  } catch (error) {
    return { warning: createDetailedError(error, target) };
  }
}

async function readDirectoryEntries(
  dirPath: string
): Promise<Dirent[] | SearchWarning> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries.sort(compareNames);
  } catch (error) {
    return createDetailedError(error, dirPath);
  }
}

function accepts(name: string, options: CollectOptions): boolean {
  return includeFile(name, options.include, options.exclude);
}

async function* walkDirectory(
  dirPath: string,
  options: CollectOptions
): AsyncGenerator<CollectEvent> {
  const entries = await readDirectoryEntries(dirPath);
  if (!Array.isArray(entries)) {
    yield { kind: 'warning', warning: entries };
    return;
  }

  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);
    const result = await statPath(fullPath);
    if ('warning' in result) {
      yield { kind: 'warning', warning: result.warning };
      continue;
    }

    const { stats } = result;
    if (stats.isDirectory()) {
      // Linked directories are not descended; the walk cannot cycle.
      if (options.recursive && !entry.isSymbolicLink()) {
        yield* walkDirectory(fullPath, options);
      }
      continue;
    }

    if (stats.isFile() && accepts(entry.name, options)) {
      yield { kind: 'file', candidate: { path: fullPath, stats } };
    }
  }
}

function notRegularFileWarning(root: string): SearchWarning {
  return createDetailedError(
    new SearchError(
      ErrorCode.E_NOT_FILE,
      `Not a regular file or directory: ${root}`,
      root
    )
  );
}

/**
 * Lazily walk the roots in order, yielding accepted files and per-path
 * warnings. Directory entries are visited in name order, depth-first.
 */
export async function* iterateCandidates(
  roots: readonly string[],
  options: CollectOptions
): AsyncGenerator<CollectEvent> {
  for (const root of roots) {
    const result = await statPath(root);
    if ('warning' in result) {
      yield { kind: 'warning', warning: result.warning };
      continue;
    }

    const { stats } = result;
    if (stats.isDirectory()) {
      yield* walkDirectory(root, options);
    } else if (stats.isFile()) {
      if (accepts(path.basename(root), options)) {
        yield { kind: 'file', candidate: { path: root, stats } };
      }
    } else {
      yield { kind: 'warning', warning: notRegularFileWarning(root) };
    }
  }
}

export async function collectFiles(
  roots: readonly string[],
  options: CollectOptions
): Promise<CollectResult> {
  const files: FileCandidate[] = [];
  const warnings: SearchWarning[] = [];

  for await (const event of iterateCandidates(roots, options)) {
    if (event.kind === 'file') {
      files.push(event.candidate);
    } else {
      warnings.push(event.warning);
    }
  }

  return { files, warnings };
}
