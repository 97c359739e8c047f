/**
 * Directory Walker
 * 
 * Streaming traversal shared by the size probe and the archiver's file
 * count pass. Directories are read one at a time through `opendir`, so only
 * the pending directory paths are held in memory, never the file list.
 * Symbolic links are reported but never followed.
 */

import type { Dir } from 'node:fs';
import { lstat, opendir } from 'node:fs/promises';
import { join } from 'node:path';
import { ok, err, type Result } from '@cruise-packager/core';
import { isErrnoException } from '@cruise-packager/utils';

export type WalkFailureKind = 'permission-denied';

export interface WalkFailure {
  kind: WalkFailureKind;
  path: string;
  code: string;
}

export type WalkEntry =
  | { type: 'file'; path: string; size: number }
  | { type: 'unreadable'; path: string; failure: WalkFailure };

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);

function toWalkFailure(path: string, error: unknown): WalkFailure | null {
  if (isErrnoException(error) && error.code !== undefined && PERMISSION_CODES.has(error.code)) {
    return { kind: 'permission-denied', path, code: error.code };
  }
  return null;
}

async function openDirectory(path: string): Promise<Result<Dir, WalkFailure>> {
  try {
    return ok(await opendir(path));
  } catch (error) {
    const failure = toWalkFailure(path, error);
    if (failure) {
      return err(failure);
    }
    throw error;
  }
}

async function fileSize(path: string): Promise<Result<number, WalkFailure>> {
  try {
    const stats = await lstat(path);
    return ok(stats.size);
  } catch (error) {
    const failure = toWalkFailure(path, error);
    if (failure) {
      return err(failure);
    }
    throw error;
  }
}

/**
 * Yield every regular file below `root` (or `root` itself when it is a file),
 * plus every subtree that could not be read
 */
export async function* walkRegularFiles(root: string): AsyncGenerator<WalkEntry> {
  const rootStats = await lstat(root);
  if (rootStats.isFile()) {
    yield { type: 'file', path: root, size: rootStats.size };
    return;
  }
  if (!rootStats.isDirectory()) {
    return;
  }

  const pending: string[] = [root];

  while (pending.length > 0) {
    const current = pending.pop();
    if (current === undefined) {
      break;
    }

    const opened = await openDirectory(current);
    if (!opened.ok) {
      yield { type: 'unreadable', path: current, failure: opened.error };
      continue;
    }

    for await (const dirent of opened.value) {
      const entryPath = join(current, dirent.name);

      if (dirent.isDirectory()) {
        pending.push(entryPath);
      } else if (dirent.isFile()) {
        const size = await fileSize(entryPath);
        if (size.ok) {
          yield { type: 'file', path: entryPath, size: size.value };
        } else {
          yield { type: 'unreadable', path: entryPath, failure: size.error };
        }
      }
    }
  }
}
