/**
 * Filesystem helpers shared by the workspace and artifact stages.
 */

import { Stats } from 'fs';
import * as fs from 'fs/promises';

/** Shape check: errors from `fs` may come from another realm, where `instanceof Error` is false. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err;
}

/** Directory entries, or undefined when the directory does not exist. */
export async function listDir(dir: string): Promise<string[] | undefined> {
  try {
    return await fs.readdir(dir);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return undefined;
    throw err;
  }
}

/** lstat that yields undefined for a missing path (a dangling link still counts as present). */
export async function lstatOrUndefined(p: string): Promise<Stats | undefined> {
  try {
    return await fs.lstat(p);
  } catch (err) {
    if (isErrnoException(err) && err.code === 'ENOENT') return undefined;
    throw err;
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
