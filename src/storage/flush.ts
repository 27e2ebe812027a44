/**
 * Flush result checks shared by the writers of both stores
 */

import type { StorageResult } from './types.js';

/**
 * Throws when a store could not persist its buffered writes. `fail` builds the
 * caller's own error type from the message.
 */
export function assertFlushed(
  result: StorageResult,
  store: string,
  fail: (message: string) => Error = message => new Error(message)
): void {
  if (!result.success) {
    throw fail(`${store} flush failed: ${result.errors?.join('; ') ?? 'unknown error'}`);
  }
}
