import { createHash } from 'node:crypto';

import stringify from 'fast-json-stable-stringify';

/** sha256 over the key-sorted JSON form of `value`. */
export function fingerprint(value: unknown): string {
  const hash = createHash('sha256');
  hash.update(stringify(value));
  return hash.digest('hex');
}
