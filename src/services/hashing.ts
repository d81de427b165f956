// src/services/hashing.ts
// What: Content hashing for deduplication.
// How: Streams the file through SHA-256. A vanished, unreadable or empty file yields HashUnavailable;
//      callers leave such files where they are.

import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { HashUnavailable, errorMessage } from '../errors.js';

export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  let bytes = 0;
  try {
    for await (const chunk of createReadStream(filePath)) {
      const buf = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      bytes += buf.length;
      hash.update(buf);
    }
  } catch (err) {
    throw new HashUnavailable(filePath, `Could not calculate hash for ${filePath}: ${errorMessage(err)}`, err);
  }
  if (bytes === 0) {
    throw new HashUnavailable(filePath, `Empty file has no usable hash: ${filePath}`);
  }
  return hash.digest('hex');
}
