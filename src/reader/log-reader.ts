/**
 * Log reader - decodes log files into the text the correlator consumes
 */

import fs from 'node:fs';
import path from 'node:path';
import type { LogEncoding } from '../config/schema.js';

/**
 * Decode raw log bytes. Undecodable sequences become U+FFFD rather than
 * failing the read.
 */
export function decodeLogBytes(data: Uint8Array, encoding: LogEncoding): string {
  return new TextDecoder(encoding).decode(data);
}

export async function readLogFile(logFile: string, encoding: LogEncoding): Promise<string> {
  const absolutePath = path.resolve(logFile);

  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Log file not found: ${absolutePath}`);
  }

  const data = await fs.promises.readFile(absolutePath);
  return decodeLogBytes(data, encoding);
}
