/**
 * Reading source files as strict UTF-8
 */

import fs from 'node:fs';
import { FileIOError } from '../errors/index.js';

// ignoreBOM keeps a leading BOM in the text so the extractor can restore it
const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Read a file as UTF-8 text. Bytes that are not valid UTF-8 fail the read
 * instead of being replaced, since the text is written back.
 */
export async function readSourceFile(filePath: string): Promise<string> {
  let bytes: Buffer;
  try {
    bytes = await fs.promises.readFile(filePath);
  } catch (error) {
    throw new FileIOError(filePath, 'read', error);
  }

  try {
    return decoder.decode(bytes);
  } catch (error) {
    throw new FileIOError(filePath, 'decode', error);
  }
}
