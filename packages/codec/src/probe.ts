/**
 * Format detection and reader selection.
 *
 *   const reader = createStlReader(new MemorySource(bytes));
 *   for (const triangle of reader) { ... }
 */

import { AsciiStlReader, SOLID_PREFIX } from './ascii-reader.js';
import { BinaryStlReader } from './binary-reader.js';
import { indexTriangles } from './indexer.js';
import { BufferedReader, type ByteSource } from './io.js';
import type { IndexedMesh, StlFormat, TriangleReader } from './mesh.js';
import { resolveReaderOptions, type ReaderOptions } from './options.js';

/**
 * Peek at the first line to pick a decoder, then seek back to where the
 * source was. A first line that cannot be read (I/O error, not UTF-8)
 * means binary; a failing seek is rethrown.
 */
export function probeStlFormat(source: ByteSource, options?: ReaderOptions): StlFormat {
  const { bufferSize, logger } = resolveReaderOptions(options);
  const start = source.position;
  let line: string | null = null;
  let readError: unknown;
  try {
    line = new BufferedReader(source, bufferSize).readLine();
  } catch (err) {
    readError = err;
  }
  source.seek(start);

  if (readError !== undefined) {
    logger.debug(`probe: first line unreadable, assuming binary (${String(readError)})`);
    return 'binary';
  }
  const format = line !== null && line.startsWith(SOLID_PREFIX) ? 'ascii' : 'binary';
  logger.debug(`probe: ${format}`);
  return format;
}

/** Probe the source and open the matching reader at its start. */
export function createStlReader(source: ByteSource, options?: ReaderOptions): TriangleReader {
  return probeStlFormat(source, options) === 'ascii'
    ? AsciiStlReader.create(source, options)
    : BinaryStlReader.create(source, options);
}

/** Decode either format straight into an indexed mesh. */
export function readStl(source: ByteSource, options?: ReaderOptions): IndexedMesh {
  return indexTriangles(createStlReader(source, options), options);
}
