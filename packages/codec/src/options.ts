/**
 * Reader, writer and validator options.
 *
 * Numeric settings are checked with zod and filled with defaults on parse,
 * so every entry point sees a complete, valid config.
 */

import { z } from 'zod';
import { F32_EPSILON } from './vec3.js';

/** Anything with console-style `debug` and `warn`, e.g. `console` itself. */
export type Logger = Pick<Console, 'debug' | 'warn'>;

export const silentLogger: Logger = {
  debug: () => {},
  warn: () => {},
};

const bufferSize = z.number().int().positive().max(1 << 30)
  .describe('Chunk size in bytes for buffered reads and writes');

export const readerOptionsSchema = z.object({
  bufferSize: bufferSize.default(8192),
});

export const writerOptionsSchema = z.object({
  bufferSize: bufferSize.default(8192),
});

export const validateOptionsSchema = z.object({
  areaEpsilon: z.number().finite().positive().default(F32_EPSILON)
    .describe('Faces with a smaller area are rejected as degenerate'),
});

interface WithLogger {
  logger?: Logger;
}

export type ReaderOptions = z.input<typeof readerOptionsSchema> & WithLogger;
export type WriterOptions = z.input<typeof writerOptionsSchema>;
export type ValidateOptions = z.input<typeof validateOptionsSchema>;

export interface ResolvedReaderOptions extends z.output<typeof readerOptionsSchema> {
  logger: Logger;
}

export function resolveReaderOptions(options: ReaderOptions = {}): ResolvedReaderOptions {
  const { logger, ...rest } = options;
  return { ...readerOptionsSchema.parse(rest), logger: logger ?? silentLogger };
}

export function resolveWriterOptions(options: WriterOptions = {}): z.output<typeof writerOptionsSchema> {
  return writerOptionsSchema.parse(options);
}

export function resolveValidateOptions(options: ValidateOptions = {}): z.output<typeof validateOptionsSchema> {
  return validateOptionsSchema.parse(options);
}
