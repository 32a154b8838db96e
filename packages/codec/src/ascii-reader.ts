/**
 * ASCII STL reader.
 *
 *   solid <name>
 *     facet normal nx ny nz
 *       outer loop
 *         vertex x y z   (x3)
 *       endloop
 *     endfacet           (repeated)
 *   endsolid <name>
 *
 * Line-oriented: each non-blank line is split on whitespace and must match
 * the grammar token for token. One facet block is consumed per `next()`.
 */

import { StlError } from './errors.js';
import { BufferedReader, type ByteSource } from './io.js';
import type { Triangle, TriangleReader } from './mesh.js';
import { resolveReaderOptions, type Logger, type ReaderOptions } from './options.js';
import type { Vec3 } from './vec3.js';

export const SOLID_PREFIX = 'solid ';

const FLOAT_TOKEN = /^[+-]?(?:(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?|inf|infinity|nan)$/i;

const f32 = new Float32Array(1);
const f32Bits = new Uint32Array(f32.buffer);

/** Next float32 above a non-negative float32 (Infinity past the largest). */
function nextUp(x: number): number {
  f32[0] = x;
  f32Bits[0]++;
  return f32[0];
}

function nextDown(x: number): number {
  f32[0] = x;
  f32Bits[0]--;
  return f32[0];
}

/** Sign of (decimal literal - m); `token` is unsigned and `m` a finite double. */
function compareDecimal(token: string, m: number): number {
  const [mantissa, exp = '0'] = token.toLowerCase().split('e');
  const [intPart, fracPart = ''] = mantissa.split('.');
  const digits = BigInt(`${intPart}${fracPart}` || '0');
  const e10 = Number(exp) - fracPart.length;

  // m = scaled * 2^e2 with an integer `scaled`
  let scaled = m;
  let e2 = 0;
  while (!Number.isInteger(scaled)) {
    scaled *= 2;
    e2--;
  }

  const lhs = digits * 10n ** BigInt(Math.max(e10, 0)) * 2n ** BigInt(Math.max(-e2, 0));
  const rhs = BigInt(scaled) * 2n ** BigInt(Math.max(e2, 0)) * 10n ** BigInt(Math.max(-e10, 0));
  return lhs === rhs ? 0 : lhs > rhs ? 1 : -1;
}

/**
 * Round an unsigned decimal literal to the nearest float32, ties to even.
 * When the double nearest the literal is exactly a float32 midpoint, the
 * direction comes from the literal's exact decimal value.
 */
function roundToF32(token: string): number {
  const d = Number(token);
  const r = Math.fround(d);
  if (r === d || !Number.isFinite(d)) return r;
  const lower = r < d ? r : nextDown(r);
  const upper = r < d ? nextUp(r) : r;
  const midpoint = (lower + (upper === Infinity ? 2 ** 128 : upper)) / 2;
  if (midpoint !== d) return r;
  const cmp = compareDecimal(token, d);
  return cmp > 0 ? upper : cmp < 0 ? lower : r;
}

/** Parse one token as a finite float32, or throw `invalid-number`. */
export function parseF32(token: string): number {
  if (!FLOAT_TOKEN.test(token)) {
    throw new StlError('invalid-number', `Invalid float literal "${token}"`, { token });
  }
  const negative = token.startsWith('-');
  const unsigned = /^[+-]/.test(token) ? token.slice(1) : token;
  // inf/nan spellings come out of Number() as NaN or Infinity
  const magnitude = roundToF32(unsigned);
  const value = negative ? -magnitude : magnitude;
  if (!Number.isFinite(value)) {
    throw new StlError('invalid-number', `Expected finite f32, got "${token}" (${value})`, { token });
  }
  return value;
}

function parseVec3(tokens: readonly string[]): Vec3 {
  return [parseF32(tokens[0]), parseF32(tokens[1]), parseF32(tokens[2])];
}

/** Solid names compare with runs of whitespace collapsed to one space. */
function normalizeName(text: string): string {
  return text.split(/\s+/).filter((t) => t.length > 0).join(' ');
}

function show(tokens: readonly string[]): string {
  return JSON.stringify(tokens);
}

export class AsciiStlReader implements TriangleReader {
  readonly format = 'ascii';
  private facets = 0;
  private done = false;

  private constructor(
    private readonly reader: BufferedReader,
    /** Text after `solid ` on the first line. */
    readonly name: string,
    private readonly logger: Logger,
  ) {}

  /** Checks the `solid ` line now; facets are parsed on demand. */
  static create(source: ByteSource, options?: ReaderOptions): AsciiStlReader {
    const { bufferSize, logger } = resolveReaderOptions(options);
    const reader = new BufferedReader(source, bufferSize);
    const first = reader.readLine();
    if (first === null) {
      throw new StlError('unexpected-eof', 'Empty file?');
    }
    if (!first.startsWith(SOLID_PREFIX)) {
      throw new StlError('invalid-data', `ASCII STL does not start with "${SOLID_PREFIX}"`);
    }
    const name = normalizeName(first.slice(SOLID_PREFIX.length));
    logger.debug(`ascii STL: solid "${name}"`);
    return new AsciiStlReader(reader, name, logger);
  }

  next(): IteratorResult<Triangle> {
    if (this.done) return { done: true, value: undefined };
    try {
      const triangle = this.readFacet();
      if (triangle === null) {
        this.done = true;
        return { done: true, value: undefined };
      }
      this.facets++;
      return { done: false, value: triangle };
    } catch (err) {
      this.done = true;
      throw err;
    }
  }

  [Symbol.iterator](): this {
    return this;
  }

  /** Next non-blank line as tokens, or null at end of stream. */
  private nextTokens(): string[] | null {
    for (;;) {
      const line = this.reader.readLine();
      if (line === null) return null;
      const tokens = line.split(/\s+/).filter((t) => t.length > 0);
      if (tokens.length > 0) return tokens;
    }
  }

  private expectTokens(expected: readonly string[]): void {
    const tokens = this.nextTokens();
    if (tokens === null) {
      throw new StlError('unexpected-eof', `EOF while expecting ${show(expected)}`, { triangle: this.facets });
    }
    if (tokens.length !== expected.length || tokens.some((t, i) => t !== expected[i])) {
      throw new StlError('invalid-data', `Expected ${show(expected)}, got ${show(tokens)}`, { triangle: this.facets });
    }
  }

  private readFacet(): Triangle | null {
    const header = this.nextTokens();
    if (header === null) {
      throw new StlError('unexpected-eof', 'EOF while expecting facet or endsolid', { triangle: this.facets });
    }
    if (header[0] === 'endsolid') {
      const endName = normalizeName(header.slice(1).join(' '));
      if (endName !== '' && endName !== this.name) {
        this.logger.warn(`ascii STL: endsolid "${endName}" does not match solid "${this.name}"`);
      }
      this.logger.debug(`ascii STL: ${this.facets} facets read`);
      return null;
    }
    if (header.length !== 5 || header[0] !== 'facet' || header[1] !== 'normal') {
      throw new StlError('invalid-data', `Invalid facet header: ${show(header)}`, { triangle: this.facets });
    }
    const normal = parseVec3(header.slice(2));
    this.expectTokens(['outer', 'loop']);
    const vertices: Vec3[] = [];
    for (let i = 0; i < 3; i++) {
      const line = this.nextTokens();
      if (line === null) {
        throw new StlError('unexpected-eof', 'EOF while expecting vertex', { triangle: this.facets });
      }
      if (line.length !== 4 || line[0] !== 'vertex') {
        throw new StlError('invalid-data', `Expected vertex f32 f32 f32, got ${show(line)}`, { triangle: this.facets });
      }
      vertices.push(parseVec3(line.slice(1)));
    }
    this.expectTokens(['endloop']);
    this.expectTokens(['endfacet']);
    return { normal, vertices: [vertices[0], vertices[1], vertices[2]] };
  }
}
