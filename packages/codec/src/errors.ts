/**
 * Codec errors.
 *
 * Format and geometry problems are reported as `StlError` with a `kind`.
 * Failures of the byte source or sink itself are never wrapped; they reach
 * the caller exactly as the source or sink threw them.
 */

export type StlErrorKind =
  /** Input ended where more bytes or tokens were required. */
  | 'unexpected-eof'
  /** Wrong keyword, wrong token count, bad leading line, bad encoding. */
  | 'invalid-data'
  /** ASCII number that does not parse or is not finite as float32. */
  | 'invalid-number'
  | 'degenerate-face'
  | 'unmatched-edge'
  /** Writer precondition violated (triangle count out of range). */
  | 'invalid-input'
  /** Iterable yielded a different number of triangles than it declared. */
  | 'length-mismatch';

export interface EdgeRef {
  /** Local vertex position (0-2) the edge starts at. */
  from: number;
  to: number;
}

export interface StlErrorDetails {
  token?: string;
  face?: number;
  edge?: EdgeRef;
  /** Index of the triangle being decoded or encoded. */
  triangle?: number;
}

export class StlError extends Error {
  readonly kind: StlErrorKind;
  readonly token?: string;
  readonly face?: number;
  readonly edge?: EdgeRef;
  readonly triangle?: number;

  constructor(kind: StlErrorKind, message: string, details: StlErrorDetails = {}) {
    super(message);
    this.name = 'StlError';
    this.kind = kind;
    this.token = details.token;
    this.face = details.face;
    this.edge = details.edge;
    this.triangle = details.triangle;
  }
}

export function isStlError(err: unknown, kind?: StlErrorKind): err is StlError {
  return err instanceof StlError && (kind === undefined || err.kind === kind);
}
