/**
 * Byte I/O: the seekable source readers borrow and the sink the writer
 * borrows. Everything is synchronous; decoding and encoding are linear scans.
 */

import * as fs from 'node:fs';
import { StlError, type StlErrorDetails } from './errors.js';

/** Seekable, synchronous byte source. */
export interface ByteSource {
  /** Fill as much of `target` as possible; 0 means end of stream. */
  read(target: Uint8Array): number;
  /** Move to an absolute byte offset. */
  seek(offset: number): void;
  readonly position: number;
}

export interface ByteSink {
  /**
   * Consume `chunk`. Writers reuse the underlying buffer, so the bytes are
   * valid only for the duration of the call; copy them to keep them.
   */
  write(chunk: Uint8Array): void;
  flush?(): void;
}

function checkOffset(offset: number): void {
  if (!Number.isSafeInteger(offset) || offset < 0) {
    throw new RangeError(`Invalid seek offset ${offset}`);
  }
}

// ─── In-memory ──────────────────────────────────────────────

export class MemorySource implements ByteSource {
  private pos = 0;

  constructor(private readonly bytes: Uint8Array) {}

  get position(): number {
    return this.pos;
  }

  read(target: Uint8Array): number {
    const n = Math.max(0, Math.min(target.length, this.bytes.length - this.pos));
    target.set(this.bytes.subarray(this.pos, this.pos + n));
    this.pos += n;
    return n;
  }

  seek(offset: number): void {
    checkOffset(offset);
    this.pos = offset;
  }
}

export class MemorySink implements ByteSink {
  private chunks: Uint8Array[] = [];
  private size = 0;

  get byteLength(): number {
    return this.size;
  }

  write(chunk: Uint8Array): void {
    // Writers reuse their buffers, keep a copy.
    this.chunks.push(chunk.slice());
    this.size += chunk.length;
  }

  toUint8Array(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const chunk of this.chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

// ─── File descriptors (caller opens and closes) ─────────────

export class FileSource implements ByteSource {
  private pos: number;

  constructor(private readonly fd: number, start = 0) {
    checkOffset(start);
    this.pos = start;
  }

  get position(): number {
    return this.pos;
  }

  read(target: Uint8Array): number {
    const n = fs.readSync(this.fd, target, 0, target.length, this.pos);
    this.pos += n;
    return n;
  }

  seek(offset: number): void {
    checkOffset(offset);
    this.pos = offset;
  }
}

export class FileSink implements ByteSink {
  constructor(private readonly fd: number) {}

  write(chunk: Uint8Array): void {
    let offset = 0;
    while (offset < chunk.length) {
      offset += fs.writeSync(this.fd, chunk, offset, chunk.length - offset);
    }
  }
}

// ─── Buffering ──────────────────────────────────────────────

const NEWLINE = 0x0a;
const CARRIAGE_RETURN = 0x0d;

export class BufferedReader {
  private buf: Uint8Array;
  private start = 0;
  private end = 0;
  private eof = false;
  private readonly decoder = new TextDecoder('utf-8', { fatal: true });

  constructor(private readonly source: ByteSource, bufferSize: number) {
    this.buf = new Uint8Array(bufferSize);
  }

  /** Read exactly `n` bytes or throw `unexpected-eof` naming `what`. */
  readExact(n: number, what: string, details?: StlErrorDetails): Uint8Array {
    while (this.end - this.start < n) {
      if (!this.fill()) {
        throw new StlError(
          'unexpected-eof',
          `Unexpected end of input while reading ${what}: needed ${n} bytes, got ${this.end - this.start}`,
          details,
        );
      }
    }
    const out = this.buf.slice(this.start, this.start + n);
    this.start += n;
    return out;
  }

  /**
   * Next line without its `\n` or `\r\n` terminator, or null at end of
   * stream. A final line without terminator is still returned.
   */
  readLine(): string | null {
    let scanFrom = this.start;
    for (;;) {
      const nl = this.buf.subarray(scanFrom, this.end).indexOf(NEWLINE);
      if (nl !== -1) {
        const lineEnd = scanFrom + nl;
        const line = this.decode(this.start, lineEnd);
        this.start = lineEnd + 1;
        return line;
      }
      scanFrom = this.end - this.start;
      const more = this.fill();
      scanFrom += this.start;
      if (!more) break;
    }
    if (this.start === this.end) return null;
    const line = this.decode(this.start, this.end);
    this.start = this.end;
    return line;
  }

  private decode(from: number, to: number): string {
    if (to > from && this.buf[to - 1] === CARRIAGE_RETURN) to--;
    try {
      return this.decoder.decode(this.buf.subarray(from, to));
    } catch (err) {
      throw new StlError('invalid-data', `Stream did not contain valid UTF-8: ${String(err)}`);
    }
  }

  /** Pull one more chunk from the source. False at end of stream. */
  private fill(): boolean {
    if (this.eof) return false;
    if (this.start > 0) {
      this.buf.copyWithin(0, this.start, this.end);
      this.end -= this.start;
      this.start = 0;
    }
    if (this.end === this.buf.length) {
      const grown = new Uint8Array(this.buf.length * 2);
      grown.set(this.buf);
      this.buf = grown;
    }
    const n = this.source.read(this.buf.subarray(this.end));
    if (n === 0) {
      this.eof = true;
      return false;
    }
    this.end += n;
    return true;
  }
}

export class BufferedWriter {
  private readonly buf: Uint8Array;
  private len = 0;

  constructor(private readonly sink: ByteSink, bufferSize: number) {
    this.buf = new Uint8Array(bufferSize);
  }

  write(bytes: Uint8Array): void {
    if (this.len + bytes.length > this.buf.length) this.drain();
    if (bytes.length >= this.buf.length) {
      this.sink.write(bytes);
      return;
    }
    this.buf.set(bytes, this.len);
    this.len += bytes.length;
  }

  /** Hand everything pending to the sink, then flush the sink. */
  flush(): void {
    this.drain();
    this.sink.flush?.();
  }

  private drain(): void {
    if (this.len === 0) return;
    this.sink.write(this.buf.subarray(0, this.len));
    this.len = 0;
  }
}
