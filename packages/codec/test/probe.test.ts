import { describe, it, expect } from 'vitest';
import {
  probeStlFormat, createStlReader, readStl, encodeStl,
  MemorySource, BinaryStlReader, AsciiStlReader, createTriangle, isStlError,
  type ByteSource, type Triangle,
} from '../src/index.js';

const TRIANGLE: Triangle = createTriangle([0, 0, 1], [0, 0, 0], [1, 0, 0], [0, 1, 0]);

const ASCII = `solid probe
  facet normal 0 0 1
    outer loop
      vertex 0 0 0
      vertex 1 0 0
      vertex 0 1 0
    endloop
  endfacet
endsolid probe
`;

function text(s: string): MemorySource {
  return new MemorySource(new TextEncoder().encode(s));
}

/** Binary STL whose header starts with the given text. */
function binaryWithHeader(header: number[]): Uint8Array {
  const bytes = encodeStl([TRIANGLE]);
  bytes.set(header, 0);
  return bytes;
}

class FailingSource implements ByteSource {
  seeks: number[] = [];
  constructor(private readonly failure: Error) {}
  get position(): number { return 0; }
  read(): number { throw this.failure; }
  seek(offset: number): void { this.seeks.push(offset); }
}

describe('probeStlFormat', () => {
  it('detects ASCII and rewinds', () => {
    const src = text(ASCII);
    expect(probeStlFormat(src)).toBe('ascii');
    expect(src.position).toBe(0);
  });

  it('detects binary and rewinds', () => {
    const src = new MemorySource(encodeStl([TRIANGLE]));
    expect(probeStlFormat(src)).toBe('binary');
    expect(src.position).toBe(0);
  });

  it('restores a non-zero start offset exactly', () => {
    const prefix = new Uint8Array(10).fill(0x20);
    const bytes = new Uint8Array([...prefix, ...new TextEncoder().encode(ASCII)]);
    const src = new MemorySource(bytes);
    src.seek(10);
    expect(probeStlFormat(src)).toBe('ascii');
    expect(src.position).toBe(10);
    expect([...createStlReader(src)]).toEqual([TRIANGLE]);
  });

  it('requires the trailing space after solid', () => {
    expect(probeStlFormat(text('solid\n'))).toBe('binary');
    expect(probeStlFormat(text('solidx\n'))).toBe('binary');
    expect(probeStlFormat(text('Solid x\n'))).toBe('binary');
  });

  it('treats empty and very short sources as binary', () => {
    expect(probeStlFormat(text(''))).toBe('binary');
    expect(probeStlFormat(text('sol'))).toBe('binary');
  });

  it('falls through to binary when a "solid " header is not UTF-8', () => {
    const header = [...new TextEncoder().encode('solid trap'), 0xff, 0xfe];
    const src = new MemorySource(binaryWithHeader(header));
    expect(probeStlFormat(src)).toBe('binary');
    expect(src.position).toBe(0);
    expect([...createStlReader(src)]).toEqual([TRIANGLE]);
  });

  it('rewinds even when an ambiguous binary header is taken for ASCII', () => {
    const bytes = new Uint8Array(84);
    bytes.set(new TextEncoder().encode('solid ok\n'), 0);
    const src = new MemorySource(bytes);
    expect(probeStlFormat(src)).toBe('ascii');
    expect(src.position).toBe(0);

    const reader = createStlReader(src);
    expect(reader.format).toBe('ascii');
    let caught: unknown;
    try {
      reader.next();
    } catch (err) {
      caught = err;
    }
    expect(isStlError(caught, 'invalid-data')).toBe(true);
  });

  it('treats a read failure as binary after seeking back', () => {
    const src = new FailingSource(new Error('disk on fire'));
    expect(probeStlFormat(src)).toBe('binary');
    expect(src.seeks).toEqual([0]);
  });

  it('propagates a failing seek', () => {
    const src = text(ASCII);
    src.seek = () => { throw new Error('not seekable'); };
    expect(() => probeStlFormat(src)).toThrow('not seekable');
  });
});

describe('createStlReader', () => {
  it('returns an ASCII reader for ASCII input', () => {
    const reader = createStlReader(text(ASCII));
    expect(reader).toBeInstanceOf(AsciiStlReader);
    expect([...reader]).toEqual([TRIANGLE]);
  });

  it('returns a binary reader for binary input', () => {
    const reader = createStlReader(new MemorySource(encodeStl([TRIANGLE])));
    expect(reader).toBeInstanceOf(BinaryStlReader);
    expect([...reader]).toEqual([TRIANGLE]);
  });

  it('surfaces source I/O errors from the binary reader unchanged', () => {
    const failure = new Error('disk on fire');
    expect(() => createStlReader(new FailingSource(failure))).toThrow(failure);
  });
});

describe('readStl', () => {
  it('decodes either format into the same indexed mesh', () => {
    const fromAscii = readStl(text(ASCII));
    const fromBinary = readStl(new MemorySource(encodeStl([TRIANGLE])));
    expect(fromAscii).toEqual(fromBinary);
    expect(fromAscii.vertices).toEqual([[0, 0, 0], [1, 0, 0], [0, 1, 0]]);
    expect(fromAscii.faces).toEqual([{ normal: [0, 0, 1], vertices: [0, 1, 2] }]);
  });
});
