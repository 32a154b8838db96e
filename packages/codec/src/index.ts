// Public API

// Geometry
export type { Vec3 } from './vec3.js';
export { vec3, triangleArea, approxEqual, DEFAULT_EPSILON, F32_EPSILON } from './vec3.js';

// Mesh types
export type { Triangle, IndexedTriangle, IndexedMesh, TriangleReader, StlFormat } from './mesh.js';
export { createTriangle, createIndexedMesh, meshTriangles } from './mesh.js';

// Errors
export { StlError, isStlError } from './errors.js';
export type { StlErrorKind, StlErrorDetails, EdgeRef } from './errors.js';

// Options
export type { Logger, ReaderOptions, WriterOptions, ValidateOptions } from './options.js';
export { readerOptionsSchema, writerOptionsSchema, validateOptionsSchema, silentLogger } from './options.js';

// Byte I/O
export type { ByteSource, ByteSink } from './io.js';
export { MemorySource, MemorySink, FileSource, FileSink } from './io.js';

// Decoding
export { BinaryStlReader } from './binary-reader.js';
export { AsciiStlReader, parseF32 } from './ascii-reader.js';
export { probeStlFormat, createStlReader, readStl } from './probe.js';

// Indexing + validation
export type { VertexKey } from './indexer.js';
export { vertexKey, indexTriangles } from './indexer.js';
export type { ManifoldResult } from './validate.js';
export { validateMesh, assertManifold } from './validate.js';

// Encoding
export type { SizedIterable } from './stl.js';
export { writeStl, encodeStl } from './stl.js';
