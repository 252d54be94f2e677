import { DecodeError, InvalidVectorError } from '@embedcache/shared';

/** An embedding as produced by a model. Its dimensionality is opaque to the cache. */
export type EmbeddingVector = number[];

/**
 * Layout (little-endian):
 *   [0]      format version
 *   [1..4]   dimension n, uint32
 *   [5..]    n float64 components
 */
export const VECTOR_FORMAT_VERSION = 1;
export const VECTOR_HEADER_BYTES = 5;
const COMPONENT_BYTES = 8;

export function encodeVector(vector: readonly number[]): Buffer {
  if (!Array.isArray(vector)) {
    throw new InvalidVectorError('Embedding vector must be an array of numbers');
  }

  const buffer = Buffer.alloc(VECTOR_HEADER_BYTES + vector.length * COMPONENT_BYTES);
  buffer.writeUInt8(VECTOR_FORMAT_VERSION, 0);
  buffer.writeUInt32LE(vector.length, 1);

  for (let i = 0; i < vector.length; i++) {
    const component: unknown = vector[i];
    if (typeof component !== 'number') {
      throw new InvalidVectorError(`Embedding component ${i} is not a number`, {
        details: { index: i, type: typeof component },
      });
    }
    buffer.writeDoubleLE(component, VECTOR_HEADER_BYTES + i * COMPONENT_BYTES);
  }

  return buffer;
}

export function decodeVector(bytes: Buffer): EmbeddingVector {
  if (bytes.length < VECTOR_HEADER_BYTES) {
    throw new DecodeError(`Cached blob too short for a vector header (${bytes.length} bytes)`);
  }

  const version = bytes.readUInt8(0);
  if (version !== VECTOR_FORMAT_VERSION) {
    throw new DecodeError(`Unsupported vector format version ${version}`, {
      details: { expected: VECTOR_FORMAT_VERSION, actual: version },
    });
  }

  const dims = bytes.readUInt32LE(1);
  const expectedLength = VECTOR_HEADER_BYTES + dims * COMPONENT_BYTES;
  if (bytes.length !== expectedLength) {
    throw new DecodeError(
      `Cached blob length ${bytes.length} does not match declared dimension ${dims}`,
      { details: { dims, expectedLength, actualLength: bytes.length } },
    );
  }

  const vector: EmbeddingVector = new Array<number>(dims);
  for (let i = 0; i < dims; i++) {
    vector[i] = bytes.readDoubleLE(VECTOR_HEADER_BYTES + i * COMPONENT_BYTES);
  }
  return vector;
}
