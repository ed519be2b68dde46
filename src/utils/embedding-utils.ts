/**
 * Embedding (de)serialization for the SQLite vector table.
 *
 * The indexer stores each embedding as a little-endian Float32 BLOB.
 */

/**
 * Serialize an embedding to a Buffer for SQLite storage (4 bytes per dimension).
 */
export function serializeEmbedding(embedding: ArrayLike<number>): Buffer {
  return Buffer.from(Float32Array.from(embedding).buffer);
}

/**
 * Deserialize an embedding BLOB.
 *
 * Copies into a fresh Float32Array: SQLite buffers are not guaranteed to be
 * 4-byte aligned, which a view over `buffer.buffer` would require.
 */
export function deserializeEmbedding(buffer: Buffer): Float32Array {
  const dims = Math.floor(buffer.length / Float32Array.BYTES_PER_ELEMENT);
  const out = new Float32Array(dims);
  for (let i = 0; i < dims; i++) {
    out[i] = buffer.readFloatLE(i * Float32Array.BYTES_PER_ELEMENT);
  }
  return out;
}
