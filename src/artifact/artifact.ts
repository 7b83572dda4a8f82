/**
 * Artifact
 *
 * Immutable compiled module: a chunk container plus its decoded chunk
 * index. Injection returns a new artifact; the original is never touched.
 */

import { createError } from '../error-classes.js';
import { assertChunkId, decodeChunks, encodeChunks, type Chunk } from './chunks.js';

export class Artifact {
  private readonly bytes: Buffer;
  private readonly index: readonly Chunk[];

  private constructor(bytes: Buffer, index: readonly Chunk[]) {
    this.bytes = bytes;
    this.index = index;
  }

  static fromChunks(chunks: readonly Chunk[]): Artifact {
    const copies = chunks.map((chunk) => ({ id: chunk.id, data: Buffer.from(chunk.data) }));
    return new Artifact(encodeChunks(copies), copies);
  }

  /** @throws CompileError MODF-B002 when `binary` is not a valid container */
  static fromBinary(binary: Uint8Array): Artifact {
    const bytes = Buffer.from(binary);
    return new Artifact(bytes, decodeChunks(bytes));
  }

  /** Copy of the encoded container */
  get binary(): Buffer {
    return Buffer.from(this.bytes);
  }

  get size(): number {
    return this.bytes.length;
  }

  chunkIds(): string[] {
    return this.index.map((chunk) => chunk.id);
  }

  chunks(): Chunk[] {
    return this.index.map((chunk) => ({ id: chunk.id, data: Buffer.from(chunk.data) }));
  }

  hasChunk(id: string): boolean {
    return this.index.some((chunk) => chunk.id === id);
  }

  /** Payload of the first chunk with `id` */
  readChunk(id: string): Buffer | undefined {
    const chunk = this.index.find((candidate) => candidate.id === id);
    return chunk ? Buffer.from(chunk.data) : undefined;
  }

  /**
   * New artifact with one more chunk appended after the existing ones.
   * @throws CompileError MODF-B002 when `id` is malformed or already present
   */
  withChunk(id: string, data: Uint8Array): Artifact {
    assertChunkId(id);
    if (this.hasChunk(id)) {
      throw createError('MODF-B002', { reason: `chunk ${id} is already present` });
    }
    return Artifact.fromChunks([...this.index, { id, data: Buffer.from(data) }]);
  }
}

/** Inject a named metadata chunk; see Artifact.withChunk */
export function addChunk(artifact: Artifact, id: string, data: Uint8Array): Artifact {
  return artifact.withChunk(id, data);
}

export function readChunk(artifact: Artifact, id: string): Buffer | undefined {
  return artifact.readChunk(id);
}
