/**
 * Chunk Container
 *
 * Layout (all integers big-endian u32):
 *
 *   "FOR1" <size of everything after this field> "MODF"
 *   repeated: <4-char id> <payload length> <payload> <zero padding to 4 bytes>
 */

import { createError } from '../error-classes.js';

export interface Chunk {
  readonly id: string;
  readonly data: Buffer;
}

export const FORM_HEADER = 'FOR1';
export const FORM_TYPE = 'MODF';

const CHUNK_ID = /^[\x20-\x7e]{4}$/;

function align4(length: number): number {
  return (length + 3) & ~3;
}

function invalid(reason: string): never {
  throw createError('MODF-B002', { reason });
}

export function isValidChunkId(id: string): boolean {
  return CHUNK_ID.test(id);
}

export function assertChunkId(id: string): void {
  if (!isValidChunkId(id)) {
    invalid(`chunk id must be 4 printable ASCII characters, got ${JSON.stringify(id)}`);
  }
}

export function encodeChunks(chunks: readonly Chunk[]): Buffer {
  const parts: Buffer[] = [Buffer.from(FORM_TYPE, 'ascii')];

  for (const chunk of chunks) {
    assertChunkId(chunk.id);
    const header = Buffer.alloc(8);
    header.write(chunk.id, 0, 4, 'ascii');
    header.writeUInt32BE(chunk.data.length, 4);
    parts.push(header, chunk.data);

    const padding = align4(chunk.data.length) - chunk.data.length;
    if (padding > 0) parts.push(Buffer.alloc(padding));
  }

  const body = Buffer.concat(parts);
  const prefix = Buffer.alloc(8);
  prefix.write(FORM_HEADER, 0, 4, 'ascii');
  prefix.writeUInt32BE(body.length, 4);
  return Buffer.concat([prefix, body]);
}

/**
 * Split a container into its chunks, in file order.
 * Payloads are copied out of `binary`.
 */
export function decodeChunks(binary: Uint8Array): Chunk[] {
  const buffer = Buffer.from(binary);

  if (buffer.length < 12) invalid(`container is ${buffer.length} bytes long`);
  if (buffer.toString('ascii', 0, 4) !== FORM_HEADER) invalid('missing FOR1 header');

  const declared = buffer.readUInt32BE(4);
  if (declared !== buffer.length - 8) {
    invalid(`declared size ${declared} does not match ${buffer.length - 8}`);
  }
  if (buffer.toString('ascii', 8, 12) !== FORM_TYPE) invalid('form type is not MODF');

  const chunks: Chunk[] = [];
  let offset = 12;
  while (offset < buffer.length) {
    if (offset + 8 > buffer.length) invalid(`truncated chunk header at byte ${offset}`);

    const id = buffer.toString('ascii', offset, offset + 4);
    const length = buffer.readUInt32BE(offset + 4);
    const start = offset + 8;
    if (start + length > buffer.length) invalid(`chunk ${id} overruns the container`);

    chunks.push({ id, data: Buffer.from(buffer.subarray(start, start + length)) });
    offset = start + align4(length);
  }

  return chunks;
}
