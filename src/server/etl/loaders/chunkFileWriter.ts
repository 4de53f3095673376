/**
 * Chunk File Writer
 *
 * Persists normalized chunks as a JSON array of { text } records.
 */

import fs from 'fs/promises';
import path from 'path';
import type { Chunk, ChunkRecord } from '../../contracts/types.js';

export function toChunkRecords(chunks: readonly Chunk[]): ChunkRecord[] {
  return chunks.map((text) => ({ text }));
}

/**
 * Write data as 2-space indented UTF-8 JSON, creating parent directories
 */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(data, null, 2), 'utf-8');
}

export async function writeChunkFile(filePath: string, chunks: readonly Chunk[]): Promise<void> {
  await writeJsonFile(filePath, toChunkRecords(chunks));
}
