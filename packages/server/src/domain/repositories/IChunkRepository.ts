import type { ChunkIndex, RelocationReport } from '@clipvault/common-types';

/**
 * Chunk Repository Interface (Server-side)
 *
 * Abstracts where chunk bytes live. Callers address chunks by directory
 * (the media record's storage path) and index.
 * Implementation: LocalFileSystemChunkRepository
 *
 * Storage Structure:
 * - {directory}/{index}.chunk
 */
export interface IChunkRepository {
  /**
   * Write a chunk, creating the directory when needed
   * An existing chunk at the same index is overwritten.
   */
  storeChunk(directory: string, index: ChunkIndex, data: Buffer): Promise<void>;

  /**
   * Read a chunk
   * @returns chunk bytes, or null when the chunk does not exist
   */
  getChunk(directory: string, index: ChunkIndex): Promise<Buffer | null>;

  /**
   * Indexes of the chunks stored in a directory, ascending
   * Returns [] when the directory does not exist.
   */
  listChunkIndexes(directory: string): Promise<ChunkIndex[]>;

  /**
   * True when every index in [0, totalCount) has a chunk
   * Returns false when the directory does not exist.
   */
  allChunksPresent(directory: string, totalCount: number): Promise<boolean>;

  /**
   * Delete every chunk file in a directory, leaving other files alone
   * @returns number of chunks removed (0 when the directory does not exist)
   */
  clearChunks(directory: string): Promise<number>;

  /**
   * Move every regular file from sourceDir to destDir
   *
   * Best effort: a file that cannot be moved is logged and reported in
   * `failed`, and the remaining files are still moved.
   */
  relocate(sourceDir: string, destDir: string): Promise<RelocationReport>;
}
