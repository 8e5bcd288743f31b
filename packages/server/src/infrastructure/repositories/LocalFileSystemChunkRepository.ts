import type { ChunkIndex, RelocationReport } from '@clipvault/common-types';
import { StorageAccessError } from '@clipvault/common-types';
import type { IChunkRepository } from '../../domain/repositories/IChunkRepository.js';
import fs from 'fs/promises';
import type { Dirent } from 'fs';
import path from 'path';

const CHUNK_EXTENSION = '.chunk';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Local filesystem Chunk Repository
 *
 * Storage Structure:
 * - {directory}/{index}.chunk
 */
export class LocalFileSystemChunkRepository implements IChunkRepository {
  private getChunkPath(directory: string, index: ChunkIndex): string {
    return path.join(directory, `${index}${CHUNK_EXTENSION}`);
  }

  async storeChunk(directory: string, index: ChunkIndex, data: Buffer): Promise<void> {
    await fs.mkdir(directory, { recursive: true });
    await fs.writeFile(this.getChunkPath(directory, index), data);
  }

  async getChunk(directory: string, index: ChunkIndex): Promise<Buffer | null> {
    try {
      return await fs.readFile(this.getChunkPath(directory, index));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  async listChunkIndexes(directory: string): Promise<ChunkIndex[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return [];
      }
      throw error;
    }

    const indexes: ChunkIndex[] = [];
    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith(CHUNK_EXTENSION)) continue;

      const name = entry.name.slice(0, -CHUNK_EXTENSION.length);
      // "3.chunk" only; skips names like "03.chunk" or "a.chunk"
      if (/^(0|[1-9]\d*)$/.test(name)) {
        indexes.push(Number(name));
      }
    }

    return indexes.sort((a, b) => a - b);
  }

  async allChunksPresent(directory: string, totalCount: number): Promise<boolean> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(directory, { withFileTypes: true });
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return false;
      }
      throw error;
    }

    const files = new Set(entries.filter((entry) => entry.isFile()).map((entry) => entry.name));
    for (let i = 0; i < totalCount; i++) {
      if (!files.has(`${i}${CHUNK_EXTENSION}`)) {
        return false;
      }
    }
    return true;
  }

  async clearChunks(directory: string): Promise<number> {
    const indexes = await this.listChunkIndexes(directory);
    for (const index of indexes) {
      await fs.rm(this.getChunkPath(directory, index), { force: true });
    }
    if (indexes.length > 0) {
      console.log(`🧹 [ChunkRepository] Removed ${indexes.length} stale chunk(s) from ${directory}`);
    }
    return indexes.length;
  }

  async relocate(sourceDir: string, destDir: string): Promise<RelocationReport> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(sourceDir, { withFileTypes: true });
    } catch (error) {
      throw new StorageAccessError(
        `Cannot read source directory ${sourceDir}: ${errorMessage(error)}`
      );
    }

    await fs.mkdir(destDir, { recursive: true });

    const report: RelocationReport = { moved: [], skipped: [], failed: [] };

    for (const entry of entries) {
      const sourcePath = path.join(sourceDir, entry.name);

      if (!entry.isFile()) {
        console.warn(`⚠️ [ChunkRepository] ${sourcePath} is not a file, skipped`);
        report.skipped.push(entry.name);
        continue;
      }

      try {
        await this.moveFile(sourcePath, path.join(destDir, entry.name));
        report.moved.push(entry.name);
        console.log(`📦 [ChunkRepository] Moved ${sourcePath} to ${destDir}`);
      } catch (error) {
        const reason = errorMessage(error);
        console.error(`❌ [ChunkRepository] Failed to move ${sourcePath}:`, reason);
        report.failed.push({ file: entry.name, reason });
      }
    }

    return report;
  }

  /**
   * rename, or copy + unlink when source and destination are on different devices
   */
  private async moveFile(sourcePath: string, destPath: string): Promise<void> {
    try {
      await fs.rename(sourcePath, destPath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'EXDEV') {
        throw error;
      }
      await fs.copyFile(sourcePath, destPath);
      await fs.unlink(sourcePath);
    }
  }
}
