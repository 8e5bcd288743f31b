/**
 * Zero-based position of a chunk inside an upload
 */
export type ChunkIndex = number;

/**
 * Result of moving a chunk directory to another location
 */
export interface RelocationReport {
  /** File names moved to the destination */
  moved: string[];

  /** Entries left behind because they are not regular files */
  skipped: string[];

  /** Files that could not be moved */
  failed: { file: string; reason: string }[];
}
