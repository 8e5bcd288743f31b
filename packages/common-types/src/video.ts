/**
 * Unique identifier for a video (catalog primary key)
 */
export type VideoId = number;

/**
 * Video as exposed by the video catalog
 *
 * The catalog owns this row; the upload lifecycle only reads it and
 * clears the published flag when new content replaces a processed asset.
 */
export interface Video {
  /** Catalog identifier */
  id: VideoId;

  /** Display title */
  title: string;

  /** Whether the video is visible to viewers */
  isPublished: boolean;

  /** Publication timestamp (ISO 8601, optional) */
  publishedAt?: string;

  /** Like counter */
  numLikes: number;

  /** View counter */
  numViews: number;
}
