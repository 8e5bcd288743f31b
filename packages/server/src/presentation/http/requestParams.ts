import type { Request } from 'express';
import type { VideoId } from '@clipvault/common-types';

const NON_NEGATIVE_INTEGER = /^(0|[1-9]\d*)$/;

/**
 * :id route parameter as a VideoId, or null when it is not a positive integer
 */
export function parseVideoId(req: Request): VideoId | null {
  const { id } = req.params;
  if (!id || !NON_NEGATIVE_INTEGER.test(id)) {
    return null;
  }
  const videoId = Number(id);
  return Number.isSafeInteger(videoId) && videoId > 0 ? videoId : null;
}

/**
 * Non-negative integer from a query string or JSON value, or null
 */
export function parseNonNegativeInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? value : null;
  }
  if (typeof value === 'string' && NON_NEGATIVE_INTEGER.test(value)) {
    const parsed = Number(value);
    return Number.isSafeInteger(parsed) ? parsed : null;
  }
  return null;
}

/**
 * JSON body as a plain object ({} when the body is missing or not an object)
 */
export function jsonBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body) || Buffer.isBuffer(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}
