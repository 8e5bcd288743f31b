import type pg from 'pg';
import type { VideoId } from '@clipvault/common-types';
import { UploadInProgressConflictError } from '@clipvault/common-types';
import type { IUploadUnitOfWork, UploadTransactionScope } from '../../domain/repositories/IUploadUnitOfWork.js';
import { PostgresMediaRecordRepository } from '../repositories/PostgresMediaRecordRepository.js';
import { PostgresVideoRepository } from '../repositories/PostgresVideoRepository.js';

/**
 * Advisory lock keys are hashtextextended(prefix || video id). A collision
 * with another key only serializes two units that could have run together.
 */
export const UPLOAD_LOCK_PREFIX = 'video-upload:';

// lock_not_available: lock_timeout expired while waiting
const LOCK_NOT_AVAILABLE = '55P03';

function isLockTimeout(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === LOCK_NOT_AVAILABLE;
}

/**
 * PostgreSQL Unit of Work
 *
 * One transaction per unit. A transaction-scoped advisory lock on the
 * video id serializes units for the same video, including the first
 * submit that has no row to lock yet. The lock is released on COMMIT or
 * ROLLBACK. A wait longer than the pool's lock_timeout is reported as an
 * UploadInProgressConflictError.
 */
export class PostgresUploadUnitOfWork implements IUploadUnitOfWork {
  constructor(private readonly pool: pg.Pool) {}

  async runForVideo<T>(
    videoId: VideoId,
    work: (scope: UploadTransactionScope) => Promise<T>
  ): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      try {
        await client.query('SELECT pg_advisory_xact_lock(hashtextextended($1, 0))', [
          `${UPLOAD_LOCK_PREFIX}${videoId}`,
        ]);
      } catch (err) {
        if (isLockTimeout(err)) {
          throw new UploadInProgressConflictError(
            `Another upload operation for video ${videoId} is still running`
          );
        }
        throw err;
      }

      const result = await work({
        mediaRecords: new PostgresMediaRecordRepository(client),
        videos: new PostgresVideoRepository(client),
      });

      await client.query('COMMIT');
      return result;
    } catch (err) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackErr) {
        console.error(`❌ [PostgreSQL] Rollback failed for video ${videoId}:`, rollbackErr);
      }
      throw err;
    } finally {
      client.release();
    }
  }
}
