/**
 * Storage exports
 */

export * from './object-storage';
export * from './local-storage';
export * from './s3-storage';

import type { StorageConfig } from '../../lib/config';
import { logger } from '../../utils/logger';
import { LocalObjectStorage } from './local-storage';
import { ObjectStorage } from './object-storage';
import { S3ObjectStorage } from './s3-storage';

export function createObjectStorage(config: StorageConfig): ObjectStorage {
  if (config.driver === 's3') {
    logger.debug('Using S3 object storage', { bucket: config.bucket, endpoint: config.endpoint });
    return new S3ObjectStorage(config);
  }
  logger.debug('Using local object storage', { root: config.root });
  return new LocalObjectStorage(config.root);
}
