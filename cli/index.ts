/**
 * Photo gallery core: tag registry and provenance ledger, ingestion,
 * enrichment jobs and signed media URLs.
 */

import { GalleryConfig } from './lib/config';
import { UrlSigner } from './services/access/signed-url';
import { GalleryStore } from './services/db/store';
import { PgGalleryStore } from './services/db/pg-store';
import {
  createEnrichmentDispatcher,
  DetectionJob,
  ExifJob,
  ExifReader,
  HttpObjectDetector,
  HttpTextRecognizer,
  InProcessJobQueue,
  ObjectDetector,
  TextRecognizer,
} from './services/enrichment';
import { ContainerService, PictureService } from './services/gallery';
import { IngestionPipeline } from './services/ingest/ingestion-pipeline';
import { createObjectStorage, ObjectStorage } from './services/storage';
import { TagLedger } from './services/tags/tag-ledger';
import { TagRegistry } from './services/tags/tag-registry';
import { logger } from './utils/logger';

export * from './lib/config';
export * from './lib/errors';
export * from './lib/tag-set';
export * from './lib/types';
export * from './services/access';
export * from './services/db';
export * from './services/enrichment';
export * from './services/gallery';
export * from './services/ingest';
export * from './services/storage';
export * from './services/tags';

export interface GalleryServiceOverrides {
  store?: GalleryStore;
  storage?: ObjectStorage;
  detector?: ObjectDetector;
  recognizer?: TextRecognizer;
  readExif?: ExifReader;
  now?: () => number;
}

export interface GalleryServices {
  store: GalleryStore;
  storage: ObjectStorage;
  registry: TagRegistry;
  ledger: TagLedger;
  containers: ContainerService;
  pictures: PictureService;
  ingestion: IngestionPipeline;
  queue: InProcessJobQueue;
  detectionJob: DetectionJob;
  exifJob: ExifJob;
  signer: UrlSigner;
  close(): Promise<void>;
}

/**
 * Wire every service from one loaded config. Collaborators that talk to the
 * outside world can be swapped through `overrides`.
 */
export function createGalleryServices(config: GalleryConfig, overrides: GalleryServiceOverrides = {}): GalleryServices {
  logger.setLevel(config.logLevel);

  const store = overrides.store ?? new PgGalleryStore({
    connectionString: config.database.url,
    maxConnections: config.database.maxConnections,
  });
  const storage = overrides.storage ?? createObjectStorage(config.storage);
  const registry = new TagRegistry(store);
  const ledger = new TagLedger(store, registry);

  const { enrichment } = config;
  const detectionJob = new DetectionJob({
    store,
    storage,
    ledger,
    detector: overrides.detector ?? new HttpObjectDetector({ url: enrichment.detectorUrl, timeoutMs: enrichment.timeoutMs }),
    recognizer: overrides.recognizer ?? new HttpTextRecognizer({ url: enrichment.recognizerUrl, timeoutMs: enrichment.timeoutMs }),
  });
  const exifJob = new ExifJob({ store, storage, ledger, readExif: overrides.readExif });
  const queue = new InProcessJobQueue(enrichment.pools);
  const dispatcher = createEnrichmentDispatcher({ queue, detectionJob, exifJob });

  return {
    store,
    storage,
    registry,
    ledger,
    containers: new ContainerService(store, registry),
    pictures: new PictureService(store, storage, ledger),
    ingestion: new IngestionPipeline({
      store,
      storage,
      ledger,
      dispatcher,
      archiveMaxBytes: config.ingest.archiveMaxBytes,
    }),
    queue,
    detectionJob,
    exifJob,
    signer: new UrlSigner({ ...config.signing, now: overrides.now }),
    async close(): Promise<void> {
      await queue.onIdle();
      await store.close();
    },
  };
}
