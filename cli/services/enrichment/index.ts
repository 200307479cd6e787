/**
 * Enrichment exports
 */

export * from './backends';
export * from './detection-job';
export * from './dispatcher';
export * from './exif';
export * from './exif-job';
export * from './job-queue';
export * from './job-support';

import { DETECT_JOB, DetectionJob } from './detection-job';
import { EnrichmentDispatcher } from './dispatcher';
import { EXIF_JOB, ExifJob } from './exif-job';
import { InProcessJobQueue } from './job-queue';

/**
 * Job name to the pool it is routed to. Detection wants the accelerated pool.
 */
export const ENRICHMENT_JOBS = {
  [DETECT_JOB]: 'gpu',
  [EXIF_JOB]: 'cpu',
} as const;

export interface EnrichmentDispatcherDeps {
  queue: InProcessJobQueue;
  detectionJob: DetectionJob;
  exifJob: ExifJob;
}

/**
 * Register both jobs on `queue` and return a dispatcher that enqueues them
 * for every new picture.
 */
export function createEnrichmentDispatcher(deps: EnrichmentDispatcherDeps): EnrichmentDispatcher {
  const { queue, detectionJob, exifJob } = deps;
  queue.register(DETECT_JOB, ENRICHMENT_JOBS[DETECT_JOB], pictureId => detectionJob.run(pictureId));
  queue.register(EXIF_JOB, ENRICHMENT_JOBS[EXIF_JOB], pictureId => exifJob.run(pictureId));

  return {
    dispatchPicture(pictureId: string): void {
      queue.enqueue(DETECT_JOB, pictureId);
      queue.enqueue(EXIF_JOB, pictureId);
    },
  };
}
