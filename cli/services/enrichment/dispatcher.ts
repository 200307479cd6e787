/**
 * Hands a freshly ingested picture to the enrichment jobs. Dispatch returns
 * immediately; job outcomes land in the store, never back with the caller.
 */
export interface EnrichmentDispatcher {
  dispatchPicture(pictureId: string): void;
}
