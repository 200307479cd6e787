import { errorMessage, logger } from '../../utils/logger';
import { GalleryStore } from '../db/store';
import { ObjectStorage } from '../storage/object-storage';
import { TagLedger } from '../tags/tag-ledger';
import { ObjectDetector, TextRecognizer } from './backends';
import { JobResult, loadPictureBytes } from './job-support';

export const DETECT_JOB = 'picture.detect';

export interface DetectionJobDeps {
  store: GalleryStore;
  storage: ObjectStorage;
  ledger: TagLedger;
  detector: ObjectDetector;
  recognizer: TextRecognizer;
}

/**
 * Object labels become `ai` tags; recognized text replaces the picture's OCR text.
 */
export class DetectionJob {
  constructor(private readonly deps: DetectionJobDeps) {}

  async run(pictureId: string): Promise<JobResult> {
    const { store, storage, ledger } = this.deps;
    const loaded = await loadPictureBytes(DETECT_JOB, pictureId, store, storage);
    if (!loaded.ok) return loaded.result;

    const labels = await this.detectLabels(pictureId, loaded.bytes);
    const ocrText = await this.recognizeText(pictureId, loaded.bytes);

    const { added, removed } = await ledger.replaceSourceLinks(pictureId, 'ai', labels);
    // an empty result is "no text found" and still overwrites
    await store.transaction(tx => tx.updatePicture(pictureId, { ocrText }));

    logger.info(`Picture ${pictureId}: ai_tags=${labels.length}, ocr_text length=${ocrText.length}`, {
      added,
      removed,
    });
    return { status: 'completed' };
  }

  private async detectLabels(pictureId: string, bytes: Buffer): Promise<string[]> {
    try {
      const labels: string[] = [];
      for (const label of await this.deps.detector.detect(bytes)) {
        const trimmed = label.trim();
        if (trimmed && !labels.includes(trimmed)) labels.push(trimmed);
      }
      return labels;
    } catch (error) {
      logger.warn('Object detection failed', { pictureId, error: errorMessage(error) });
      return [];
    }
  }

  private async recognizeText(pictureId: string, bytes: Buffer): Promise<string> {
    try {
      const lines = await this.deps.recognizer.recognize(bytes);
      return lines.join('\n').trim();
    } catch (error) {
      logger.warn('Text recognition failed', { pictureId, error: errorMessage(error) });
      return '';
    }
  }
}
