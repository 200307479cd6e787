import axios from 'axios';
import { z } from 'zod';

/**
 * Object detection over raw image bytes. Returns class labels.
 */
export interface ObjectDetector {
  readonly name: string;
  detect(bytes: Buffer): Promise<string[]>;
}

/**
 * Text recognition over raw image bytes. Returns recognized lines in reading order.
 */
export interface TextRecognizer {
  readonly name: string;
  recognize(bytes: Buffer): Promise<string[]>;
}

/**
 * Raised when a backend is not configured or cannot be reached
 */
export class BackendUnavailableError extends Error {
  constructor(
    public readonly backend: string,
    message: string
  ) {
    super(message);
    this.name = 'BackendUnavailableError';
  }
}

const DetectionResponseSchema = z.object({
  labels: z.array(z.string()),
});

const RecognitionResponseSchema = z.object({
  lines: z.array(z.string()),
});

export interface HttpBackendOptions {
  url?: string;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 30000;

async function postImage(backend: string, options: HttpBackendOptions, bytes: Buffer): Promise<unknown> {
  if (!options.url) {
    throw new BackendUnavailableError(backend, `${backend} URL is not configured`);
  }
  try {
    const response = await axios.post<unknown>(options.url, bytes, {
      headers: { 'Content-Type': 'application/octet-stream' },
      timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      maxBodyLength: Infinity,
    });
    return response.data;
  } catch (error) {
    if (axios.isAxiosError(error) && !error.response) {
      throw new BackendUnavailableError(backend, `${backend} unreachable: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Detector served over HTTP: the image is POSTed as-is and the service
 * answers `{ "labels": [...] }`.
 */
export class HttpObjectDetector implements ObjectDetector {
  readonly name = 'detector';

  constructor(private readonly options: HttpBackendOptions = {}) {}

  async detect(bytes: Buffer): Promise<string[]> {
    const data = await postImage(this.name, this.options, bytes);
    return DetectionResponseSchema.parse(data).labels;
  }
}

/**
 * Recognizer served over HTTP, answering `{ "lines": [...] }`.
 */
export class HttpTextRecognizer implements TextRecognizer {
  readonly name = 'recognizer';

  constructor(private readonly options: HttpBackendOptions = {}) {}

  async recognize(bytes: Buffer): Promise<string[]> {
    const data = await postImage(this.name, this.options, bytes);
    return RecognitionResponseSchema.parse(data).lines;
  }
}
