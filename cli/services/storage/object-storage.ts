/**
 * Byte store for picture content. Keys are assigned by the caller.
 */
export interface ObjectStorage {
  readonly name: string;
  /** Resolves only once the full object is readable under `key`. */
  put(key: string, bytes: Buffer, contentType?: string): Promise<string>;
  /** Resolves to null when no object exists under `key`. */
  get(key: string): Promise<Buffer | null>;
  delete(key: string): Promise<void>;
}
