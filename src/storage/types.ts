import type { Readable } from "stream";

/**
 * Append-only byte area holding artifact contents. Keys are written once and
 * never rewritten in place.
 */
export interface BlobStorage {
  put(key: string, data: Buffer, contentType: string): Promise<void>;
  get(key: string): Promise<Buffer>;
  getStream(key: string): Promise<Readable>;
  exists(key: string): Promise<boolean>;
  ping(): Promise<void>;
}
