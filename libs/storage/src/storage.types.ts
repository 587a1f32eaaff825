/**
 * Storage collaborator contract
 *
 * Blobs are written once under a caller-chosen relative path and addressed
 * afterwards only by the URI that save() returned.
 */
export interface StorageClient {
  save(relativePath: string, data: Buffer, contentType?: string): Promise<string>;
  load(uri: string): Promise<Buffer>;
  delete(uri: string): Promise<void>;
}

/**
 * Injection token for the active storage backend
 */
export const STORAGE_CLIENT = 'STORAGE_CLIENT';

export const LOCAL_URI_SCHEME = 'local://';
