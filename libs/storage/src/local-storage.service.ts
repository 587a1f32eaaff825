import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { promises as fs } from 'fs';
import * as path from 'path';
import {
  InvalidStorageUriError,
  StorageError,
  getErrorMessage,
  sanitizeForLog,
} from '@app/shared-types';
import { LOCAL_URI_SCHEME, StorageClient } from './storage.types';

/**
 * Normalize a slash-separated key: no leading/trailing slashes, no empty segments
 */
export function normalizeKey(key: string): string {
  return key
    .split(/[\\/]+/)
    .filter((part) => part.length > 0)
    .join('/');
}

/**
 * Filesystem storage backend rooted at UPLOAD_LOCAL_DIRECTORY.
 *
 * URIs have the form `local://<prefix>/<relative path>`; every resolved path
 * must stay inside the root directory.
 */
@Injectable()
export class LocalStorageService implements StorageClient {
  private readonly logger = new Logger(LocalStorageService.name);
  private readonly rootDirectory: string;
  private readonly basePrefix: string;

  constructor(private readonly configService: ConfigService) {
    this.rootDirectory = path.resolve(
      this.configService.get<string>('UPLOAD_LOCAL_DIRECTORY', './var/uploads'),
    );
    this.basePrefix = normalizeKey(
      this.configService.get<string>('UPLOAD_BASE_PREFIX', 'uploads'),
    );
  }

  async save(
    relativePath: string,
    data: Buffer,
    contentType?: string,
  ): Promise<string> {
    const key = [this.basePrefix, normalizeKey(relativePath)]
      .filter((part) => part.length > 0)
      .join('/');
    const target = this.resolveKey(key);

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.writeFile(target, data, { flag: 'wx' });
    } catch (error) {
      throw new StorageError(
        `Failed to save file: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }

    this.logger.debug(
      `Stored ${data.length} bytes at ${sanitizeForLog(key, 200)} (${contentType ?? 'unknown type'})`,
    );
    return `${LOCAL_URI_SCHEME}${key}`;
  }

  async load(uri: string): Promise<Buffer> {
    const target = this.resolveUri(uri);
    try {
      return await fs.readFile(target);
    } catch (error) {
      throw new StorageError(
        `Failed to load file: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  async delete(uri: string): Promise<void> {
    const target = this.resolveUri(uri);
    try {
      await fs.rm(target, { force: true });
    } catch (error) {
      throw new StorageError(
        `Failed to delete file: ${getErrorMessage(error)}`,
        error instanceof Error ? error : undefined,
      );
    }
  }

  private resolveUri(uri: string): string {
    if (!uri.startsWith(LOCAL_URI_SCHEME)) {
      throw new InvalidStorageUriError(`Unsupported storage URI: ${sanitizeForLog(uri)}`);
    }
    return this.resolveKey(normalizeKey(uri.slice(LOCAL_URI_SCHEME.length)));
  }

  private resolveKey(key: string): string {
    const target = path.resolve(this.rootDirectory, key);
    const relative = path.relative(this.rootDirectory, target);
    if (
      relative.length === 0 ||
      relative.startsWith('..') ||
      path.isAbsolute(relative)
    ) {
      throw new InvalidStorageUriError(
        'Attempted to access a path outside of the upload directory',
      );
    }
    return target;
  }
}
