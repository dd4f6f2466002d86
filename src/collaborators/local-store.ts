/**
 * Object store backed by a local directory
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname, resolve, sep } from 'node:path';
import { pathToFileURL } from 'node:url';
import { CollaboratorError } from '../types/error.types.js';
import type { ObjectStore } from './types.js';
import { createModuleLogger } from '@utils/logger';

const logger = createModuleLogger('local-store');

export class LocalDirectoryStore implements ObjectStore {
  private root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async put(key: string, bytes: Uint8Array, mediaType: string): Promise<string> {
    const target = resolve(this.root, key);
    if (!target.startsWith(this.root + sep)) {
      throw new CollaboratorError(`Object key escapes the store root: ${key}`, 'storage');
    }

    try {
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, bytes);
    } catch (error) {
      throw new CollaboratorError(`Failed to store ${key}`, 'storage', true, error);
    }

    logger.info({ key, mediaType, size: bytes.byteLength }, 'Stored object');
    return pathToFileURL(target).href;
  }
}
