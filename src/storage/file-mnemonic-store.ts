/**
 * Mnemonic store backed by a plain-text file in the wallet data directory
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import * as path from 'node:path';

import type { IMnemonicStore } from '../interfaces/storage.interface.ts';

export const MNEMONIC_FILE_NAME = 'mnemonic.txt';

export class FileMnemonicStore implements IMnemonicStore {
  readonly filePath: string;
  private dataDir: string;

  constructor(dataDir: string) {
    this.dataDir = dataDir;
    this.filePath = path.join(dataDir, MNEMONIC_FILE_NAME);
  }

  async load(): Promise<string> {
    try {
      return (await readFile(this.filePath, 'utf-8')).trim();
    } catch (error) {
      if (isNotFound(error)) {
        return '';
      }
      throw error;
    }
  }

  async save(mnemonic: string): Promise<void> {
    await mkdir(this.dataDir, { recursive: true, mode: 0o700 });
    await writeFile(this.filePath, mnemonic, { encoding: 'utf-8', mode: 0o600 });
  }

  async reset(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
