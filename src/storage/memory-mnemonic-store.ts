import type { IMnemonicStore } from '../interfaces/storage.interface.ts';

/**
 * Process-local store, for tests and for wallets that must not touch disk
 */
export class MemoryMnemonicStore implements IMnemonicStore {
  private mnemonic: string;

  constructor(initial = '') {
    this.mnemonic = initial;
  }

  load(): Promise<string> {
    return Promise.resolve(this.mnemonic);
  }

  save(mnemonic: string): Promise<void> {
    this.mnemonic = mnemonic;
    return Promise.resolve();
  }

  reset(): Promise<void> {
    this.mnemonic = '';
    return Promise.resolve();
  }
}
