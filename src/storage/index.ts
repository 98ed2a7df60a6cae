export { FileMnemonicStore, MNEMONIC_FILE_NAME } from './file-mnemonic-store.ts';
export { MemoryMnemonicStore } from './memory-mnemonic-store.ts';
export type { IMnemonicStore } from '../interfaces/storage.interface.ts';
