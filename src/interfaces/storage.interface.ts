/**
 * Mnemonic persistence. One wallet per store; the phrase is kept as plain text.
 */
export interface IMnemonicStore {
  /**
   * Stored phrase, or an empty string when nothing is stored
   */
  load(): Promise<string>;
  save(mnemonic: string): Promise<void>;
  reset(): Promise<void>;
}
