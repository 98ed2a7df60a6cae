/**
 * Chain data providers
 */

export { BaseProvider } from './base-provider.ts';
export { EsploraProvider } from './esplora-provider.ts';
export type {
  FetchLike,
  IChainDataProvider,
  ProviderOptions,
  UTXO,
} from '../interfaces/provider.interface.ts';
