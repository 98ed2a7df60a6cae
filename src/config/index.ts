/**
 * Configuration module exports
 */

export {
  CONFIG_FILE_NAMES,
  type ConfigSource,
  ConfigLoader,
  DEFAULT_DERIVATION_PATH,
  ENV_VARS,
  type WalletConfig,
} from './config-loader.ts';
export {
  DEFAULT_API_URLS,
  getNetworkConfig,
  NETWORK_TYPES,
  parseNetworkType,
  toBitcoinNetwork,
} from './networks.ts';
