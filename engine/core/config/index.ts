export {
  DEFAULT_BRIDGE_CONFIG,
  LOG_LEVELS,
  loadBridgeConfig,
  resolveBridgeConfig,
} from './BridgeConfig.js';
export type { BridgeConfig, LogLevel } from './BridgeConfig.js';
