import { describe, it, expect } from 'vitest';
import { DEFAULT_BRIDGE_CONFIG, loadBridgeConfig, resolveBridgeConfig } from './BridgeConfig.js';
import type { BridgeConfig } from './BridgeConfig.js';
import { InvalidArgumentsError } from '../errors/index.js';

describe('BridgeConfig', () => {
  describe('resolveBridgeConfig()', () => {
    it('should fall back to defaults', () => {
      expect(resolveBridgeConfig()).toEqual({ logLevel: 'warn', strictExpansion: false });
      expect(Object.isFrozen(DEFAULT_BRIDGE_CONFIG)).toBe(true);
    });

    it('should merge overrides and freeze the result', () => {
      const config = resolveBridgeConfig({ strictExpansion: true });
      expect(config).toEqual({ logLevel: 'warn', strictExpansion: true });
      expect(Object.isFrozen(config)).toBe(true);
    });

    it('should reject unknown keys and bad values', () => {
      const unknownKey: Partial<BridgeConfig> = JSON.parse('{"logLevel":"info","colour":"red"}');
      expect(() => resolveBridgeConfig(unknownKey)).toThrow(InvalidArgumentsError);

      const badLevel: Partial<BridgeConfig> = JSON.parse('{"logLevel":"loud"}');
      expect(() => resolveBridgeConfig(badLevel)).toThrow('logLevel');
    });
  });

  describe('loadBridgeConfig()', () => {
    it('should read the environment', () => {
      const config = loadBridgeConfig({
        CELLBRIDGE_LOG_LEVEL: 'debug',
        CELLBRIDGE_STRICT_EXPANSION: '1',
        PATH: '/usr/bin',
      });
      expect(config).toEqual({ logLevel: 'debug', strictExpansion: true });
    });

    it('should use defaults for unset variables', () => {
      expect(loadBridgeConfig({})).toEqual(DEFAULT_BRIDGE_CONFIG);
      expect(loadBridgeConfig({ CELLBRIDGE_STRICT_EXPANSION: 'false' }).strictExpansion).toBe(false);
    });

    it('should name the bad variable', () => {
      expect(() => loadBridgeConfig({ CELLBRIDGE_STRICT_EXPANSION: 'yes' }))
        .toThrow('CELLBRIDGE_STRICT_EXPANSION');
    });
  });
});
