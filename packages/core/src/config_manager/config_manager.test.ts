import { ConfigManager, ConfigError } from './index';
import type { BoardConfig } from './index';
import { MemoryConfigStore } from '../config_store/memory';

const validConfig: BoardConfig = {
  rigHandle: 'alice',
  upstream: 'commons-org/wl-commons',
  forkOrg: 'alice',
  forkDb: 'wl-commons',
  mode: 'wild-west',
  signing: false,
};

describe('ConfigManager', () => {
  let configStore: MemoryConfigStore;
  let configManager: ConfigManager;

  beforeEach(() => {
    configStore = new MemoryConfigStore();
    configManager = new ConfigManager(configStore);
  });

  describe('loadConfig', () => {
    it('should return a valid stored config', async () => {
      configStore.setConfig(validConfig);

      await expect(configManager.loadConfig()).resolves.toEqual(validConfig);
    });

    it('should return null when nothing is stored', async () => {
      await expect(configManager.loadConfig()).resolves.toBeNull();
    });

    it('should treat a config failing its schema as missing', async () => {
      configStore.setConfig({ ...validConfig, mode: 'yolo' });

      await expect(configManager.loadConfig()).resolves.toBeNull();
    });
  });

  describe('requireConfig', () => {
    it('should throw ConfigError when no config exists', async () => {
      await expect(configManager.requireConfig()).rejects.toBeInstanceOf(ConfigError);
    });
  });

  describe('getSettings', () => {
    it('should expose mode and signing', async () => {
      configStore.setConfig(validConfig);

      await expect(configManager.getSettings()).resolves.toEqual({ mode: 'wild-west', signing: false });
    });
  });

  describe('saveSettings', () => {
    it('should persist mode and signing while keeping the rest', async () => {
      configStore.setConfig(validConfig);

      await configManager.saveSettings('pr', true);

      expect(configStore.getConfig()).toEqual({ ...validConfig, mode: 'pr', signing: true });
    });

    it('should refuse when no config exists', async () => {
      await expect(configManager.saveSettings('pr', false)).rejects.toThrow(
        'board config not found or invalid; join a commons first'
      );
    });
  });

  describe('saveConfig', () => {
    it('should reject a config with an invalid upstream', async () => {
      await expect(configManager.saveConfig({ ...validConfig, upstream: 'no-slash' })).rejects.toThrow(
        /invalid board config: upstream/
      );
      expect(configStore.getConfig()).toBeNull();
    });
  });
});
