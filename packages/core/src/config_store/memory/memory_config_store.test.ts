import { MemoryConfigStore } from './memory_config_store';

describe('MemoryConfigStore', () => {
  it('[EARS-A1] should return null when nothing was set', async () => {
    await expect(new MemoryConfigStore().loadConfig()).resolves.toBeNull();
  });

  it('[EARS-A2] should return what was saved', async () => {
    const store = new MemoryConfigStore();

    await store.saveConfig({ logLevel: 'warn' });

    await expect(store.loadConfig()).resolves.toEqual({ logLevel: 'warn' });
  });

  it('[EARS-B1] should allow setting and clearing documents for test setup', async () => {
    const store = new MemoryConfigStore();

    store.setConfig({ anything: true });
    expect(store.getConfig()).toEqual({ anything: true });

    store.clear();
    await expect(store.loadConfig()).resolves.toBeNull();
    expect(store.describe()).toBe('memory');
  });
});
