import { afterEach, describe, expect, it, vi } from 'vitest';
import { FileStateStorage } from '../FileStateStorage';
import { RedisStateStorage, type RedisLike } from '../RedisStateStorage';
import { DEFAULT_STATE_DIRECTORY, createStateStorage, stateKeyPrefix } from '../createStateStorage';

const fakeRedis = () => {
  const values = new Map<string, string>();
  const redis = {
    values,
    get: vi.fn(async (key: string) => values.get(key) ?? null),
    set: vi.fn(async (key: string, value: string) => {
      values.set(key, value);
      return 'OK';
    }),
    disconnect: vi.fn(),
  } satisfies RedisLike & { values: Map<string, string> };
  return redis;
};

describe('RedisStateStorage', () => {
  it('stores states as JSON under the key prefix', async () => {
    const redis = fakeRedis();
    const storage = new RedisStateStorage(redis, { keyPrefix: 'SHOP_STATE_' });

    await storage.set('alice', { isAuthenticated: true, authIdent: 'alice' });

    expect(redis.values.get('SHOP_STATE_alice')).toBe('{"isAuthenticated":true,"authIdent":"alice"}');
    await expect(storage.get('alice')).resolves.toEqual({ isAuthenticated: true, authIdent: 'alice' });
    await expect(storage.get('bob')).resolves.toBeUndefined();
    expect(redis.get).toHaveBeenLastCalledWith('SHOP_STATE_bob');
  });

  it('disconnects only clients it owns', async () => {
    const shared = fakeRedis();
    await new RedisStateStorage(shared).close();
    expect(shared.disconnect).not.toHaveBeenCalled();

    const owned = fakeRedis();
    await new RedisStateStorage(owned, { ownsClient: true }).close();
    expect(owned.disconnect).toHaveBeenCalledTimes(1);
  });
});

describe('createStateStorage', () => {
  const stores: RedisStateStorage[] = [];

  afterEach(async () => {
    await Promise.all(stores.splice(0).map((store) => store.close()));
  });

  it('derives key prefixes from the namespace', () => {
    expect(stateKeyPrefix('shop')).toBe('SHOP_STATE_');
    expect(stateKeyPrefix('shop', 'session')).toBe('SHOP_SESSION_');
  });

  it('uses file storage in the default directory', () => {
    const storage = createStateStorage({ namespace: 'shop' });

    expect(storage).toBeInstanceOf(FileStateStorage);
    expect(storage).toMatchObject({ directory: DEFAULT_STATE_DIRECTORY, keyPrefix: 'SHOP_STATE_' });
  });

  it('uses a directory URI as is', () => {
    expect(createStateStorage({ uri: '/var/lib/shop', namespace: 'shop' })).toMatchObject({
      directory: '/var/lib/shop',
    });
  });

  it('connects lazily to redis URIs', () => {
    for (const uri of ['redis://localhost:6379/0', 'rediss://cache.test:6380']) {
      const storage = createStateStorage({ uri, namespace: 'shop', prefix: 'session' });
      if (!(storage instanceof RedisStateStorage)) {
        throw new Error(`expected a redis store for ${uri}`);
      }
      stores.push(storage);
      expect(storage.keyPrefix).toBe('SHOP_SESSION_');
    }
  });
});
