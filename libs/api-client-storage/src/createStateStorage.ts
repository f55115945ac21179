import { Redis } from 'ioredis';
import { FileStateStorage } from './FileStateStorage';
import { RedisStateStorage } from './RedisStateStorage';

export const DEFAULT_STATE_DIRECTORY = './tmp';

export interface CreateStateStorageOptions {
  /** `redis://` / `rediss://` URL, or a directory for file storage. */
  uri?: string;
  /** Usually the client name; keeps the keys of different clients apart. */
  namespace: string;
  prefix?: string;
}

const REDIS_URI = /^rediss?:\/\//i;

export function stateKeyPrefix(namespace: string, prefix = 'state'): string {
  return `${namespace.toUpperCase()}_${prefix.toUpperCase()}_`;
}

/**
 * Builds the state store once at startup; pass the result to every client
 * that should share it.
 */
export function createStateStorage(options: CreateStateStorageOptions): FileStateStorage | RedisStateStorage {
  const uri = options.uri || DEFAULT_STATE_DIRECTORY;
  const keyPrefix = stateKeyPrefix(options.namespace, options.prefix);

  if (REDIS_URI.test(uri)) {
    const redis = new Redis(uri, {
      lazyConnect: true,
      maxRetriesPerRequest: 2,
      connectTimeout: 5000,
    });
    return new RedisStateStorage(redis, { keyPrefix, ownsClient: true });
  }

  return new FileStateStorage(uri, keyPrefix);
}
