import { parseClientState, type ClientState, type StateStorage } from '@apikit/api-client-core';

/** The part of an ioredis client the store uses. */
export interface RedisLike {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  disconnect?(): void;
}

export interface RedisStateStorageOptions {
  keyPrefix?: string;
  /** Disconnect the client on {@link RedisStateStorage.close}; set when the store created it. */
  ownsClient?: boolean;
}

/** States stored as JSON strings under `<keyPrefix><key>`. */
export class RedisStateStorage implements StateStorage {
  readonly keyPrefix: string;
  private readonly ownsClient: boolean;

  constructor(
    private readonly redis: RedisLike,
    options: RedisStateStorageOptions = {},
  ) {
    this.keyPrefix = options.keyPrefix ?? '';
    this.ownsClient = options.ownsClient ?? false;
  }

  async get(key: string): Promise<ClientState | undefined> {
    const raw = await this.redis.get(this.keyPrefix + key);
    return raw === null ? undefined : parseClientState(raw);
  }

  async set(key: string, state: ClientState): Promise<void> {
    await this.redis.set(this.keyPrefix + key, JSON.stringify(state));
  }

  async close(): Promise<void> {
    if (this.ownsClient) {
      this.redis.disconnect?.();
    }
  }
}
