export * from './FileStateStorage';
export * from './RedisStateStorage';
export * from './createStateStorage';
