import type { ClientState, StateStorage } from './types';

/** Process-local store; states are copied on the way in and out. */
export class InMemoryStateStorage implements StateStorage {
  private readonly states = new Map<string, string>();

  constructor(private readonly keyPrefix = '') {}

  async get(key: string): Promise<ClientState | undefined> {
    const raw = this.states.get(this.keyPrefix + key);
    return raw === undefined ? undefined : parseClientState(raw);
  }

  async set(key: string, state: ClientState): Promise<void> {
    this.states.set(this.keyPrefix + key, JSON.stringify(state));
  }

  clear(): void {
    this.states.clear();
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is ClientState[string] {
  if (value === null || value === undefined) return true;
  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
      return true;
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Parses a serialised state. Anything that is not a JSON object is rejected.
 * Shared by the persistent stores.
 */
export function parseClientState(raw: string): ClientState {
  const parsed: unknown = JSON.parse(raw);
  if (!isRecord(parsed)) {
    throw new TypeError(`Stored client state is not an object: ${raw.slice(0, 64)}`);
  }
  const state: ClientState = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (isJsonValue(value)) state[key] = value;
  }
  return state;
}
