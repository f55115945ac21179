import { mkdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { parseClientState, type ClientState, type StateStorage } from '@apikit/api-client-core';

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** One JSON file per key under `directory`, created on first write. */
export class FileStateStorage implements StateStorage {
  constructor(
    readonly directory: string,
    readonly keyPrefix = '',
  ) {}

  filenameFor(key: string): string {
    return join(this.directory, `${this.keyPrefix}${encodeURIComponent(key)}.json`);
  }

  async get(key: string): Promise<ClientState | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filenameFor(key), 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return undefined;
      throw error;
    }
    return parseClientState(raw);
  }

  async set(key: string, state: ClientState): Promise<void> {
    await mkdir(this.directory, { recursive: true });
    await writeFile(this.filenameFor(key), JSON.stringify(state), 'utf8');
  }
}
