import type { BaseClient } from './BaseClient';
import { resolveClientConfig, type ResolveClientConfigOptions } from './config';
import type { BaseClientConfig, ClientState } from './types';

export type ClientConstructor<C extends BaseClient> = new (config: BaseClientConfig) => C;

export interface CreateClientFromConfigOptions
  extends Omit<ResolveClientConfigOptions, 'name'>,
    Pick<BaseClientConfig, 'stateStorage' | 'transport' | 'scheduler' | 'logger' | 'errorProcessors'> {
  /** Defaults to the class name without its `Client` suffix, lower-cased. */
  name?: string;
  loadState?: boolean | ClientState;
}

export function configNameFor(ClientClass: { name: string }): string {
  return ClientClass.name.replace(/Client$/, '').toLowerCase();
}

/**
 * Resolves the settings of `ClientClass` (file, environment, overrides),
 * builds the client with the given collaborators and loads its state.
 *
 * @example
 * ```ts
 * const storage = createStateStorage({ uri: process.env.STATE_URI, namespace: 'catalog' });
 * const client = await createClientFromConfig(CatalogClient, { stateStorage: storage });
 * ```
 */
export async function createClientFromConfig<C extends BaseClient>(
  ClientClass: ClientConstructor<C>,
  options: CreateClientFromConfigOptions = {},
): Promise<C> {
  const name = options.name ?? configNameFor(ClientClass);
  const { source, settings } = await resolveClientConfig({
    name,
    path: options.path,
    env: options.env,
    envPrefix: options.envPrefix,
    overrides: options.overrides,
  });
  options.logger?.info('client.config.resolved', { client: ClientClass.name, name, source: source ?? null });

  const client = new ClientClass({
    ...settings,
    stateStorage: options.stateStorage,
    transport: options.transport,
    scheduler: options.scheduler,
    logger: options.logger,
    errorProcessors: options.errorProcessors,
  });
  return client.initialize({ loadState: options.loadState });
}
