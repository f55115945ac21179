import { AuthRequiredError } from './errors';

export interface AuthenticatableClient {
  readonly autoAuthenticate: boolean;
  isAuthenticated: boolean;
  authenticate(): Promise<void>;
  /** Resolves `true` when the session was restored and the call may be replayed. */
  recoverAuth(error: AuthRequiredError): Promise<boolean>;
}

/**
 * Runs `operation` on an authenticated session.
 *
 * An unauthenticated client with `autoAuthenticate` logs in first and then
 * runs the operation once. Otherwise an {@link AuthRequiredError} gets a single
 * recovery attempt followed by one replay; any other outcome marks the
 * client unauthenticated and re-throws.
 */
export async function runAuthenticated<R>(
  client: AuthenticatableClient,
  operation: () => Promise<R>,
): Promise<R> {
  if (client.autoAuthenticate && !client.isAuthenticated) {
    await client.authenticate();
    return operation();
  }

  try {
    return await operation();
  } catch (error) {
    if (error instanceof AuthRequiredError) {
      if (client.autoAuthenticate && (await client.recoverAuth(error))) {
        return operation();
      }
      client.isAuthenticated = false;
    }
    throw error;
  }
}

/** Method wrapper form of {@link runAuthenticated}. */
export function authRequired<C extends AuthenticatableClient, A extends unknown[], R>(
  operation: (this: C, ...args: A) => Promise<R>,
): (this: C, ...args: A) => Promise<R> {
  return function (this: C, ...args: A): Promise<R> {
    return runAuthenticated(this, () => operation.apply(this, args));
  };
}
