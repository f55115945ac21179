import { describe, expect, it, vi } from 'vitest';
import { authRequired, runAuthenticated, type AuthenticatableClient } from '../authGate';
import { AuthRequiredError } from '../errors';

class FakeSession implements AuthenticatableClient {
  isAuthenticated = false;

  authenticate = vi.fn(async () => {
    this.isAuthenticated = true;
  });

  recoverAuth = vi.fn(async (_error: AuthRequiredError) => this.recovers);

  constructor(
    readonly autoAuthenticate = true,
    private readonly recovers = true,
  ) {}
}

class Account extends FakeSession {
  balance = authRequired(async function (this: Account, currency: string) {
    return `${currency} 10.00`;
  });
}

const expired = () => new AuthRequiredError(undefined, 'session expired', 'alice');

describe('runAuthenticated', () => {
  it('logs in before the first call', async () => {
    const session = new FakeSession();
    const operation = vi.fn(async () => 'profile');

    await expect(runAuthenticated(session, operation)).resolves.toBe('profile');
    expect(session.authenticate).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('runs directly on an authenticated session', async () => {
    const session = new FakeSession();
    session.isAuthenticated = true;

    await expect(runAuthenticated(session, async () => 'profile')).resolves.toBe('profile');
    expect(session.authenticate).not.toHaveBeenCalled();
  });

  it('replays the call once after a successful recovery', async () => {
    const session = new FakeSession();
    session.isAuthenticated = true;
    const operation = vi.fn<() => Promise<string>>().mockRejectedValueOnce(expired()).mockResolvedValueOnce('profile');

    await expect(runAuthenticated(session, operation)).resolves.toBe('profile');
    expect(session.recoverAuth).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('marks the session unauthenticated when recovery fails', async () => {
    const session = new FakeSession(true, false);
    session.isAuthenticated = true;
    const error = expired();

    await expect(runAuthenticated(session, async () => Promise.reject(error))).rejects.toBe(error);
    expect(session.recoverAuth).toHaveBeenCalledWith(error);
    expect(session.isAuthenticated).toBe(false);
  });

  it('does not recover without autoAuthenticate', async () => {
    const session = new FakeSession(false);
    session.isAuthenticated = true;

    await expect(runAuthenticated(session, async () => Promise.reject(expired()))).rejects.toBeInstanceOf(
      AuthRequiredError,
    );
    expect(session.recoverAuth).not.toHaveBeenCalled();
    expect(session.isAuthenticated).toBe(false);
  });

  it('lets a second auth failure after recovery propagate', async () => {
    const session = new FakeSession();
    session.isAuthenticated = true;
    const operation = vi.fn(async (): Promise<string> => {
      throw expired();
    });

    await expect(runAuthenticated(session, operation)).rejects.toBeInstanceOf(AuthRequiredError);
    expect(session.recoverAuth).toHaveBeenCalledTimes(1);
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('leaves other failures alone', async () => {
    const session = new FakeSession();
    session.isAuthenticated = true;

    await expect(runAuthenticated(session, async () => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    expect(session.recoverAuth).not.toHaveBeenCalled();
    expect(session.isAuthenticated).toBe(true);
  });
});

describe('authRequired', () => {
  it('wraps methods with the gate of their client', async () => {
    const account = new Account();

    await expect(account.balance('EUR')).resolves.toBe('EUR 10.00');
    expect(account.authenticate).toHaveBeenCalledTimes(1);
  });
});
