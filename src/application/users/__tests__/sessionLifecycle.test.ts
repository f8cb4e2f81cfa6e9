import { describe, it, expect, beforeEach } from 'vitest';
import { CreateUserUseCase } from '../createUser.js';
import { LoginUseCase } from '../login.js';
import { UpdateUserUseCase } from '../updateUser.js';
import { DeleteUserUseCase } from '../deleteUser.js';
import { AuthGate } from '../../../domain/auth/authGate.js';
import { TokenService } from '../../../domain/auth/token.js';
import { InMemoryUserStore } from './inMemoryUserStore.js';

describe('session lifecycle', () => {
  let store: InMemoryUserStore;
  let login: LoginUseCase;
  let updateUser: UpdateUserUseCase;
  let deleteUser: DeleteUserUseCase;

  beforeEach(async () => {
    store = new InMemoryUserStore();
    const tokens = new TokenService({ secret: 'test-secret' });
    const gate = new AuthGate(tokens);
    login = new LoginUseCase(store, tokens);
    updateUser = new UpdateUserUseCase(store, gate);
    deleteUser = new DeleteUserUseCase(store, gate);

    await new CreateUserUseCase(store).execute({
      email: 'a@x.com',
      password: 'pw1',
      handle: 'alice',
      publicKey: 'pk',
    });
  });

  it('should revoke the old token once it has been used to change the password', async () => {
    const token = await login.execute({ email: 'a@x.com', password: 'pw1' });

    await expect(
      updateUser.execute({ email: 'a@x.com', token, changes: { password: 'pw2' } })
    ).resolves.toMatchObject({ email: 'a@x.com' });

    await expect(deleteUser.execute({ email: 'a@x.com', token })).rejects.toMatchObject({
      category: 'Error',
      reason: 'stale credential',
    });
    expect(await store.findByEmail('a@x.com')).not.toBeNull();
  });

  it('should accept a token issued after the password change', async () => {
    const oldToken = await login.execute({ email: 'a@x.com', password: 'pw1' });
    await updateUser.execute({ email: 'a@x.com', token: oldToken, changes: { password: 'pw2' } });

    await expect(login.execute({ email: 'a@x.com', password: 'pw1' })).rejects.toMatchObject({
      message: 'Password is incorrect',
    });

    const newToken = await login.execute({ email: 'a@x.com', password: 'pw2' });
    await deleteUser.execute({ email: 'a@x.com', token: newToken });

    expect(await store.listEmails()).toEqual([]);
  });
});
