import { describe, it, expect, beforeEach } from 'vitest';
import { CreateUserUseCase } from '../createUser.js';
import { ConflictError } from '../../errors.js';
import { PasswordVault } from '../../../domain/auth/password.js';
import { DuplicateEmailError, NewUser, UserStore } from '../userStore.js';
import { User } from '../../../domain/auth/user.js';
import { InMemoryUserStore } from './inMemoryUserStore.js';

describe('CreateUserUseCase', () => {
  let store: InMemoryUserStore;
  let useCase: CreateUserUseCase;

  beforeEach(() => {
    store = new InMemoryUserStore();
    useCase = new CreateUserUseCase(store);
  });

  it('should persist the user and return the profile without the hash', async () => {
    const profile = await useCase.execute({
      email: 'a@x.com',
      password: 'pw1',
      handle: 'alice',
      publicKey: 'pk-alice',
    });

    expect(profile).toEqual({
      email: 'a@x.com',
      handle: 'alice',
      publicKey: 'pk-alice',
      bio: null,
    });
  });

  it('should store a hash that verifies, never the plaintext', async () => {
    await useCase.execute({ email: 'a@x.com', password: 'pw1', handle: 'alice', publicKey: 'pk' });
    const stored = await store.findByEmail('a@x.com');

    expect(stored?.passwordHash).not.toBe('pw1');
    expect(await PasswordVault.verify('pw1', stored?.passwordHash ?? '')).toBe(true);
  });

  it('should reject a duplicate email as an Error', async () => {
    await useCase.execute({ email: 'a@x.com', password: 'pw1', handle: 'alice', publicKey: 'pk' });

    const attempt = useCase.execute({
      email: 'a@x.com',
      password: 'pw2',
      handle: 'alice2',
      publicKey: 'pk2',
    });

    await expect(attempt).rejects.toThrow(ConflictError);
    await expect(attempt).rejects.toMatchObject({
      category: 'Error',
      message: 'User with email already exists: a@x.com',
    });
  });

  it('should convert a store constraint violation into a ConflictError', async () => {
    // Simulates a concurrent registration landing between the check and the insert
    class RacingStore extends InMemoryUserStore {
      async findByEmail(): Promise<User | null> {
        return null;
      }

      async insert(user: NewUser): Promise<User> {
        throw new DuplicateEmailError(user.email);
      }
    }
    const racing: UserStore = new RacingStore();

    await expect(
      new CreateUserUseCase(racing).execute({
        email: 'a@x.com',
        password: 'pw1',
        handle: 'alice',
        publicKey: 'pk',
      })
    ).rejects.toThrow('User with email already exists: a@x.com');
  });
});
