import { describe, it, expect, beforeEach } from 'vitest';
import { LoginUseCase } from '../login.js';
import { CreateUserUseCase } from '../createUser.js';
import { IncorrectPasswordError, NotFoundError } from '../../errors.js';
import { TokenService } from '../../../domain/auth/token.js';
import { InMemoryUserStore } from './inMemoryUserStore.js';

describe('LoginUseCase', () => {
  let store: InMemoryUserStore;
  let tokens: TokenService;
  let useCase: LoginUseCase;

  beforeEach(async () => {
    store = new InMemoryUserStore();
    tokens = new TokenService({ secret: 'test-secret' });
    useCase = new LoginUseCase(store, tokens);

    await new CreateUserUseCase(store).execute({
      email: 'a@x.com',
      password: 'pw1',
      handle: 'alice',
      publicKey: 'pk',
    });
  });

  it('should issue a token bound to the current password hash', async () => {
    const token = await useCase.execute({ email: 'a@x.com', password: 'pw1' });
    const stored = await store.findByEmail('a@x.com');
    const result = tokens.validate(token);

    expect(result.valid).toBe(true);
    expect(result.valid && result.claims.email).toBe('a@x.com');
    expect(result.valid && result.claims.passwordHashFingerprint).toBe(stored?.passwordHash);
  });

  it('should report a wrong password as a Failure', async () => {
    const attempt = useCase.execute({ email: 'a@x.com', password: 'wrong' });

    await expect(attempt).rejects.toThrow(IncorrectPasswordError);
    await expect(attempt).rejects.toMatchObject({
      category: 'Failure',
      message: 'Password is incorrect',
    });
  });

  it('should report an unknown email as a Failure', async () => {
    const attempt = useCase.execute({ email: 'nobody@x.com', password: 'pw' });

    await expect(attempt).rejects.toThrow(NotFoundError);
    await expect(attempt).rejects.toMatchObject({
      category: 'Failure',
      message: 'No user with email: nobody@x.com',
    });
  });
});
