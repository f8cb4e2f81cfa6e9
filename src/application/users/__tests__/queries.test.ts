import { describe, it, expect, beforeEach } from 'vitest';
import { UserQueries } from '../queries.js';
import { NotFoundError } from '../../errors.js';
import { InMemoryUserStore } from './inMemoryUserStore.js';

describe('UserQueries', () => {
  let store: InMemoryUserStore;
  let queries: UserQueries;

  beforeEach(async () => {
    store = new InMemoryUserStore();
    queries = new UserQueries(store);
    await store.insert({ email: 'a@x.com', passwordHash: 'h1', handle: 'alice', publicKey: 'pk-a' });
    await store.insert({
      email: 'b@x.com',
      passwordHash: 'h2',
      handle: 'bob',
      publicKey: 'pk-b',
      bio: 'hi',
    });
  });

  it('should return a public profile', async () => {
    expect(await queries.getUser('b@x.com')).toEqual({
      email: 'b@x.com',
      handle: 'bob',
      publicKey: 'pk-b',
      bio: 'hi',
    });
  });

  it('should report an unknown email as a Failure', async () => {
    const attempt = queries.getUser('nobody@x.com');

    await expect(attempt).rejects.toThrow(NotFoundError);
    await expect(attempt).rejects.toMatchObject({
      category: 'Failure',
      message: 'No Users with email: nobody@x.com',
    });
  });

  it('should list every email', async () => {
    expect(await queries.listEmails()).toEqual(['a@x.com', 'b@x.com']);
  });

  it('should list nothing for an empty directory', async () => {
    expect(await new UserQueries(new InMemoryUserStore()).listEmails()).toEqual([]);
  });
});
