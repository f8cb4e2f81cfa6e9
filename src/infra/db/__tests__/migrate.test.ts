import { describe, it, expect } from 'vitest';
import { parseMigrations } from '../migrate.js';

describe('parseMigrations', () => {
  it('should order SQL files by version and skip everything else', () => {
    expect(parseMigrations(['010_add_index.sql', 'README.md', '002_bio.sql', '001_create_users.sql'])).toEqual([
      { filename: '001_create_users.sql', version: 1 },
      { filename: '002_bio.sql', version: 2 },
      { filename: '010_add_index.sql', version: 10 },
    ]);
  });

  it('should reject a file without a version prefix', () => {
    expect(() => parseMigrations(['create_users.sql'])).toThrow(
      'Invalid migration filename: create_users.sql'
    );
  });
});
