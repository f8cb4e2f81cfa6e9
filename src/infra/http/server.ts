import { loadConfig } from '../../config.js';
import { TokenService } from '../../domain/auth/token.js';
import { createPool } from '../db/pool.js';
import { PgUserRepo } from '../db/userRepo.js';
import { createApp } from './app.js';

const config = loadConfig();
const pool = createPool(config.databaseUrl);

const app = createApp({
  userStore: new PgUserRepo(pool),
  tokenService: new TokenService({
    secret: config.jwtSecret,
    ttlHours: config.tokenTtlHours,
  }),
  healthCheck: () => pool.query('SELECT 1'),
});

app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/healthz`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
});
