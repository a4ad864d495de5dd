import express from 'express';
import cors from 'cors';
import type Database from 'better-sqlite3';
import type { AppConfig } from '../../config.js';
import { UserRepo } from '../db/userRepo.js';
import { TokenIssuer } from '../../application/auth/tokenIssuer.js';
import { TokenVerifier } from '../../application/auth/tokenVerifier.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { createAuthRoutes } from './routes/auth.js';
import { createMeRoutes } from './routes/me.js';
import { createHealthRoutes } from './routes/health.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';

export interface AppDeps {
  config: Pick<AppConfig, 'jwtSecret' | 'adminEmails' | 'tokenTtlSeconds'>;
  db: Database.Database;
}

/**
 * Wire store, token services and use cases into an Express app. Does not listen.
 */
export function createApp({ config, db }: AppDeps): express.Express {
  const userRepo = new UserRepo(db);
  const tokenIssuer = new TokenIssuer(config.jwtSecret, config.tokenTtlSeconds);
  const tokenVerifier = new TokenVerifier(userRepo, config.jwtSecret);

  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use('/api', createHealthRoutes(db));
  app.use(createSwaggerRoutes());
  app.use(
    '/auth',
    createAuthRoutes({
      registerUseCase: new RegisterUseCase(userRepo, tokenIssuer, config.adminEmails),
      loginUseCase: new LoginUseCase(userRepo, tokenIssuer),
    })
  );
  app.use(createMeRoutes(tokenVerifier));

  app.use(notFoundHandler);
  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
