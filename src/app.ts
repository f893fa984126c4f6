import * as Sentry from '@sentry/node';
import express from 'express';
import cors from 'cors';
import compression from 'compression';
import generalRoutes from './routes/general.routes';
import {pinoLogger} from './config/pino.config';
import {rate_limit_api} from './middlewares/ratelimiter.middleware';
import {error_handler} from './middlewares/error.middleware';
import {AppDependencies} from './interfaces/dependencies';

export function create_app(deps: AppDependencies) {
  const {config} = deps;
  const app = express();

  // number of reverse proxies in front of us, so req.ip is the real client
  app.set('trust proxy', config.trustProxy);

  app.use(
    cors({
      origin: config.corsOrigins ?? true,
      credentials: true,
    })
  );
  app.use(express.json());
  app.use(express.urlencoded({extended: true}));
  app.use(compression());
  app.use(pinoLogger);
  app.use(rate_limit_api);

  app.use('', generalRoutes(deps));

  app.all('*', (_, res) => {
    res.status(404).json({detail: 'Route not found'});
  });

  // The error handler must be registered before any other error middleware and after all controllers
  Sentry.setupExpressErrorHandler(app);

  app.use(error_handler(config.nodeEnv !== 'production'));

  return app;
}
