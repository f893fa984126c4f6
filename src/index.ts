import {config} from 'dotenv';
config();

import * as Sentry from '@sentry/node';
import {load_config} from './config/env';

const appConfig = load_config();

Sentry.init({
  environment: appConfig.nodeEnv,
  dsn: appConfig.sentryDsn,
  // Performance Monitoring
  tracesSampleRate: 1.0, //  Capture 100% of the transactions
});

import {create_app} from './app';
import {logger} from './config/pino.config';
import {
  connect_db,
  mongo_database_probe,
} from './services/database.service';
import {mongo_waitlist_store} from './services/waitlist.service';
import {verify_turnstile_token} from './utils/turnstile';

async function main() {
  const connected = await connect_db(appConfig);

  const app = create_app({
    config: appConfig,
    waitlist: connected ? mongo_waitlist_store : null,
    database: connected ? mongo_database_probe : null,
    verify_captcha: verify_turnstile_token,
    now: () => new Date(),
  });

  app.listen(appConfig.port, () =>
    logger.info({port: appConfig.port}, 'App is now running')
  );
}

main().catch(error => {
  logger.fatal({err: error}, 'Fatal startup error');
  process.exit(1);
});
