import {AppConfig} from '../config/env';
import {DatabaseProbe} from '../services/database.service';
import {WaitlistStore} from '../services/waitlist.service';
import {CaptchaVerifier} from '../utils/turnstile';

export interface AppDependencies {
  config: AppConfig;
  // null when no database is configured or the connection failed
  waitlist: WaitlistStore | null;
  database: DatabaseProbe | null;
  verify_captcha: CaptchaVerifier;
  now: () => Date;
}
