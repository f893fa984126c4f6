import {Request, Response} from 'express';
import {AppDependencies} from '../interfaces/dependencies';
import {WaitlistEntry} from '../interfaces/waitlist';
import {DEFAULT_CITY, DEFAULT_SOURCE} from '../models/waitlist.model';
import {AppError, ErrorKind, handle_error} from '../utils/handle-error';
import {parse_waitlist_submission} from '../validators/waitlist.validator';

export function waitlist_controller({
  config,
  waitlist,
  verify_captcha,
  now,
}: AppDependencies) {
  const exposeDetails = config.nodeEnv !== 'production';

  function require_store() {
    if (waitlist === null) {
      throw new AppError(ErrorKind.Config, 'Database not configured');
    }

    return waitlist;
  }

  async function get_waitlist_count(_: Request, res: Response) {
    try {
      const count = await require_store().count();

      res.status(200).json({count});
    } catch (error) {
      handle_error(error, res, exposeDetails);
    }
  }

  async function submit_to_waitlist(req: Request, res: Response) {
    try {
      const submission = parse_waitlist_submission(req.body);

      const secret = config.turnstileSecret;
      if (!secret) {
        throw new AppError(ErrorKind.Config, 'Turnstile secret not configured');
      }

      let verified: boolean;
      try {
        verified = await verify_captcha({
          secret,
          token: submission.token,
          remoteIp: req.ip,
        });
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new AppError(
          ErrorKind.UpstreamVerification,
          `Verification error: ${message}`
        );
      }

      if (!verified) {
        throw new AppError(ErrorKind.Validation, 'CAPTCHA verification failed');
      }

      // nothing below runs for an unverified token
      const store = require_store();
      const entry: WaitlistEntry = {
        email: submission.email.toLowerCase(),
        city: submission.city || DEFAULT_CITY,
        source: submission.source || DEFAULT_SOURCE,
        subscribed_at: now(),
      };

      const outcome = await store.upsert(entry, now());
      const count = await store.count();

      req.log.info({outcome, source: entry.source}, 'waitlist submission stored');

      res.status(200).json({ok: true, count});
    } catch (error) {
      handle_error(error, res, exposeDetails);
    }
  }

  return {get_waitlist_count, submit_to_waitlist};
}
