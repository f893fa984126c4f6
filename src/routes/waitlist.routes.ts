import {Router} from 'express';
import {waitlist_controller} from '../controllers/waitlist.controller';
import {AppDependencies} from '../interfaces/dependencies';
import {rate_limit_waitlist} from '../middlewares/ratelimiter.middleware';

export default function waitlist_routes(deps: AppDependencies) {
  const router = Router();
  const {get_waitlist_count, submit_to_waitlist} = waitlist_controller(deps);

  router.get('/count', get_waitlist_count);

  router.post('/submit', rate_limit_waitlist, submit_to_waitlist);

  return router;
}
