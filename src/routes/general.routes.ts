import {Router} from 'express';
import mainRoutes from './main.routes';
import waitlistRoutes from './waitlist.routes';
import {AppDependencies} from '../interfaces/dependencies';

export default function general_routes(deps: AppDependencies) {
  const router = Router();

  router.use('/', mainRoutes(deps));

  router.use('/waitlist', waitlistRoutes(deps));

  return router;
}
