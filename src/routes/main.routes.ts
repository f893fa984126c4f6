import {Router} from 'express';
import {
  read_root,
  say_hello,
  test_database,
} from '../controllers/main.controller';
import {AppDependencies} from '../interfaces/dependencies';

export default function main_routes(deps: AppDependencies) {
  const router = Router();

  router.get('/', read_root);

  router.get('/api/hello', say_hello);

  router.get('/test', test_database(deps));

  return router;
}
