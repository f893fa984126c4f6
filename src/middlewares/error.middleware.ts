import {NextFunction, Request, Response} from 'express';
import {handle_error} from '../utils/handle-error';

// Express only treats a middleware as an error handler when it takes all four
// arguments
export function error_handler(exposeDetails: boolean) {
  return function (
    error: unknown,
    _req: Request,
    res: Response,
    // eslint-disable-next-line @typescript-eslint/no-unused-vars
    _next: NextFunction
  ) {
    handle_error(error, res, exposeDetails);
  };
}
