import type {Response} from 'express';
import * as Sentry from '@sentry/node';
import mongoose from 'mongoose';
import {logger} from '../config/pino.config';

export enum ErrorKind {
  Config = 'config',
  Validation = 'validation',
  UpstreamVerification = 'upstream_verification',
  Storage = 'storage',
}

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  [ErrorKind.Config]: 500,
  [ErrorKind.Validation]: 400,
  [ErrorKind.UpstreamVerification]: 500,
  [ErrorKind.Storage]: 500,
};

// what a production client sees instead of the raw message
const REDACTED_DETAIL: Partial<Record<ErrorKind, string>> = {
  [ErrorKind.UpstreamVerification]: 'Verification error',
  [ErrorKind.Storage]: 'Internal Server Error',
};

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'AppError';
    this.kind = kind;
  }

  get status(): number {
    return STATUS_BY_KIND[this.kind];
  }
}

// body-parser raises client errors tagged with a type and a 4xx status, e.g.
// entity.parse.failed, entity.too.large, encoding.unsupported
function from_body_parser(error: unknown): AppError | undefined {
  if (
    typeof error !== 'object' ||
    error === null ||
    !('type' in error) ||
    typeof error.type !== 'string' ||
    !('status' in error) ||
    typeof error.status !== 'number' ||
    error.status < 400 ||
    error.status >= 500
  ) {
    return undefined;
  }

  if (error.type === 'entity.parse.failed') {
    return new AppError(ErrorKind.Validation, 'Malformed JSON body');
  }

  const message = error instanceof Error ? error.message : 'Bad request';
  return new AppError(ErrorKind.Validation, message);
}

export function to_app_error(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  // process error from mongodb schema validation
  if (error instanceof mongoose.Error.ValidationError) {
    const validationErrors = Object.values(error.errors).map(
      err => err.message
    );
    return new AppError(ErrorKind.Validation, validationErrors.join(', '));
  }

  const clientError = from_body_parser(error);
  if (clientError) {
    return clientError;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new AppError(ErrorKind.Storage, message);
}

export function public_detail(error: AppError, exposeDetails: boolean) {
  if (exposeDetails) return error.message;

  return REDACTED_DETAIL[error.kind] ?? error.message;
}

export function handle_error(
  error: unknown,
  res: Response,
  exposeDetails = true
): void {
  const appError = to_app_error(error);

  if (appError.status >= 500) {
    logger.error({err: error, kind: appError.kind}, appError.message);
    Sentry.captureException(error, {
      level: 'error',
      tags: {source: 'HTTP Handler', kind: appError.kind},
    });
  }

  res
    .status(appError.status)
    .json({detail: public_detail(appError, exposeDetails)});
}
