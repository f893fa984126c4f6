import isEmail from 'validator/lib/isEmail';
import {AppError, ErrorKind} from '../utils/handle-error';
import {WaitlistSubmission} from '../interfaces/waitlist';

const MAX_EMAIL_LENGTH = 320;

function optional_string(
  body: Record<string, unknown>,
  field: string
): string | undefined {
  const value = body[field];

  if (typeof value === 'undefined' || value === null) return undefined;

  if (typeof value !== 'string') {
    throw new AppError(ErrorKind.Validation, `${field} must be a string`);
  }

  return value;
}

export function parse_waitlist_submission(body: unknown): WaitlistSubmission {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new AppError(ErrorKind.Validation, 'Request body must be an object');
  }

  const fields: Record<string, unknown> = {...body};
  const {email, token} = fields;

  if (
    typeof email !== 'string' ||
    email.trim().length > MAX_EMAIL_LENGTH ||
    isEmail(email.trim()) === false
  ) {
    throw new AppError(
      ErrorKind.Validation,
      'Please provide a valid email address'
    );
  }

  if (typeof token !== 'string' || token.length === 0) {
    throw new AppError(ErrorKind.Validation, 'Please provide a captcha token');
  }

  return {
    email: email.trim(),
    token,
    city: optional_string(fields, 'city'),
    source: optional_string(fields, 'source'),
  };
}
