import axios from 'axios';
import {
  TurnstileVerification,
  TurnstileVerifyResponse,
} from '../interfaces/turnstile';

export const TURNSTILE_VERIFY_URL =
  'https://challenges.cloudflare.com/turnstile/v0/siteverify';
export const TURNSTILE_TIMEOUT_MS = 6_000;

export type CaptchaVerifier = (
  verification: TurnstileVerification
) => Promise<boolean>;

function is_verify_response(data: unknown): data is TurnstileVerifyResponse {
  return typeof data === 'object' && data !== null && !Array.isArray(data);
}

/**
 * Resolves to whether Cloudflare accepted the token, whatever the HTTP status.
 * Rejects when the call fails or the answer is not a JSON object.
 */
export const verify_turnstile_token: CaptchaVerifier = async function ({
  secret,
  token,
  remoteIp,
}) {
  const form = new URLSearchParams({secret, response: token});

  if (remoteIp) {
    form.set('remoteip', remoteIp);
  }

  const resp = await axios.post<unknown>(TURNSTILE_VERIFY_URL, form.toString(), {
    headers: {'Content-Type': 'application/x-www-form-urlencoded'},
    timeout: TURNSTILE_TIMEOUT_MS,
    // siteverify answers rejected tokens with a 4xx JSON body; the body decides
    validateStatus: () => true,
  });

  if (!is_verify_response(resp.data)) {
    throw Error('Malformed verification response');
  }

  return resp.data.success === true;
};
