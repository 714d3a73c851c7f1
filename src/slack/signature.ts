import { createHmac, timingSafeEqual } from 'node:crypto';
import { RelayError, ErrorCode } from '../utils/errors.js';

export const SIGNATURE_VERSION = 'v0';
export const MAX_REQUEST_AGE_SECONDS = 60 * 5;

const TIMESTAMP_RE = /^\d+$/;

export interface SignatureInput {
  signingSecret: string;
  /** Request body exactly as received, before any JSON parsing. */
  rawBody: string;
  timestamp: string | null | undefined;
  signature: string | null | undefined;
  /** Current time in milliseconds. */
  now?: number;
}

export function computeSlackSignature(signingSecret: string, timestamp: string, rawBody: string): string {
  const base = `${SIGNATURE_VERSION}:${timestamp}:${rawBody}`;
  const digest = createHmac('sha256', signingSecret).update(base).digest('hex');
  return `${SIGNATURE_VERSION}=${digest}`;
}

function reject(reason: string, message: string): RelayError {
  return new RelayError(ErrorCode.UNAUTHORIZED, message, { reason });
}

/**
 * Verify the `X-Slack-Signature` header of an Events API request.
 * Throws an UNAUTHORIZED RelayError when the request must be rejected.
 */
export function verifySlackSignature(input: SignatureInput): void {
  const { timestamp, signature } = input;

  if (!timestamp || !TIMESTAMP_RE.test(timestamp)) {
    throw reject('timestamp_invalid', 'Missing or malformed request timestamp');
  }

  const nowSeconds = Math.floor((input.now ?? Date.now()) / 1000);
  if (Math.abs(nowSeconds - Number(timestamp)) > MAX_REQUEST_AGE_SECONDS) {
    throw reject('timestamp_expired', 'Request timestamp is outside the allowed window');
  }

  if (!signature) {
    throw reject('signature_missing', 'Missing request signature');
  }

  const expected = Buffer.from(computeSlackSignature(input.signingSecret, timestamp, input.rawBody));
  const provided = Buffer.from(signature);
  if (expected.length !== provided.length || !timingSafeEqual(expected, provided)) {
    throw reject('signature_mismatch', 'Request signature does not match');
  }
}
