'use strict';

import jws from 'jws';

import {
  DEFAULT_EXPIRATION_SECONDS,
  MAX_EXPIRATION_SECONDS,
} from './web-push-constants.js';
import { InvalidSubjectError, WebPushError } from './web-push-error.js';
import type { VapidKeys } from './vapid-keys.js';

const MAILTO_PREFIX = 'mailto:';
const HTTPS_PREFIX = 'https://';

export function validateSubject(subject: string): void {
  if (typeof subject !== 'string' || subject.length === 0) {
    throw new InvalidSubjectError(
      String(subject),
      'No subject set in vapidDetails.subject.'
    );
  }

  if (subject.startsWith(MAILTO_PREFIX)) {
    if (subject.length === MAILTO_PREFIX.length) {
      throw new InvalidSubjectError(subject, 'Vapid mailto subject has no address. ' + subject);
    }
    return;
  }

  if (!subject.startsWith(HTTPS_PREFIX)) {
    throw new InvalidSubjectError(subject);
  }

  let hostname: string;
  try {
    hostname = new URL(subject).hostname;
  } catch (err) {
    throw new InvalidSubjectError(
      subject,
      'Vapid subject is not a url or mailto url. ' + subject,
      { cause: err }
    );
  }

  if (!hostname) {
    throw new InvalidSubjectError(subject, 'Vapid subject is not a url or mailto url. ' + subject);
  }
}

/**
 * Given the number of seconds calculates the expiration in the future by
 * adding `numSeconds` to the current seconds from Unix Epoch.
 */
export function getFutureExpirationTimestamp(numSeconds: number, now = Date.now()): number {
  return Math.floor((now + numSeconds * 1000) / 1000);
}

/**
 * Validates an expiration window length, in seconds, against the 24 hour
 * ceiling set by RFC 8292.
 */
export function validateExpirationSeconds(expirationSeconds: number): void {
  if (!Number.isInteger(expirationSeconds)) {
    throw new WebPushError('`expirationSeconds` value must be an integer');
  }

  if (expirationSeconds <= 0) {
    throw new WebPushError('`expirationSeconds` must be a positive integer');
  }

  if (expirationSeconds > MAX_EXPIRATION_SECONDS) {
    throw new WebPushError('`expirationSeconds` value is greater than maximum of 24 hours');
  }
}

/**
 * Validates an absolute expiration, in seconds from Epoch.
 */
export function validateExpiration(expiration: number, now = Date.now()): void {
  if (!Number.isInteger(expiration)) {
    throw new WebPushError('`expiration` value must be a number');
  }

  if (expiration <= Math.floor(now / 1000)) {
    throw new WebPushError('`expiration` must be in the future');
  }

  // Roughly checks the time of expiration, since the max expiration can be ahead
  // of the time than at the moment the expiration was generated
  const maxExpirationTimestamp = getFutureExpirationTimestamp(MAX_EXPIRATION_SECONDS, now);

  if (expiration > maxExpirationTimestamp) {
    throw new WebPushError('`expiration` value is greater than maximum of 24 hours');
  }
}

export function validateAudience(audience: string): void {
  let parsed: URL;
  try {
    parsed = new URL(audience);
  } catch (err) {
    throw new WebPushError('VAPID audience is not a url. ' + audience, { cause: err });
  }

  if (!parsed.hostname) {
    throw new WebPushError('VAPID audience is not a url. ' + audience);
  }
}

export interface VapidAssertionOptions {
  /** The origin of the push service, e.g. `https://fcm.googleapis.com`. */
  audience: string;
  /** A `mailto:` address or `https://` URL the push service can contact. */
  subject: string;
  vapidKeys: VapidKeys;
  /** Defaults to 12 hours. */
  expirationSeconds?: number;
  /** Absolute expiry in seconds from Epoch; wins over `expirationSeconds`. */
  expiration?: number;
  /** Milliseconds from Epoch. */
  now?: number;
}

export interface VapidAssertion {
  token: string;
  /** The raw public key, base64url encoded, for the `k` parameter. */
  publicKey: string;
}

export function createVapidAssertion(options: VapidAssertionOptions): VapidAssertion {
  validateSubject(options.subject);
  validateAudience(options.audience);

  const now = options.now ?? Date.now();
  let expiration: number;
  if (options.expiration !== undefined) {
    validateExpiration(options.expiration, now);
    expiration = options.expiration;
  } else {
    const expirationSeconds = options.expirationSeconds ?? DEFAULT_EXPIRATION_SECONDS;
    validateExpirationSeconds(expirationSeconds);
    expiration = getFutureExpirationTimestamp(expirationSeconds, now);
  }

  const token = jws.sign({
    header: {
      typ: 'JWT',
      alg: 'ES256',
    },
    payload: {
      aud: new URL(options.audience).origin,
      exp: expiration,
      sub: options.subject,
    },
    privateKey: options.vapidKeys.toPEM(),
  });

  return {
    token,
    publicKey: options.vapidKeys.publicKeyBase64Url,
  };
}

/**
 * This method takes the required VAPID parameters and returns the
 * Authorization header to be added to a Web Push Protocol Request.
 */
export function getVapidHeaders(options: VapidAssertionOptions): { Authorization: string } {
  const { token, publicKey } = createVapidAssertion(options);

  return {
    Authorization: 'vapid t=' + token + ', k=' + publicKey,
  };
}
