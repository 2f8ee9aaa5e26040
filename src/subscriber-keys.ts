'use strict';

import urlBase64 from 'urlsafe-base64';

import { CURVE_NAME, ECDH } from './crypto.js';
import { KeyAgreementError } from './web-push-error.js';

const P256DH_LENGTH = 65;
const AUTH_LENGTH = 16;
const UNCOMPRESSED_POINT = 0x04;

/**
 * Key material a browser hands out with `PushSubscription.getKey()`.
 */
export interface SubscriberKeys {
  readonly p256dh: Buffer;
  readonly auth: Buffer;
}

export interface SubscriberKeysInit {
  p256dh: string | Uint8Array;
  auth: string | Uint8Array;
}

function toBuffer(value: string | Uint8Array, name: string): Buffer {
  if (typeof value !== 'string') {
    return Buffer.from(value);
  }

  // Browsers emit base64url, but some stores keep the "=" padding around.
  const unpadded = value.replace(/=+$/, '');
  if (!urlBase64.validate(unpadded)) {
    throw new KeyAgreementError(
      `The subscription ${name} value must be URL safe Base 64 encoded.`
    );
  }
  return urlBase64.decode(unpadded);
}

export function validateP256dh(p256dh: Buffer): void {
  if (p256dh.length !== P256DH_LENGTH || p256dh[0] !== UNCOMPRESSED_POINT) {
    throw new KeyAgreementError(
      `The subscription p256dh value should be an uncompressed ${P256DH_LENGTH} byte P-256 point.`
    );
  }

  try {
    ECDH.convertKey(p256dh, CURVE_NAME, undefined, undefined, 'uncompressed');
  } catch (err) {
    throw new KeyAgreementError(
      'The subscription p256dh value is not a point on the P-256 curve.',
      { cause: err }
    );
  }
}

export function validateAuth(auth: Buffer): void {
  if (auth.length !== AUTH_LENGTH) {
    throw new KeyAgreementError(
      `The subscription auth secret should be exactly ${AUTH_LENGTH} bytes long, got ${auth.length}.`
    );
  }
}

export function createSubscriberKeys(init: SubscriberKeysInit): SubscriberKeys {
  if (!init.p256dh || init.p256dh.length === 0) {
    throw new KeyAgreementError('No user public key provided for encryption.');
  }

  if (!init.auth || init.auth.length === 0) {
    throw new KeyAgreementError('No user auth provided for encryption.');
  }

  const p256dh = toBuffer(init.p256dh, 'p256dh');
  const auth = toBuffer(init.auth, 'auth');

  validateP256dh(p256dh);
  validateAuth(auth);

  return Object.freeze({ p256dh, auth });
}
