'use strict';

import asn1 from 'asn1.js';
import urlBase64 from 'urlsafe-base64';

import { CURVE_NAME, createECDH } from './crypto.js';
import { InvalidVapidKeyError } from './web-push-error.js';

const PRIVATE_KEY_LENGTH = 32;
const PUBLIC_KEY_LENGTH = 65;

const ID_EC_PUBLIC_KEY = [1, 2, 840, 10045, 2, 1];
const PRIME_256_V1 = [1, 2, 840, 10045, 3, 1, 7];

interface ECPrivateKey {
  version: number;
  privateKey: Buffer;
  parameters?: number[];
  publicKey?: asn1.BitString;
}

interface SubjectPublicKeyInfo {
  algorithm: { id: number[]; curve: number[] };
  publicKey: asn1.BitString;
}

const ECPrivateKeyASN = asn1.define<ECPrivateKey>('ECPrivateKey', function () {
  this.seq().obj(
    this.key('version').int(),
    this.key('privateKey').octstr(),
    this.key('parameters').explicit(0).objid().optional(),
    this.key('publicKey').explicit(1).bitstr().optional()
  );
});

const SubjectPublicKeyInfoASN = asn1.define<SubjectPublicKeyInfo>(
  'SubjectPublicKeyInfo',
  function () {
    this.seq().obj(
      this.key('algorithm').seq().obj(
        this.key('id').objid(),
        this.key('curve').objid()
      ),
      this.key('publicKey').bitstr()
    );
  }
);

// Occasionally the curve hands back a key without its leading zero bytes,
// which push services then reject.
function padStart(buffer: Buffer, length: number): Buffer {
  if (buffer.length >= length) {
    return buffer;
  }
  return Buffer.concat([Buffer.alloc(length - buffer.length), buffer]);
}

function decodeKey(value: string, label: string, length: number): Buffer {
  if (!value) {
    throw new InvalidVapidKeyError(`No key set for the Vapid ${label} key.`);
  }

  if (!urlBase64.validate(value)) {
    throw new InvalidVapidKeyError(
      `Vapid ${label} key must be a URL safe Base 64 (without "=")`
    );
  }

  const decoded = urlBase64.decode(value);
  if (decoded.length !== length) {
    throw new InvalidVapidKeyError(
      `Vapid ${label} key should be ${length} bytes long when decoded.`
    );
  }
  return decoded;
}

export function validatePublicKey(publicKey: string): Buffer {
  return decodeKey(publicKey, 'public', PUBLIC_KEY_LENGTH);
}

export function validatePrivateKey(privateKey: string): Buffer {
  return decodeKey(privateKey, 'private', PRIVATE_KEY_LENGTH);
}

function derivePublicKey(privateKey: Buffer): Buffer {
  const curve = createECDH(CURVE_NAME);
  try {
    curve.setPrivateKey(privateKey);
  } catch (err) {
    throw new InvalidVapidKeyError(
      'Vapid private key is not a valid P-256 private key.',
      { cause: err }
    );
  }
  return padStart(curve.getPublicKey(), PUBLIC_KEY_LENGTH);
}

/**
 * The application server's long-lived P-256 signing key pair.
 *
 * Instances are immutable and safe to share between concurrent sends.
 */
export class VapidKeys {
  readonly #publicKey: Buffer;
  readonly #privateKey: Buffer;

  private constructor(publicKey: Buffer, privateKey: Buffer) {
    this.#publicKey = Buffer.from(publicKey);
    this.#privateKey = Buffer.from(privateKey);
    Object.freeze(this);
  }

  static generate(): VapidKeys {
    const curve = createECDH(CURVE_NAME);
    curve.generateKeys();

    return new VapidKeys(
      padStart(curve.getPublicKey(), PUBLIC_KEY_LENGTH),
      padStart(curve.getPrivateKey(), PRIVATE_KEY_LENGTH)
    );
  }

  static fromPrivateKey(privateKey: string | Uint8Array): VapidKeys {
    const privateKeyBuffer =
      typeof privateKey === 'string'
        ? validatePrivateKey(privateKey)
        : Buffer.from(privateKey);

    if (privateKeyBuffer.length !== PRIVATE_KEY_LENGTH) {
      throw new InvalidVapidKeyError(
        `Vapid private key should be ${PRIVATE_KEY_LENGTH} bytes long.`
      );
    }

    return new VapidKeys(derivePublicKey(privateKeyBuffer), privateKeyBuffer);
  }

  /**
   * Restores a key pair from the base64url strings produced by
   * {@link generateVAPIDKeys}. The public key has to be the one derived from
   * the private key.
   */
  static fromBase64Url(publicKey: string, privateKey: string): VapidKeys {
    const publicKeyBuffer = validatePublicKey(publicKey);
    const keys = VapidKeys.fromPrivateKey(privateKey);

    if (!keys.#publicKey.equals(publicKeyBuffer)) {
      throw new InvalidVapidKeyError(
        'Vapid public key does not belong to the Vapid private key.'
      );
    }
    return keys;
  }

  get publicKey(): Buffer {
    return Buffer.from(this.#publicKey);
  }

  get privateKey(): Buffer {
    return Buffer.from(this.#privateKey);
  }

  get publicKeyBase64Url(): string {
    return urlBase64.encode(this.#publicKey);
  }

  get privateKeyBase64Url(): string {
    return urlBase64.encode(this.#privateKey);
  }

  toPEM(): string {
    return ECPrivateKeyASN.encode(
      {
        version: 1,
        privateKey: this.#privateKey,
        parameters: PRIME_256_V1,
        publicKey: { unused: 0, data: this.#publicKey },
      },
      'pem',
      { label: 'EC PRIVATE KEY' }
    );
  }

  toPublicPEM(): string {
    return SubjectPublicKeyInfoASN.encode(
      {
        algorithm: { id: ID_EC_PUBLIC_KEY, curve: PRIME_256_V1 },
        publicKey: { unused: 0, data: this.#publicKey },
      },
      'pem',
      { label: 'PUBLIC KEY' }
    );
  }

  toJSON(): { publicKey: string; privateKey: string } {
    return {
      publicKey: this.publicKeyBase64Url,
      privateKey: this.privateKeyBase64Url,
    };
  }
}

export function generateVAPIDKeys(): { publicKey: string; privateKey: string } {
  return VapidKeys.generate().toJSON();
}
