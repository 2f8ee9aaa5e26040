'use strict';

import {
  CURVE_NAME,
  createCipheriv,
  createDecipheriv,
  createECDH,
  createHmac,
  randomBytes,
} from './crypto.js';
import { RECORD_SIZE } from './web-push-constants.js';
import {
  KeyAgreementError,
  PayloadTooLargeError,
  WebPushError,
} from './web-push-error.js';
import { validateAuth, validateP256dh, type SubscriberKeys } from './subscriber-keys.js';

const AES_GCM = 'aes-128-gcm';
const TAG_LENGTH = 16;
const KEY_LENGTH = 16;
const NONCE_LENGTH = 12;
const SALT_LENGTH = 16;
const SHA_256_LENGTH = 32;
const PUBLIC_KEY_LENGTH = 65;
const PAD_DELIMITER = 0x02;

// salt(16) || rs(4) || idlen(1) || keyid(65)
export const HEADER_LENGTH = SALT_LENGTH + 4 + 1 + PUBLIC_KEY_LENGTH;

/**
 * Largest plaintext that still fits the whole message, header included,
 * into one record once the delimiter, `padding` and the tag are added.
 */
export function getMaxPayloadLength(padding = 0): number {
  return RECORD_SIZE - HEADER_LENGTH - TAG_LENGTH - 1 - padding;
}

const WEBPUSH_INFO = Buffer.from('WebPush: info\0', 'ascii');
const KEY_INFO = Buffer.from('Content-Encoding: aes128gcm\0', 'ascii');
const NONCE_INFO = Buffer.from('Content-Encoding: nonce\0', 'ascii');

function HMAC_hash(key: Buffer, input: Buffer): Buffer {
  const hmac = createHmac('sha256', key);
  hmac.update(input);
  return hmac.digest();
}

export function HKDF_extract(salt: Buffer, ikm: Buffer): Buffer {
  return HMAC_hash(salt, ikm);
}

export function HKDF_expand(prk: Buffer, info: Buffer, l: number): Buffer {
  let output: Buffer = Buffer.alloc(0);
  let T: Buffer = Buffer.alloc(0);
  let counter = 0;
  const cbuf = Buffer.alloc(1);
  while (output.length < l) {
    cbuf.writeUIntBE(++counter, 0, 1);
    T = HMAC_hash(prk, Buffer.concat([T, info, cbuf]));
    output = Buffer.concat([output, T]);
  }

  return output.subarray(0, l);
}

export function HKDF(salt: Buffer, ikm: Buffer, info: Buffer, len: number): Buffer {
  return HKDF_expand(HKDF_extract(salt, ikm), info, len);
}

/**
 * Mixes the subscription's auth secret into the ECDH output. Both public
 * keys are bound into the info string, receiver first.
 */
export function webpushSecret(
  authSecret: Buffer,
  sharedSecret: Buffer,
  receiverPublicKey: Buffer,
  senderPublicKey: Buffer
): Buffer {
  return HKDF(
    authSecret,
    sharedSecret,
    Buffer.concat([WEBPUSH_INFO, receiverPublicKey, senderPublicKey]),
    SHA_256_LENGTH
  );
}

export function deriveKeyAndNonce(
  salt: Buffer,
  secret: Buffer
): { key: Buffer; nonce: Buffer } {
  const prk = HKDF_extract(salt, secret);
  return {
    key: HKDF_expand(prk, KEY_INFO, KEY_LENGTH),
    nonce: HKDF_expand(prk, NONCE_INFO, NONCE_LENGTH),
  };
}

function writeHeader(salt: Buffer, rs: number, keyid: Buffer): Buffer {
  if (keyid.length > 255) {
    throw new WebPushError('keyid is too large');
  }

  const ints = Buffer.alloc(5);
  ints.writeUIntBE(rs, 0, 4);
  ints.writeUIntBE(keyid.length, 4, 1);
  return Buffer.concat([salt, ints, keyid]);
}

export interface RecordHeader {
  salt: Buffer;
  rs: number;
  keyid: Buffer;
  record: Buffer;
}

export function readHeader(body: Buffer): RecordHeader {
  if (body.length < SALT_LENGTH + 5) {
    throw new WebPushError('Truncated aes128gcm header.');
  }

  const idlen = body.readUIntBE(SALT_LENGTH + 4, 1);
  const start = SALT_LENGTH + 5 + idlen;
  if (body.length < start) {
    throw new WebPushError('Truncated aes128gcm keyid.');
  }

  return {
    salt: body.subarray(0, SALT_LENGTH),
    rs: body.readUIntBE(SALT_LENGTH, 4),
    keyid: body.subarray(SALT_LENGTH + 5, start),
    record: body.subarray(start),
  };
}

/**
 * Everything needed to seal exactly one message for one subscriber.
 *
 * The one-time key pair and salt are created by
 * {@link createEncryptionContext} and never accepted from outside, and
 * {@link EncryptionContext.seal} refuses to run twice, so a key and nonce
 * pair can never cover two plaintexts.
 */
export class EncryptionContext {
  readonly localPublicKey: Buffer;
  readonly salt: Buffer;
  readonly #key: Buffer;
  readonly #nonce: Buffer;
  #sealed = false;

  constructor(localPublicKey: Buffer, salt: Buffer, key: Buffer, nonce: Buffer) {
    this.localPublicKey = localPublicKey;
    this.salt = salt;
    this.#key = key;
    this.#nonce = nonce;
  }

  get sealed(): boolean {
    return this.#sealed;
  }

  seal(plaintext: Buffer, padding = 0): Buffer {
    if (this.#sealed) {
      throw new WebPushError('An encryption context can only seal one message.');
    }

    if (!Number.isInteger(padding) || padding < 0) {
      throw new WebPushError('padding must be a non-negative integer.');
    }

    const maxPayloadLength = getMaxPayloadLength(padding);
    if (plaintext.length > maxPayloadLength) {
      throw new PayloadTooLargeError(plaintext.length, Math.max(maxPayloadLength, 0));
    }

    this.#sealed = true;

    const gcm = createCipheriv(AES_GCM, this.#key, this.#nonce);
    const delimiter = Buffer.alloc(padding + 1);
    delimiter.writeUIntBE(PAD_DELIMITER, 0, 1);

    const ciphertext = [gcm.update(plaintext), gcm.update(delimiter), gcm.final()];
    const tag = gcm.getAuthTag();
    if (tag.length !== TAG_LENGTH) {
      throw new WebPushError('invalid tag generated');
    }

    return Buffer.concat([
      writeHeader(this.salt, RECORD_SIZE, this.localPublicKey),
      ...ciphertext,
      tag,
    ]);
  }
}

export function createEncryptionContext(keys: SubscriberKeys): EncryptionContext {
  validateP256dh(keys.p256dh);
  validateAuth(keys.auth);

  const localCurve = createECDH(CURVE_NAME);
  const localPublicKey = localCurve.generateKeys();

  let sharedSecret: Buffer;
  try {
    sharedSecret = localCurve.computeSecret(keys.p256dh);
  } catch (err) {
    throw new KeyAgreementError(
      'Unable to agree on a shared secret with the subscription p256dh value.',
      { cause: err }
    );
  }

  const salt = randomBytes(SALT_LENGTH);
  const secret = webpushSecret(keys.auth, sharedSecret, keys.p256dh, localPublicKey);
  const { key, nonce } = deriveKeyAndNonce(salt, secret);

  return new EncryptionContext(localPublicKey, salt, key, nonce);
}

export interface ReceiverKeys {
  /** The subscriber's 32 byte P-256 private key. */
  privateKey: Uint8Array;
  authSecret: Uint8Array;
}

/**
 * Opens an `aes128gcm` push message the way a user agent would. Only the
 * single record form sent by {@link EncryptionContext.seal} is accepted.
 */
export function decrypt(body: Uint8Array, receiver: ReceiverKeys): Buffer {
  const { salt, rs, keyid, record } = readHeader(Buffer.from(body));

  if (keyid.length !== PUBLIC_KEY_LENGTH) {
    throw new WebPushError(
      `The keyid should be a ${PUBLIC_KEY_LENGTH} byte public key, got ${keyid.length}.`
    );
  }

  if (rs <= TAG_LENGTH + 1) {
    throw new WebPushError('The rs parameter has to be greater than ' + (TAG_LENGTH + 1));
  }

  if (record.length > rs) {
    throw new WebPushError('Multiple records are not supported.');
  }

  if (record.length < TAG_LENGTH + 1) {
    throw new WebPushError('Truncated aes128gcm record.');
  }

  const curve = createECDH(CURVE_NAME);
  let sharedSecret: Buffer;
  try {
    curve.setPrivateKey(Buffer.from(receiver.privateKey));
    sharedSecret = curve.computeSecret(keyid);
  } catch (err) {
    throw new KeyAgreementError('Unable to agree on a shared secret with the sender key.', {
      cause: err,
    });
  }

  const secret = webpushSecret(
    Buffer.from(receiver.authSecret),
    sharedSecret,
    curve.getPublicKey(),
    keyid
  );
  const { key, nonce } = deriveKeyAndNonce(salt, secret);

  const gcm = createDecipheriv(AES_GCM, key, nonce);
  gcm.setAuthTag(record.subarray(record.length - TAG_LENGTH));

  let padded: Buffer;
  try {
    padded = Buffer.concat([
      gcm.update(record.subarray(0, record.length - TAG_LENGTH)),
      gcm.final(),
    ]);
  } catch (err) {
    throw new WebPushError('Unable to decrypt record: authentication failed.', {
      cause: err,
    });
  }

  let end = padded.length - 1;
  while (end >= 0 && padded[end] === 0) {
    --end;
  }

  if (end < 0 || padded[end] !== PAD_DELIMITER) {
    throw new WebPushError('Invalid padding delimiter in final record.');
  }

  return padded.subarray(0, end);
}
