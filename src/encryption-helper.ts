'use strict';

import { createEncryptionContext } from './ece.js';
import type { SubscriberKeys } from './subscriber-keys.js';

export interface EncryptOptions {
  /** Extra zero bytes after the delimiter, to hide the payload length. */
  padding?: number;
}

export interface EncryptedBody {
  localPublicKey: Buffer;
  salt: Buffer;
  /** The complete aes128gcm body, header included. */
  cipherText: Buffer;
}

export function toPayloadBuffer(payload: string | Uint8Array | undefined): Buffer {
  if (payload === undefined) {
    return Buffer.alloc(0);
  }
  return typeof payload === 'string' ? Buffer.from(payload, 'utf8') : Buffer.from(payload);
}

export const encrypt = function (
  keys: SubscriberKeys,
  payload: string | Uint8Array,
  options: EncryptOptions = {}
): EncryptedBody {
  const context = createEncryptionContext(keys);
  const cipherText = context.seal(toPayloadBuffer(payload), options.padding);

  return {
    localPublicKey: context.localPublicKey,
    salt: context.salt,
    cipherText,
  };
};
