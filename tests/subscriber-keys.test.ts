import { beforeAll, describe, expect, it } from 'vitest';

import { createSubscriberKeys } from '../src/subscriber-keys.js';
import { KeyAgreementError } from '../src/web-push-error.js';
import { createReceiver, type Receiver } from './test-utils.js';

let receiver: Receiver;

beforeAll(async () => {
  receiver = await createReceiver();
});

describe('createSubscriberKeys', () => {
  it('decodes base64url keys', () => {
    const keys = createSubscriberKeys({ p256dh: receiver.p256dh, auth: receiver.auth });

    expect(keys.p256dh.equals(Buffer.from(receiver.publicKey))).toBe(true);
    expect(keys.auth.equals(Buffer.from(receiver.authSecret))).toBe(true);
    expect(Object.isFrozen(keys)).toBe(true);
  });

  it('accepts raw bytes', () => {
    const keys = createSubscriberKeys({ p256dh: receiver.publicKey, auth: receiver.authSecret });
    expect(keys.p256dh).toHaveLength(65);
    expect(keys.auth).toHaveLength(16);
  });

  it('tolerates "=" padding on stored keys', () => {
    const keys = createSubscriberKeys({ p256dh: receiver.p256dh + '=', auth: receiver.auth + '==' });
    expect(keys.auth.equals(Buffer.from(receiver.authSecret))).toBe(true);
  });

  it.each([15, 17, 32])('rejects a %i byte auth secret', (length) => {
    expect(() =>
      createSubscriberKeys({ p256dh: receiver.publicKey, auth: Buffer.alloc(length, 1) })
    ).toThrow(KeyAgreementError);
  });

  it('rejects a missing auth secret', () => {
    expect(() => createSubscriberKeys({ p256dh: receiver.p256dh, auth: '' })).toThrow(
      'No user auth provided for encryption.'
    );
  });

  it('rejects a truncated p256dh', () => {
    expect(() =>
      createSubscriberKeys({ p256dh: receiver.publicKey.subarray(0, 64), auth: receiver.authSecret })
    ).toThrow(KeyAgreementError);
  });

  it('rejects a compressed point', () => {
    const compressed = Buffer.from(receiver.publicKey);
    compressed[0] = 0x02;

    expect(() => createSubscriberKeys({ p256dh: compressed, auth: receiver.authSecret })).toThrow(
      KeyAgreementError
    );
  });

  it('rejects a point that is not on P-256', () => {
    const offCurve = Buffer.concat([Buffer.from([0x04]), Buffer.alloc(64)]);

    expect(() => createSubscriberKeys({ p256dh: offCurve, auth: receiver.authSecret })).toThrow(
      'The subscription p256dh value is not a point on the P-256 curve.'
    );
  });

  it('rejects characters outside the base64url alphabet', () => {
    expect(() => createSubscriberKeys({ p256dh: 'not/base64+', auth: receiver.auth })).toThrow(
      'The subscription p256dh value must be URL safe Base 64 encoded.'
    );
  });
});
