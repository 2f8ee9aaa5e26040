import { beforeAll, describe, expect, it } from 'vitest';

import {
  createNotification,
  createNotificationFromSubscription,
  validateUrgency,
} from '../src/notification.js';
import { InvalidNotificationError, KeyAgreementError } from '../src/web-push-error.js';
import { createReceiver, type Receiver } from './test-utils.js';

const ENDPOINT = 'https://push.example.net/send/abc123';

let receiver: Receiver;

beforeAll(async () => {
  receiver = await createReceiver();
});

describe('createNotification', () => {
  it('builds a frozen notification', () => {
    const notification = createNotification({
      payload: 'hello',
      endpoint: ENDPOINT,
      p256dh: receiver.p256dh,
      auth: receiver.auth,
      ttl: 0,
      topic: 'inbox-updates',
      urgency: 'high',
    });

    expect(Object.isFrozen(notification)).toBe(true);
    expect(notification.payload.toString()).toBe('hello');
    expect(notification.ttl).toBe(0);
    expect(notification.topic).toBe('inbox-updates');
    expect(notification.urgency).toBe('high');
    expect(notification.keys.p256dh).toHaveLength(65);
  });

  it('treats a missing payload as empty', () => {
    const notification = createNotification({
      endpoint: ENDPOINT,
      p256dh: receiver.p256dh,
      auth: receiver.auth,
    });
    expect(notification.payload).toHaveLength(0);
  });

  it.each([-1, 1.5, Number.NaN])('rejects a TTL of %d', (ttl) => {
    expect(() =>
      createNotification({ endpoint: ENDPOINT, p256dh: receiver.p256dh, auth: receiver.auth, ttl })
    ).toThrow('TTL should be a number and should be at least 0');
  });

  it('accepts a 32 character topic and rejects longer or non base64url ones', () => {
    const base = { endpoint: ENDPOINT, p256dh: receiver.p256dh, auth: receiver.auth };

    expect(createNotification({ ...base, topic: 'a'.repeat(32) }).topic).toBe('a'.repeat(32));
    expect(() => createNotification({ ...base, topic: 'a'.repeat(33) })).toThrow(InvalidNotificationError);
    expect(() => createNotification({ ...base, topic: 'has space' })).toThrow(InvalidNotificationError);
    expect(() => createNotification({ ...base, topic: '' })).toThrow(InvalidNotificationError);
  });

  it('rejects unknown urgencies', () => {
    expect(() => validateUrgency('urgent')).toThrow(
      "Unsupported urgency specified. The valid values are ['very-low', 'low', 'normal', 'high']."
    );
    expect(() => validateUrgency('very-low')).not.toThrow();
  });

  it.each(['not a url', 'http://push.example.net/send', ''])('rejects the endpoint "%s"', (endpoint) => {
    expect(() => createNotification({ endpoint, p256dh: receiver.p256dh, auth: receiver.auth })).toThrow(
      InvalidNotificationError
    );
  });

  it('allows plain http for a local push service', () => {
    const notification = createNotification({
      endpoint: 'http://localhost:8080/push',
      p256dh: receiver.p256dh,
      auth: receiver.auth,
    });
    expect(notification.endpoint).toBe('http://localhost:8080/push');
  });

  it('rejects an auth secret of the wrong size with KeyAgreementError', () => {
    expect(() =>
      createNotification({ endpoint: ENDPOINT, p256dh: receiver.p256dh, auth: Buffer.alloc(8, 1) })
    ).toThrow(KeyAgreementError);
  });
});

describe('createNotificationFromSubscription', () => {
  it('reads the browser subscription JSON', () => {
    const notification = createNotificationFromSubscription(
      {
        endpoint: ENDPOINT,
        expirationTime: null,
        keys: { p256dh: receiver.p256dh, auth: receiver.auth },
      },
      '{"title":"hi"}',
      { ttl: 60 }
    );

    expect(notification.endpoint).toBe(ENDPOINT);
    expect(notification.ttl).toBe(60);
    expect(notification.payload.toString()).toBe('{"title":"hi"}');
  });

  it('rejects a subscription without keys', () => {
    expect(() => createNotificationFromSubscription({ endpoint: ENDPOINT }, 'x')).toThrow(
      'Invalid push subscription: keys: Required'
    );
  });
});
