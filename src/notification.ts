'use strict';

import { z } from 'zod';

import { toPayloadBuffer } from './encryption-helper.js';
import { createSubscriberKeys, type SubscriberKeys } from './subscriber-keys.js';
import {
  MAX_TOPIC_LENGTH,
  supportedUrgencies,
  type Urgency,
} from './web-push-constants.js';
import { InvalidNotificationError } from './web-push-error.js';

const TOPIC_PATTERN = /^[A-Za-z0-9_-]+$/;
const LOCAL_HOSTNAMES = new Set(['localhost', '127.0.0.1', '[::1]']);

/**
 * A single message bound for one subscription. Built once per send and
 * never modified afterwards.
 */
export interface Notification {
  readonly payload: Buffer;
  readonly endpoint: string;
  readonly keys: SubscriberKeys;
  /** Seconds the push service may hold the message. */
  readonly ttl?: number;
  readonly topic?: string;
  readonly urgency?: Urgency;
}

export interface NotificationOptions {
  ttl?: number;
  topic?: string;
  urgency?: Urgency;
}

export interface NotificationInit extends NotificationOptions {
  payload?: string | Uint8Array;
  endpoint: string;
  p256dh: string | Uint8Array;
  auth: string | Uint8Array;
}

export const pushSubscriptionSchema = z.object({
  endpoint: z.string().url('Invalid endpoint URL'),
  expirationTime: z.number().nullable().optional(),
  keys: z.object({
    p256dh: z.string().min(1, 'p256dh key is required'),
    auth: z.string().min(1, 'auth key is required'),
  }),
});

export type PushSubscriptionJSON = z.infer<typeof pushSubscriptionSchema>;

export function validateEndpoint(endpoint: string): URL {
  if (typeof endpoint !== 'string' || endpoint.length === 0) {
    throw new InvalidNotificationError(
      'The subscription endpoint must be a string with a valid URL.'
    );
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (err) {
    throw new InvalidNotificationError(
      'The subscription endpoint must be a string with a valid URL.',
      { cause: err }
    );
  }

  const isLocal = url.protocol === 'http:' && LOCAL_HOSTNAMES.has(url.hostname);
  if (url.protocol !== 'https:' && !isLocal) {
    throw new InvalidNotificationError(
      'The subscription endpoint must use https. ' + endpoint
    );
  }
  return url;
}

export function validateTtl(ttl: number): void {
  if (!Number.isInteger(ttl) || ttl < 0) {
    throw new InvalidNotificationError('TTL should be a number and should be at least 0');
  }
}

export function validateTopic(topic: string): void {
  if (topic.length === 0 || topic.length > MAX_TOPIC_LENGTH || !TOPIC_PATTERN.test(topic)) {
    throw new InvalidNotificationError(
      `Topic must be 1 to ${MAX_TOPIC_LENGTH} characters of the URL safe Base 64 alphabet.`
    );
  }
}

export function validateUrgency(urgency: string): asserts urgency is Urgency {
  const urgencies: readonly string[] = Object.values(supportedUrgencies);
  if (!urgencies.includes(urgency)) {
    throw new InvalidNotificationError(
      "Unsupported urgency specified. The valid values are ['" +
        urgencies.join("', '") +
        "']."
    );
  }
}

export function createNotification(init: NotificationInit): Notification {
  validateEndpoint(init.endpoint);

  if (init.ttl !== undefined) {
    validateTtl(init.ttl);
  }
  if (init.topic !== undefined) {
    validateTopic(init.topic);
  }
  if (init.urgency !== undefined) {
    validateUrgency(init.urgency);
  }

  const keys = createSubscriberKeys({ p256dh: init.p256dh, auth: init.auth });

  return Object.freeze({
    payload: toPayloadBuffer(init.payload),
    endpoint: init.endpoint,
    keys,
    ttl: init.ttl,
    topic: init.topic,
    urgency: init.urgency,
  });
}

/**
 * Builds a notification from the JSON a browser returns from
 * `PushSubscription.toJSON()`.
 */
export function createNotificationFromSubscription(
  subscription: unknown,
  payload?: string | Uint8Array,
  options: NotificationOptions = {}
): Notification {
  const parsed = pushSubscriptionSchema.safeParse(subscription);
  if (!parsed.success) {
    throw new InvalidNotificationError(
      'Invalid push subscription: ' +
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ')
    );
  }

  return createNotification({
    ...options,
    payload,
    endpoint: parsed.data.endpoint,
    p256dh: parsed.data.keys.p256dh,
    auth: parsed.data.keys.auth,
  });
}
