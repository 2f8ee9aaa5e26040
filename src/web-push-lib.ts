'use strict';

import { encrypt } from './encryption-helper.js';
import type { Notification } from './notification.js';
import { getSubscriptionState, type SubscriptionState } from './subscription-state.js';
import { getVapidHeaders, validateExpirationSeconds, validateSubject } from './vapid-helper.js';
import { VapidKeys } from './vapid-keys.js';
import {
  DEFAULT_EXPIRATION_SECONDS,
  DEFAULT_TTL,
  supportedContentEncodings,
} from './web-push-constants.js';
import {
  InvalidVapidKeyError,
  WebPushError,
  type UnexpectedStatusDetails,
} from './web-push-error.js';

export interface WebPushOptions {
  /** A `mailto:` address or `https://` URL identifying the sender. */
  subject: string;
  vapidKeys: VapidKeys;
  /** Lifetime of each VAPID token. Defaults to 12 hours, at most 24. */
  expirationSeconds?: number;
  /** TTL used when a notification does not set its own. */
  defaultTtl?: number;
  /** Zero bytes appended after the padding delimiter of every message. */
  padding?: number;
  /** Milliseconds from Epoch; swapped out in tests. */
  clock?: () => number;
}

export interface WebPushRequest {
  endpoint: string;
  method: 'POST';
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * Builds encrypted, VAPID signed push requests and reads push service
 * responses. It holds no per-send state, so one instance can serve any
 * number of concurrent sends.
 */
export class WebPush {
  readonly subject: string;
  readonly vapidKeys: VapidKeys;
  readonly expirationSeconds: number;
  readonly defaultTtl: number;
  readonly padding: number;
  readonly #clock: () => number;

  constructor(options: WebPushOptions) {
    validateSubject(options.subject);

    if (!(options.vapidKeys instanceof VapidKeys)) {
      throw new InvalidVapidKeyError('vapidKeys must be a VapidKeys instance.');
    }

    const expirationSeconds = options.expirationSeconds ?? DEFAULT_EXPIRATION_SECONDS;
    validateExpirationSeconds(expirationSeconds);

    const defaultTtl = options.defaultTtl ?? DEFAULT_TTL;
    if (!Number.isInteger(defaultTtl) || defaultTtl < 0) {
      throw new WebPushError('defaultTtl should be a number and should be at least 0');
    }

    const padding = options.padding ?? 0;
    if (!Number.isInteger(padding) || padding < 0) {
      throw new WebPushError('padding must be a non-negative integer.');
    }

    this.subject = options.subject;
    this.vapidKeys = options.vapidKeys;
    this.expirationSeconds = expirationSeconds;
    this.defaultTtl = defaultTtl;
    this.padding = padding;
    this.#clock = options.clock ?? Date.now;
  }

  getBody(notification: Notification): Buffer {
    return encrypt(notification.keys, notification.payload, {
      padding: this.padding,
    }).cipherText;
  }

  getHeaders(notification: Notification, contentLength: number): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Encoding': supportedContentEncodings.AES_128_GCM,
      'Content-Length': String(contentLength),
      TTL: String(notification.ttl ?? this.defaultTtl),
    };

    if (notification.urgency) {
      headers.Urgency = notification.urgency;
    }

    if (notification.topic) {
      headers.Topic = notification.topic;
    }

    const vapidHeaders = getVapidHeaders({
      audience: new URL(notification.endpoint).origin,
      subject: this.subject,
      vapidKeys: this.vapidKeys,
      expirationSeconds: this.expirationSeconds,
      now: this.#clock(),
    });
    headers.Authorization = vapidHeaders.Authorization;

    return headers;
  }

  buildRequest(notification: Notification): WebPushRequest {
    try {
      const body = this.getBody(notification);

      return {
        endpoint: notification.endpoint,
        method: 'POST',
        headers: this.getHeaders(notification, body.length),
        body,
      };
    } catch (err) {
      if (err instanceof WebPushError) {
        throw err;
      }
      throw new WebPushError('Unable to construct web push request', { cause: err });
    }
  }

  interpretResponse(
    statusCode: number,
    body: string,
    details?: UnexpectedStatusDetails
  ): SubscriptionState {
    return getSubscriptionState(statusCode, body, details);
  }
}
