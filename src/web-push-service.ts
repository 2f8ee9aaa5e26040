'use strict';

import type { Notification } from './notification.js';
import type { SubscriptionState } from './subscription-state.js';
import { WebPush, type WebPushOptions } from './web-push-lib.js';
import {
  UnexpectedStatusError,
  WebPushTransportError,
} from './web-push-error.js';

export type WebPushLogger = Pick<Console, 'debug' | 'warn'>;

/**
 * A way of delivering the requests a {@link WebPush} builds. The crypto
 * stays in {@link WebPush}; subclasses only own the HTTP side.
 */
export abstract class WebPushService {
  protected readonly webPush: WebPush;

  constructor(webPush: WebPush) {
    this.webPush = webPush;
  }

  get subject(): string {
    return this.webPush.subject;
  }

  get vapidKeys(): WebPush['vapidKeys'] {
    return this.webPush.vapidKeys;
  }

  /**
   * Sends one notification.
   *
   * Resolves to the subscription's state. Rejects with
   * {@link UnexpectedStatusError} for statuses that say nothing certain
   * about the subscription, and with {@link WebPushTransportError} when no
   * response arrived at all.
   */
  abstract send(notification: Notification): Promise<SubscriptionState>;
}

export type FetchFunction = typeof fetch;

export interface FetchWebPushServiceOptions {
  fetch?: FetchFunction;
  /** Milliseconds before the request is aborted. */
  timeout?: number;
  logger?: WebPushLogger;
}

function headersToRecord(headers: Headers): Record<string, string> {
  const record: Record<string, string> = {};
  headers.forEach((value, key) => {
    record[key] = value;
  });
  return record;
}

/**
 * Delivers notifications with the global `fetch` of Node.js.
 */
export class FetchWebPushService extends WebPushService {
  readonly #fetch: FetchFunction;
  readonly #timeout?: number;
  readonly #logger: WebPushLogger;

  constructor(webPush: WebPush | WebPushOptions, options: FetchWebPushServiceOptions = {}) {
    super(webPush instanceof WebPush ? webPush : new WebPush(webPush));
    this.#fetch = options.fetch ?? fetch;
    this.#timeout = options.timeout;
    this.#logger = options.logger ?? console;
  }

  async send(notification: Notification): Promise<SubscriptionState> {
    const request = this.webPush.buildRequest(notification);
    const fetchFn = this.#fetch;

    let response: Response;
    let responseText: string;
    try {
      response = await fetchFn(request.endpoint, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: this.#timeout === undefined ? undefined : AbortSignal.timeout(this.#timeout),
      });
      responseText = await response.text();
    } catch (err) {
      throw new WebPushTransportError(request.endpoint, { cause: err });
    }

    this.#logger.debug('Push response', {
      endpoint: request.endpoint.slice(0, 50),
      status: response.status,
      body: responseText.slice(0, 200),
    });

    try {
      return this.webPush.interpretResponse(response.status, responseText, {
        endpoint: request.endpoint,
        headers: headersToRecord(response.headers),
      });
    } catch (err) {
      if (err instanceof UnexpectedStatusError) {
        this.#logger.warn(
          `Received a response with an unsuccessful HTTP status code: [${err.statusCode}] - ${err.body}`
        );
      }
      throw err;
    }
  }
}
