'use strict';

import { UnexpectedStatusError, type UnexpectedStatusDetails } from './web-push-error.js';

export const SubscriptionState = {
  /** The push service accepted the message. */
  ACTIVE: 'active',
  /** The subscription is gone for good and should be deleted. */
  EXPIRED: 'expired',
} as const;

export type SubscriptionState = (typeof SubscriptionState)[keyof typeof SubscriptionState];

/**
 * Maps a push service response onto the subscription's state.
 *
 * Only 2xx, 404 and 410 say something definite about the subscription.
 * Every other status (400, 413, 429, 5xx, ...) is thrown as an
 * {@link UnexpectedStatusError} so it is never mistaken for an expiry.
 */
export function getSubscriptionState(
  statusCode: number,
  body: string,
  details?: UnexpectedStatusDetails
): SubscriptionState {
  if (statusCode >= 200 && statusCode <= 299) {
    return SubscriptionState.ACTIVE;
  }

  if (statusCode === 404 || statusCode === 410) {
    return SubscriptionState.EXPIRED;
  }

  throw new UnexpectedStatusError(statusCode, body, details);
}
